import type { Mirror } from './conformal.js';
import { lineMirror } from './mirrors.js';

export type TriangleCurvature = 'spherical' | 'euclidean' | 'hyperbolic';

/** Coxeter branch order; `null` is ∞ (mirrors meeting at angle 0). */
export type BranchOrder = number | null;

const FLAT_TOLERANCE = 1e-9;

const assertBranchOrder = (label: string, value: BranchOrder) => {
  if (value !== null && (!Number.isInteger(value) || value < 2)) {
    throw new Error(`[triangle-mirrors] ${label} must be an integer >= 2 or null (received ${value})`);
  }
};

const branchAngle = (order: BranchOrder): number => (order === null ? 0 : Math.PI / order);

const reciprocal = (order: BranchOrder): number => (order === null ? 0 : 1 / order);

export const formatBranchOrder = (order: BranchOrder): string => (order === null ? '∞' : String(order));

export const triangleCurvature = (p: BranchOrder, q: BranchOrder): TriangleCurvature => {
  const excess = reciprocal(p) + reciprocal(q) - 0.5;
  if (Math.abs(excess) < FLAT_TOLERANCE) return 'euclidean';
  return excess > 0 ? 'spherical' : 'hyperbolic';
};

// m1 meets the x axis at the origin at angle π/p. For p = ∞ it is the circle of
// diameter 1 tangent to the x axis there, keeping the outside.
const secondMirror = (p: BranchOrder): Mirror => {
  if (p === null) return [-1, 1, 0, -1];
  const theta = branchAngle(p);
  return lineMirror([Math.sin(theta), -Math.cos(theta)], 0);
};

// Every mirror centred on the x axis and through (1, 0) has the form [a, -1, a, 0]
// with unit norm; `a` is fixed by the angle with m1.
const thirdMirror = (m1: Mirror, q: BranchOrder): Mirror => {
  let a = (m1[1] - Math.cos(branchAngle(q))) / (m1[2] - m1[0]);
  if (Math.abs(a + 1) < FLAT_TOLERANCE) {
    // The vertical line x = 1.
    a = -1;
  }
  return [a, -1, a, 0];
};

/**
 * Mirrors of the {p, q} triangle group. The fundamental triangle has its
 * π/p corner at the origin, its right angle on the x axis at (1, 0) and its
 * π/q corner on m1.
 *
 * Gram matrix of the result: <m0, m1> = -cos(π/p), <m1, m2> = -cos(π/q),
 * <m0, m2> = 0.
 */
export const triangleMirrors = (p: BranchOrder, q: BranchOrder): [Mirror, Mirror, Mirror] => {
  assertBranchOrder('p', p);
  assertBranchOrder('q', q);
  const m0 = lineMirror([0, 1], 0);
  const m1 = secondMirror(p);
  return [m0, m1, thirdMirror(m1, q)];
};

/**
 * Mirrors of the {p, q, r} group: the {p, q} triangle plus a fourth mirror
 * orthogonal to m0 and m1 and meeting m2 at π/r.
 *
 * For finite p the fourth mirror is a circle about the origin; of the two
 * solutions the one keeping the origin is taken. For p = ∞ it is a circle
 * through the cusp at the origin, centred on the x axis.
 *
 * Symbols whose Gram matrix is positive definite ({3, 3, 3}, {4, 3, 3},
 * {5, 3, 3}, ...) have no such configuration and are rejected.
 */
export const rank4Mirrors = (
  p: BranchOrder,
  q: BranchOrder,
  r: BranchOrder,
): [Mirror, Mirror, Mirror, Mirror] => {
  assertBranchOrder('r', r);
  const [m0, m1, m2] = triangleMirrors(p, q);
  const a = m2[0];
  const k = Math.cos(branchAngle(r));
  const symbol = `{${[p, q, r].map(formatBranchOrder).join(', ')}}`;
  const unrealisable = () =>
    new Error(`[triangle-mirrors] ${symbol} has no realisation by circles in the plane`);

  if (p === null) {
    // [α, -α, 1, 0] is orthogonal to m0 and m1 and has unit norm.
    if (Math.abs(1 - a) < FLAT_TOLERANCE) throw unrealisable();
    const alpha = -(k + a) / (1 - a);
    return [m0, m1, m2, [alpha, -alpha, 1, 0]];
  }

  // [α, β, 0, 0] with β² - α² = 1 and -aα - β = -k.
  const quadratic = a * a - 1;
  let alpha: number;
  if (quadratic === 0) {
    if (k === 0) throw unrealisable();
    alpha = (k * k - 1) / (2 * a * k);
  } else {
    const discriminant = a * a + k * k - 1;
    if (discriminant < 0) throw unrealisable();
    const root = Math.sqrt(discriminant);
    alpha = Math.min((a * k + root) / quadratic, (a * k - root) / quadratic);
  }
  return [m0, m1, m2, [alpha, k - a * alpha, 0, 0]];
};

/** Mirror 2, opposite the π/p corner, is the tile edge. */
export const defaultTriangleEdges = (rank: number): boolean[] =>
  Array.from({ length: rank }, (_, index) => index === 2);
