import { conformalInner, type Mirror, type Vec2 } from './conformal.js';

export type MirrorKeep = 'inside' | 'outside';

export type MirrorShape =
  | { kind: 'line'; normal: Vec2; offset: number }
  | { kind: 'circle'; center: Vec2; radius: number; keep: MirrorKeep };

const LINE_EPSILON = 1e-12;

/**
 * Line `normal · q = offset`; the kept side is `normal · q >= offset`.
 * The normal is normalised, so the signed distance of a lifted point is the
 * Euclidean distance to the line.
 */
export const lineMirror = (normal: Vec2, offset = 0): Mirror => {
  const length = Math.hypot(normal[0], normal[1]);
  if (!(length > 0)) {
    throw new Error('[mirrors] line normal must be non-zero');
  }
  const nx = normal[0] / length;
  const ny = normal[1] / length;
  const d = offset / length;
  return [d, d, nx, ny];
};

/**
 * Circle of the given centre and radius. For a lifted point `q` the signed
 * distance is `(r² - |q - c|²) / 2r` when keeping the inside, its negation
 * when keeping the outside.
 */
export const circleMirror = (center: Vec2, radius: number, keep: MirrorKeep = 'inside'): Mirror => {
  if (!(radius > 0) || !Number.isFinite(radius)) {
    throw new Error(`[mirrors] circle radius must be positive and finite (received ${radius})`);
  }
  const k = keep === 'inside' ? -1 / radius : 1 / radius;
  const c2 = center[0] * center[0] + center[1] * center[1];
  const r2 = radius * radius;
  return [(-k * (1 + c2 - r2)) / 2, (k * (1 - c2 + r2)) / 2, -k * center[0], -k * center[1]];
};

export const normalizeMirror = (mirror: Mirror): Mirror => {
  const norm = conformalInner(mirror, mirror);
  if (!(norm > 0)) {
    throw new Error('[mirrors] mirror vector must be spacelike');
  }
  const scale = 1 / Math.sqrt(norm);
  return [mirror[0] * scale, mirror[1] * scale, mirror[2] * scale, mirror[3] * scale];
};

export const mirrorFromShape = (shape: MirrorShape): Mirror =>
  shape.kind === 'line'
    ? lineMirror(shape.normal, shape.offset)
    : circleMirror(shape.center, shape.radius, shape.keep);

/** Recovers the Euclidean line or circle a mirror vector describes. */
export const describeMirror = (mirror: Mirror): MirrorShape => {
  const [m, p, x, y] = normalizeMirror(mirror);
  const k = p - m;
  if (Math.abs(k) < LINE_EPSILON) {
    return { kind: 'line', normal: [x, y], offset: m };
  }
  const center: Vec2 = [-x / k, -y / k];
  return {
    kind: 'circle',
    center,
    radius: Math.abs(1 / k),
    keep: k < 0 ? 'inside' : 'outside',
  };
};
