import test from 'node:test';
import assert from 'node:assert/strict';
import fc from 'fast-check';

import {
  conformalInner,
  isInside,
  lift,
  nullConeResidual,
  project,
  reflectsThrough,
  signedDistance,
  type ConformalPoint,
  type Mirror,
} from '../src/geometry/conformal.js';
import { circleMirror, lineMirror } from '../src/geometry/mirrors.js';

const coordinate = fc.double({ min: -100, max: 100, noNaN: true });
const angle = fc.double({ min: 0, max: 2 * Math.PI, noNaN: true });
const component = fc.double({ min: -3, max: 3, noNaN: true });
const vector4 = fc.tuple(component, component, component, component);
const spacelike = vector4.filter((vector) => conformalInner(vector, vector) > 0.1);

// Rounding grows with the mirror's Euclidean size relative to its norm.
const returnsAfterTwoReflections = (mirror: Mirror, point: ConformalPoint): boolean => {
  const twice = reflectsThrough(mirror, reflectsThrough(mirror, point));
  const euclidean = mirror.reduce((sum, value) => sum + value * value, 0);
  const scale =
    Math.max(1, ...point.map(Math.abs)) * (1 + euclidean / conformalInner(mirror, mirror)) ** 2;
  return twice.every((value, index) => Math.abs(value - point[index]) <= 1e-12 * scale);
};

const assertClose = (actual: number, expected: number, tolerance: number, label = 'value') => {
  assert.ok(
    Math.abs(actual - expected) <= tolerance,
    `${label}: expected ${expected}, received ${actual}`,
  );
};

test('project inverts lift', () => {
  fc.assert(
    fc.property(coordinate, coordinate, (x, y) => {
      const [px, py] = project(lift([x, y]));
      const tolerance = 1e-9 * Math.max(1, Math.abs(x), Math.abs(y)) ** 2;
      return Math.abs(px - x) <= tolerance && Math.abs(py - y) <= tolerance;
    }),
  );
});

test('lifted points lie on the null cone', () => {
  fc.assert(
    fc.property(coordinate, coordinate, (x, y) => Math.abs(nullConeResidual(lift([x, y]))) < 1e-6),
  );
});

test('lift places the origin at [1/2, -1/2, 0, 0]', () => {
  assert.deepEqual(lift([0, 0]), [0.5, -0.5, 0, 0]);
  assert.deepEqual(lift([-1, 0.5]), [1.125, 0.125, -1, 0.5]);
});

test('reflection through the unit circle inverts the plane', () => {
  const unitCircle: Mirror = [0, -1, 0, 0];
  const reflected = reflectsThrough(unitCircle, lift([2, 0]));
  assert.deepEqual(reflected, [2.5, -1.5, 2, 0]);
  assert.deepEqual(project(reflected), [0.5, 0]);
});

test('single reflection across the y axis flips x', () => {
  const mirror: Mirror = [0, 0, 1, 0];
  const point = lift([-1, 0.5]);
  assert.equal(isInside(mirror, point), false);
  const reflected = reflectsThrough(mirror, point);
  assert.deepEqual(reflected, [1.125, 0.125, 1, 0.5]);
  assert.equal(isInside(mirror, reflected), true);
});

test('reflection moves a point to the opposite side of its mirror', () => {
  fc.assert(
    fc.property(angle, fc.double({ min: -5, max: 5, noNaN: true }), coordinate, coordinate, (theta, offset, x, y) => {
      const mirror = lineMirror([Math.cos(theta), Math.sin(theta)], offset);
      const point = lift([x, y]);
      const before = signedDistance(mirror, point);
      const after = signedDistance(mirror, reflectsThrough(mirror, point));
      return Math.abs(before + after) <= 1e-9 * Math.max(1, Math.abs(before));
    }),
  );
});

test('reflection is an involution', () => {
  fc.assert(
    fc.property(angle, coordinate, coordinate, (theta, x, y) => {
      const mirror = lineMirror([Math.cos(theta), Math.sin(theta)], 0.25);
      const point = lift([x, y]);
      const twice = reflectsThrough(mirror, reflectsThrough(mirror, point));
      const [tx, ty] = project(twice);
      const tolerance = 1e-9 * Math.max(1, Math.abs(x), Math.abs(y)) ** 2;
      return Math.abs(tx - x) <= tolerance && Math.abs(ty - y) <= tolerance;
    }),
  );
});

test('reflecting twice through a circle returns the lifted point', () => {
  fc.assert(
    fc.property(
      fc.double({ min: -5, max: 5, noNaN: true }),
      fc.double({ min: -5, max: 5, noNaN: true }),
      fc.double({ min: 0.05, max: 10, noNaN: true }),
      fc.boolean(),
      coordinate,
      coordinate,
      (cx, cy, radius, keepInside, x, y) =>
        returnsAfterTwoReflections(
          circleMirror([cx, cy], radius, keepInside ? 'inside' : 'outside'),
          lift([x, y]),
        ),
    ),
  );
});

test('reflecting twice through any spacelike vector is the identity', () => {
  fc.assert(
    fc.property(spacelike, vector4, (mirror, point) => returnsAfterTwoReflections(mirror, point)),
  );
});

test('reflection preserves the inner product', () => {
  const mirror = lineMirror([1, 2], 0.5);
  const a = lift([0.3, -1.2]);
  const b = lift([2.5, 0.75]);
  const ra = reflectsThrough(mirror, a);
  const rb = reflectsThrough(mirror, b);
  assertClose(conformalInner(ra, rb), conformalInner(a, b), 1e-12, 'inner product');
});

test('isInside agrees with the sign of signedDistance', () => {
  fc.assert(
    fc.property(vector4, vector4, (mirror, point) => {
      return isInside(mirror, point) === signedDistance(mirror, point) >= 0;
    }),
  );
  fc.assert(
    fc.property(spacelike, coordinate, coordinate, (mirror, x, y) => {
      const point = lift([x, y]);
      return isInside(mirror, point) === signedDistance(mirror, point) >= 0;
    }),
  );
});

test('points on a mirror count as inside', () => {
  const mirror: Mirror = [0, 0, 1, 0];
  assert.equal(isInside(mirror, lift([0, 0.3])), true);
});

test('a null mirror leaves the point untouched', () => {
  const point: ConformalPoint = lift([0.4, -0.2]);
  assert.equal(reflectsThrough([1, 1, 0, 0], point), point);
});
