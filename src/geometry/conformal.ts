/**
 * Conformal point model of the plane. Points and mirrors share the 4-vector
 * layout `[m, p, x, y]`, with `m` timelike and `p, x, y` spacelike:
 *
 *   <a, b> = -a.m b.m + a.p b.p + a.x b.x + a.y b.y
 *
 * A plane point lifts onto the null cone; a mirror is a spacelike vector whose
 * orthogonal complement is a line or circle of the plane.
 */
export type ConformalPoint = readonly [m: number, p: number, x: number, y: number];

export type Mirror = readonly [m: number, p: number, x: number, y: number];

export type Vec2 = readonly [x: number, y: number];

export const conformalInner = (
  a: readonly [number, number, number, number],
  b: readonly [number, number, number, number],
): number => -a[0] * b[0] + a[1] * b[1] + a[2] * b[2] + a[3] * b[3];

export const lift = (xy: Vec2): ConformalPoint => {
  const n = 0.5 * (xy[0] * xy[0] + xy[1] * xy[1]);
  return [n + 0.5, n - 0.5, xy[0], xy[1]];
};

/** Inverse of `lift`. Not defined at the point at infinity (m == p). */
export const project = (point: ConformalPoint): Vec2 => {
  const w = point[0] - point[1];
  return [point[2] / w, point[3] / w];
};

export const signedDistance = (mirror: Mirror, point: ConformalPoint): number =>
  conformalInner(mirror, point);

/** Points exactly on the mirror count as inside. */
export const isInside = (mirror: Mirror, point: ConformalPoint): boolean =>
  signedDistance(mirror, point) >= 0;

export const reflectsThrough = (mirror: Mirror, point: ConformalPoint): ConformalPoint => {
  const norm = conformalInner(mirror, mirror);
  if (norm === 0) {
    return point;
  }
  const s = (2 * conformalInner(mirror, point)) / norm;
  return [
    point[0] - s * mirror[0],
    point[1] - s * mirror[1],
    point[2] - s * mirror[2],
    point[3] - s * mirror[3],
  ];
};

/** Deviation from the null cone; zero for a lifted point up to rounding. */
export const nullConeResidual = (point: ConformalPoint): number => conformalInner(point, point);
