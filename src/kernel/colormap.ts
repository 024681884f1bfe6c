export type Rgba = readonly [r: number, g: number, b: number, a: number];

export const WHITE: Rgba = Object.freeze([1, 1, 1, 1] as const);

export const NEUTRAL_GRAY: Rgba = Object.freeze([0.5, 0.5, 0.5, 1] as const);

// Band around the middle of the range drawn as a white contour line.
const CONTOUR_LOW = 0.49;
const CONTOUR_HIGH = 0.51;

// Degree-6 polynomial fit of viridis, lowest order first.
const VIRIDIS_COEFFS: readonly (readonly [number, number, number])[] = [
  [0.2777273272234177, 0.005407344544966578, 0.3340998053353061],
  [0.1050930431085774, 1.404613529898575, 1.384590162594685],
  [-0.3308618287255563, 0.214847559468213, 0.09509516302823659],
  [-4.634230498983486, -5.799100973351585, -19.33244095627987],
  [6.228269936347081, 14.17993336680509, 56.69055260068105],
  [4.776384997670288, -13.74514537774601, -65.35303263337234],
  [-5.435455855934631, 4.645852612178535, 26.3124352495832],
];

const clamp01 = (value: number): number => (value < 0 ? 0 : value > 1 ? 1 : value);

const horner = (channel: 0 | 1 | 2, t: number): number => {
  let acc = 0;
  for (let index = VIRIDIS_COEFFS.length - 1; index >= 0; index--) {
    acc = acc * t + VIRIDIS_COEFFS[index][channel];
  }
  return acc;
};

/** Position of `value` inside [min, max], clamped to [0, 1]. */
export const normalizeToRange = (value: number, min: number, max: number): number => {
  const span = max - min;
  if (!(span > 0) || Number.isNaN(value)) return 0;
  if (value <= min) return 0;
  if (value >= max) return 1;
  return (value - min) / span;
};

export const perceptualColormap = (value: number, min: number, max: number): Rgba => {
  const t = normalizeToRange(value, min, max);
  if (t > CONTOUR_LOW && t < CONTOUR_HIGH) {
    return WHITE;
  }
  return [clamp01(horner(0, t)), clamp01(horner(1, t)), clamp01(horner(2, t)), 1];
};
