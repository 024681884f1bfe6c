import { lift, type ConformalPoint, type Mirror, type Vec2 } from '../geometry/conformal.js';
import { MAX_GENERATORS } from '../group/automaton.js';

export const MAX_MIRRORS = MAX_GENERATORS;

export const RENDER_FLAG_HIGHLIGHT_FUNDAMENTAL = 1 << 0;
export const RENDER_FLAG_ELEMENT_COLORING = 1 << 1;
export const RENDER_FLAG_TRAILING_GENERATOR = 1 << 2;

const KNOWN_FLAGS =
  RENDER_FLAG_HIGHLIGHT_FUNDAMENTAL | RENDER_FLAG_ELEMENT_COLORING | RENDER_FLAG_TRAILING_GENERATOR;

export type RenderModeFlags = {
  highlightFundamental: boolean;
  elementColoring: boolean;
  trailingGenerator: boolean;
};

/**
 * Per-frame kernel configuration. Immutable once built; the tables it is used
 * with travel separately in the frame.
 *  - scale: model units covered by half the viewport width and height
 *  - colorScale: upper end of the colormap input range
 *  - depth: maximum number of reduction rounds per pixel
 */
export type RenderParams = {
  readonly mirrors: readonly Mirror[];
  readonly edges: readonly boolean[];
  readonly cutMirror: Mirror;
  readonly referencePoint: ConformalPoint;
  readonly scale: Vec2;
  readonly colorScale: number;
  readonly depth: number;
  readonly flags: number;
};

export type RenderParamsInit = {
  mirrors: readonly Mirror[];
  edges?: readonly boolean[];
  cutMirror?: Mirror;
  referencePoint?: ConformalPoint;
  scale?: Vec2;
  colorScale?: number;
  depth?: number;
  flags?: number;
};

const RENDER_PARAM_BOUNDS = {
  depth: { min: 1, max: 4096 },
  colorScale: { min: 1e-6, max: 1000 },
  scale: { min: 1e-9, max: 1e9 },
} as const;

const DEFAULT_DEPTH = 50;
const DEFAULT_COLOR_SCALE = 1;
const DEFAULT_SCALE: Vec2 = [1, 1];
const DEFAULT_FLAGS = RENDER_FLAG_HIGHLIGHT_FUNDAMENTAL;

/** Everything is outside this mirror, so the sticker lookup uses column 0. */
export const NEVER_INSIDE_MIRROR: Mirror = Object.freeze([1, 0, 0, 0] as const);

export const ORIGIN_POINT: ConformalPoint = Object.freeze(lift([0, 0]));

const clamp = (value: number, min: number, max: number) => {
  if (Number.isNaN(value)) return min;
  if (!Number.isFinite(value)) return value > 0 ? max : min;
  if (value < min) return min;
  if (value > max) return max;
  return value;
};

const isFiniteVector = (vector: readonly number[]) => vector.every((entry) => Number.isFinite(entry));

const sanitizeMirrors = (mirrors: readonly Mirror[]): Mirror[] => {
  if (mirrors.length > MAX_MIRRORS) {
    console.warn(
      `[render-params] ${mirrors.length} mirrors supplied, keeping the first ${MAX_MIRRORS}`,
    );
  }
  return mirrors.slice(0, MAX_MIRRORS).map((mirror, index) => {
    if (!isFiniteVector(mirror)) {
      throw new Error(`[render-params] mirror ${index} has non-finite components`);
    }
    return [mirror[0], mirror[1], mirror[2], mirror[3]];
  });
};

const sanitizeEdges = (edges: readonly boolean[] | undefined, count: number): boolean[] =>
  Array.from({ length: count }, (_, index) => edges?.[index] === true);

const sanitizeScale = (scale: Vec2 | undefined): Vec2 => {
  const source = scale ?? DEFAULT_SCALE;
  const bounds = RENDER_PARAM_BOUNDS.scale;
  return [clamp(source[0], bounds.min, bounds.max), clamp(source[1], bounds.min, bounds.max)];
};

const sanitizeDepth = (depth: number | undefined): number => {
  if (depth == null) return DEFAULT_DEPTH;
  const bounds = RENDER_PARAM_BOUNDS.depth;
  return Math.trunc(clamp(depth, bounds.min, bounds.max));
};

const sanitizeColorScale = (colorScale: number | undefined): number => {
  if (colorScale == null) return DEFAULT_COLOR_SCALE;
  const bounds = RENDER_PARAM_BOUNDS.colorScale;
  return clamp(colorScale, bounds.min, bounds.max);
};

const sanitizePoint = (point: ConformalPoint | undefined): ConformalPoint => {
  if (!point || !isFiniteVector(point) || point[0] - point[1] === 0) {
    return ORIGIN_POINT;
  }
  return [point[0], point[1], point[2], point[3]];
};

export const createRenderParams = (init: RenderParamsInit): RenderParams => {
  const mirrors = sanitizeMirrors(init.mirrors);
  const cut = init.cutMirror;
  const cutMirror: Mirror =
    cut && isFiniteVector(cut) ? [cut[0], cut[1], cut[2], cut[3]] : NEVER_INSIDE_MIRROR;
  return {
    mirrors,
    edges: sanitizeEdges(init.edges, mirrors.length),
    cutMirror,
    referencePoint: sanitizePoint(init.referencePoint),
    scale: sanitizeScale(init.scale),
    colorScale: sanitizeColorScale(init.colorScale),
    depth: sanitizeDepth(init.depth),
    flags: (init.flags ?? DEFAULT_FLAGS) & KNOWN_FLAGS,
  };
};

export const encodeRenderFlags = (mode: Partial<RenderModeFlags>): number =>
  (mode.highlightFundamental ? RENDER_FLAG_HIGHLIGHT_FUNDAMENTAL : 0) |
  (mode.elementColoring ? RENDER_FLAG_ELEMENT_COLORING : 0) |
  (mode.trailingGenerator ? RENDER_FLAG_TRAILING_GENERATOR : 0);

export const decodeRenderFlags = (flags: number): RenderModeFlags => ({
  highlightFundamental: (flags & RENDER_FLAG_HIGHLIGHT_FUNDAMENTAL) !== 0,
  elementColoring: (flags & RENDER_FLAG_ELEMENT_COLORING) !== 0,
  trailingGenerator: (flags & RENDER_FLAG_TRAILING_GENERATOR) !== 0,
});

export const getRenderParamBounds = () => ({
  depth: { ...RENDER_PARAM_BOUNDS.depth },
  colorScale: { ...RENDER_PARAM_BOUNDS.colorScale },
  scale: { ...RENDER_PARAM_BOUNDS.scale },
  defaults: { depth: DEFAULT_DEPTH, colorScale: DEFAULT_COLOR_SCALE, flags: DEFAULT_FLAGS },
});

// Uniform block shared with tilingKernel.wgsl, byte offsets:
//   mirrors 0 (4 x vec4<f32>), edges 64 (vec4<u32>), cut 80, point 96,
//   scale 112 (vec2<f32>), colorScale 120, depth 124, flags 128,
//   mirrorCount 132, width 136, height 140, elementCount 144, hasStickers 148.
export const RENDER_PARAMS_BYTE_LENGTH = 160;

export type PackedFrameShape = {
  width: number;
  height: number;
  elementCount: number;
  hasStickers: boolean;
};

export const packRenderParams = (
  params: RenderParams,
  shape: PackedFrameShape,
  target?: ArrayBuffer | null,
): ArrayBuffer => {
  const buffer =
    target && target.byteLength === RENDER_PARAMS_BYTE_LENGTH
      ? target
      : new ArrayBuffer(RENDER_PARAMS_BYTE_LENGTH);
  const floats = new Float32Array(buffer);
  const words = new Uint32Array(buffer);
  floats.fill(0);
  for (let index = 0; index < MAX_MIRRORS; index++) {
    const mirror = params.mirrors[index];
    if (!mirror) continue;
    floats.set(mirror, index * 4);
    words[16 + index] = params.edges[index] ? 1 : 0;
  }
  floats.set(params.cutMirror, 20);
  floats.set(params.referencePoint, 24);
  floats[28] = params.scale[0];
  floats[29] = params.scale[1];
  floats[30] = params.colorScale;
  words[31] = params.depth >>> 0;
  words[32] = params.flags >>> 0;
  words[33] = params.mirrors.length >>> 0;
  words[34] = shape.width >>> 0;
  words[35] = shape.height >>> 0;
  words[36] = shape.elementCount >>> 0;
  words[37] = shape.hasStickers ? 1 : 0;
  return buffer;
};
