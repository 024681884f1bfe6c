import { lift, project, type Vec2 } from '../geometry/conformal.js';
import { GROUP_SENTINEL, type GroupAutomaton } from '../group/automaton.js';
import type { StickerTable } from '../group/stickers.js';
import type { Rgba } from './colormap.js';
import { colorizeReduction, type ColorSource } from './colorizer.js';
import { reduceToFundamentalDomain, type ReductionResult } from './reducer.js';
import type { RenderParams } from './renderParams.js';

/** Everything one frame of the kernel reads. Shared read-only by every pixel. */
export type TilingFrame = {
  params: RenderParams;
  automaton: GroupAutomaton;
  stickers: StickerTable | null;
  width: number;
  height: number;
};

export type PointClassification = {
  model: Vec2;
  reduction: ReductionResult;
  facelet: number;
  source: ColorSource;
  color: Rgba;
};

export type FrameClassificationStats = {
  pixels: number;
  untouched: number;
  settled: number;
  exhausted: number;
  unresolved: number;
};

export const createFrameStats = (): FrameClassificationStats => ({
  pixels: 0,
  untouched: 0,
  settled: 0,
  exhausted: 0,
  unresolved: 0,
});

/** Pixel centre to model coordinates; y grows upwards, centred on the reference point. */
export const pixelToModel = (
  px: number,
  py: number,
  width: number,
  height: number,
  params: RenderParams,
): Vec2 => {
  const [cx, cy] = project(params.referencePoint);
  const u = ((px + 0.5) / width) * 2 - 1;
  const v = 1 - ((py + 0.5) / height) * 2;
  return [cx + u * params.scale[0], cy + v * params.scale[1]];
};

export const classifyPoint = (
  model: Vec2,
  frame: Pick<TilingFrame, 'params' | 'automaton' | 'stickers'>,
): PointClassification => {
  const { params, automaton, stickers } = frame;
  const reduction = reduceToFundamentalDomain(lift(model), params.mirrors, automaton, params.depth);
  const { color, source, facelet } = colorizeReduction(reduction, params, automaton, stickers);
  return { model, reduction, facelet, source, color };
};

const toByte = (value: number): number => Math.round((value < 0 ? 0 : value > 1 ? 1 : value) * 255);

const recordStats = (stats: FrameClassificationStats, reduction: ReductionResult) => {
  stats.pixels += 1;
  if (reduction.steps === 0) stats.untouched += 1;
  if (reduction.settled) stats.settled += 1;
  else stats.exhausted += 1;
  if (reduction.element === GROUP_SENTINEL) stats.unresolved += 1;
};

/**
 * Reference implementation of the per-pixel kernel. Writes RGBA8 rows top to
 * bottom; alpha is always opaque.
 */
export const renderTilingCpu = (
  frame: TilingFrame,
  target?: Uint8ClampedArray | null,
  stats?: FrameClassificationStats,
): Uint8ClampedArray => {
  const { width, height } = frame;
  const byteLength = width * height * 4;
  const output =
    target && target.length >= byteLength ? target : new Uint8ClampedArray(byteLength);
  for (let py = 0; py < height; py++) {
    for (let px = 0; px < width; px++) {
      const { reduction, color } = classifyPoint(
        pixelToModel(px, py, width, height, frame.params),
        frame,
      );
      if (stats) recordStats(stats, reduction);
      const offset = (py * width + px) * 4;
      output[offset] = toByte(color[0]);
      output[offset + 1] = toByte(color[1]);
      output[offset + 2] = toByte(color[2]);
      output[offset + 3] = 255;
    }
  }
  return output;
};
