import { isInside, signedDistance, type ConformalPoint } from '../geometry/conformal.js';
import { advance, colorOf, GROUP_SENTINEL, type GroupAutomaton } from '../group/automaton.js';
import { faceletOf, type StickerTable } from '../group/stickers.js';
import { NEUTRAL_GRAY, perceptualColormap, type Rgba } from './colormap.js';
import type { ReductionResult } from './reducer.js';
import { decodeRenderFlags, type RenderParams } from './renderParams.js';

/** Generator applied after the sticker lookup when the trailing-generator flag is set. */
export const TRAILING_GENERATOR = 0;

/** Fixed normalisation of automaton colour indices. */
export const COLOR_INDEX_DIVISOR = 50;

export type ColorSource = 'fundamental' | 'element' | 'distance';

export type Colorization = {
  color: Rgba;
  source: ColorSource;
  /** Element the colour was read from, after relabelling; sentinel for distance colouring. */
  facelet: number;
};

/** Smallest signed distance to an edge-flagged mirror; +Infinity when none is flagged. */
export const edgeDistance = (params: RenderParams, point: ConformalPoint): number => {
  let best = Number.POSITIVE_INFINITY;
  params.mirrors.forEach((mirror, index) => {
    if (!params.edges[index]) return;
    const distance = signedDistance(mirror, point);
    if (distance < best) best = distance;
  });
  return best;
};

export const colorizeReduction = (
  reduction: ReductionResult,
  params: RenderParams,
  automaton: GroupAutomaton,
  stickers: StickerTable | null,
): Colorization => {
  const mode = decodeRenderFlags(params.flags);

  if (mode.highlightFundamental && reduction.steps === 0) {
    return { color: NEUTRAL_GRAY, source: 'fundamental', facelet: reduction.element };
  }

  if (mode.elementColoring && reduction.element !== GROUP_SENTINEL) {
    let element = reduction.element;
    if (stickers) {
      element = faceletOf(stickers, element, isInside(params.cutMirror, reduction.point));
    }
    if (mode.trailingGenerator) {
      element = advance(automaton, element, TRAILING_GENERATOR);
    }
    const colorIndex = colorOf(automaton, element);
    if (colorIndex !== GROUP_SENTINEL) {
      return {
        color: perceptualColormap(colorIndex / COLOR_INDEX_DIVISOR, 0, params.colorScale),
        source: 'element',
        facelet: element,
      };
    }
  }

  return {
    color: perceptualColormap(edgeDistance(params, reduction.point), 0, params.colorScale),
    source: 'distance',
    facelet: GROUP_SENTINEL,
  };
};
