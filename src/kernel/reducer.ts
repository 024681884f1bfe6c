import {
  isInside,
  reflectsThrough,
  type ConformalPoint,
  type Mirror,
} from '../geometry/conformal.js';
import { advance, IDENTITY_ELEMENT, type GroupAutomaton } from '../group/automaton.js';

export type ReductionResult = {
  /** Point after the last reflection applied. */
  point: ConformalPoint;
  /** Element reached from the identity, or GROUP_SENTINEL. */
  element: number;
  /** Reflections applied; 0 only for the reference copy of the domain. */
  steps: number;
  rounds: number;
  /** True when a full round fired no mirror. */
  settled: boolean;
};

/**
 * Folds a point into the fundamental domain. Each round scans the mirrors in
 * ascending order and reflects through every one the point violates; rounds
 * stop at the first quiet round or after `depth` rounds.
 */
export const reduceToFundamentalDomain = (
  start: ConformalPoint,
  mirrors: readonly Mirror[],
  automaton: GroupAutomaton,
  depth: number,
): ReductionResult => {
  let point = start;
  let element = IDENTITY_ELEMENT;
  let steps = 0;
  let rounds = 0;
  let settled = false;

  while (rounds < depth) {
    rounds += 1;
    let fired = false;
    for (let generator = 0; generator < mirrors.length; generator++) {
      const mirror = mirrors[generator];
      if (isInside(mirror, point)) continue;
      point = reflectsThrough(mirror, point);
      element = advance(automaton, element, generator);
      steps += 1;
      fired = true;
    }
    if (!fired) {
      settled = true;
      break;
    }
  }

  return { point, element, steps, rounds, settled };
};
