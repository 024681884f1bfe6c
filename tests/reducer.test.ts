import test from 'node:test';
import assert from 'node:assert/strict';
import fc from 'fast-check';

import { isInside, lift, project, reflectsThrough, type Mirror } from '../src/geometry/conformal.js';
import { lineMirror } from '../src/geometry/mirrors.js';
import { triangleMirrors } from '../src/geometry/triangleMirrors.js';
import {
  advance,
  createGroupAutomaton,
  createTrivialAutomaton,
  GROUP_SENTINEL,
} from '../src/group/automaton.js';
import { reduceToFundamentalDomain } from '../src/kernel/reducer.js';

const assertClose = (actual: number, expected: number, tolerance = 1e-9) => {
  assert.ok(Math.abs(actual - expected) <= tolerance, `expected ${expected}, received ${actual}`);
};

// D3: mirror a is the x axis, mirror b the line at 60 degrees.
const dihedralMirrors: Mirror[] = [lineMirror([0, 1]), lineMirror([Math.sin(Math.PI / 3), -0.5])];

const dihedralAutomaton = () =>
  createGroupAutomaton({
    generatorCount: 2,
    rows: [
      [0, 1, 2],
      [10, 0, 3],
      [20, 4, 0],
      [30, 5, 1],
      [40, 2, 5],
      [45, 3, 4],
    ],
  });

const polar = (degrees: number, radius: number): [number, number] => {
  const radians = (degrees * Math.PI) / 180;
  return [radius * Math.cos(radians), radius * Math.sin(radians)];
};

test('a point already in the fundamental domain is untouched', () => {
  const start = lift(polar(30, 1));
  const result = reduceToFundamentalDomain(start, dihedralMirrors, dihedralAutomaton(), 16);
  assert.equal(result.element, 0);
  assert.equal(result.steps, 0);
  assert.equal(result.rounds, 1);
  assert.equal(result.settled, true);
  assert.equal(result.point, start);
});

test('dihedral point at 200 degrees folds to element 5', () => {
  const result = reduceToFundamentalDomain(
    lift(polar(200, 1)),
    dihedralMirrors,
    dihedralAutomaton(),
    16,
  );
  assert.equal(result.element, 5);
  assert.equal(result.steps, 3);
  assert.equal(result.rounds, 3);
  assert.equal(result.settled, true);
  const [x, y] = project(result.point);
  const [ex, ey] = polar(40, 1);
  assertClose(x, ex);
  assertClose(y, ey);
});

test('Klein four quadrants fold onto the positive quadrant', () => {
  const automaton = createGroupAutomaton({
    generatorCount: 2,
    rows: [
      [0, 1, 2],
      [10, 0, 3],
      [20, 3, 0],
      [30, 2, 1],
    ],
  });
  const mirrors: Mirror[] = [
    [0, 0, 1, 0],
    [0, 0, 0, 1],
  ];
  const result = reduceToFundamentalDomain(lift([-1, -2]), mirrors, automaton, 8);
  assert.equal(result.element, 3);
  assert.equal(result.steps, 2);
  assert.equal(result.rounds, 2);
  assert.equal(result.settled, true);
  assert.deepEqual(project(result.point), [1, 2]);
});

test('contradictory mirrors exhaust the depth budget', () => {
  const automaton = createGroupAutomaton({
    generatorCount: 2,
    rows: [
      [0, 1, 2],
      [0, 0, null],
      [0, null, 0],
    ],
  });
  // x >= 1 and x <= 0 can never both hold.
  const mirrors = [lineMirror([1, 0], 1), lineMirror([-1, 0], 0)];
  const result = reduceToFundamentalDomain(lift([0.5, 0]), mirrors, automaton, 5);
  assert.equal(result.rounds, 5);
  assert.equal(result.settled, false);
  assert.equal(result.steps, 10);
  assert.equal(result.element, GROUP_SENTINEL);
  assertClose(project(result.point)[0], -9.5, 1e-9);
});

test('a single round applies exactly one reflection to a point outside one mirror', () => {
  const automaton = dihedralAutomaton();
  const start = lift([0.5, -0.2]);
  const result = reduceToFundamentalDomain(start, dihedralMirrors, automaton, 1);
  assert.deepEqual(result.point, reflectsThrough(dihedralMirrors[0], start));
  assert.equal(result.element, advance(automaton, 0, 0));
  assert.equal(result.element, 1);
  assert.equal(result.steps, 1);
  assert.equal(result.rounds, 1);
  // The depth ran out before a quiet round.
  assert.equal(result.settled, false);
  assertClose(project(result.point)[0], 0.5);
  assertClose(project(result.point)[1], 0.2);
});

test('missing transitions leave the element unresolved while the point still folds', () => {
  const automaton = createGroupAutomaton({ generatorCount: 1, rows: [[0, null]] });
  const result = reduceToFundamentalDomain(lift([-0.3, 0]), [[0, 0, 1, 0]], automaton, 4);
  assert.equal(result.element, GROUP_SENTINEL);
  assert.equal(result.steps, 1);
  assert.equal(result.settled, true);
  assertClose(project(result.point)[0], 0.3);
});

test('reduction always stops within the depth budget', () => {
  const mirrors = triangleMirrors(7, 3);
  const automaton = createTrivialAutomaton(3);
  fc.assert(
    fc.property(
      fc.double({ min: -4, max: 4, noNaN: true }),
      fc.double({ min: -4, max: 4, noNaN: true }),
      fc.integer({ min: 1, max: 64 }),
      (x, y, depth) => {
        const result = reduceToFundamentalDomain(lift([x, y]), mirrors, automaton, depth);
        return result.rounds <= depth && result.steps <= depth * mirrors.length;
      },
    ),
  );
});

test('a settled point sits inside every mirror and reduces again in zero steps', () => {
  const automaton = dihedralAutomaton();
  fc.assert(
    fc.property(
      fc.double({ min: 0, max: 360, noNaN: true }),
      fc.double({ min: 0.01, max: 10, noNaN: true }),
      (degrees, radius) => {
        const first = reduceToFundamentalDomain(
          lift(polar(degrees, radius)),
          dihedralMirrors,
          automaton,
          32,
        );
        if (!first.settled) return false;
        if (!dihedralMirrors.every((mirror) => isInside(mirror, first.point))) return false;
        const again = reduceToFundamentalDomain(first.point, dihedralMirrors, automaton, 32);
        return again.steps === 0 && again.element === 0 && again.point === first.point;
      },
    ),
  );
});
