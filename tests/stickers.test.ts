import test from 'node:test';
import assert from 'node:assert/strict';

import { GROUP_SENTINEL } from '../src/group/automaton.js';
import {
  createIdentityStickerTable,
  createStickerTable,
  faceletOf,
  StickerShapeError,
} from '../src/group/stickers.js';

test('faceletOf picks the column by cut side', () => {
  const stickers = createStickerTable(
    [
      [0, 2],
      [1, null],
      [2, 0],
    ],
    3,
  );
  assert.equal(faceletOf(stickers, 0, false), 0);
  assert.equal(faceletOf(stickers, 0, true), 2);
  assert.equal(faceletOf(stickers, 2, true), 0);
  assert.equal(faceletOf(stickers, 1, true), GROUP_SENTINEL);
});

test('faceletOf returns the sentinel for unresolved or unknown elements', () => {
  const stickers = createIdentityStickerTable(2);
  assert.equal(faceletOf(stickers, GROUP_SENTINEL, false), GROUP_SENTINEL);
  assert.equal(faceletOf(stickers, 2, false), GROUP_SENTINEL);
  assert.equal(faceletOf(stickers, 1.5, true), GROUP_SENTINEL);
});

test('identity sticker table maps each element to itself', () => {
  const stickers = createIdentityStickerTable(3);
  assert.deepEqual(Array.from(stickers.table), [0, 0, 1, 1, 2, 2]);
});

test('createStickerTable validates shape against the automaton', () => {
  assert.throws(
    () => createStickerTable([[0, 0]], 2),
    (error: unknown) =>
      error instanceof StickerShapeError &&
      error.message === '[sticker-table] expected one row per element (2), received 1',
  );
  assert.throws(
    () =>
      createStickerTable(
        [
          [0, 0],
          [1, 4],
        ],
        2,
      ),
    /row 1 column 1 names missing element 4/,
  );
});
