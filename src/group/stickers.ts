import { GROUP_SENTINEL } from './automaton.js';

export const STICKER_COLUMNS = 2;

/**
 * Secondary partition of fundamental domains. Row e holds the facelet an
 * element maps to outside (column 0) and inside (column 1) the cutting mirror.
 * Facelet ids are element indices, so they feed straight back into the
 * automaton lookups.
 */
export type StickerTable = {
  readonly elementCount: number;
  readonly table: Uint32Array;
};

export type StickerRow = readonly [outside: number | null, inside: number | null];

export class StickerShapeError extends Error {
  constructor(message: string) {
    super(`[sticker-table] ${message}`);
    this.name = 'StickerShapeError';
  }
}

export const faceletOf = (stickers: StickerTable, element: number, insideCut: boolean): number => {
  if (element === GROUP_SENTINEL) return GROUP_SENTINEL;
  if (!Number.isInteger(element) || element < 0 || element >= stickers.elementCount) {
    return GROUP_SENTINEL;
  }
  return stickers.table[element * STICKER_COLUMNS + (insideCut ? 1 : 0)];
};

export const createStickerTable = (
  rows: readonly StickerRow[],
  elementCount: number,
): StickerTable => {
  if (rows.length !== elementCount) {
    throw new StickerShapeError(
      `expected one row per element (${elementCount}), received ${rows.length}`,
    );
  }
  const table = new Uint32Array(rows.length * STICKER_COLUMNS);
  rows.forEach((row, index) => {
    row.forEach((entry, column) => {
      if (entry === null || entry === GROUP_SENTINEL) {
        table[index * STICKER_COLUMNS + column] = GROUP_SENTINEL;
        return;
      }
      if (!Number.isInteger(entry) || entry < 0 || entry >= elementCount) {
        throw new StickerShapeError(`row ${index} column ${column} names missing element ${entry}`);
      }
      table[index * STICKER_COLUMNS + column] = entry;
    });
  });
  return { elementCount, table };
};

export const createIdentityStickerTable = (elementCount: number): StickerTable => {
  const table = new Uint32Array(elementCount * STICKER_COLUMNS);
  for (let element = 0; element < elementCount; element++) {
    table[element * STICKER_COLUMNS] = element;
    table[element * STICKER_COLUMNS + 1] = element;
  }
  return { elementCount, table };
};
