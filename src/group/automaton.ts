/** Element value meaning "unresolved": outside the enumerated ball or degenerate. */
export const GROUP_SENTINEL = 0xffffffff;

export const IDENTITY_ELEMENT = 0;

export const MAX_GENERATORS = 4;

/**
 * Finite quotient of a reflection group, one fixed-width row per enumerated
 * element: column 0 holds the colour index, column g + 1 the neighbour reached
 * through generator g. Identity is row 0.
 */
export type GroupAutomaton = {
  readonly generatorCount: number;
  readonly rowStride: number;
  readonly elementCount: number;
  readonly table: Uint32Array;
};

export type GroupAutomatonRow = readonly (number | null)[];

export type GroupAutomatonInit = {
  generatorCount: number;
  rows: readonly GroupAutomatonRow[];
};

export class AutomatonShapeError extends Error {
  constructor(message: string) {
    super(`[group-automaton] ${message}`);
    this.name = 'AutomatonShapeError';
  }
}

const isRowIndex = (automaton: GroupAutomaton, element: number) =>
  Number.isInteger(element) && element >= 0 && element < automaton.elementCount;

export const advance = (automaton: GroupAutomaton, element: number, generator: number): number => {
  if (element === GROUP_SENTINEL) return GROUP_SENTINEL;
  if (!isRowIndex(automaton, element)) return GROUP_SENTINEL;
  if (!Number.isInteger(generator) || generator < 0 || generator >= automaton.generatorCount) {
    return GROUP_SENTINEL;
  }
  const next = automaton.table[element * automaton.rowStride + generator + 1];
  return isRowIndex(automaton, next) ? next : GROUP_SENTINEL;
};

export const colorOf = (
  automaton: GroupAutomaton,
  element: number,
  fallback: number = GROUP_SENTINEL,
): number => {
  if (element === GROUP_SENTINEL) return fallback;
  if (!isRowIndex(automaton, element)) return fallback;
  return automaton.table[element * automaton.rowStride];
};

export const advanceWord = (
  automaton: GroupAutomaton,
  element: number,
  word: readonly number[],
): number => word.reduce((current, generator) => advance(automaton, current, generator), element);

const encodeEntry = (value: number | null, row: number, column: number): number => {
  if (value === null || value === GROUP_SENTINEL) return GROUP_SENTINEL;
  if (!Number.isInteger(value) || value < 0 || value > GROUP_SENTINEL) {
    throw new AutomatonShapeError(`row ${row} column ${column} holds invalid entry ${value}`);
  }
  return value;
};

export const createGroupAutomaton = (init: GroupAutomatonInit): GroupAutomaton => {
  const { generatorCount, rows } = init;
  if (!Number.isInteger(generatorCount) || generatorCount < 1 || generatorCount > MAX_GENERATORS) {
    throw new AutomatonShapeError(
      `generator count must be an integer in [1, ${MAX_GENERATORS}] (received ${generatorCount})`,
    );
  }
  if (rows.length === 0) {
    throw new AutomatonShapeError('table must contain at least the identity row');
  }
  const rowStride = generatorCount + 1;
  const table = new Uint32Array(rows.length * rowStride);
  rows.forEach((row, index) => {
    if (row.length !== rowStride) {
      throw new AutomatonShapeError(
        `row ${index} has ${row.length} entries, expected ${rowStride}`,
      );
    }
    for (let column = 0; column < rowStride; column++) {
      table[index * rowStride + column] = encodeEntry(row[column] ?? null, index, column);
    }
  });
  for (let index = 0; index < rows.length; index++) {
    for (let column = 1; column < rowStride; column++) {
      const neighbour = table[index * rowStride + column];
      if (neighbour !== GROUP_SENTINEL && neighbour >= rows.length) {
        throw new AutomatonShapeError(
          `row ${index} generator ${column - 1} points at missing element ${neighbour}`,
        );
      }
    }
  }
  return { generatorCount, rowStride, elementCount: rows.length, table };
};

/** Identity row only; every neighbour reads as unresolved. */
export const createTrivialAutomaton = (generatorCount: number): GroupAutomaton =>
  createGroupAutomaton({
    generatorCount,
    rows: [[0, ...new Array<null>(generatorCount).fill(null)]],
  });
