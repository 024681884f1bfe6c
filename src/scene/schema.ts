import { conformalInner, type Mirror, type Vec2 } from '../geometry/conformal.js';
import type { MirrorKeep } from '../geometry/mirrors.js';
import { rank4Mirrors, type BranchOrder } from '../geometry/triangleMirrors.js';
import {
  AutomatonShapeError,
  createGroupAutomaton,
  MAX_GENERATORS,
  type GroupAutomatonRow,
} from '../group/automaton.js';
import { createStickerTable, StickerShapeError, type StickerRow } from '../group/stickers.js';
import { getRenderParamBounds } from '../kernel/renderParams.js';
import {
  SCENE_SCHEMA_VERSION,
  type SceneAutomaton,
  type SceneMetadata,
  type SceneMirrorSet,
  type SceneMirrorEntry,
  type SceneValidationIssue,
  type SceneValidationResult,
  type SceneView,
  type TilingScene,
} from './types.js';

type IssuePath = readonly (string | number)[];

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const asString = (value: unknown): string | null => (typeof value === 'string' ? value : null);
const asBoolean = (value: unknown): boolean | null => (typeof value === 'boolean' ? value : null);

const isFiniteNumber = (value: unknown): value is number =>
  typeof value === 'number' && Number.isFinite(value);

const toPath = (...parts: (string | number)[]): IssuePath => parts;

const pushIssue = (
  issues: SceneValidationIssue[],
  code: string,
  message: string,
  path: IssuePath,
  severity: SceneValidationIssue['severity'] = 'error',
) => {
  issues.push({ code, message, path, severity });
};

const asFiniteTuple = (value: unknown, length: number): number[] | null => {
  if (!Array.isArray(value) || value.length !== length) {
    return null;
  }
  const entries: readonly unknown[] = value;
  const result: number[] = [];
  for (const entry of entries) {
    if (!isFiniteNumber(entry)) {
      return null;
    }
    result.push(entry);
  }
  return result;
};

const asTableCell = (value: unknown): number | null | undefined => {
  if (value === null) return null;
  if (typeof value === 'number' && Number.isInteger(value) && value >= 0) return value;
  return undefined;
};

const normaliseMirrorEntry = (
  value: unknown,
  issues: SceneValidationIssue[],
  path: IssuePath,
): SceneMirrorEntry | null => {
  if (!isRecord(value)) {
    pushIssue(issues, 'mirror/type', 'Mirror must be an object', path);
    return null;
  }
  const kind = asString(value.kind);
  switch (kind) {
    case 'vector': {
      const vector = asFiniteTuple(value.vector, 4);
      if (!vector) {
        pushIssue(issues, 'mirror/vector', 'Vector mirror must list four finite components', [
          ...path,
          'vector',
        ]);
        return null;
      }
      const mirror: Mirror = [vector[0], vector[1], vector[2], vector[3]];
      if (!(conformalInner(mirror, mirror) > 0)) {
        pushIssue(issues, 'mirror/vector/timelike', 'Mirror vector must be spacelike', [
          ...path,
          'vector',
        ]);
        return null;
      }
      return { kind: 'vector', vector: mirror };
    }
    case 'line': {
      const normal = asFiniteTuple(value.normal, 2);
      if (!normal || (normal[0] === 0 && normal[1] === 0)) {
        pushIssue(issues, 'mirror/line/normal', 'Line mirror needs a non-zero normal [x, y]', [
          ...path,
          'normal',
        ]);
        return null;
      }
      const offset = value.offset === undefined ? 0 : value.offset;
      if (!isFiniteNumber(offset)) {
        pushIssue(issues, 'mirror/line/offset', 'Line offset must be a finite number', [
          ...path,
          'offset',
        ]);
        return null;
      }
      return { kind: 'line', normal: [normal[0], normal[1]], offset };
    }
    case 'circle': {
      const center = asFiniteTuple(value.center, 2);
      if (!center) {
        pushIssue(issues, 'mirror/circle/center', 'Circle mirror needs a centre [x, y]', [
          ...path,
          'center',
        ]);
        return null;
      }
      const radius = value.radius;
      if (!isFiniteNumber(radius) || radius <= 0) {
        pushIssue(issues, 'mirror/circle/radius', 'Circle radius must be positive and finite', [
          ...path,
          'radius',
        ]);
        return null;
      }
      const keep: MirrorKeep | null =
        value.keep === undefined || value.keep === 'inside'
          ? 'inside'
          : value.keep === 'outside'
            ? 'outside'
            : null;
      if (!keep) {
        pushIssue(issues, 'mirror/circle/keep', 'Circle keep must be "inside" or "outside"', [
          ...path,
          'keep',
        ]);
        return null;
      }
      return { kind: 'circle', center: [center[0], center[1]], radius, keep };
    }
    default:
      pushIssue(issues, 'mirror/kind', `Unknown mirror kind "${kind ?? ''}"`, [...path, 'kind']);
      return null;
  }
};

const isBranchOrder = (value: unknown): value is BranchOrder =>
  value === null || (typeof value === 'number' && Number.isInteger(value) && value >= 2);

const normaliseSchlafli = (
  value: unknown,
  issues: SceneValidationIssue[],
  path: IssuePath,
): SceneMirrorSet | null => {
  if (!Array.isArray(value) || (value.length !== 2 && value.length !== 3)) {
    pushIssue(issues, 'mirrors/schlafli', 'Schläfli symbol must list two or three branch orders', path);
    return null;
  }
  const orders: readonly unknown[] = value;
  const [p, q, r] = orders;
  if (!isBranchOrder(p) || !isBranchOrder(q) || (orders.length === 3 && !isBranchOrder(r))) {
    pushIssue(
      issues,
      'mirrors/schlafli',
      'Schläfli branch orders must be integers >= 2, or null for ∞',
      path,
    );
    return null;
  }
  if (!isBranchOrder(r)) {
    return { kind: 'schlafli', p, q };
  }
  try {
    rank4Mirrors(p, q, r);
  } catch (error) {
    pushIssue(
      issues,
      'mirrors/schlafli/unrealisable',
      error instanceof Error ? error.message : String(error),
      path,
    );
    return null;
  }
  return { kind: 'schlafli', p, q, r };
};

const normaliseMirrorSet = (
  value: unknown,
  issues: SceneValidationIssue[],
  path: IssuePath,
): SceneMirrorSet | null => {
  if (isRecord(value) && 'schlafli' in value) {
    return normaliseSchlafli(value.schlafli, issues, [...path, 'schlafli']);
  }
  if (!Array.isArray(value) || value.length === 0) {
    pushIssue(
      issues,
      'mirrors/type',
      'Scene must list at least one mirror or give a { schlafli: [p, q] } symbol',
      path,
    );
    return null;
  }
  const entries: readonly unknown[] = value;
  if (entries.length > MAX_GENERATORS) {
    pushIssue(
      issues,
      'mirrors/count',
      `Scene lists ${entries.length} mirrors; only the first ${MAX_GENERATORS} are used`,
      path,
      'warning',
    );
  }
  const used = entries.slice(0, MAX_GENERATORS);
  const mirrors: SceneMirrorEntry[] = [];
  used.forEach((entry, index) => {
    const mirror = normaliseMirrorEntry(entry, issues, [...path, index]);
    if (mirror) mirrors.push(mirror);
  });
  return mirrors.length === used.length ? { kind: 'list', mirrors } : null;
};

export const countSceneMirrors = (mirrors: SceneMirrorSet): number =>
  mirrors.kind === 'schlafli' ? (mirrors.r === undefined ? 3 : 4) : mirrors.mirrors.length;

const normaliseEdges = (
  value: unknown,
  mirrorCount: number,
  issues: SceneValidationIssue[],
  path: IssuePath,
): boolean[] | undefined => {
  if (value === undefined) return undefined;
  if (!Array.isArray(value)) {
    pushIssue(issues, 'edges/type', 'Edges must be an array of booleans', path);
    return undefined;
  }
  const entries: readonly unknown[] = value;
  const edges = entries.filter((entry): entry is boolean => typeof entry === 'boolean');
  if (edges.length !== entries.length) {
    pushIssue(issues, 'edges/type', 'Edges must be an array of booleans', path);
    return undefined;
  }
  if (edges.length !== mirrorCount) {
    pushIssue(
      issues,
      'edges/length',
      `Edges list has ${edges.length} entries for ${mirrorCount} mirrors; missing entries read as false`,
      path,
      'warning',
    );
  }
  return edges;
};

const normaliseAutomaton = (
  value: unknown,
  mirrorCount: number,
  issues: SceneValidationIssue[],
  path: IssuePath,
): SceneAutomaton | undefined => {
  if (value === undefined) return undefined;
  if (!isRecord(value)) {
    pushIssue(issues, 'automaton/type', 'Automaton must be an object', path);
    return undefined;
  }
  if (!Array.isArray(value.rows) || value.rows.length === 0) {
    pushIssue(issues, 'automaton/rows', 'Automaton must list at least the identity row', [
      ...path,
      'rows',
    ]);
    return undefined;
  }
  const rowEntries: readonly unknown[] = value.rows;
  const rows: GroupAutomatonRow[] = [];
  rowEntries.forEach((row, index) => {
    const rowPath = toPath(...path, 'rows', index);
    if (!Array.isArray(row)) {
      pushIssue(issues, 'automaton/row/type', 'Automaton row must be an array', rowPath);
      return;
    }
    const cells: readonly unknown[] = row;
    const parsed: (number | null)[] = [];
    for (const cell of cells) {
      const entry = asTableCell(cell);
      if (entry === undefined) {
        pushIssue(
          issues,
          'automaton/row/entry',
          'Automaton entries must be non-negative integers or null',
          rowPath,
        );
        return;
      }
      parsed.push(entry);
    }
    rows.push(parsed);
  });
  if (rows.length !== rowEntries.length) return undefined;

  const declared = value.generatorCount;
  const generatorCount = declared === undefined ? rows[0].length - 1 : declared;
  if (typeof generatorCount !== 'number' || !Number.isInteger(generatorCount)) {
    pushIssue(issues, 'automaton/generatorCount', 'generatorCount must be an integer', [
      ...path,
      'generatorCount',
    ]);
    return undefined;
  }
  if (generatorCount !== mirrorCount) {
    pushIssue(
      issues,
      'automaton/generator-count',
      `Automaton has ${generatorCount} generators for ${mirrorCount} mirrors; missing transitions are unresolved`,
      path,
      'warning',
    );
  }
  try {
    createGroupAutomaton({ generatorCount, rows });
  } catch (error) {
    if (error instanceof AutomatonShapeError) {
      pushIssue(issues, 'automaton/shape', error.message, path);
      return undefined;
    }
    throw error;
  }
  return { generatorCount, rows };
};

const normaliseStickers = (
  value: unknown,
  automaton: SceneAutomaton | undefined,
  issues: SceneValidationIssue[],
  path: IssuePath,
): StickerRow[] | undefined => {
  if (value === undefined) return undefined;
  if (!automaton) {
    pushIssue(issues, 'stickers/automaton', 'Sticker rows need a valid automaton', path);
    return undefined;
  }
  if (!Array.isArray(value)) {
    pushIssue(issues, 'stickers/type', 'Stickers must be an array of [outside, inside] rows', path);
    return undefined;
  }
  const entries: readonly unknown[] = value;
  const rows: StickerRow[] = [];
  entries.forEach((entry, index) => {
    const cells: readonly unknown[] = Array.isArray(entry) ? entry : [];
    const outside = asTableCell(cells[0]);
    const inside = asTableCell(cells[1]);
    if (cells.length !== 2 || outside === undefined || inside === undefined) {
      pushIssue(
        issues,
        'stickers/row',
        'Sticker row must be [outside, inside] with integer or null entries',
        [...path, index],
      );
      return;
    }
    rows.push([outside, inside]);
  });
  if (rows.length !== entries.length) return undefined;
  try {
    createStickerTable(rows, automaton.rows.length);
  } catch (error) {
    if (error instanceof StickerShapeError) {
      pushIssue(issues, 'stickers/shape', error.message, path);
      return undefined;
    }
    throw error;
  }
  return rows;
};

const clampWithWarning = (
  value: number,
  bounds: { min: number; max: number },
  issues: SceneValidationIssue[],
  code: string,
  path: IssuePath,
): number => {
  const clamped = Math.min(bounds.max, Math.max(bounds.min, value));
  if (clamped !== value) {
    pushIssue(
      issues,
      code,
      `Value ${value} is outside [${bounds.min}, ${bounds.max}]; using ${clamped}`,
      path,
      'warning',
    );
  }
  return clamped;
};

const readFlag = (
  value: unknown,
  fallback: boolean,
  issues: SceneValidationIssue[],
  path: IssuePath,
): boolean => {
  if (value === undefined) return fallback;
  const flag = asBoolean(value);
  if (flag === null) {
    pushIssue(issues, 'view/flag/type', `Expected a boolean; using ${fallback}`, path, 'warning');
    return fallback;
  }
  return flag;
};

const normaliseView = (
  value: unknown,
  hasAutomaton: boolean,
  issues: SceneValidationIssue[],
  path: IssuePath,
): SceneView => {
  const bounds = getRenderParamBounds();
  const defaults: SceneView = {
    center: [0, 0],
    zoom: 1,
    colorScale: bounds.defaults.colorScale,
    depth: bounds.defaults.depth,
    highlightFundamental: true,
    elementColoring: hasAutomaton,
    trailingGenerator: false,
  };
  if (value === undefined) return defaults;
  if (!isRecord(value)) {
    pushIssue(issues, 'view/type', 'View must be an object; using defaults', path, 'warning');
    return defaults;
  }

  let center: Vec2 = defaults.center;
  if (value.center !== undefined) {
    const pair = asFiniteTuple(value.center, 2);
    if (pair) {
      center = [pair[0], pair[1]];
    } else {
      pushIssue(issues, 'view/center', 'View centre must be [x, y]', [...path, 'center']);
    }
  }

  let zoom = defaults.zoom;
  if (value.zoom !== undefined) {
    if (isFiniteNumber(value.zoom) && value.zoom > 0) {
      zoom = value.zoom;
    } else {
      pushIssue(issues, 'view/zoom', 'View zoom must be a positive number', [...path, 'zoom']);
    }
  }

  let colorScale = defaults.colorScale;
  if (value.colorScale !== undefined) {
    if (isFiniteNumber(value.colorScale)) {
      colorScale = clampWithWarning(
        value.colorScale,
        bounds.colorScale,
        issues,
        'view/colorScale/clamped',
        [...path, 'colorScale'],
      );
    } else {
      pushIssue(issues, 'view/colorScale', 'colorScale must be a finite number', [
        ...path,
        'colorScale',
      ]);
    }
  }

  let depth = defaults.depth;
  if (value.depth !== undefined) {
    if (typeof value.depth === 'number' && Number.isInteger(value.depth)) {
      depth = clampWithWarning(value.depth, bounds.depth, issues, 'view/depth/clamped', [
        ...path,
        'depth',
      ]);
    } else {
      pushIssue(issues, 'view/depth', 'depth must be an integer', [...path, 'depth']);
    }
  }

  return {
    center,
    zoom,
    colorScale,
    depth,
    highlightFundamental: readFlag(value.highlightFundamental, defaults.highlightFundamental, issues, [
      ...path,
      'highlightFundamental',
    ]),
    elementColoring: readFlag(value.elementColoring, defaults.elementColoring, issues, [
      ...path,
      'elementColoring',
    ]),
    trailingGenerator: readFlag(value.trailingGenerator, defaults.trailingGenerator, issues, [
      ...path,
      'trailingGenerator',
    ]),
  };
};

const normaliseMetadata = (
  value: unknown,
  issues: SceneValidationIssue[],
  path: IssuePath,
): SceneMetadata => {
  const name = isRecord(value) ? asString(value.name) : null;
  if (!name) {
    pushIssue(issues, 'scene/metadata/name', 'Scene metadata should include a name', path, 'warning');
  }
  const description = isRecord(value) ? asString(value.description) ?? undefined : undefined;
  return { name: name ?? 'untitled', description };
};

export class SceneValidationError extends Error {
  constructor(
    message: string,
    readonly issues: SceneValidationIssue[],
  ) {
    super(message);
    this.name = 'SceneValidationError';
  }
}

export function validateScene(payload: unknown): SceneValidationResult {
  const issues: SceneValidationIssue[] = [];

  if (!isRecord(payload)) {
    pushIssue(issues, 'scene/type', 'Scene root must be an object', toPath());
    throw new SceneValidationError('Scene root must be an object', issues);
  }

  const schemaVersion = asString(payload.schemaVersion);
  if (!schemaVersion) {
    pushIssue(
      issues,
      'scene/schemaVersion',
      'Scene must supply a schemaVersion string',
      toPath('schemaVersion'),
    );
  } else if (schemaVersion !== SCENE_SCHEMA_VERSION) {
    pushIssue(
      issues,
      'scene/schemaVersion/unsupported',
      `Scene schemaVersion ${schemaVersion} is not ${SCENE_SCHEMA_VERSION}; reading it as ${SCENE_SCHEMA_VERSION}`,
      toPath('schemaVersion'),
      'warning',
    );
  }

  const metadata = normaliseMetadata(payload.metadata, issues, toPath('metadata'));
  const mirrors = normaliseMirrorSet(payload.mirrors, issues, toPath('mirrors'));
  const mirrorCount = mirrors ? countSceneMirrors(mirrors) : 0;
  const edges = normaliseEdges(payload.edges, mirrorCount, issues, toPath('edges'));
  const cut =
    payload.cut === undefined
      ? undefined
      : normaliseMirrorEntry(payload.cut, issues, toPath('cut')) ?? undefined;
  const automaton = normaliseAutomaton(payload.automaton, mirrorCount, issues, toPath('automaton'));
  const stickers = normaliseStickers(payload.stickers, automaton, issues, toPath('stickers'));
  const view = normaliseView(payload.view, automaton !== undefined, issues, toPath('view'));

  const hasFatalIssues = issues.some((issue) => issue.severity === 'error');
  if (hasFatalIssues || !mirrors) {
    throw new SceneValidationError('Scene validation failed', issues);
  }

  const scene: TilingScene = {
    schemaVersion: schemaVersion ?? SCENE_SCHEMA_VERSION,
    metadata,
    mirrors,
    edges,
    cut,
    automaton,
    stickers,
    view,
  };

  return { scene, issues };
}
