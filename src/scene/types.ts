import type { Mirror, Vec2 } from '../geometry/conformal.js';
import type { MirrorShape } from '../geometry/mirrors.js';
import type { BranchOrder } from '../geometry/triangleMirrors.js';
import type { GroupAutomatonRow } from '../group/automaton.js';
import type { StickerRow } from '../group/stickers.js';

export const SCENE_SCHEMA_VERSION = '1.0.0';

export type SceneMirrorEntry = { readonly kind: 'vector'; readonly vector: Mirror } | MirrorShape;

export type SceneMirrorSet =
  | { readonly kind: 'list'; readonly mirrors: readonly SceneMirrorEntry[] }
  | {
      readonly kind: 'schlafli';
      readonly p: BranchOrder;
      readonly q: BranchOrder;
      /** Present for the four-mirror {p, q, r} groups. */
      readonly r?: BranchOrder;
    };

export interface SceneMetadata {
  readonly name: string;
  readonly description?: string;
}

export interface SceneAutomaton {
  readonly generatorCount: number;
  readonly rows: readonly GroupAutomatonRow[];
}

export interface SceneView {
  readonly center: Vec2;
  /** Model units covered by half the viewport height. */
  readonly zoom: number;
  readonly colorScale: number;
  readonly depth: number;
  readonly highlightFundamental: boolean;
  readonly elementColoring: boolean;
  readonly trailingGenerator: boolean;
}

export interface TilingScene {
  readonly schemaVersion: string;
  readonly metadata: SceneMetadata;
  readonly mirrors: SceneMirrorSet;
  readonly edges?: readonly boolean[];
  readonly cut?: SceneMirrorEntry;
  readonly automaton?: SceneAutomaton;
  readonly stickers?: readonly StickerRow[];
  readonly view: SceneView;
}

export interface SceneValidationIssue {
  readonly code: string;
  readonly message: string;
  readonly path: readonly (string | number)[];
  readonly severity: 'error' | 'warning';
}

export interface SceneValidationResult {
  readonly scene: TilingScene;
  readonly issues: SceneValidationIssue[];
}
