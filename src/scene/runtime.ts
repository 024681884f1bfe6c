import { lift, type Mirror, type Vec2 } from '../geometry/conformal.js';
import { mirrorFromShape } from '../geometry/mirrors.js';
import { defaultTriangleEdges, rank4Mirrors, triangleMirrors } from '../geometry/triangleMirrors.js';
import {
  createGroupAutomaton,
  createTrivialAutomaton,
  type GroupAutomaton,
} from '../group/automaton.js';
import { createStickerTable, type StickerTable } from '../group/stickers.js';
import type { TilingFrame } from '../kernel/classify.js';
import { createRenderParams, encodeRenderFlags, type RenderParams } from '../kernel/renderParams.js';
import { hashCanonicalJson } from '../serialization/canonicalJson.js';
import type { SceneMirrorSet, SceneMirrorEntry, SceneView, TilingScene } from './types.js';

export type SceneViewOverrides = Partial<Pick<SceneView, 'center' | 'zoom' | 'depth' | 'colorScale'>>;

export type SceneRuntimeOptions = {
  width: number;
  height: number;
  overrides?: SceneViewOverrides;
};

export interface SceneRuntimeBundle {
  readonly scene: TilingScene;
  readonly view: SceneView;
  readonly params: RenderParams;
  readonly automaton: GroupAutomaton;
  readonly stickers: StickerTable | null;
  readonly frame: TilingFrame;
  /** BLAKE3 digest of the scene's canonical JSON. */
  readonly fingerprint: string;
}

export const resolveMirrorEntry = (entry: SceneMirrorEntry): Mirror =>
  entry.kind === 'vector' ? entry.vector : mirrorFromShape(entry);

export const resolveSceneMirrors = (mirrors: SceneMirrorSet): Mirror[] =>
  mirrors.kind === 'list'
    ? mirrors.mirrors.map(resolveMirrorEntry)
    : mirrors.r === undefined
      ? triangleMirrors(mirrors.p, mirrors.q)
      : rank4Mirrors(mirrors.p, mirrors.q, mirrors.r);

const resolveEdges = (scene: TilingScene, mirrorCount: number): readonly boolean[] => {
  if (scene.edges) return scene.edges;
  if (scene.mirrors.kind === 'schlafli') return defaultTriangleEdges(mirrorCount);
  return new Array<boolean>(mirrorCount).fill(true);
};

const assertViewport = (width: number, height: number) => {
  if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
    throw new Error(`[scene-runtime] viewport must be positive integers (received ${width}x${height})`);
  }
};

/** Half-extents of the view: `zoom` covers half the height, width follows the aspect ratio. */
export const viewScale = (zoom: number, width: number, height: number): Vec2 => [
  (zoom * width) / height,
  zoom,
];

export const createSceneRuntime = (
  scene: TilingScene,
  options: SceneRuntimeOptions,
): SceneRuntimeBundle => {
  const { width, height } = options;
  assertViewport(width, height);
  const overrides = options.overrides ?? {};
  const view: SceneView = {
    ...scene.view,
    center: overrides.center ?? scene.view.center,
    zoom: overrides.zoom ?? scene.view.zoom,
    depth: overrides.depth ?? scene.view.depth,
    colorScale: overrides.colorScale ?? scene.view.colorScale,
  };

  const mirrors = resolveSceneMirrors(scene.mirrors);
  const automaton = scene.automaton
    ? createGroupAutomaton(scene.automaton)
    : createTrivialAutomaton(mirrors.length);
  if (automaton.generatorCount !== mirrors.length) {
    console.warn(
      `[scene-runtime] "${scene.metadata.name}": automaton has ${automaton.generatorCount} generators for ${mirrors.length} mirrors`,
    );
  }
  const stickers = scene.stickers ? createStickerTable(scene.stickers, automaton.elementCount) : null;

  const params = createRenderParams({
    mirrors,
    edges: resolveEdges(scene, mirrors.length),
    cutMirror: scene.cut ? resolveMirrorEntry(scene.cut) : undefined,
    referencePoint: lift(view.center),
    scale: viewScale(view.zoom, width, height),
    colorScale: view.colorScale,
    depth: view.depth,
    flags: encodeRenderFlags(view),
  });

  return {
    scene,
    view,
    params,
    automaton,
    stickers,
    frame: { params, automaton, stickers, width, height },
    fingerprint: hashCanonicalJson(scene).hash,
  };
};
