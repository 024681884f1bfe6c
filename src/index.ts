export * from './geometry/conformal.js';
export * from './geometry/mirrors.js';
export * from './geometry/triangleMirrors.js';
export * from './group/automaton.js';
export * from './group/stickers.js';
export * from './kernel/renderParams.js';
export * from './kernel/reducer.js';
export * from './kernel/colormap.js';
export * from './kernel/colorizer.js';
export * from './kernel/classify.js';
export * from './kernel/tilingGpuKernel.js';
export * from './kernel/kernelProfiler.js';
export * from './scene/types.js';
export { SceneValidationError, validateScene, countSceneMirrors } from './scene/schema.js';
export * from './scene/loader.js';
export * from './scene/runtime.js';
export * from './render/frameWatchdog.js';
export * from './render/offlineRenderer.js';
export * from './render/png.js';
export {
  hashBytes,
  hashCanonicalJson,
  hashCanonicalJsonString,
  hashFrame,
  writeCanonicalJson,
  type CanonicalJsonWriteOptions,
} from './serialization/canonicalJson.js';
