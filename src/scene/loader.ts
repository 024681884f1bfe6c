import { readFile } from 'node:fs/promises';
import { basename } from 'node:path';

import { hashCanonicalJson } from '../serialization/canonicalJson.js';
import { SceneValidationError, validateScene } from './schema.js';
import type { SceneValidationIssue, TilingScene } from './types.js';

export interface SceneLoadSuccess {
  readonly scene: TilingScene;
  readonly issues: SceneValidationIssue[];
  readonly fingerprint: string;
  readonly sourceName?: string;
}

export type SceneLoadResult =
  | ({ readonly kind: 'success' } & SceneLoadSuccess)
  | {
      readonly kind: 'error';
      readonly message: string;
      readonly issues: SceneValidationIssue[] | undefined;
      readonly sourceName?: string;
    };

export async function loadSceneFromJson(json: string, sourceName?: string): Promise<SceneLoadResult> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (error) {
    return {
      kind: 'error',
      message: error instanceof Error ? error.message : 'Failed to parse JSON scene',
      issues: undefined,
      sourceName,
    };
  }

  try {
    const { scene, issues } = validateScene(parsed);
    return {
      kind: 'success',
      scene,
      issues,
      fingerprint: hashCanonicalJson(scene).hash,
      sourceName,
    };
  } catch (error) {
    if (error instanceof SceneValidationError) {
      return {
        kind: 'error',
        message: error.message,
        issues: error.issues,
        sourceName,
      };
    }
    return {
      kind: 'error',
      message: error instanceof Error ? error.message : 'Unknown scene validation error',
      issues: undefined,
      sourceName,
    };
  }
}

export async function loadSceneFromFile(path: string): Promise<SceneLoadResult> {
  const json = await readFile(path, 'utf8');
  return loadSceneFromJson(json, basename(path));
}
