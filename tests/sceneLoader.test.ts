import test from 'node:test';
import assert from 'node:assert/strict';
import { fileURLToPath } from 'node:url';

import { loadSceneFromFile, loadSceneFromJson } from '../src/scene/loader.js';
import { hashCanonicalJson } from '../src/serialization/canonicalJson.js';

const fixturePath = (name: string) => fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url));
const examplePath = (name: string) =>
  fileURLToPath(new URL(`../examples/scenes/${name}`, import.meta.url));

test('loadSceneFromFile returns the scene, its issues and a fingerprint', async () => {
  const result = await loadSceneFromFile(fixturePath('dihedral-d3.json'));
  assert.equal(result.kind, 'success');
  if (result.kind !== 'success') return;
  assert.equal(result.sourceName, 'dihedral-d3.json');
  assert.deepEqual(result.issues, []);
  assert.match(result.fingerprint, /^[0-9a-f]{64}$/);
  assert.equal(result.fingerprint, hashCanonicalJson(result.scene).hash);
});

test('the fingerprint ignores key order and whitespace', async () => {
  const a = await loadSceneFromJson(
    '{"schemaVersion":"1.0.0","metadata":{"name":"square"},"mirrors":{"schlafli":[4,4]}}',
  );
  const b = await loadSceneFromJson(`{
    "mirrors": { "schlafli": [4, 4] },
    "metadata": { "name": "square" },
    "schemaVersion": "1.0.0"
  }`);
  assert.ok(a.kind === 'success' && b.kind === 'success');
  assert.equal(a.fingerprint, b.fingerprint);
});

test('invalid JSON is reported without issues', async () => {
  const result = await loadSceneFromJson('{ "schemaVersion": ', 'truncated.json');
  assert.equal(result.kind, 'error');
  assert.equal(result.issues, undefined);
  assert.equal(result.sourceName, 'truncated.json');
});

test('validation failures carry their issues', async () => {
  const result = await loadSceneFromFile(fixturePath('broken-scene.json'));
  assert.equal(result.kind, 'error');
  if (result.kind !== 'error') return;
  assert.equal(result.message, 'Scene validation failed');
  assert.equal(result.issues?.length, 3);
});

test('every bundled example scene loads without issues', async () => {
  for (const name of [
    'dihedral-d3.json',
    'klein-four.json',
    'heptagonal-7-3.json',
    'octagonal-8-3-3.json',
  ]) {
    const result = await loadSceneFromFile(examplePath(name));
    assert.equal(result.kind, 'success', name);
    assert.deepEqual(result.kind === 'success' && result.issues, [], name);
  }
});
