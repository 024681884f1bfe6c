import test from 'node:test';
import assert from 'node:assert/strict';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import sharp from 'sharp';

import { encodePng, writePng } from '../src/render/png.js';

const PNG_SIGNATURE = [137, 80, 78, 71, 13, 10, 26, 10];

const samplePixels = () => new Uint8ClampedArray([255, 0, 0, 255, 0, 128, 255, 64]);

test('encodePng produces a lossless RGBA image', async () => {
  const png = await encodePng(samplePixels(), 2, 1);
  assert.deepEqual(Array.from(png.subarray(0, 8)), PNG_SIGNATURE);
  const { data, info } = await sharp(png).raw().toBuffer({ resolveWithObject: true });
  assert.equal(info.width, 2);
  assert.equal(info.height, 1);
  assert.equal(info.channels, 4);
  assert.deepEqual(Array.from(data), Array.from(samplePixels()));
});

test('encodePng rejects mismatched buffers', () => {
  assert.throws(
    () => encodePng(new Uint8ClampedArray(4), 2, 1),
    /\[png\] frame buffer holds 4 bytes, expected 8/,
  );
  assert.throws(() => encodePng(samplePixels(), 0, 1), /\[png\] invalid frame size 0x1/);
});

test('writePng writes the file to disk', async (t) => {
  const dir = await mkdtemp(join(tmpdir(), 'tiler-png-'));
  t.after(() => rm(dir, { recursive: true, force: true }));
  const path = join(dir, 'frame.png');
  await writePng(path, samplePixels(), 2, 1);
  const written = await readFile(path);
  assert.deepEqual(Array.from(written.subarray(0, 8)), PNG_SIGNATURE);
});
