import test from 'node:test';
import assert from 'node:assert/strict';

import { FrameWatchdog, type MeasurementProvider } from '../src/render/frameWatchdog.js';

const MB = 1024 * 1024;

const scriptedProvider = (times: bigint[], heapMb: number): MeasurementProvider => {
  let index = 0;
  return {
    now: () => times[Math.min(index++, times.length - 1)] ?? 0n,
    heapUsed: () => heapMb * MB,
  };
};

test('endFrame measures duration, heap and throughput', () => {
  const watchdog = new FrameWatchdog({ frameMs: 20 }, {}, scriptedProvider([0n, 5_000_000n], 10));
  watchdog.beginFrame(0);
  const sample = watchdog.endFrame(1000);
  assert.deepEqual(sample, { frameIndex: 0, frameMs: 5, heapMb: 10, pixels: 1000, pixelsPerMs: 200 });
  const snapshot = watchdog.snapshot();
  assert.equal(snapshot.frames, 1);
  assert.equal(snapshot.frameMsAvg, 5);
  assert.equal(snapshot.frameMsMax, 5);
  assert.equal(snapshot.heapMbMax, 10);
  assert.equal(snapshot.pixelsPerMsMin, 200);
  assert.deepEqual(snapshot.violations, []);
});

test('budgets beyond tolerance record violations', () => {
  const watchdog = new FrameWatchdog(
    { frameMs: 20, heapMb: 100, pixelsPerMs: 50 },
    {},
    scriptedProvider([0n, 40_000_000n], 200),
  );
  watchdog.beginFrame(3);
  watchdog.endFrame(1000);
  assert.deepEqual(watchdog.snapshot().violations, [
    { type: 'frameMs', value: 40, limit: 20, frameIndex: 3 },
    { type: 'heapMb', value: 200, limit: 100, frameIndex: 3 },
    { type: 'pixelsPerMs', value: 25, limit: 50, frameIndex: 3 },
  ]);
});

test('values within the tolerance band are not violations', () => {
  const watchdog = new FrameWatchdog(
    { frameMs: 20, pixelsPerMs: 50 },
    { tolerance: 0.1 },
    scriptedProvider([0n, 21_000_000n], 1),
  );
  watchdog.beginFrame(0);
  watchdog.endFrame(1000);
  assert.deepEqual(watchdog.snapshot().violations, []);
});

test('a zero-length frame reports unbounded throughput and no minimum', () => {
  const watchdog = new FrameWatchdog({ pixelsPerMs: 50 }, {}, scriptedProvider([7n, 7n], 1));
  watchdog.beginFrame(0);
  assert.equal(watchdog.endFrame(64).pixelsPerMs, Number.POSITIVE_INFINITY);
  const snapshot = watchdog.snapshot();
  assert.equal(snapshot.pixelsPerMsMin, null);
  assert.deepEqual(snapshot.violations, []);
});

test('frames must be opened and closed in order', () => {
  const watchdog = new FrameWatchdog({}, { label: 'tiles' }, scriptedProvider([0n], 1));
  assert.throws(() => watchdog.endFrame(1), /\[tiles\] endFrame called without beginFrame\./);
  watchdog.beginFrame(0);
  assert.throws(() => watchdog.beginFrame(1), /\[tiles\] beginFrame called twice without endFrame\./);
  watchdog.abortFrame();
  watchdog.beginFrame(1);
  assert.equal(watchdog.endFrame(1).frameIndex, 1);
  assert.equal(watchdog.snapshot().frames, 1);
});

test('history keeps the most recent samples and reset clears everything', () => {
  let tick = 0n;
  const provider: MeasurementProvider = {
    now: () => (tick += 1_000_000n),
    heapUsed: () => 0,
  };
  const watchdog = new FrameWatchdog({ frameMs: 0.5 }, { historySize: 2 }, provider);
  for (let frame = 0; frame < 3; frame++) {
    watchdog.beginFrame(frame);
    watchdog.endFrame(10);
  }
  const snapshot = watchdog.snapshot();
  assert.deepEqual(
    snapshot.history.map((sample) => sample.frameIndex),
    [1, 2],
  );
  assert.equal(snapshot.violations.length, 3);
  assert.equal(snapshot.frameMsAvg, 1);

  watchdog.reset();
  assert.deepEqual(watchdog.snapshot(), {
    frames: 0,
    frameMsAvg: 0,
    frameMsMax: 0,
    heapMbMax: 0,
    pixelsPerMsMin: null,
    lastSample: null,
    history: [],
    violations: [],
  });
});
