export type FrameBudget = {
  frameMs?: number;
  heapMb?: number;
  /** Lower bound on classified pixels per millisecond. */
  pixelsPerMs?: number;
};

export type FrameSample = {
  frameIndex: number;
  frameMs: number;
  heapMb: number;
  pixels: number;
  pixelsPerMs: number;
};

export type FrameViolationType = keyof FrameBudget;

export type FrameViolation = {
  type: FrameViolationType;
  value: number;
  limit: number;
  frameIndex: number;
};

export type FrameSnapshot = {
  frames: number;
  frameMsAvg: number;
  frameMsMax: number;
  heapMbMax: number;
  pixelsPerMsMin: number | null;
  lastSample: FrameSample | null;
  history: FrameSample[];
  violations: FrameViolation[];
};

export type MeasurementProvider = {
  now: () => bigint;
  heapUsed: () => number;
};

export type FrameWatchdogOptions = {
  label?: string;
  /** Fractional slack applied to every budget before it counts as violated. */
  tolerance?: number;
  historySize?: number;
};

type FrameTotals = {
  frames: number;
  frameMsSum: number;
  frameMsMax: number;
  heapMbMax: number;
  pixelsPerMsMin: number | null;
};

type BudgetCheck = {
  type: FrameViolationType;
  kind: 'ceiling' | 'floor';
  read: (sample: FrameSample) => number;
};

const BUDGET_CHECKS: readonly BudgetCheck[] = [
  { type: 'frameMs', kind: 'ceiling', read: (sample) => sample.frameMs },
  { type: 'heapMb', kind: 'ceiling', read: (sample) => sample.heapMb },
  { type: 'pixelsPerMs', kind: 'floor', read: (sample) => sample.pixelsPerMs },
];

const BYTES_PER_MB = 1024 * 1024;

const NS_PER_MS = 1_000_000;

const processProvider: MeasurementProvider = {
  now: () => process.hrtime.bigint(),
  heapUsed: () => process.memoryUsage().heapUsed,
};

const emptyTotals = (): FrameTotals => ({
  frames: 0,
  frameMsSum: 0,
  frameMsMax: 0,
  heapMbMax: 0,
  pixelsPerMsMin: null,
});

const accumulate = (totals: FrameTotals, sample: FrameSample): FrameTotals => ({
  frames: totals.frames + 1,
  frameMsSum: totals.frameMsSum + sample.frameMs,
  frameMsMax: Math.max(totals.frameMsMax, sample.frameMs),
  heapMbMax: Math.max(totals.heapMbMax, sample.heapMb),
  pixelsPerMsMin: !Number.isFinite(sample.pixelsPerMs)
    ? totals.pixelsPerMsMin
    : totals.pixelsPerMsMin == null
      ? sample.pixelsPerMs
      : Math.min(totals.pixelsPerMsMin, sample.pixelsPerMs),
});

/**
 * Tracks per-frame cost of offline renders against optional budgets. Time and
 * heap are ceilings, throughput is a floor; each gets `tolerance` slack.
 */
export class FrameWatchdog {
  private readonly budget: Readonly<FrameBudget>;
  private readonly slack: number;
  private readonly historyLimit: number;
  private readonly provider: MeasurementProvider;
  private readonly label: string;

  private totals = emptyTotals();
  private recent: FrameSample[] = [];
  private violations: FrameViolation[] = [];
  private lastSample: FrameSample | null = null;
  private open: { startedAt: bigint; frameIndex: number } | null = null;

  constructor(
    budget: FrameBudget,
    options: FrameWatchdogOptions = {},
    provider: MeasurementProvider = processProvider,
  ) {
    this.budget = Object.freeze({ ...budget });
    this.slack = 1 + Math.max(0, options.tolerance ?? 0.1);
    this.historyLimit = Math.max(0, Math.floor(options.historySize ?? 32));
    this.provider = provider;
    this.label = options.label ?? 'frame-watchdog';
  }

  beginFrame(frameIndex: number): void {
    if (this.open) {
      throw new Error(`[${this.label}] beginFrame called twice without endFrame.`);
    }
    this.open = { startedAt: this.provider.now(), frameIndex };
  }

  /** Drops an open frame without recording it. */
  abortFrame(): void {
    this.open = null;
  }

  endFrame(pixels: number): FrameSample {
    const frame = this.open;
    if (!frame) {
      throw new Error(`[${this.label}] endFrame called without beginFrame.`);
    }
    this.open = null;

    const frameMs = Number(this.provider.now() - frame.startedAt) / NS_PER_MS;
    const sample: FrameSample = {
      frameIndex: frame.frameIndex,
      frameMs,
      heapMb: this.provider.heapUsed() / BYTES_PER_MB,
      pixels,
      // Zero-length frames have no meaningful rate.
      pixelsPerMs: frameMs > 0 ? pixels / frameMs : Number.POSITIVE_INFINITY,
    };

    this.totals = accumulate(this.totals, sample);
    this.lastSample = sample;
    if (this.historyLimit > 0) {
      this.recent = [...this.recent, sample].slice(-this.historyLimit);
    }
    this.violations.push(...this.collectViolations(sample));
    return sample;
  }

  private collectViolations(sample: FrameSample): FrameViolation[] {
    const found: FrameViolation[] = [];
    for (const check of BUDGET_CHECKS) {
      const limit = this.budget[check.type];
      if (typeof limit !== 'number' || !Number.isFinite(limit)) continue;
      const value = check.read(sample);
      const violated =
        check.kind === 'ceiling' ? value > limit * this.slack : value < limit / this.slack;
      if (violated) {
        found.push({ type: check.type, value, limit, frameIndex: sample.frameIndex });
      }
    }
    return found;
  }

  snapshot(): FrameSnapshot {
    const { frames, frameMsSum, frameMsMax, heapMbMax, pixelsPerMsMin } = this.totals;
    return {
      frames,
      frameMsAvg: frames > 0 ? frameMsSum / frames : 0,
      frameMsMax,
      heapMbMax,
      pixelsPerMsMin,
      lastSample: this.lastSample,
      history: [...this.recent],
      violations: [...this.violations],
    };
  }

  reset(): void {
    this.totals = emptyTotals();
    this.recent = [];
    this.violations = [];
    this.lastSample = null;
    this.open = null;
  }
}
