export type ProfileSummary = {
  sampleCount: number;
  medianMs: number;
  meanMs: number;
  baselineMs: number | null;
  drift: number | null;
  warning: boolean;
};

export type DriftWarning = {
  drift: number;
  medianMs: number;
  baselineMs: number;
};

export type KernelProfilerOptions = {
  /** Rolling window length; never below 32. */
  capacity?: number;
  /** Samples collected before the median is frozen as the baseline. */
  baselineAfter?: number;
  driftThreshold?: number;
  onWarning?: (event: DriftWarning) => void;
};

const DEFAULT_CAPACITY = 240;
const DEFAULT_BASELINE_AFTER = 90;
const DEFAULT_DRIFT_THRESHOLD = 0.1;

const medianOf = (sorted: readonly number[]): number => {
  const half = sorted.length >> 1;
  return sorted.length & 1 ? sorted[half] : (sorted[half - 1] + sorted[half]) / 2;
};

/**
 * Rolling dispatch timings. Once enough frames are in, the median becomes the
 * baseline; later frames drifting past the threshold raise one warning per
 * excursion.
 */
export class KernelProfiler {
  private readonly window: number[] = [];
  private readonly capacity: number;
  private readonly baselineAfter: number;
  private readonly threshold: number;
  private readonly onWarning?: (event: DriftWarning) => void;
  private baseline: number | null = null;
  private warned = false;
  private latest: ProfileSummary | null = null;

  constructor(options: KernelProfilerOptions = {}) {
    this.capacity = Math.max(32, Math.trunc(options.capacity ?? DEFAULT_CAPACITY));
    this.baselineAfter = Math.max(1, Math.trunc(options.baselineAfter ?? DEFAULT_BASELINE_AFTER));
    this.threshold = options.driftThreshold ?? DEFAULT_DRIFT_THRESHOLD;
    this.onWarning = options.onWarning;
  }

  record(timeMs: number): ProfileSummary {
    this.window.push(timeMs);
    if (this.window.length > this.capacity) {
      this.window.splice(0, this.window.length - this.capacity);
    }

    const sorted = [...this.window].sort((a, b) => a - b);
    const medianMs = medianOf(sorted);
    const meanMs = this.window.reduce((total, value) => total + value, 0) / this.window.length;
    if (this.baseline === null && this.window.length >= this.baselineAfter) {
      this.baseline = medianMs;
    }

    let drift: number | null = null;
    const baseline = this.baseline;
    if (baseline !== null && baseline > 0) {
      // Worst of the sustained (median) and instantaneous (latest) slowdown.
      drift = Math.max(medianMs - baseline, timeMs - baseline) / baseline;
    }
    const warning = drift !== null && drift > this.threshold;
    if (warning && !this.warned && drift !== null && baseline !== null) {
      this.onWarning?.({ drift, medianMs, baselineMs: baseline });
    }
    this.warned = warning;

    this.latest = {
      sampleCount: this.window.length,
      medianMs,
      meanMs,
      baselineMs: baseline,
      drift,
      warning,
    };
    return this.latest;
  }

  summary(): ProfileSummary | null {
    return this.latest;
  }
}
