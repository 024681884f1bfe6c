import { hashFrame } from '../serialization/canonicalJson.js';
import {
  FrameWatchdog,
  type FrameBudget,
  type FrameSample,
  type FrameSnapshot,
  type FrameWatchdogOptions,
  type MeasurementProvider,
} from './frameWatchdog.js';

export type OfflineRendererConfig = {
  width: number;
  height: number;
  budgets: FrameBudget;
  watchdog?: FrameWatchdogOptions;
  provider?: MeasurementProvider;
};

export type OfflineFrameContext = {
  frameIndex: number;
};

export type OfflineRenderCallback<T> = (outBuffer: Uint8ClampedArray) => Promise<T> | T;

export type OfflineFrameResult<T> = {
  frameIndex: number;
  result: T;
  performance: FrameSample;
  /** View over the renderer's internal buffer. Finish reading before the next renderFrame. */
  pixels: Uint8ClampedArray;
  digest: string;
};

const assertDimension = (label: string, value: number) => {
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`[offline-renderer] ${label} must be a positive integer (received ${value})`);
  }
};

export class OfflineRenderer {
  private readonly width: number;
  private readonly height: number;
  private readonly watchdog: FrameWatchdog;
  private readonly outBuffer: Uint8ClampedArray;

  constructor(config: OfflineRendererConfig) {
    assertDimension('width', config.width);
    assertDimension('height', config.height);
    this.width = config.width;
    this.height = config.height;
    this.watchdog = new FrameWatchdog(
      config.budgets,
      { label: 'offline-renderer', historySize: 120, ...config.watchdog },
      config.provider,
    );
    this.outBuffer = new Uint8ClampedArray(this.width * this.height * 4);
  }

  getPerformanceSnapshot(): FrameSnapshot {
    return this.watchdog.snapshot();
  }

  getScratchBuffer(): Uint8ClampedArray {
    return this.outBuffer;
  }

  async renderFrame<T>(
    context: OfflineFrameContext,
    callback: OfflineRenderCallback<T>,
  ): Promise<OfflineFrameResult<T>> {
    this.watchdog.beginFrame(context.frameIndex);
    let result: T;
    try {
      result = await callback(this.outBuffer);
    } catch (error) {
      this.watchdog.abortFrame();
      throw error;
    }
    const performance = this.watchdog.endFrame(this.width * this.height);
    return {
      frameIndex: context.frameIndex,
      result,
      performance,
      pixels: this.outBuffer,
      digest: hashFrame(this.outBuffer, this.width, this.height),
    };
  }
}
