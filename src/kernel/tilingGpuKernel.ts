import { GROUP_SENTINEL, type GroupAutomaton } from '../group/automaton.js';
import { STICKER_COLUMNS, type StickerTable } from '../group/stickers.js';
import { renderTilingCpu, type FrameClassificationStats, type TilingFrame } from './classify.js';
import { KernelProfiler, type DriftWarning, type ProfileSummary } from './kernelProfiler.js';
import { packRenderParams, RENDER_PARAMS_BYTE_LENGTH } from './renderParams.js';

const WORKGROUP_SIZE = 8;

// WebGPU flag values, for hosts that expose a device but not the globals.
const BUFFER_USAGE = {
  MAP_READ: 0x0001,
  COPY_SRC: 0x0004,
  COPY_DST: 0x0008,
  UNIFORM: 0x0040,
  STORAGE: 0x0080,
} as const;

const MAP_READ_MODE = 0x0001;

const KERNEL_URL = new URL('./tilingKernel.wgsl', import.meta.url);

let kernelSource: Promise<string> | null = null;

const readKernelSource = async (): Promise<string> => {
  if (typeof process === 'object' && typeof process.versions?.node === 'string') {
    const { readFile } = await import('node:fs/promises');
    return readFile(KERNEL_URL, 'utf8');
  }
  const response = await fetch(KERNEL_URL);
  if (!response.ok) {
    throw new Error(`[tiling-gpu-kernel] failed to load kernel source (${response.status})`);
  }
  return response.text();
};

export const getTilingKernelSource = (): Promise<string> => {
  kernelSource ??= readKernelSource().catch((error: unknown) => {
    kernelSource = null;
    throw error;
  });
  return kernelSource;
};

export type TilingBackend = 'gpu' | 'cpu';

export type TilingKernelProfile = {
  backend: TilingBackend;
  timeMs: number;
  pixelCount: number;
};

export type TilingKernelStats = ProfileSummary & { backend: TilingBackend };

export type TilingKernelWarningEvent = DriftWarning;

export type TilingKernelInitOptions = {
  /** `gpu-first` throws when no device can be brought up; `auto` falls back. */
  backend?: 'auto' | 'gpu-first' | 'cpu-only';
  device?: GPUDevice | null;
  now?: () => number;
  onWarning?: (event: TilingKernelWarningEvent) => void;
  profileCapacity?: number;
  label?: string;
};

export type TilingDispatchOptions = {
  output?: Uint8ClampedArray | null;
  /** Classification counters; only the CPU backend fills them. */
  stats?: FrameClassificationStats;
};

export type PackedTilingFrame = {
  params: ArrayBuffer;
  automaton: Uint32Array;
  stickers: Uint32Array;
};

/**
 * Re-strides the automaton to `mirrorCount + 1` columns, the layout the shader
 * indexes with. Generators the table does not know read as the sentinel.
 */
export const packAutomatonForMirrors = (
  automaton: GroupAutomaton,
  mirrorCount: number,
): Uint32Array => {
  const stride = mirrorCount + 1;
  if (automaton.rowStride === stride) {
    return automaton.table;
  }
  const packed = new Uint32Array(automaton.elementCount * stride).fill(GROUP_SENTINEL);
  for (let element = 0; element < automaton.elementCount; element++) {
    packed[element * stride] = automaton.table[element * automaton.rowStride];
    const shared = Math.min(mirrorCount, automaton.generatorCount);
    for (let generator = 0; generator < shared; generator++) {
      packed[element * stride + generator + 1] =
        automaton.table[element * automaton.rowStride + generator + 1];
    }
  }
  return packed;
};

const packStickers = (stickers: StickerTable | null): Uint32Array =>
  stickers && stickers.table.length > 0
    ? stickers.table
    : new Uint32Array(STICKER_COLUMNS).fill(GROUP_SENTINEL);

export const packTilingFrame = (frame: TilingFrame): PackedTilingFrame => ({
  params: packRenderParams(frame.params, {
    width: frame.width,
    height: frame.height,
    elementCount: frame.automaton.elementCount,
    hasStickers: frame.stickers != null,
  }),
  automaton: packAutomatonForMirrors(frame.automaton, frame.params.mirrors.length),
  stickers: packStickers(frame.stickers),
});

type GpuTables = {
  automaton: GroupAutomaton;
  stickers: StickerTable | null;
  mirrorCount: number;
  automatonBuffer: GPUBuffer;
  stickerBuffer: GPUBuffer;
};

type GpuState = {
  device: GPUDevice;
  pipeline: GPUComputePipeline;
  bindGroupLayout: GPUBindGroupLayout;
  paramsBuffer: GPUBuffer;
  outputBuffer: GPUBuffer | null;
  readbackBuffer: GPUBuffer | null;
  outputCapacity: number;
  tables: GpuTables | null;
  bindGroup: GPUBindGroup | null;
};

const requestDefaultDevice = async (): Promise<GPUDevice | null> => {
  const gpu = typeof navigator === 'undefined' || !('gpu' in navigator) ? undefined : navigator.gpu;
  if (!gpu) return null;
  try {
    const adapter = await gpu.requestAdapter();
    return adapter ? await adapter.requestDevice() : null;
  } catch (error) {
    console.warn('[tiling-gpu-kernel] WebGPU adapter request failed', error);
    return null;
  }
};

const createGpuState = async (device: GPUDevice, label: string): Promise<GpuState> => {
  const module = device.createShaderModule({ label, code: await getTilingKernelSource() });
  const pipeline = await device.createComputePipelineAsync({
    label,
    layout: 'auto',
    compute: { module, entryPoint: 'main' },
  });
  return {
    device,
    pipeline,
    bindGroupLayout: pipeline.getBindGroupLayout(0),
    paramsBuffer: device.createBuffer({
      label: `${label}-params`,
      size: RENDER_PARAMS_BYTE_LENGTH,
      usage: BUFFER_USAGE.UNIFORM | BUFFER_USAGE.COPY_DST,
    }),
    outputBuffer: null,
    readbackBuffer: null,
    outputCapacity: 0,
    tables: null,
    bindGroup: null,
  };
};

/**
 * Runs tiling frames on a WebGPU compute pipeline when one can be created and
 * on `renderTilingCpu` otherwise. Both backends run the same reduce-and-colour
 * pipeline; the GPU path works in f32, so pixels near a mirror may differ.
 */
export class TilingGpuKernel {
  private readonly profiler: KernelProfiler;
  private readonly label: string;
  private lastProfile: TilingKernelProfile | null = null;

  private constructor(
    private readonly backend: TilingBackend,
    private gpu: GpuState | null,
    private readonly now: () => number,
    options: TilingKernelInitOptions,
  ) {
    this.label = options.label ?? 'tiling-gpu-kernel';
    this.profiler = new KernelProfiler({
      capacity: options.profileCapacity,
      onWarning: options.onWarning,
    });
  }

  static async create(options: TilingKernelInitOptions = {}): Promise<TilingGpuKernel> {
    const preference = options.backend ?? 'auto';
    const now = options.now ?? (() => performance.now());
    const cpu = () => new TilingGpuKernel('cpu', null, now, options);
    if (preference === 'cpu-only') {
      return cpu();
    }

    const device = options.device ?? (await requestDefaultDevice());
    if (!device) {
      if (preference === 'gpu-first') {
        throw new Error('[tiling-gpu-kernel] WebGPU device unavailable');
      }
      return cpu();
    }

    try {
      const gpu = await createGpuState(device, options.label ?? 'tiling-gpu-kernel');
      return new TilingGpuKernel('gpu', gpu, now, options);
    } catch (error) {
      if (preference === 'gpu-first') {
        throw new Error('[tiling-gpu-kernel] failed to initialize GPU backend', { cause: error });
      }
      console.warn('[tiling-gpu-kernel] falling back to CPU backend', error);
      return cpu();
    }
  }

  getBackend(): TilingBackend {
    return this.backend;
  }

  getLastProfile(): TilingKernelProfile | null {
    return this.lastProfile;
  }

  getStats(): TilingKernelStats | null {
    const summary = this.profiler.summary();
    return summary ? { backend: this.backend, ...summary } : null;
  }

  async dispatch(
    frame: TilingFrame,
    options: TilingDispatchOptions = {},
  ): Promise<Uint8ClampedArray> {
    const { width, height } = frame;
    if (!Number.isInteger(width) || !Number.isInteger(height)) {
      throw new Error(`[${this.label}] frame size must be integral (${width}x${height})`);
    }
    const startedAt = this.now();
    const target = options.output ?? null;
    const output = this.gpu
      ? await this.dispatchGpu(this.gpu, frame, target)
      : renderTilingCpu(frame, target, options.stats);
    const timeMs = this.now() - startedAt;
    this.profiler.record(timeMs);
    this.lastProfile = { backend: this.backend, timeMs, pixelCount: width * height };
    return output;
  }

  dispose(): void {
    if (!this.gpu) return;
    const { paramsBuffer, outputBuffer, readbackBuffer, tables } = this.gpu;
    paramsBuffer.destroy();
    outputBuffer?.destroy();
    readbackBuffer?.destroy();
    tables?.automatonBuffer.destroy();
    tables?.stickerBuffer.destroy();
    this.gpu = null;
  }

  private ensureOutputBuffers(gpu: GpuState, pixelCount: number) {
    if (gpu.outputCapacity >= pixelCount && gpu.outputBuffer && gpu.readbackBuffer) {
      return;
    }
    gpu.outputBuffer?.destroy();
    gpu.readbackBuffer?.destroy();
    const size = Math.max(1, pixelCount) * Uint32Array.BYTES_PER_ELEMENT;
    gpu.outputBuffer = gpu.device.createBuffer({
      label: `${this.label}-output`,
      size,
      usage: BUFFER_USAGE.STORAGE | BUFFER_USAGE.COPY_SRC,
    });
    gpu.readbackBuffer = gpu.device.createBuffer({
      label: `${this.label}-readback`,
      size,
      usage: BUFFER_USAGE.COPY_DST | BUFFER_USAGE.MAP_READ,
    });
    gpu.outputCapacity = pixelCount;
    gpu.bindGroup = null;
  }

  private createStorage(gpu: GpuState, name: string, data: Uint32Array): GPUBuffer {
    const buffer = gpu.device.createBuffer({
      label: `${this.label}-${name}`,
      size: Math.max(4, data.byteLength),
      usage: BUFFER_USAGE.STORAGE | BUFFER_USAGE.COPY_DST,
    });
    gpu.device.queue.writeBuffer(buffer, 0, new Uint32Array(data));
    return buffer;
  }

  // Tables only change when the group configuration does; re-upload on identity change.
  private ensureTables(gpu: GpuState, frame: TilingFrame, packed: PackedTilingFrame) {
    const current = gpu.tables;
    const mirrorCount = frame.params.mirrors.length;
    if (
      current &&
      current.automaton === frame.automaton &&
      current.stickers === frame.stickers &&
      current.mirrorCount === mirrorCount
    ) {
      return;
    }
    current?.automatonBuffer.destroy();
    current?.stickerBuffer.destroy();
    gpu.tables = {
      automaton: frame.automaton,
      stickers: frame.stickers,
      mirrorCount,
      automatonBuffer: this.createStorage(gpu, 'automaton', packed.automaton),
      stickerBuffer: this.createStorage(gpu, 'stickers', packed.stickers),
    };
    gpu.bindGroup = null;
  }

  private async dispatchGpu(
    gpu: GpuState,
    frame: TilingFrame,
    target: Uint8ClampedArray | null,
  ): Promise<Uint8ClampedArray> {
    const pixelCount = frame.width * frame.height;
    const packed = packTilingFrame(frame);
    this.ensureOutputBuffers(gpu, pixelCount);
    this.ensureTables(gpu, frame, packed);
    const { outputBuffer, readbackBuffer, tables } = gpu;
    if (!outputBuffer || !readbackBuffer || !tables) {
      throw new Error(`[${this.label}] GPU buffers not allocated`);
    }
    if (!gpu.bindGroup) {
      gpu.bindGroup = gpu.device.createBindGroup({
        layout: gpu.bindGroupLayout,
        entries: [
          { binding: 0, resource: { buffer: gpu.paramsBuffer } },
          { binding: 1, resource: { buffer: tables.automatonBuffer } },
          { binding: 2, resource: { buffer: tables.stickerBuffer } },
          { binding: 3, resource: { buffer: outputBuffer } },
        ],
      });
    }
    const queue = gpu.device.queue;
    queue.writeBuffer(gpu.paramsBuffer, 0, packed.params);
    const encoder = gpu.device.createCommandEncoder({ label: `${this.label}-commands` });
    const pass = encoder.beginComputePass({ label: `${this.label}-pass` });
    pass.setPipeline(gpu.pipeline);
    pass.setBindGroup(0, gpu.bindGroup);
    pass.dispatchWorkgroups(
      Math.max(1, Math.ceil(frame.width / WORKGROUP_SIZE)),
      Math.max(1, Math.ceil(frame.height / WORKGROUP_SIZE)),
    );
    pass.end();
    const byteLength = pixelCount * Uint32Array.BYTES_PER_ELEMENT;
    encoder.copyBufferToBuffer(outputBuffer, 0, readbackBuffer, 0, byteLength);
    queue.submit([encoder.finish()]);
    await queue.onSubmittedWorkDone();

    await readbackBuffer.mapAsync(MAP_READ_MODE, 0, byteLength);
    const mapped = new Uint8Array(readbackBuffer.getMappedRange(0, byteLength));
    const output = target && target.length >= byteLength ? target : new Uint8ClampedArray(byteLength);
    output.set(mapped);
    readbackBuffer.unmap();
    return output;
  }
}
