export type BackendFlag = 'auto' | 'gpu-first' | 'cpu-only';

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

const requireValue = (flag: string, raw: string | undefined): string => {
  if (raw === undefined || raw.startsWith('--')) {
    throw new CliUsageError(`${flag} requires a value.`);
  }
  return raw;
};

export const readNumberFlag = (flag: string, raw: string | undefined): number => {
  const text = requireValue(flag, raw);
  const value = Number(text);
  if (text.trim() === '' || !Number.isFinite(value)) {
    throw new CliUsageError(`${flag} expects a number (received "${text}").`);
  }
  return value;
};

export const readIntegerFlag = (flag: string, raw: string | undefined, min = 1): number => {
  const value = readNumberFlag(flag, raw);
  if (!Number.isInteger(value) || value < min) {
    throw new CliUsageError(`${flag} expects an integer >= ${min} (received ${value}).`);
  }
  return value;
};

export const readStringFlag = (flag: string, raw: string | undefined): string =>
  requireValue(flag, raw);

export const readBackendFlag = (raw: string | undefined): BackendFlag => {
  const value = requireValue('--backend', raw);
  if (value === 'auto' || value === 'gpu-first' || value === 'cpu-only') {
    return value;
  }
  throw new CliUsageError(`Unsupported backend "${value}". Use auto, gpu-first or cpu-only.`);
};

export type RenderCommandOptions = {
  scenePath?: string;
  output?: string;
  width: number;
  height: number;
  depth?: number;
  zoom?: number;
  backend: BackendFlag;
  json: boolean;
};

export const parseRenderArgs = (args: readonly string[]): RenderCommandOptions => {
  const options: RenderCommandOptions = {
    width: 512,
    height: 512,
    backend: 'auto',
    json: false,
  };
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (!arg.startsWith('--')) {
      if (options.scenePath) {
        throw new CliUsageError(`Unexpected argument "${arg}".`);
      }
      options.scenePath = arg;
      continue;
    }
    switch (arg) {
      case '--output':
        options.output = readStringFlag(arg, args[++i]);
        break;
      case '--width':
        options.width = readIntegerFlag(arg, args[++i]);
        break;
      case '--height':
        options.height = readIntegerFlag(arg, args[++i]);
        break;
      case '--depth':
        options.depth = readIntegerFlag(arg, args[++i]);
        break;
      case '--zoom': {
        const zoom = readNumberFlag(arg, args[++i]);
        if (!(zoom > 0)) {
          throw new CliUsageError(`--zoom must be positive (received ${zoom}).`);
        }
        options.zoom = zoom;
        break;
      }
      case '--backend':
        options.backend = readBackendFlag(args[++i]);
        break;
      case '--json':
        options.json = true;
        break;
      default:
        throw new CliUsageError(`Unknown flag "${arg}".`);
    }
  }
  return options;
};

export type ClassifyCommandOptions = {
  scenePath?: string;
  x?: number;
  y?: number;
  depth?: number;
  json: boolean;
};

export const parseClassifyArgs = (args: readonly string[]): ClassifyCommandOptions => {
  const options: ClassifyCommandOptions = { json: false };
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (!arg.startsWith('--')) {
      if (options.scenePath) {
        throw new CliUsageError(`Unexpected argument "${arg}".`);
      }
      options.scenePath = arg;
      continue;
    }
    switch (arg) {
      case '--x':
        options.x = readNumberFlag(arg, args[++i]);
        break;
      case '--y':
        options.y = readNumberFlag(arg, args[++i]);
        break;
      case '--depth':
        options.depth = readIntegerFlag(arg, args[++i]);
        break;
      case '--json':
        options.json = true;
        break;
      default:
        throw new CliUsageError(`Unknown flag "${arg}".`);
    }
  }
  return options;
};
