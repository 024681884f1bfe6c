import { blake3 } from '@noble/hashes/blake3';
import { bytesToHex } from '@noble/hashes/utils';

export type CanonicalJsonWriteOptions = {
  /** Spaces per level, capped at 10. Omitted or 0 writes a single line. */
  indent?: number;
};

type Layout = { unit: string; colon: string };

const utf8 = new TextEncoder();

const encodeNumber = (value: number): string => {
  if (!Number.isFinite(value)) {
    throw new TypeError(`Canonical JSON cannot encode non-finite numbers (received ${value})`);
  }
  // String(-0) is already "0"; only the exponent sign needs fixing.
  return String(value).replace('e+', 'e');
};

const hasPlainPrototype = (value: object): boolean => {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === null || proto === Object.prototype;
};

const wrap = (parts: string[], brackets: '[]' | '{}', layout: Layout | null, depth: number): string => {
  const [open, close] = brackets;
  if (parts.length === 0) return open + close;
  if (!layout) return `${open}${parts.join(',')}${close}`;
  const inner = layout.unit.repeat(depth + 1);
  return `${open}\n${inner}${parts.join(`,\n${inner}`)}\n${layout.unit.repeat(depth)}${close}`;
};

/** Returns undefined for members JSON omits (undefined, functions, symbols). */
const encode = (value: unknown, layout: Layout | null, depth: number): string | undefined => {
  switch (typeof value) {
    case 'undefined':
    case 'function':
    case 'symbol':
      return undefined;
    case 'boolean':
      return String(value);
    case 'number':
      return encodeNumber(value);
    case 'string':
      return JSON.stringify(value);
    case 'bigint':
      throw new TypeError('Canonical JSON does not support bigint values');
  }
  if (value === null) return 'null';
  if (typeof value !== 'object') {
    throw new TypeError('Unsupported canonical JSON value encountered during serialization');
  }

  // Typed tables (automaton, stickers) serialise as plain number arrays.
  if (Array.isArray(value) || ArrayBuffer.isView(value)) {
    const items: unknown[] = Array.isArray(value) ? value : numericItems(value);
    const parts = items.map((item) => encode(item, layout, depth + 1) ?? 'null');
    return wrap(parts, '[]', layout, depth);
  }

  let members: Map<string, unknown>;
  if (value instanceof Map) {
    members = new Map(Array.from(value, ([key, entry]): [string, unknown] => [String(key), entry]));
  } else if (hasPlainPrototype(value)) {
    members = new Map(Object.entries(value));
  } else {
    throw new TypeError('Unsupported canonical JSON value encountered during serialization');
  }

  const parts: string[] = [];
  for (const key of [...members.keys()].sort()) {
    const encoded = encode(members.get(key), layout, depth + 1);
    if (encoded !== undefined) {
      parts.push(`${JSON.stringify(key)}${layout?.colon ?? ':'}${encoded}`);
    }
  }
  return wrap(parts, '{}', layout, depth);
};

const numericItems = (view: ArrayBufferView): number[] => {
  if (view instanceof Uint32Array || view instanceof Float32Array || view instanceof Uint8Array) {
    return Array.from(view);
  }
  throw new TypeError('Unsupported canonical JSON value encountered during serialization');
};

export const writeCanonicalJson = (
  value: unknown,
  options: CanonicalJsonWriteOptions = {},
): string => {
  const width = Math.min(Math.trunc(options.indent ?? 0), 10);
  const layout = width > 0 ? { unit: ' '.repeat(width), colon: ': ' } : null;
  return encode(value, layout, 0) ?? 'null';
};

export const hashBytes = (bytes: Uint8Array): string => bytesToHex(blake3(bytes));

export const hashCanonicalJsonString = (json: string): string => hashBytes(utf8.encode(json));

export const hashCanonicalJson = (
  value: unknown,
  options: CanonicalJsonWriteOptions = {},
): { json: string; hash: string } => {
  const json = writeCanonicalJson(value, options);
  return { json, hash: hashCanonicalJsonString(json) };
};

/** Digest of a rendered RGBA8 frame, prefixed by its dimensions. */
export const hashFrame = (pixels: Uint8ClampedArray, width: number, height: number): string => {
  const bytes = new Uint8Array(8 + pixels.byteLength);
  new DataView(bytes.buffer).setUint32(0, width >>> 0, true);
  new DataView(bytes.buffer).setUint32(4, height >>> 0, true);
  bytes.set(pixels, 8);
  return hashBytes(bytes);
};
