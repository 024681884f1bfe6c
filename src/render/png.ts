import sharp from 'sharp';

const assertFrame = (pixels: Uint8ClampedArray, width: number, height: number) => {
  if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
    throw new Error(`[png] invalid frame size ${width}x${height}`);
  }
  if (pixels.length < width * height * 4) {
    throw new Error(
      `[png] frame buffer holds ${pixels.length} bytes, expected ${width * height * 4}`,
    );
  }
};

const toSharp = (pixels: Uint8ClampedArray, width: number, height: number) => {
  assertFrame(pixels, width, height);
  const view = Buffer.from(pixels.buffer, pixels.byteOffset, width * height * 4);
  return sharp(view, { raw: { width, height, channels: 4 } }).png();
};

export const encodePng = (
  pixels: Uint8ClampedArray,
  width: number,
  height: number,
): Promise<Buffer> => toSharp(pixels, width, height).toBuffer();

export const writePng = async (
  path: string,
  pixels: Uint8ClampedArray,
  width: number,
  height: number,
): Promise<void> => {
  await toSharp(pixels, width, height).toFile(path);
};
