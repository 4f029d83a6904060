/**
 * Test Image Fixture Utilities
 *
 * Creates small test images in memory: QOI images with chosen pixels, and
 * PNG/JPEG files built with pngjs and jpeg-js.
 */

import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import * as path from 'node:path';
import jpeg from 'jpeg-js';
import { PNG } from 'pngjs';
import { QoiColorspace, type Pixel, type QoiImage } from '../types.js';

/**
 * Build a QOI image from a list of pixels in row-major order
 */
export function imageFromPixels(
  width: number,
  height: number,
  pixels: Pixel[],
  options: { hasAlpha?: boolean; colorspace?: QoiColorspace } = {}
): QoiImage {
  if (pixels.length !== width * height) {
    throw new Error(`Expected ${width * height} pixels, got ${pixels.length}`);
  }

  const data = new Uint8Array(width * height * 4);
  pixels.forEach((pixel, i) => {
    data[i * 4] = pixel.r;
    data[i * 4 + 1] = pixel.g;
    data[i * 4 + 2] = pixel.b;
    data[i * 4 + 3] = pixel.a;
  });

  return {
    width,
    height,
    hasAlpha: options.hasAlpha ?? true,
    colorspace: options.colorspace ?? QoiColorspace.SRGB,
    data
  };
}

/**
 * Deterministic pseudo-random pixel content (xorshift32)
 */
export function createNoiseImage(
  width: number,
  height: number,
  seed: number,
  options: { hasAlpha?: boolean; colorspace?: QoiColorspace } = {}
): QoiImage {
  const hasAlpha = options.hasAlpha ?? true;
  const data = new Uint8Array(width * height * 4);
  let state = seed >>> 0 || 1;

  for (let i = 0; i < data.length; i++) {
    state ^= state << 13;
    state >>>= 0;
    state ^= state >>> 17;
    state ^= state << 5;
    state >>>= 0;
    data[i] = state & 0xff;
  }

  if (!hasAlpha) {
    for (let i = 3; i < data.length; i += 4) {
      data[i] = 255;
    }
  }

  return {
    width,
    height,
    hasAlpha,
    colorspace: options.colorspace ?? QoiColorspace.SRGB,
    data
  };
}

/**
 * Image with smooth gradients, so that diff and luma chunks are exercised
 */
export function createGradientImage(width: number, height: number, hasAlpha = false): QoiImage {
  const data = new Uint8Array(width * height * 4);

  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const i = (y * width + x) * 4;
      data[i] = (x * 3) & 0xff;
      data[i + 1] = (x * 2 + y) & 0xff;
      data[i + 2] = (y * 5) & 0xff;
      data[i + 3] = hasAlpha ? (255 - x) & 0xff : 255;
    }
  }

  return { width, height, hasAlpha, colorspace: QoiColorspace.SRGB, data };
}

/**
 * Create a solid-color RGBA buffer
 */
export function createSolidRgba(width: number, height: number, color: Uint8Array): Uint8Array {
  const pixelData = new Uint8Array(width * height * 4);
  for (let i = 0; i < width * height; i++) {
    pixelData[i * 4] = color[0]; // R
    pixelData[i * 4 + 1] = color[1]; // G
    pixelData[i * 4 + 2] = color[2]; // B
    pixelData[i * 4 + 3] = color[3]; // A
  }
  return pixelData;
}

/**
 * Encode RGBA pixels as PNG with pngjs
 */
export function createPngFromRgba(
  width: number,
  height: number,
  rgba: Uint8Array,
  options: { alpha?: boolean } = {}
): Uint8Array {
  const png = new PNG({ width, height });
  png.data = Buffer.from(rgba);
  const encoded = PNG.sync.write(png, { colorType: options.alpha === false ? 2 : 6 });
  return new Uint8Array(encoded);
}

/**
 * Create a solid-color PNG for testing
 */
export function createTestPng(
  width: number,
  height: number,
  color: Uint8Array,
  options: { alpha?: boolean } = {}
): Uint8Array {
  return createPngFromRgba(width, height, createSolidRgba(width, height, color), options);
}

/**
 * Create a solid-color baseline JPEG with jpeg-js
 */
export function createTestJpeg(width: number, height: number, color: Uint8Array): Uint8Array {
  const encoded = jpeg.encode(
    {
      data: createSolidRgba(width, height, color),
      width,
      height
    },
    90 // quality
  );

  return new Uint8Array(encoded.data);
}

/**
 * Create test image bytes with specific magic bytes for format detection testing
 */
export function createMagicBytesTest(format: 'qoi' | 'png' | 'jpeg'): Uint8Array {
  switch (format) {
    case 'qoi':
      // "qoif"
      return new Uint8Array([0x71, 0x6f, 0x69, 0x66, ...new Array<number>(28).fill(0)]);

    case 'png':
      // PNG signature: 89 50 4E 47 0D 0A 1A 0A
      return new Uint8Array([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a, ...new Array<number>(24).fill(0)]);

    case 'jpeg':
      // JPEG SOI: FF D8 FF
      return new Uint8Array([0xff, 0xd8, 0xff, 0xe0, ...new Array<number>(28).fill(0)]);
  }
}

/**
 * Run `fn` with a fresh temporary directory that is removed afterwards
 */
export async function withTempDir<T>(fn: (dir: string) => Promise<T>): Promise<T> {
  const dir = await mkdtemp(path.join(tmpdir(), 'qoi-kit-'));
  try {
    return await fn(dir);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}
