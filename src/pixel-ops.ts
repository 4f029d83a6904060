import { QoiColorspace, type Pixel, type QoiImage, type RasterImage } from './types.js';
import { allocateBytes } from './errors.js';

/**
 * Compare two pixels channel by channel
 */
export function pixelsEqual(a: Pixel, b: Pixel): boolean {
  return a.r === b.r && a.g === b.g && a.b === b.b && a.a === b.a;
}

/**
 * Create an image filled with a single color (default: transparent black)
 */
export function createQoiImage(
  width: number,
  height: number,
  options: { hasAlpha?: boolean; colorspace?: QoiColorspace; fill?: Pixel } = {}
): QoiImage {
  const hasAlpha = options.hasAlpha ?? true;
  const fill = options.fill ?? { r: 0, g: 0, b: 0, a: hasAlpha ? 0 : 255 };
  const data = allocateBytes(width * height * 4);

  for (let offset = 0; offset < data.length; offset += 4) {
    data[offset] = fill.r;
    data[offset + 1] = fill.g;
    data[offset + 2] = fill.b;
    data[offset + 3] = hasAlpha ? fill.a : 255;
  }

  return {
    width,
    height,
    hasAlpha,
    colorspace: options.colorspace ?? QoiColorspace.SRGB,
    data
  };
}

function pixelOffset(image: RasterImage | QoiImage, x: number, y: number): number {
  if (!Number.isInteger(x) || !Number.isInteger(y) || x < 0 || y < 0 || x >= image.width || y >= image.height) {
    throw new RangeError(`Pixel (${x}, ${y}) is outside the ${image.width}x${image.height} image`);
  }
  return (y * image.width + x) * 4;
}

export function getPixel(image: RasterImage | QoiImage, x: number, y: number): Pixel {
  const offset = pixelOffset(image, x, y);
  const { data } = image;
  return { r: data[offset], g: data[offset + 1], b: data[offset + 2], a: data[offset + 3] };
}

export function setPixel(image: RasterImage | QoiImage, x: number, y: number, pixel: Pixel): void {
  const offset = pixelOffset(image, x, y);
  image.data[offset] = pixel.r & 0xff;
  image.data[offset + 1] = pixel.g & 0xff;
  image.data[offset + 2] = pixel.b & 0xff;
  image.data[offset + 3] = pixel.a & 0xff;
}

/**
 * True if any alpha sample in an RGBA buffer is below 255
 */
export function hasTranslucentPixels(data: Uint8Array): boolean {
  for (let i = 3; i < data.length; i += 4) {
    if (data[i] !== 255) return true;
  }
  return false;
}

/**
 * Copy of an RGBA buffer with every alpha sample set to 255.
 * Color channels are kept as-is (no compositing against a background).
 */
export function flattenAlpha(data: Uint8Array): Uint8Array {
  const result = data.slice();
  for (let i = 3; i < result.length; i += 4) {
    result[i] = 255;
  }
  return result;
}

/**
 * Expand packed 1-4 channel 8-bit samples to RGBA
 *
 * - 1: gray
 * - 2: gray + alpha
 * - 3: RGB
 * - 4: RGBA (copied)
 */
export function expandToRgba(samples: Uint8Array, pixelCount: number, channels: number): Uint8Array {
  if (samples.length < pixelCount * channels) {
    throw new RangeError(
      `Expected ${pixelCount * channels} samples for ${pixelCount} pixels, got ${samples.length}`
    );
  }

  if (channels === 4) {
    return samples.slice(0, pixelCount * 4);
  }

  const rgba = allocateBytes(pixelCount * 4);
  for (let i = 0; i < pixelCount; i++) {
    const src = i * channels;
    const dst = i * 4;
    switch (channels) {
      case 1:
        rgba[dst] = rgba[dst + 1] = rgba[dst + 2] = samples[src];
        rgba[dst + 3] = 255;
        break;
      case 2:
        rgba[dst] = rgba[dst + 1] = rgba[dst + 2] = samples[src];
        rgba[dst + 3] = samples[src + 1];
        break;
      case 3:
        rgba[dst] = samples[src];
        rgba[dst + 1] = samples[src + 1];
        rgba[dst + 2] = samples[src + 2];
        rgba[dst + 3] = 255;
        break;
      default:
        throw new Error(`Unsupported channel count: ${channels}`);
    }
  }
  return rgba;
}

/**
 * Turn a raster into a QOI image, optionally dropping its alpha channel
 */
export function rasterToQoiImage(
  raster: RasterImage,
  options: { alpha?: boolean; colorspace?: QoiColorspace } = {}
): QoiImage {
  const hasAlpha = options.alpha ?? raster.hasAlpha;
  return {
    width: raster.width,
    height: raster.height,
    hasAlpha,
    colorspace: options.colorspace ?? QoiColorspace.SRGB,
    data: hasAlpha ? raster.data : flattenAlpha(raster.data)
  };
}
