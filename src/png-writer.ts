import { PNG } from 'pngjs';
import type { RasterImage } from './types.js';
import { toBuffer } from './utils.js';

const PNG_COLOR_TYPE_RGB = 2;
const PNG_COLOR_TYPE_RGBA = 6;

/**
 * Encode a raster as an 8-bit PNG.
 *
 * Images with alpha become color type 6 (RGBA), the rest color type 2 (RGB).
 */
export function encodePng(image: RasterImage): Uint8Array {
  const { width, height, hasAlpha, data } = image;
  if (data.length !== width * height * 4) {
    throw new Error(`Expected ${width * height * 4} bytes of RGBA data for ${width}x${height}, got ${data.length}`);
  }

  const png = new PNG({ width, height });
  png.data = toBuffer(data);

  const encoded = PNG.sync.write(png, {
    colorType: hasAlpha ? PNG_COLOR_TYPE_RGBA : PNG_COLOR_TYPE_RGB,
    inputColorType: PNG_COLOR_TYPE_RGBA,
    inputHasAlpha: true
  });

  return new Uint8Array(encoded.buffer, encoded.byteOffset, encoded.byteLength);
}
