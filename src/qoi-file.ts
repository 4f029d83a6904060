/**
 * QOI file loading, saving and conversion from/to other formats.
 */

import { QoiColorspace, type ConvertInput, type ConvertOptions, type QoiCodecOptions, type QoiImage } from './types.js';
import { decodeQoi } from './qoi-decoder.js';
import { encodeQoi } from './qoi-encoder.js';
import { encodePng } from './png-writer.js';
import { rasterToQoiImage, hasTranslucentPixels } from './pixel-ops.js';
import { readImageBytes, readRaster, writeImageBytes } from './image-io.js';
import { createDecoder } from './decoders/decoder-factory.js';
import { UnsupportedFormatError } from './errors.js';
import { isQoiSignature } from './utils.js';

// Importing the decoders bundle registers the QOI, PNG and JPEG plugins
import './decoders/index.js';

/**
 * Read and decode a QOI file
 */
export async function loadQoiFile(path: string, options: QoiCodecOptions = {}): Promise<QoiImage> {
  const data = await readImageBytes(path);
  return decodeQoi(data, options);
}

/**
 * Encode an image and write it to disk
 */
export async function saveQoiFile(path: string, image: QoiImage, options: QoiCodecOptions = {}): Promise<void> {
  const encoded = encodeQoi(image, options);
  await writeImageBytes(path, encoded);
}

/**
 * Convert any supported image (QOI, PNG, JPEG) to QOI bytes
 *
 * @example
 * const qoi = await convertToQoi('photo.png', { colorspace: QoiColorspace.Linear });
 *
 * // Drop alpha and report progress
 * const opaque = await convertToQoi(pngBytes, {
 *   alpha: false,
 *   onProgress: (done, total) => console.log(`${done}/${total} rows`)
 * });
 */
export async function convertToQoi(input: ConvertInput, options: ConvertOptions = {}): Promise<Uint8Array> {
  const { logger = console.warn } = options;

  const decoder = await createDecoder(input, options.decoderOptions, options.decoders);
  const raster = await readRaster(decoder, options.onProgress);

  // QOI sources keep their own tag unless the caller overrides it
  const colorspace =
    options.colorspace ??
    (raster.metadata?.colorspace === 'linear' ? QoiColorspace.Linear : QoiColorspace.SRGB);

  if (options.alpha === false && raster.hasAlpha && hasTranslucentPixels(raster.data)) {
    logger(
      `Discarding alpha: ${raster.width}x${raster.height} source has translucent pixels, writing them as opaque`
    );
  }

  const image = rasterToQoiImage(raster, { alpha: options.alpha, colorspace });
  return encodeQoi(image, { maxDimension: options.maxDimension });
}

/**
 * Convert any supported image to QOI and write it to `outputPath`
 */
export async function convertToQoiFile(
  input: ConvertInput,
  outputPath: string,
  options: ConvertOptions = {}
): Promise<void> {
  const encoded = await convertToQoi(input, options);
  await writeImageBytes(outputPath, encoded);
}

/**
 * Decode a QOI file or buffer and re-encode it as PNG
 */
export async function convertQoiToPng(input: string | Uint8Array, options: QoiCodecOptions = {}): Promise<Uint8Array> {
  const data = typeof input === 'string' ? await readImageBytes(input) : input;
  if (!isQoiSignature(data)) {
    throw new UnsupportedFormatError('Input is not a QOI image');
  }
  const image = decodeQoi(data, options);
  return encodePng(image);
}
