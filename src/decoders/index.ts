/**
 * Image Decoders
 *
 * Multi-format image decoder system supporting QOI, PNG, and JPEG.
 * Provides a unified interface for reading RGBA rows regardless of source format.
 */

import { setDefaultDecoderPlugins } from './plugin-registry.js';
import { qoiDecoder } from './qoi-decoder.js';
import { pngDecoder } from './png-decoder.js';
import { jpegDecoder } from './jpeg-decoder.js';

// Register comprehensive defaults when consumers import the decoders bundle.
setDefaultDecoderPlugins([qoiDecoder, pngDecoder, jpegDecoder]);

// Core types
export type {
  ImageDecoder,
  ImageHeader,
  ImageFormat,
  ImageInput,
  DecoderOptions,
  QoiDecoderOptions,
  PngDecoderOptions,
  JpegDecoderOptions,
  DecoderPlugin
} from './types.js';

// Format detection
export { detectImageFormat, detectFormat, readMagicBytes, validateFormat } from './format-detection.js';

// QOI decoders
export { QoiFileDecoder, QoiBufferDecoder, qoiDecoder } from './qoi-decoder.js';

// PNG decoders
export { PngFileDecoder, PngBufferDecoder, pngDecoder } from './png-decoder.js';

// JPEG decoders
export { JpegFileDecoder, JpegBufferDecoder, jpegDecoder, parseJpegHeader } from './jpeg-decoder.js';

// Registry
export { setDefaultDecoderPlugins, getDefaultDecoderPlugins, clearDefaultDecoderPlugins } from './plugin-registry.js';

// Factory functions (main API)
export { createDecoder, createDecoders, isImageDecoder } from './decoder-factory.js';
