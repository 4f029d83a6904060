/**
 * QOI Image Library
 *
 * Lossless QOI ("Quite OK Image") encoder and decoder for Node.js, plus
 * helpers to convert PNG and JPEG images to QOI and QOI back to PNG.
 *
 * Key features:
 * - Bit-exact QOI encoding and strict decoding (every malformed file is rejected)
 * - Header sniffing without a full decode
 * - Typed errors with stable codes
 * - Automatic input format detection (QOI, PNG, JPEG)
 *
 * @example
 * import { convertToQoi, decodeQoi } from 'qoi-kit';
 *
 * const qoi = await convertToQoi('photo.png');
 * const image = decodeQoi(qoi);
 */

// Codec
export { decodeQoi } from './qoi-decoder.js';
export { encodeQoi, maxEncodedSize } from './qoi-encoder.js';
export {
  parseQoiHeader,
  serializeQoiHeader,
  validateQoiHeader,
  writeQoiHeader,
  isValidChannels,
  isValidColorspace,
  isValidDimension
} from './qoi-header.js';
export {
  QOI_HEADER_SIZE,
  QOI_END_MARKER_SIZE,
  QOI_MAX_DIMENSION,
  QOI_MAX_RUN_LENGTH,
  QOI_OP_INDEX,
  QOI_OP_DIFF,
  QOI_OP_LUMA,
  QOI_OP_RUN,
  QOI_OP_RGB,
  QOI_OP_RGBA,
  ColorIndex,
  qoiHash,
  packPixel,
  unpackPixel
} from './qoi-ops.js';

// Files and conversion (main API)
export {
  loadQoiFile,
  saveQoiFile,
  convertToQoi,
  convertToQoiFile,
  convertQoiToPng
} from './qoi-file.js';
export { readImageBytes, writeImageBytes, readRaster } from './image-io.js';
export { encodePng } from './png-writer.js';

// Multi-format decoder system
export type {
  ImageDecoder,
  ImageHeader,
  ImageFormat,
  ImageInput,
  DecoderOptions,
  DecoderPlugin,
  QoiDecoderOptions,
  PngDecoderOptions,
  JpegDecoderOptions
} from './decoders/index.js';
export {
  createDecoder,
  createDecoders,
  detectImageFormat,
  detectFormat,
  setDefaultDecoderPlugins,
  getDefaultDecoderPlugins,
  clearDefaultDecoderPlugins,
  QoiFileDecoder,
  QoiBufferDecoder,
  PngFileDecoder,
  PngBufferDecoder,
  JpegFileDecoder,
  JpegBufferDecoder,
  qoiDecoder,
  pngDecoder,
  jpegDecoder
} from './decoders/index.js';

// Pixel helpers
export {
  createQoiImage,
  getPixel,
  setPixel,
  pixelsEqual,
  hasTranslucentPixels,
  flattenAlpha,
  expandToRgba,
  rasterToQoiImage
} from './pixel-ops.js';

export * from './errors.js';
export * from './types.js';
export {
  readUInt32BE,
  writeUInt32BE,
  isQoiSignature,
  QOI_SIGNATURE,
  QOI_END_MARKER
} from './utils.js';
