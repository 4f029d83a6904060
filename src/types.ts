import type { DecoderOptions, DecoderPlugin, ImageInput } from './decoders/types.js';

/**
 * QOI channel count as stored in the header
 */
export enum QoiChannels {
  RGB = 3,
  RGBA = 4
}

/**
 * QOI colorspace tag. Only informs how pixels are interpreted downstream;
 * the chunk layout is the same for both.
 */
export enum QoiColorspace {
  /** sRGB with linear alpha (gamma-encoded channels) */
  SRGB = 0,
  /** All channels linear */
  Linear = 1
}

/**
 * A single RGBA pixel with 8-bit channels
 */
export interface Pixel {
  r: number;
  g: number;
  b: number;
  a: number;
}

/**
 * QOI file header (the 14-byte preamble, minus the magic)
 */
export interface QoiHeader {
  width: number;
  height: number;
  channels: QoiChannels;
  colorspace: QoiColorspace;
}

/**
 * Decoded QOI image
 *
 * `data` always holds RGBA samples, row-major, `width * height * 4` bytes.
 * When `hasAlpha` is false the alpha samples are 255 after decoding and are
 * ignored when encoding.
 */
export interface QoiImage {
  width: number;
  height: number;
  hasAlpha: boolean;
  colorspace: QoiColorspace;
  data: Uint8Array;
}

/**
 * Flat RGBA pixel buffer exchanged with other image formats
 */
export interface RasterImage {
  width: number;
  height: number;
  /** Whether the source carries an alpha channel */
  hasAlpha: boolean;
  /** RGBA samples, row-major, `width * height * 4` bytes */
  data: Uint8Array;
  /** Format-specific metadata carried over from the decoder header */
  metadata?: Record<string, unknown>;
}

/**
 * Limits shared by the header codec, decoder and encoder
 */
export interface QoiCodecOptions {
  /**
   * Largest accepted width or height in pixels.
   * Default: QOI_MAX_DIMENSION (524288)
   */
  maxDimension?: number;
}

/**
 * Options for converting another image into QOI
 */
export interface ConvertOptions extends QoiCodecOptions {
  /**
   * Write an alpha channel (4-channel QOI).
   * Default: whatever the source image carries.
   */
  alpha?: boolean;

  /**
   * Colorspace tag written to the header.
   * Default: QoiColorspace.SRGB
   */
  colorspace?: QoiColorspace;

  /** Format-specific decoder options for the source image */
  decoderOptions?: DecoderOptions;

  /**
   * Explicit decoder plugins to use. If omitted, the registered defaults are used.
   */
  decoders?: DecoderPlugin[];

  /**
   * Invoked after each source row has been read.
   * Receives the number of completed rows and the image height.
   */
  onProgress?: (completed: number, total: number) => void;

  /**
   * Receives non-fatal warnings, such as translucent pixels being flattened
   * when `alpha` is false. Default: console.warn
   */
  logger?: (message: string) => void;
}

/**
 * Source accepted by the conversion helpers
 */
export type ConvertInput = ImageInput;
