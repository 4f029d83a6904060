/**
 * Image format types supported by the library
 */
export type ImageFormat = 'qoi' | 'png' | 'jpeg' | 'unknown';

/**
 * Generic image header information, format-agnostic
 */
export interface ImageHeader {
  /** Image width in pixels */
  width: number;
  /** Image height in pixels */
  height: number;
  /** Channels in the source image (3=RGB, 4=RGBA) */
  channels: 3 | 4;
  /** Bits per channel of the decoded scanlines (always 8) */
  bitDepth: 8;
  /** Original image format */
  format: ImageFormat;
  /** Additional format-specific metadata */
  metadata?: Record<string, unknown>;
}

/**
 * Universal image decoder interface
 *
 * All format-specific decoders (QOI, PNG, JPEG) implement this interface,
 * providing a unified way to access image data regardless of the source format.
 *
 * - getHeader() provides metadata, cheaply where the format allows it
 * - scanlines() yields pixel data row-by-row as RGBA
 * - close() releases resources (file handles, decoded buffers, etc.)
 */
export interface ImageDecoder {
  /**
   * Get the image header information
   *
   * For QOI this only reads the 14-byte preamble. Formats that cannot be
   * sniffed cheaply decode once and cache the result for scanlines().
   */
  getHeader(): Promise<ImageHeader>;

  /**
   * Stream rows of pixel data
   *
   * Each row is `width * 4` bytes of 8-bit RGBA, top to bottom. Sources
   * without alpha yield 255 in the alpha position.
   */
  scanlines(): AsyncGenerator<Uint8Array>;

  /**
   * Release any resources held by the decoder
   */
  close(): Promise<void>;
}

/**
 * Options for creating image decoders
 */
export interface DecoderOptions {
  /** QOI-specific decoding options */
  qoi?: QoiDecoderOptions;
  /** PNG-specific decoding options */
  png?: PngDecoderOptions;
  /** JPEG-specific decoding options */
  jpeg?: JpegDecoderOptions;
}

/**
 * QOI decoder configuration
 */
export interface QoiDecoderOptions {
  /** Largest accepted width or height (default: 524288) */
  maxDimension?: number;
}

/**
 * PNG decoder configuration
 */
export interface PngDecoderOptions {
  /** Verify chunk CRCs while parsing (default: true) */
  checkCRC?: boolean;
}

/**
 * JPEG decoder configuration
 */
export interface JpegDecoderOptions {
  /** Maximum memory usage per image in MB (default: jpeg-js default of 512) */
  maxMemoryMB?: number;
  /** Maximum resolution in megapixels (default: jpeg-js default of 100) */
  maxResolutionMP?: number;
}

/**
 * Type for image input sources
 */
export type ImageInput = string | Uint8Array | ArrayBuffer | ImageDecoder;

/**
 * Plugin interface for registering decoder implementations
 */
export interface DecoderPlugin {
  /** Image format handled by this plugin */
  format: Exclude<ImageFormat, 'unknown'>;
  /**
   * Create a decoder for the provided input.
   * Implementations should throw when the input type is unsupported.
   */
  create(input: string | Uint8Array, options?: DecoderOptions): Promise<ImageDecoder>;
}
