/**
 * JPEG Decoder Implementation
 *
 * Uses jpeg-js (pure JavaScript). JPEG cannot be streamed by scanline, so the
 * image is decoded once and rows are yielded from the decoded buffer. The
 * header is read from the SOF marker without a full decode.
 */

import jpeg from 'jpeg-js';
import type { ImageDecoder, ImageHeader, JpegDecoderOptions, DecoderPlugin } from './types.js';
import { readImageBytes, rowsOf } from '../image-io.js';

/**
 * JPEG SOF (Start of Frame) marker types
 * Used to extract image dimensions without full decode
 */
const JPEG_SOF_MARKERS = [
  0xc0, // Baseline DCT
  0xc1, // Extended sequential DCT
  0xc2, // Progressive DCT
  0xc3, // Lossless
  0xc5, // Differential sequential DCT
  0xc6, // Differential progressive DCT
  0xc7, // Differential lossless
  0xc9, // Extended sequential DCT (arithmetic)
  0xca, // Progressive DCT (arithmetic)
  0xcb, // Lossless (arithmetic)
  0xcd, // Differential sequential DCT (arithmetic)
  0xce, // Differential progressive DCT (arithmetic)
  0xcf // Differential lossless (arithmetic)
];

/**
 * Extract JPEG dimensions and component count from the SOF marker
 */
export function parseJpegHeader(data: Uint8Array): { width: number; height: number; components: number } {
  if (data.length < 2 || data[0] !== 0xff || data[1] !== 0xd8) {
    throw new Error('Invalid JPEG: missing SOI marker');
  }

  let offset = 2;

  while (offset < data.length - 1) {
    if (data[offset] !== 0xff) {
      offset++;
      continue;
    }

    const marker = data[offset + 1];
    offset += 2;

    // Fill bytes and stuffed zeros
    if (marker === 0xff || marker === 0x00) {
      continue;
    }

    if (JPEG_SOF_MARKERS.includes(marker)) {
      // [length (2)] [precision (1)] [height (2)] [width (2)] [components (1)]
      if (offset + 8 > data.length) {
        throw new Error('Invalid JPEG: truncated SOF marker');
      }

      const height = (data[offset + 3] << 8) | data[offset + 4];
      const width = (data[offset + 5] << 8) | data[offset + 6];
      const components = data[offset + 7];

      return { width, height, components };
    }

    if (offset + 2 > data.length) {
      break;
    }
    const markerLength = (data[offset] << 8) | data[offset + 1];
    offset += markerLength;
  }

  throw new Error('Invalid JPEG: no SOF marker found');
}

/**
 * Base JPEG decoder class
 */
abstract class BaseJpegDecoder implements ImageDecoder {
  protected header: ImageHeader | null = null;
  protected decodedPixels: Uint8Array | null = null;
  protected options: JpegDecoderOptions;

  constructor(options: JpegDecoderOptions = {}) {
    this.options = options;
  }

  protected abstract loadBytes(): Promise<Uint8Array>;

  async getHeader(): Promise<ImageHeader> {
    if (this.header) {
      return this.header;
    }

    const jpegHeader = parseJpegHeader(await this.loadBytes());

    this.header = {
      width: jpegHeader.width,
      height: jpegHeader.height,
      channels: 3, // JPEG has no alpha; grayscale is expanded to RGB
      bitDepth: 8,
      format: 'jpeg',
      metadata: { components: jpegHeader.components }
    };

    return this.header;
  }

  async *scanlines(): AsyncGenerator<Uint8Array> {
    const header = await this.getHeader();

    if (!this.decodedPixels) {
      const { maxMemoryMB = 512, maxResolutionMP = 100 } = this.options;
      const decoded = jpeg.decode(await this.loadBytes(), {
        useTArray: true,
        formatAsRGBA: true,
        maxMemoryUsageInMB: maxMemoryMB,
        maxResolutionInMP: maxResolutionMP
      });
      if (decoded.width !== header.width || decoded.height !== header.height) {
        throw new Error(
          `JPEG decoded to ${decoded.width}x${decoded.height}, header says ${header.width}x${header.height}`
        );
      }
      this.decodedPixels = decoded.data;
    }

    yield* rowsOf(this.decodedPixels, header.width, header.height);
  }

  async close(): Promise<void> {
    this.decodedPixels = null;
  }
}

/**
 * JPEG decoder for file-based inputs
 */
export class JpegFileDecoder extends BaseJpegDecoder {
  private filePath: string;
  private data: Uint8Array | null = null;

  constructor(filePath: string, options: JpegDecoderOptions = {}) {
    super(options);
    this.filePath = filePath;
  }

  protected async loadBytes(): Promise<Uint8Array> {
    if (!this.data) {
      this.data = await readImageBytes(this.filePath);
    }
    return this.data;
  }

  async close(): Promise<void> {
    await super.close();
    this.data = null;
  }
}

/**
 * JPEG decoder for in-memory buffers
 */
export class JpegBufferDecoder extends BaseJpegDecoder {
  private data: Uint8Array;

  constructor(data: Uint8Array, options: JpegDecoderOptions = {}) {
    super(options);
    this.data = data;
  }

  protected async loadBytes(): Promise<Uint8Array> {
    return this.data;
  }
}

/**
 * Decoder plugin for JPEG images
 */
export const jpegDecoder: DecoderPlugin = {
  format: 'jpeg',
  async create(input, options = {}) {
    if (typeof input === 'string') {
      return new JpegFileDecoder(input, options.jpeg);
    }
    return new JpegBufferDecoder(input, options.jpeg);
  }
};
