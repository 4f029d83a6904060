/**
 * PNG Decoder Implementation
 *
 * Implements the ImageDecoder interface for PNG using pngjs. pngjs expands
 * every color type and bit depth to 8-bit RGBA, which is exactly the
 * scanline format the decoder interface promises.
 */

import { PNG, type PNGWithMetadata } from 'pngjs';
import type { ImageDecoder, ImageHeader, DecoderPlugin, PngDecoderOptions } from './types.js';
import { readImageBytes, rowsOf } from '../image-io.js';
import { toBuffer } from '../utils.js';

/**
 * Convert pngjs metadata to generic image header
 */
function pngToImageHeader(png: PNGWithMetadata): ImageHeader {
  return {
    width: png.width,
    height: png.height,
    channels: png.alpha ? 4 : 3,
    bitDepth: 8,
    format: 'png',
    metadata: {
      colorType: png.colorType,
      sourceBitDepth: png.depth,
      interlaced: png.interlace
    }
  };
}

/**
 * Shared decode-once logic for PNG inputs
 */
abstract class BasePngDecoder implements ImageDecoder {
  protected decoded: PNGWithMetadata | null = null;
  protected options: PngDecoderOptions;

  constructor(options: PngDecoderOptions = {}) {
    this.options = options;
  }

  protected abstract loadBytes(): Promise<Uint8Array>;

  protected async decode(): Promise<PNGWithMetadata> {
    if (!this.decoded) {
      const bytes = await this.loadBytes();
      this.decoded = PNG.sync.read(toBuffer(bytes), { checkCRC: this.options.checkCRC ?? true });
    }
    return this.decoded;
  }

  async getHeader(): Promise<ImageHeader> {
    return pngToImageHeader(await this.decode());
  }

  async *scanlines(): AsyncGenerator<Uint8Array> {
    const png = await this.decode();
    const data = new Uint8Array(png.data.buffer, png.data.byteOffset, png.data.byteLength);
    yield* rowsOf(data, png.width, png.height);
  }

  async close(): Promise<void> {
    this.decoded = null;
  }
}

/**
 * PNG decoder for file-based inputs
 */
export class PngFileDecoder extends BasePngDecoder {
  private filePath: string;

  constructor(filePath: string, options: PngDecoderOptions = {}) {
    super(options);
    this.filePath = filePath;
  }

  protected loadBytes(): Promise<Uint8Array> {
    return readImageBytes(this.filePath);
  }
}

/**
 * PNG decoder for in-memory buffers
 */
export class PngBufferDecoder extends BasePngDecoder {
  private data: Uint8Array;

  constructor(data: Uint8Array, options: PngDecoderOptions = {}) {
    super(options);
    this.data = data;
  }

  protected async loadBytes(): Promise<Uint8Array> {
    return this.data;
  }
}

/**
 * Decoder plugin for PNG images (files and buffers)
 */
export const pngDecoder: DecoderPlugin = {
  format: 'png',
  async create(input, options = {}) {
    if (typeof input === 'string') {
      return new PngFileDecoder(input, options.png);
    }
    return new PngBufferDecoder(input, options.png);
  }
};
