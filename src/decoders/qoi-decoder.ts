/**
 * QOI Decoder Implementation
 *
 * Implements the ImageDecoder interface for QOI files and buffers.
 * The header is sniffed from the first 14 bytes; pixels are decoded in one
 * pass when scanlines are requested, since QOI chunks cannot be resumed
 * mid-stream without the decoder state.
 */

import { open } from 'node:fs/promises';
import type { ImageDecoder, ImageHeader, DecoderPlugin, QoiDecoderOptions } from './types.js';
import { QoiChannels, QoiColorspace, type QoiHeader } from '../types.js';
import { parseQoiHeader } from '../qoi-header.js';
import { decodeQoi } from '../qoi-decoder.js';
import { QOI_HEADER_SIZE } from '../qoi-ops.js';
import { QoiIoError } from '../errors.js';
import { readImageBytes, rowsOf } from '../image-io.js';
import { errorMessage } from '../utils.js';

/**
 * Convert QOI header to generic image header
 */
function qoiHeaderToImageHeader(header: QoiHeader): ImageHeader {
  return {
    width: header.width,
    height: header.height,
    channels: header.channels === QoiChannels.RGBA ? 4 : 3,
    bitDepth: 8,
    format: 'qoi',
    metadata: {
      colorspace: header.colorspace === QoiColorspace.Linear ? 'linear' : 'srgb'
    }
  };
}

/**
 * QOI decoder for file-based inputs
 */
export class QoiFileDecoder implements ImageDecoder {
  private qoiHeader: QoiHeader | null = null;
  private filePath: string;
  private options: QoiDecoderOptions;

  constructor(filePath: string, options: QoiDecoderOptions = {}) {
    this.filePath = filePath;
    this.options = options;
  }

  async getHeader(): Promise<ImageHeader> {
    if (!this.qoiHeader) {
      this.qoiHeader = parseQoiHeader(await this.readHeaderBytes(), this.options);
    }
    return qoiHeaderToImageHeader(this.qoiHeader);
  }

  async *scanlines(): AsyncGenerator<Uint8Array> {
    const data = await readImageBytes(this.filePath);
    const image = decodeQoi(data, this.options);
    yield* rowsOf(image.data, image.width, image.height);
  }

  async close(): Promise<void> {
    // Files are opened and closed within each call
  }

  private async readHeaderBytes(): Promise<Uint8Array> {
    try {
      const fileHandle = await open(this.filePath, 'r');
      try {
        const buffer = new Uint8Array(QOI_HEADER_SIZE);
        const { bytesRead } = await fileHandle.read(buffer, 0, QOI_HEADER_SIZE, 0);
        return buffer.slice(0, bytesRead);
      } finally {
        await fileHandle.close();
      }
    } catch (err) {
      throw new QoiIoError(
        `Could not read header of '${this.filePath}': ${errorMessage(err)}`,
        this.filePath,
        { cause: err }
      );
    }
  }
}

/**
 * QOI decoder for in-memory buffers
 */
export class QoiBufferDecoder implements ImageDecoder {
  private qoiHeader: QoiHeader | null = null;
  private data: Uint8Array;
  private options: QoiDecoderOptions;

  constructor(data: Uint8Array, options: QoiDecoderOptions = {}) {
    this.data = data;
    this.options = options;
  }

  async getHeader(): Promise<ImageHeader> {
    if (!this.qoiHeader) {
      this.qoiHeader = parseQoiHeader(this.data, this.options);
    }
    return qoiHeaderToImageHeader(this.qoiHeader);
  }

  async *scanlines(): AsyncGenerator<Uint8Array> {
    const image = decodeQoi(this.data, this.options);
    yield* rowsOf(image.data, image.width, image.height);
  }

  async close(): Promise<void> {
    // No resources to clean up for memory-based input
  }
}

/**
 * Decoder plugin for QOI images (files and buffers)
 */
export const qoiDecoder: DecoderPlugin = {
  format: 'qoi',
  async create(input, options = {}) {
    if (typeof input === 'string') {
      return new QoiFileDecoder(input, options.qoi);
    }
    return new QoiBufferDecoder(input, options.qoi);
  }
};
