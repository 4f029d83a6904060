import { QoiChannels, QoiColorspace, type QoiCodecOptions, type QoiHeader } from './types.js';
import { QoiEncodeError, QoiFormatError } from './errors.js';
import { QOI_HEADER_SIZE, QOI_MAX_DIMENSION } from './qoi-ops.js';
import { QOI_SIGNATURE, bytesToString, isQoiSignature, readUInt32BE, writeUInt32BE } from './utils.js';

export function isValidChannels(value: number): value is QoiChannels {
  return value === QoiChannels.RGB || value === QoiChannels.RGBA;
}

export function isValidColorspace(value: number): value is QoiColorspace {
  return value === QoiColorspace.SRGB || value === QoiColorspace.Linear;
}

/**
 * Check a width or height against [1, maxDimension]
 */
export function isValidDimension(value: number, maxDimension = QOI_MAX_DIMENSION): boolean {
  return Number.isInteger(value) && value >= 1 && value <= maxDimension;
}

/**
 * Parse the 14-byte QOI header.
 *
 * Only the header is read, so this is suitable for sniffing a file's
 * dimensions without decoding it.
 */
export function parseQoiHeader(data: Uint8Array, options: QoiCodecOptions = {}): QoiHeader {
  const maxDimension = options.maxDimension ?? QOI_MAX_DIMENSION;

  if (data.length < QOI_HEADER_SIZE) {
    throw new QoiFormatError(
      'UnexpectedEof',
      `QOI header needs ${QOI_HEADER_SIZE} bytes, got ${data.length}`
    );
  }

  if (!isQoiSignature(data)) {
    throw new QoiFormatError(
      'BadMagic',
      `Invalid QOI signature: ${JSON.stringify(bytesToString(data, 0, 4))}`
    );
  }

  const width = readUInt32BE(data, 4);
  const height = readUInt32BE(data, 8);
  const channels = data[12];
  const colorspace = data[13];

  if (!isValidChannels(channels)) {
    throw new QoiFormatError('UnsupportedChannels', `Unsupported or unknown number of channels: ${channels}`);
  }

  if (!isValidColorspace(colorspace)) {
    throw new QoiFormatError('UnsupportedColorspace', `Unsupported or unknown colorspace: ${colorspace}`);
  }

  if (!isValidDimension(width, maxDimension)) {
    throw new QoiFormatError('InvalidDimension', `Invalid or unsupported width: ${width}`);
  }

  if (!isValidDimension(height, maxDimension)) {
    throw new QoiFormatError('InvalidDimension', `Invalid or unsupported height: ${height}`);
  }

  return { width, height, channels, colorspace };
}

/**
 * Validate a header before it is written
 */
export function validateQoiHeader(header: QoiHeader, options: QoiCodecOptions = {}): void {
  const maxDimension = options.maxDimension ?? QOI_MAX_DIMENSION;

  if (!isValidDimension(header.width, maxDimension) || !isValidDimension(header.height, maxDimension)) {
    throw new QoiEncodeError(
      'InvalidDimension',
      `Image dimensions ${header.width}x${header.height} must be between 1 and ${maxDimension}`
    );
  }

  if (!isValidChannels(header.channels)) {
    throw new QoiEncodeError('UnsupportedChannels', `Channel count must be 3 or 4, got ${header.channels}`);
  }

  if (!isValidColorspace(header.colorspace)) {
    throw new QoiEncodeError('UnsupportedColorspace', `Colorspace must be 0 or 1, got ${header.colorspace}`);
  }
}

/**
 * Write the header into `buffer` at `offset`
 */
export function writeQoiHeader(buffer: Uint8Array, header: QoiHeader, offset = 0): void {
  buffer.set(QOI_SIGNATURE, offset);
  writeUInt32BE(buffer, header.width, offset + 4);
  writeUInt32BE(buffer, header.height, offset + 8);
  buffer[offset + 12] = header.channels;
  buffer[offset + 13] = header.colorspace;
}

/**
 * Serialize a header to its 14-byte form
 */
export function serializeQoiHeader(header: QoiHeader, options: QoiCodecOptions = {}): Uint8Array {
  validateQoiHeader(header, options);
  const buffer = new Uint8Array(QOI_HEADER_SIZE);
  writeQoiHeader(buffer, header);
  return buffer;
}
