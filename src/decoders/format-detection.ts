import { open, type FileHandle } from 'node:fs/promises';
import type { ImageFormat } from './types.js';
import { QoiIoError, UnsupportedFormatError } from '../errors.js';
import { errorMessage, isQoiSignature } from '../utils.js';

/**
 * Detect image format from byte signature (magic bytes)
 *
 * @param bytes - Image data (at least first 8 bytes needed)
 * @returns Detected image format or 'unknown'
 */
export function detectImageFormat(bytes: Uint8Array): ImageFormat {
  if (bytes.length < 4) {
    return 'unknown';
  }

  // QOI: "qoif"
  if (isQoiSignature(bytes)) {
    return 'qoi';
  }

  // PNG: 89 50 4E 47 0D 0A 1A 0A (8 bytes)
  if (
    bytes.length >= 8 &&
    bytes[0] === 0x89 &&
    bytes[1] === 0x50 &&
    bytes[2] === 0x4e &&
    bytes[3] === 0x47 &&
    bytes[4] === 0x0d &&
    bytes[5] === 0x0a &&
    bytes[6] === 0x1a &&
    bytes[7] === 0x0a
  ) {
    return 'png';
  }

  // JPEG: FF D8 FF (Start of Image marker)
  if (bytes[0] === 0xff && bytes[1] === 0xd8 && bytes[2] === 0xff) {
    return 'jpeg';
  }

  return 'unknown';
}

/**
 * Read the first 32 bytes from a file or buffer for format detection
 */
export async function readMagicBytes(input: string | Uint8Array | ArrayBuffer): Promise<Uint8Array> {
  if (input instanceof Uint8Array) {
    return input.slice(0, 32);
  }

  if (input instanceof ArrayBuffer) {
    return new Uint8Array(input.slice(0, 32));
  }

  let fileHandle: FileHandle;
  try {
    fileHandle = await open(input, 'r');
  } catch (err) {
    throw new QoiIoError(
      `Failed to read file for format detection: ${errorMessage(err)}`,
      input,
      { cause: err }
    );
  }

  try {
    const buffer = new Uint8Array(32);
    const { bytesRead } = await fileHandle.read(buffer, 0, 32, 0);
    return buffer.slice(0, bytesRead);
  } catch (err) {
    throw new QoiIoError(
      `Failed to read file for format detection: ${errorMessage(err)}`,
      input,
      { cause: err }
    );
  } finally {
    await fileHandle.close();
  }
}

/**
 * Detect format from a path or bytes
 */
export async function detectFormat(input: string | Uint8Array | ArrayBuffer): Promise<ImageFormat> {
  const magicBytes = await readMagicBytes(input);
  return detectImageFormat(magicBytes);
}

/**
 * Validate that a format is supported
 *
 * @throws UnsupportedFormatError if format is unknown
 */
export function validateFormat(format: ImageFormat): asserts format is Exclude<ImageFormat, 'unknown'> {
  if (format === 'unknown') {
    throw new UnsupportedFormatError('Unknown or unsupported image format. Supported formats: QOI, PNG, JPEG');
  }
}
