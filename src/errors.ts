/**
 * Error types raised by the codec and the conversion helpers.
 *
 * Every error carries a stable `code` so callers can branch on the failure
 * without parsing messages.
 */

export type QoiFormatErrorCode =
  | 'BadMagic'
  | 'UnsupportedChannels'
  | 'UnsupportedColorspace'
  | 'InvalidDimension'
  | 'UnexpectedEof'
  | 'BadEndMarker'
  | 'TrailingData'
  | 'RunOverflow';

export type QoiEncodeErrorCode =
  | 'InvalidDimension'
  | 'UnsupportedChannels'
  | 'UnsupportedColorspace'
  | 'PixelCountMismatch';

export type QoiErrorCode =
  | QoiFormatErrorCode
  | QoiEncodeErrorCode
  | 'OutOfMemory'
  | 'Io'
  | 'UnsupportedFormat';

/**
 * Base class for all errors thrown by this library
 */
export abstract class QoiError extends Error {
  abstract readonly code: QoiErrorCode;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Malformed or unsupported QOI byte stream
 */
export class QoiFormatError extends QoiError {
  readonly code: QoiFormatErrorCode;

  constructor(code: QoiFormatErrorCode, message: string) {
    super(message);
    this.code = code;
  }
}

/**
 * Image that cannot be written as QOI
 */
export class QoiEncodeError extends QoiError {
  readonly code: QoiEncodeErrorCode;

  constructor(code: QoiEncodeErrorCode, message: string) {
    super(message);
    this.code = code;
  }
}

/**
 * Pixel or output buffer could not be allocated
 */
export class QoiOutOfMemoryError extends QoiError {
  readonly code = 'OutOfMemory';
  readonly requestedBytes: number;

  constructor(requestedBytes: number, options?: ErrorOptions) {
    super(`Failed to allocate ${requestedBytes} bytes`, options);
    this.requestedBytes = requestedBytes;
  }
}

/**
 * Reading or writing a file failed
 */
export class QoiIoError extends QoiError {
  readonly code = 'Io';
  readonly path: string;

  constructor(message: string, path: string, options?: ErrorOptions) {
    super(message, options);
    this.path = path;
  }
}

/**
 * Input is not in any format a registered decoder understands
 */
export class UnsupportedFormatError extends QoiError {
  readonly code = 'UnsupportedFormat';
}

/**
 * Allocate a zeroed byte buffer, reporting failure as QoiOutOfMemoryError
 */
export function allocateBytes(size: number): Uint8Array {
  try {
    return new Uint8Array(size);
  } catch (err) {
    if (err instanceof RangeError) {
      throw new QoiOutOfMemoryError(size, { cause: err });
    }
    throw err;
  }
}
