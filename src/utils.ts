/**
 * Read a 32-bit big-endian unsigned integer
 */
export function readUInt32BE(buffer: Uint8Array, offset: number): number {
  return (
    (buffer[offset] << 24) |
    (buffer[offset + 1] << 16) |
    (buffer[offset + 2] << 8) |
    buffer[offset + 3]
  ) >>> 0;
}

/**
 * Write a 32-bit big-endian unsigned integer
 */
export function writeUInt32BE(buffer: Uint8Array, value: number, offset: number): void {
  buffer[offset] = (value >>> 24) & 0xff;
  buffer[offset + 1] = (value >>> 16) & 0xff;
  buffer[offset + 2] = (value >>> 8) & 0xff;
  buffer[offset + 3] = value & 0xff;
}

/**
 * Convert string to Uint8Array (ASCII)
 */
export function stringToBytes(str: string): Uint8Array {
  const bytes = new Uint8Array(str.length);
  for (let i = 0; i < str.length; i++) {
    bytes[i] = str.charCodeAt(i);
  }
  return bytes;
}

/**
 * Convert Uint8Array to string (ASCII)
 */
export function bytesToString(bytes: Uint8Array, start = 0, length = bytes.length - start): string {
  let str = '';
  for (let i = start; i < start + length; i++) {
    str += String.fromCharCode(bytes[i]);
  }
  return str;
}

/**
 * QOI file signature ("qoif")
 */
export const QOI_SIGNATURE = stringToBytes('qoif');

/**
 * Seven zero bytes followed by 0x01
 */
export const QOI_END_MARKER = new Uint8Array([0, 0, 0, 0, 0, 0, 0, 1]);

/**
 * Verify QOI signature
 */
export function isQoiSignature(data: Uint8Array): boolean {
  if (data.length < 4) return false;
  for (let i = 0; i < 4; i++) {
    if (data[i] !== QOI_SIGNATURE[i]) return false;
  }
  return true;
}

/**
 * Check whether the full end marker starts at `offset`
 */
export function hasEndMarkerAt(data: Uint8Array, offset: number): boolean {
  if (offset < 0 || offset + QOI_END_MARKER.length > data.length) return false;
  for (let i = 0; i < QOI_END_MARKER.length; i++) {
    if (data[offset + i] !== QOI_END_MARKER[i]) return false;
  }
  return true;
}

/**
 * View a byte array as a Node.js Buffer without copying
 */
export function toBuffer(data: Uint8Array): Buffer {
  return Buffer.from(data.buffer, data.byteOffset, data.byteLength);
}

/**
 * Human-readable message for an unknown thrown value
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
