/**
 * QOI chunk layout, pixel packing and the 64-slot color index.
 *
 * Pixels are packed into unsigned 32-bit numbers as r<<24 | g<<16 | b<<8 | a
 * so that equality is a single comparison.
 */

import type { Pixel } from './types.js';

export const QOI_HEADER_SIZE = 14;
export const QOI_END_MARKER_SIZE = 8;
export const QOI_MAX_BYTES_PER_PIXEL = 5;

/** Largest width or height accepted unless the caller overrides it */
export const QOI_MAX_DIMENSION = 524288;

export const QOI_OP_INDEX = 0x00; // 00xxxxxx
export const QOI_OP_DIFF = 0x40; // 01xxxxxx
export const QOI_OP_LUMA = 0x80; // 10xxxxxx
export const QOI_OP_RUN = 0xc0; // 11xxxxxx
export const QOI_OP_RGB = 0xfe;
export const QOI_OP_RGBA = 0xff;

export const QOI_MASK_2 = 0xc0;

export const QOI_MAX_RUN_LENGTH = 62;
export const QOI_DIFF_MIN = -2;
export const QOI_DIFF_MAX = 1;
export const QOI_LUMA_GREEN_MIN = -32;
export const QOI_LUMA_GREEN_MAX = 31;
export const QOI_LUMA_RED_BLUE_MIN = -8;
export const QOI_LUMA_RED_BLUE_MAX = 7;

export const QOI_INDEX_SIZE = 64;

/** Start pixel of every encode/decode pass: opaque black */
export const QOI_START_PIXEL = packPixel(0, 0, 0, 255);

export function packPixel(r: number, g: number, b: number, a: number): number {
  return ((r << 24) | (g << 16) | (b << 8) | a) >>> 0;
}

export function unpackPixel(packed: number): Pixel {
  return {
    r: packed >>> 24,
    g: (packed >>> 16) & 0xff,
    b: (packed >>> 8) & 0xff,
    a: packed & 0xff
  };
}

/**
 * Index position of a pixel: (3r + 5g + 7b + 11a) mod 64
 */
export function qoiHash(packed: number): number {
  const r = packed >>> 24;
  const g = (packed >>> 16) & 0xff;
  const b = (packed >>> 8) & 0xff;
  const a = packed & 0xff;
  return (r * 3 + g * 5 + b * 7 + a * 11) % QOI_INDEX_SIZE;
}

/**
 * Add a signed delta to a channel, wrapping modulo 256
 */
export function wrapAdd(channel: number, delta: number): number {
  return (channel + delta) & 0xff;
}

/**
 * Difference of two channels as a wrapped signed 8-bit value in [-128, 127]
 */
export function wrapDiff(current: number, previous: number): number {
  return ((current - previous + 128) & 0xff) - 128;
}

/**
 * Direct-mapped table of recently seen pixels.
 *
 * Slots start as all-zero pixels (alpha 0 included) and are overwritten
 * unconditionally; there is no eviction order.
 */
export class ColorIndex {
  private readonly slots = new Uint32Array(QOI_INDEX_SIZE);

  get(slot: number): number {
    return this.slots[slot];
  }

  /**
   * Store a pixel at its hash slot and return that slot
   */
  put(packed: number): number {
    const slot = qoiHash(packed);
    this.slots[slot] = packed;
    return slot;
  }

  contains(packed: number): boolean {
    return this.slots[qoiHash(packed)] === packed;
  }
}
