import { describe, test } from 'node:test';
import assert from 'node:assert';
import { encodeQoi, maxEncodedSize } from './qoi-encoder.js';
import { QoiColorspace } from './types.js';
import { imageFromPixels, createNoiseImage } from './test-utils/image-fixtures.js';

const END_MARKER = [0, 0, 0, 0, 0, 0, 0, 1];

/** Chunk bytes between the header and the end marker */
function body(encoded: Uint8Array): number[] {
  return Array.from(encoded.subarray(14, encoded.length - 8));
}

const opaque = (r: number, g: number, b: number) => ({ r, g, b, a: 255 });

describe('encodeQoi', () => {
  test('writes header, chunks and end marker', () => {
    const image = imageFromPixels(1, 1, [opaque(0, 0, 0)], { hasAlpha: false, colorspace: QoiColorspace.Linear });
    const encoded = encodeQoi(image);

    assert.deepStrictEqual(
      Array.from(encoded),
      [0x71, 0x6f, 0x69, 0x66, 0, 0, 0, 1, 0, 0, 0, 1, 3, 1, 0xc0, ...END_MARKER]
    );
  });

  test('a pixel equal to the start pixel becomes a run', () => {
    const encoded = encodeQoi(imageFromPixels(1, 1, [opaque(0, 0, 0)]));
    assert.deepStrictEqual(body(encoded), [0xc0]);
    assert.strictEqual(encoded[12], 4);
  });

  test('small deltas use QOI_OP_DIFF with wrapping', () => {
    // dr = +1, dg = 0, db = 0 - 1 wrapped
    const encoded = encodeQoi(imageFromPixels(1, 1, [opaque(1, 0, 255)]));
    assert.deepStrictEqual(body(encoded), [0x79]);
  });

  test('medium deltas use QOI_OP_LUMA', () => {
    // dg = 25, dr - dg = -5, db - dg = 5
    const encoded = encodeQoi(imageFromPixels(1, 1, [opaque(20, 25, 30)]));
    assert.deepStrictEqual(body(encoded), [0xb9, 0x3d]);
  });

  test('large deltas use QOI_OP_RGB', () => {
    const encoded = encodeQoi(imageFromPixels(1, 1, [opaque(10, 20, 30)]));
    assert.deepStrictEqual(body(encoded), [0xfe, 10, 20, 30]);
  });

  test('alpha changes use QOI_OP_RGBA', () => {
    const encoded = encodeQoi(imageFromPixels(1, 1, [{ r: 1, g: 2, b: 3, a: 128 }]));
    assert.deepStrictEqual(body(encoded), [0xff, 1, 2, 3, 128]);
  });

  test('a repeated earlier pixel uses QOI_OP_INDEX', () => {
    const a = opaque(10, 20, 30);
    const b = opaque(200, 10, 50);
    const encoded = encodeQoi(imageFromPixels(3, 1, [a, b, a], { hasAlpha: false }));

    // hash(a) = (30 + 100 + 210 + 2805) % 64 = 9
    assert.deepStrictEqual(body(encoded), [0xfe, 10, 20, 30, 0xfe, 200, 10, 50, 0x09]);
  });

  test('runs longer than 62 are split', () => {
    const pixels = [...Array.from({ length: 70 }, () => opaque(0, 0, 0)), opaque(200, 10, 50)];
    const encoded = encodeQoi(imageFromPixels(71, 1, pixels, { hasAlpha: false }));

    assert.deepStrictEqual(body(encoded), [0xfd, 0xc7, 0xfe, 200, 10, 50]);
  });

  test('a run of exactly 62 is a single chunk', () => {
    const encoded = encodeQoi(imageFromPixels(62, 1, Array.from({ length: 62 }, () => opaque(0, 0, 0))));
    assert.deepStrictEqual(body(encoded), [0xfd]);
  });

  test('ignores alpha samples of an image without alpha', () => {
    const translucent = imageFromPixels(2, 1, [{ r: 10, g: 20, b: 30, a: 7 }, { r: 10, g: 20, b: 30, a: 9 }], {
      hasAlpha: false
    });
    const encoded = encodeQoi(translucent);

    assert.deepStrictEqual(body(encoded), [0xfe, 10, 20, 30, 0xc0]);
  });

  test('zero-alpha black matches the empty index slot', () => {
    const encoded = encodeQoi(imageFromPixels(1, 1, [{ r: 0, g: 0, b: 0, a: 0 }]));
    assert.deepStrictEqual(body(encoded), [0x00]);
  });

  test('output never exceeds the worst case', () => {
    const image = createNoiseImage(13, 7, 42);
    const encoded = encodeQoi(image);
    assert.ok(encoded.length <= maxEncodedSize(13, 7));
    assert.strictEqual(maxEncodedSize(13, 7), 14 + 13 * 7 * 5 + 8);
  });

  test('rejects a pixel buffer of the wrong size', () => {
    const image = { ...createNoiseImage(2, 2, 1), data: new Uint8Array(15) };
    assert.throws(() => encodeQoi(image), {
      name: 'QoiEncodeError',
      code: 'PixelCountMismatch',
      message: 'Expected 16 bytes of RGBA data for 2x2, got 15'
    });
  });

  test('rejects empty and oversized images', () => {
    const empty = { ...createNoiseImage(1, 1, 1), width: 0, data: new Uint8Array(0) };
    assert.throws(() => encodeQoi(empty), { code: 'InvalidDimension' });

    assert.throws(() => encodeQoi(createNoiseImage(5, 1, 1), { maxDimension: 4 }), { code: 'InvalidDimension' });
  });

  test('rejects an unknown colorspace', () => {
    const image = { ...createNoiseImage(1, 1, 1), colorspace: 2 };
    assert.throws(() => encodeQoi(image), { code: 'UnsupportedColorspace' });
  });
});
