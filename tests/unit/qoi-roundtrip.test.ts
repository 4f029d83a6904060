import { describe, test } from 'node:test';
import assert from 'node:assert';
import { decodeQoi } from '../../src/qoi-decoder.js';
import { encodeQoi } from '../../src/qoi-encoder.js';
import { createQoiImage } from '../../src/pixel-ops.js';
import { QoiColorspace } from '../../src/types.js';
import {
  createGradientImage,
  createNoiseImage,
  imageFromPixels
} from '../../src/test-utils/image-fixtures.js';

describe('QOI round trip', () => {
  test('decode(encode(image)) reproduces every small image', () => {
    let seed = 1;
    for (let width = 1; width <= 4; width++) {
      for (let height = 1; height <= 4; height++) {
        for (const hasAlpha of [true, false]) {
          for (const colorspace of [QoiColorspace.SRGB, QoiColorspace.Linear]) {
            const image = createNoiseImage(width, height, seed++, { hasAlpha, colorspace });
            const decoded = decodeQoi(encodeQoi(image));

            assert.deepStrictEqual(decoded, image, `${width}x${height} alpha=${hasAlpha} colorspace=${colorspace}`);
          }
        }
      }
    }
  });

  test('gradients survive a round trip', () => {
    for (const hasAlpha of [true, false]) {
      const image = createGradientImage(96, 40, hasAlpha);
      assert.deepStrictEqual(decodeQoi(encodeQoi(image)), image);
    }
  });

  test('gradients compress below raw size', () => {
    const image = createGradientImage(96, 40);
    assert.ok(encodeQoi(image).length < 96 * 40 * 3);
  });

  test('long runs survive a round trip', () => {
    const image = createQoiImage(100, 100, { fill: { r: 0, g: 0, b: 0, a: 0 } });
    const encoded = encodeQoi(image);

    // one index chunk, then ceil(9999 / 62) run chunks
    assert.strictEqual(encoded.length, 14 + 1 + 162 + 8);
    assert.deepStrictEqual(decodeQoi(encoded), image);
  });

  test('alternating pixels are served from the index', () => {
    const a = { r: 12, g: 200, b: 99, a: 255 };
    const b = { r: 240, g: 3, b: 60, a: 17 };
    const pixels = Array.from({ length: 32 }, (_, i) => (i % 2 === 0 ? a : b));
    const image = imageFromPixels(8, 4, pixels);
    const encoded = encodeQoi(image);

    // RGB chunk, RGBA chunk, then one index byte per pixel
    assert.strictEqual(encoded.length, 14 + 4 + 5 + 30 + 8);
    assert.deepStrictEqual(decodeQoi(encoded), image);
  });

  test('encoding is deterministic', () => {
    const image = createNoiseImage(17, 3, 99);
    assert.deepStrictEqual(encodeQoi(image), encodeQoi(image));
  });

  test('re-encoding a decoded file reproduces the same bytes', () => {
    const encoded = encodeQoi(createNoiseImage(6, 6, 5, { colorspace: QoiColorspace.Linear }));
    assert.deepStrictEqual(encodeQoi(decodeQoi(encoded)), encoded);
  });
});
