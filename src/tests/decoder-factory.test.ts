/**
 * Decoder Factory Tests
 *
 * Tests for automatic decoder creation and format detection.
 */

import { describe, test } from 'node:test';
import assert from 'node:assert';
import { writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import {
  createDecoder,
  createDecoders,
  isImageDecoder,
  QoiBufferDecoder,
  QoiFileDecoder,
  PngBufferDecoder,
  JpegBufferDecoder,
  qoiDecoder,
  pngDecoder,
  jpegDecoder
} from '../decoders/index.js';
import {
  clearDefaultDecoderPlugins,
  getDefaultDecoderPlugins,
  setDefaultDecoderPlugins
} from '../decoders/plugin-registry.js';
import type { ImageDecoder } from '../decoders/types.js';
import { encodeQoi } from '../qoi-encoder.js';
import { createNoiseImage, createTestPng, createTestJpeg, withTempDir } from '../test-utils/image-fixtures.js';

describe('Decoder Factory - createDecoder', () => {
  test('creates QOI decoder from QOI bytes', async () => {
    const decoder = await createDecoder(encodeQoi(createNoiseImage(5, 3, 1)));

    assert.ok(decoder instanceof QoiBufferDecoder, 'Should be QOI decoder');

    const header = await decoder.getHeader();
    assert.strictEqual(header.format, 'qoi');
    assert.strictEqual(header.width, 5);
    assert.strictEqual(header.height, 3);

    await decoder.close();
  });

  test('creates PNG decoder from PNG bytes', async () => {
    const decoder = await createDecoder(createTestPng(10, 10, new Uint8Array([255, 0, 0, 255])));

    assert.ok(decoder instanceof PngBufferDecoder, 'Should be PNG decoder');

    const header = await decoder.getHeader();
    assert.strictEqual(header.format, 'png');
    assert.strictEqual(header.width, 10);
    assert.strictEqual(header.height, 10);

    await decoder.close();
  });

  test('creates JPEG decoder from JPEG bytes', async () => {
    const decoder = await createDecoder(createTestJpeg(20, 20, new Uint8Array([0, 255, 0, 255])));

    assert.ok(decoder instanceof JpegBufferDecoder, 'Should be JPEG decoder');

    const header = await decoder.getHeader();
    assert.strictEqual(header.format, 'jpeg');
    assert.strictEqual(header.width, 20);
    assert.strictEqual(header.height, 20);

    await decoder.close();
  });

  test('creates decoder from ArrayBuffer', async () => {
    const pngBytes = createTestPng(15, 15, new Uint8Array([0, 0, 255, 255]));
    const buffer = new ArrayBuffer(pngBytes.length);
    new Uint8Array(buffer).set(pngBytes);

    const decoder = await createDecoder(buffer);

    assert.ok(decoder instanceof PngBufferDecoder);
    assert.strictEqual((await decoder.getHeader()).width, 15);

    await decoder.close();
  });

  test('creates file decoder from a path', async () => {
    await withTempDir(async (dir) => {
      const filePath = join(dir, 'image.qoi');
      await writeFile(filePath, encodeQoi(createNoiseImage(3, 2, 4)));

      const decoder = await createDecoder(filePath);
      assert.ok(decoder instanceof QoiFileDecoder);
      assert.strictEqual((await decoder.getHeader()).height, 2);
      await decoder.close();
    });
  });

  test('returns existing decoder instances unchanged', async () => {
    const existing = new QoiBufferDecoder(encodeQoi(createNoiseImage(1, 1, 1)));
    assert.strictEqual(await createDecoder(existing), existing);
  });

  test('rejects unrecognised bytes', async () => {
    await assert.rejects(createDecoder(new Uint8Array([1, 2, 3, 4, 5, 6, 7, 8])), {
      name: 'UnsupportedFormatError',
      code: 'UnsupportedFormat'
    });
  });

  test('uses explicit plugins when provided', async () => {
    const pngBytes = createTestPng(4, 4, new Uint8Array([1, 2, 3, 255]));

    await assert.rejects(createDecoder(pngBytes, {}, [qoiDecoder, jpegDecoder]), {
      code: 'UnsupportedFormat',
      message: 'No decoder registered for format "png". Provide a matching plugin via options.decoders.'
    });

    const decoder = await createDecoder(pngBytes, {}, [pngDecoder]);
    assert.ok(decoder instanceof PngBufferDecoder);
    await decoder.close();
  });

  test('falls back to the QOI decoder when defaults are cleared', async () => {
    const saved = getDefaultDecoderPlugins();
    clearDefaultDecoderPlugins();

    try {
      assert.deepStrictEqual(getDefaultDecoderPlugins(), [qoiDecoder]);

      const decoder = await createDecoder(encodeQoi(createNoiseImage(2, 2, 2)));
      assert.ok(decoder instanceof QoiBufferDecoder);

      await assert.rejects(createDecoder(createTestPng(2, 2, new Uint8Array([0, 0, 0, 255]))), {
        code: 'UnsupportedFormat'
      });
    } finally {
      setDefaultDecoderPlugins(saved);
    }
  });

  test('passes format options to the plugin', async () => {
    const qoiBytes = encodeQoi(createNoiseImage(20, 1, 6));
    const decoder = await createDecoder(qoiBytes, { qoi: { maxDimension: 16 } });

    await assert.rejects(decoder.getHeader(), { name: 'QoiFormatError', code: 'InvalidDimension' });
  });
});

describe('Decoder Factory - createDecoders', () => {
  test('creates one decoder per input, in order', async () => {
    const decoders = await createDecoders([
      encodeQoi(createNoiseImage(1, 1, 1)),
      createTestPng(2, 2, new Uint8Array([9, 9, 9, 255])),
      createTestJpeg(8, 8, new Uint8Array([200, 100, 50, 255]))
    ]);

    assert.strictEqual(decoders.length, 3);
    assert.ok(decoders[0] instanceof QoiBufferDecoder);
    assert.ok(decoders[1] instanceof PngBufferDecoder);
    assert.ok(decoders[2] instanceof JpegBufferDecoder);

    await Promise.all(decoders.map((decoder) => decoder.close()));
  });
});

describe('Decoder Factory - isImageDecoder', () => {
  test('recognises decoder-shaped objects only', () => {
    const fake: ImageDecoder = {
      getHeader: async () => ({ width: 1, height: 1, channels: 4, bitDepth: 8, format: 'qoi' }),
      scanlines: async function* () {
        yield new Uint8Array(4);
      },
      close: async () => {}
    };

    assert.strictEqual(isImageDecoder(fake), true);
    assert.strictEqual(isImageDecoder(new Uint8Array(4)), false);
    assert.strictEqual(isImageDecoder('image.qoi'), false);
  });
});
