/**
 * PNG Decoder Tests
 */

import { describe, test } from 'node:test';
import assert from 'node:assert';
import { writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { PngBufferDecoder, PngFileDecoder } from '../decoders/index.js';
import { readRaster } from '../image-io.js';
import { createPngFromRgba, createTestPng, withTempDir } from '../test-utils/image-fixtures.js';

describe('PNG Decoder', () => {
  test('reports RGBA PNGs as 4-channel', async () => {
    const decoder = new PngBufferDecoder(createTestPng(3, 2, new Uint8Array([1, 2, 3, 4])));
    const header = await decoder.getHeader();

    assert.strictEqual(header.format, 'png');
    assert.strictEqual(header.channels, 4);
    assert.strictEqual(header.bitDepth, 8);
    assert.strictEqual(header.metadata?.colorType, 6);

    await decoder.close();
  });

  test('reports RGB PNGs as 3-channel with opaque rows', async () => {
    const decoder = new PngBufferDecoder(createTestPng(2, 2, new Uint8Array([10, 20, 30, 255]), { alpha: false }));
    const raster = await readRaster(decoder);

    assert.strictEqual(raster.hasAlpha, false);
    assert.strictEqual(raster.metadata?.colorType, 2);
    assert.deepStrictEqual(Array.from(raster.data), [
      10, 20, 30, 255, 10, 20, 30, 255,
      10, 20, 30, 255, 10, 20, 30, 255
    ]);
  });

  test('keeps every pixel of a varied image', async () => {
    const rgba = new Uint8Array([
      255, 0, 0, 255, 0, 255, 0, 128,
      0, 0, 255, 0, 17, 34, 51, 68
    ]);
    const raster = await readRaster(new PngBufferDecoder(createPngFromRgba(2, 2, rgba)));

    assert.deepStrictEqual(raster.data, rgba);
  });

  test('decodes from a file', async () => {
    await withTempDir(async (dir) => {
      const filePath = join(dir, 'image.png');
      await writeFile(filePath, createTestPng(5, 4, new Uint8Array([9, 8, 7, 6])));

      const raster = await readRaster(new PngFileDecoder(filePath));

      assert.strictEqual(raster.width, 5);
      assert.strictEqual(raster.height, 4);
      assert.deepStrictEqual(Array.from(raster.data.subarray(0, 4)), [9, 8, 7, 6]);
    });
  });

  test('reports a missing file as an I/O error', async () => {
    await withTempDir(async (dir) => {
      const decoder = new PngFileDecoder(join(dir, 'missing.png'));
      await assert.rejects(decoder.getHeader(), { name: 'QoiIoError', code: 'Io' });
    });
  });

  test('rejects a corrupted chunk checksum', async () => {
    const png = createTestPng(2, 2, new Uint8Array([1, 2, 3, 255]));
    // last byte of the IHDR CRC
    png[32] ^= 0xff;

    await assert.rejects(new PngBufferDecoder(png).getHeader());
  });
});
