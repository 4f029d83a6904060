/**
 * Filesystem and raster helpers shared by the decoders and the conversion API.
 */

import { readFile, writeFile } from 'node:fs/promises';
import type { ImageDecoder } from './decoders/types.js';
import type { RasterImage } from './types.js';
import { QoiIoError, allocateBytes } from './errors.js';
import { errorMessage } from './utils.js';

/**
 * Read the full contents of a file
 */
export async function readImageBytes(path: string): Promise<Uint8Array> {
  try {
    const buffer = await readFile(path);
    return new Uint8Array(buffer.buffer, buffer.byteOffset, buffer.byteLength);
  } catch (err) {
    throw new QoiIoError(`Could not read from file '${path}': ${errorMessage(err)}`, path, { cause: err });
  }
}

/**
 * Write bytes to a file, replacing it if it exists
 */
export async function writeImageBytes(path: string, data: Uint8Array): Promise<void> {
  try {
    await writeFile(path, data);
  } catch (err) {
    throw new QoiIoError(`Could not write to file '${path}': ${errorMessage(err)}`, path, { cause: err });
  }
}

/**
 * Drain a decoder into a flat RGBA raster.
 *
 * `onProgress` is called after every row with the number of rows read and the
 * image height. The decoder is closed whether or not reading succeeds.
 */
export async function readRaster(
  decoder: ImageDecoder,
  onProgress?: (completed: number, total: number) => void
): Promise<RasterImage> {
  try {
    const header = await decoder.getHeader();
    const rowBytes = header.width * 4;
    const data = allocateBytes(rowBytes * header.height);

    let rows = 0;
    for await (const scanline of decoder.scanlines()) {
      if (rows >= header.height) {
        throw new Error(`Decoder produced more than ${header.height} scanlines`);
      }
      if (scanline.length !== rowBytes) {
        throw new Error(`Scanline ${rows} has ${scanline.length} bytes, expected ${rowBytes}`);
      }
      data.set(scanline, rows * rowBytes);
      rows++;
      onProgress?.(rows, header.height);
    }

    if (rows !== header.height) {
      throw new Error(`Expected ${header.height} scanlines, decoded ${rows}`);
    }

    return {
      width: header.width,
      height: header.height,
      hasAlpha: header.channels === 4,
      data,
      metadata: header.metadata
    };
  } finally {
    await decoder.close();
  }
}

/**
 * Split an RGBA buffer into rows
 */
export function* rowsOf(data: Uint8Array, width: number, height: number): Generator<Uint8Array> {
  const rowBytes = width * 4;
  for (let y = 0; y < height; y++) {
    yield data.subarray(y * rowBytes, (y + 1) * rowBytes);
  }
}
