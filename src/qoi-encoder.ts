import { QoiChannels, type QoiCodecOptions, type QoiImage } from './types.js';
import { QoiEncodeError, allocateBytes } from './errors.js';
import { validateQoiHeader, writeQoiHeader } from './qoi-header.js';
import {
  ColorIndex,
  QOI_DIFF_MAX,
  QOI_DIFF_MIN,
  QOI_END_MARKER_SIZE,
  QOI_HEADER_SIZE,
  QOI_LUMA_GREEN_MAX,
  QOI_LUMA_GREEN_MIN,
  QOI_LUMA_RED_BLUE_MAX,
  QOI_LUMA_RED_BLUE_MIN,
  QOI_MAX_BYTES_PER_PIXEL,
  QOI_MAX_RUN_LENGTH,
  QOI_OP_DIFF,
  QOI_OP_INDEX,
  QOI_OP_LUMA,
  QOI_OP_RGB,
  QOI_OP_RGBA,
  QOI_OP_RUN,
  QOI_START_PIXEL,
  packPixel,
  qoiHash,
  wrapDiff
} from './qoi-ops.js';
import { QOI_END_MARKER } from './utils.js';

/**
 * Worst-case size of an encoded image: every pixel as QOI_OP_RGBA
 */
export function maxEncodedSize(width: number, height: number): number {
  return QOI_HEADER_SIZE + width * height * QOI_MAX_BYTES_PER_PIXEL + QOI_END_MARKER_SIZE;
}

function inRange(value: number, min: number, max: number): boolean {
  return value >= min && value <= max;
}

/**
 * Encode an image to QOI.
 *
 * Pixels of an image without alpha are encoded as opaque regardless of the
 * alpha samples in `image.data`.
 */
export function encodeQoi(image: QoiImage, options: QoiCodecOptions = {}): Uint8Array {
  const { width, height, hasAlpha, colorspace, data } = image;
  const channels = hasAlpha ? QoiChannels.RGBA : QoiChannels.RGB;

  validateQoiHeader({ width, height, channels, colorspace }, options);

  const pixelCount = width * height;
  if (data.length !== pixelCount * 4) {
    throw new QoiEncodeError(
      'PixelCountMismatch',
      `Expected ${pixelCount * 4} bytes of RGBA data for ${width}x${height}, got ${data.length}`
    );
  }

  const output = allocateBytes(maxEncodedSize(width, height));
  writeQoiHeader(output, { width, height, channels, colorspace });
  let pos = QOI_HEADER_SIZE;

  const index = new ColorIndex();
  let prev = QOI_START_PIXEL;

  const readPixel = (i: number): number => {
    const offset = i * 4;
    return packPixel(
      data[offset],
      data[offset + 1],
      data[offset + 2],
      hasAlpha ? data[offset + 3] : 255
    );
  };

  let i = 0;
  while (i < pixelCount) {
    const pixel = readPixel(i);

    if (pixel === prev) {
      let run = 0;
      while (i < pixelCount && readPixel(i) === prev) {
        run++;
        i++;
        if (run === QOI_MAX_RUN_LENGTH) {
          output[pos++] = QOI_OP_RUN | (run - 1);
          run = 0;
        }
      }
      if (run > 0) {
        output[pos++] = QOI_OP_RUN | (run - 1);
      }
      continue;
    }

    const hash = qoiHash(pixel);
    const r = pixel >>> 24;
    const g = (pixel >>> 16) & 0xff;
    const b = (pixel >>> 8) & 0xff;
    const a = pixel & 0xff;

    if (index.get(hash) === pixel) {
      output[pos++] = QOI_OP_INDEX | hash;
    } else if (a === (prev & 0xff)) {
      const dr = wrapDiff(r, prev >>> 24);
      const dg = wrapDiff(g, (prev >>> 16) & 0xff);
      const db = wrapDiff(b, (prev >>> 8) & 0xff);
      const drDg = dr - dg;
      const dbDg = db - dg;

      if (
        inRange(dr, QOI_DIFF_MIN, QOI_DIFF_MAX) &&
        inRange(dg, QOI_DIFF_MIN, QOI_DIFF_MAX) &&
        inRange(db, QOI_DIFF_MIN, QOI_DIFF_MAX)
      ) {
        output[pos++] =
          QOI_OP_DIFF |
          ((dr - QOI_DIFF_MIN) << 4) |
          ((dg - QOI_DIFF_MIN) << 2) |
          (db - QOI_DIFF_MIN);
      } else if (
        inRange(dg, QOI_LUMA_GREEN_MIN, QOI_LUMA_GREEN_MAX) &&
        inRange(drDg, QOI_LUMA_RED_BLUE_MIN, QOI_LUMA_RED_BLUE_MAX) &&
        inRange(dbDg, QOI_LUMA_RED_BLUE_MIN, QOI_LUMA_RED_BLUE_MAX)
      ) {
        output[pos++] = QOI_OP_LUMA | (dg - QOI_LUMA_GREEN_MIN);
        output[pos++] = ((drDg - QOI_LUMA_RED_BLUE_MIN) << 4) | (dbDg - QOI_LUMA_RED_BLUE_MIN);
      } else {
        output[pos++] = QOI_OP_RGB;
        output[pos++] = r;
        output[pos++] = g;
        output[pos++] = b;
      }
    } else {
      output[pos++] = QOI_OP_RGBA;
      output[pos++] = r;
      output[pos++] = g;
      output[pos++] = b;
      output[pos++] = a;
    }

    index.put(pixel);
    prev = pixel;
    i++;
  }

  output.set(QOI_END_MARKER, pos);
  pos += QOI_END_MARKER_SIZE;

  return output.slice(0, pos);
}
