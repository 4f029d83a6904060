import { QoiChannels, type QoiCodecOptions, type QoiImage } from './types.js';
import { QoiFormatError, allocateBytes } from './errors.js';
import { parseQoiHeader } from './qoi-header.js';
import {
  ColorIndex,
  QOI_DIFF_MIN,
  QOI_END_MARKER_SIZE,
  QOI_HEADER_SIZE,
  QOI_LUMA_GREEN_MIN,
  QOI_LUMA_RED_BLUE_MIN,
  QOI_MASK_2,
  QOI_OP_DIFF,
  QOI_OP_INDEX,
  QOI_OP_RGB,
  QOI_OP_RGBA,
  QOI_OP_RUN,
  packPixel,
  wrapAdd
} from './qoi-ops.js';
import { hasEndMarkerAt } from './utils.js';

/**
 * Decode a complete QOI file.
 *
 * The stream is validated end to end: every chunk must fit, the pixel count
 * must match the header exactly, and the end marker must be the last eight
 * bytes of the input. Nothing is returned unless the whole file is valid.
 */
export function decodeQoi(data: Uint8Array, options: QoiCodecOptions = {}): QoiImage {
  const header = parseQoiHeader(data, options);
  const { width, height } = header;
  const pixelCount = width * height;
  const output = allocateBytes(pixelCount * 4);

  const index = new ColorIndex();
  let r = 0;
  let g = 0;
  let b = 0;
  let a = 255;

  let pos = QOI_HEADER_SIZE;
  let decoded = 0;

  while (decoded < pixelCount) {
    // Enough room for the end marker means enough room for any chunk
    if (data.length < pos + QOI_END_MARKER_SIZE) {
      throw new QoiFormatError(
        'UnexpectedEof',
        `Stream ends after ${decoded} of ${pixelCount} pixels`
      );
    }

    const tag = data[pos];

    // 0x00 is both QOI_OP_INDEX for slot 0 and the first end marker byte
    if (tag === QOI_OP_INDEX && hasEndMarkerAt(data, pos)) {
      break;
    }
    pos++;

    if (tag === QOI_OP_RGB) {
      r = data[pos++];
      g = data[pos++];
      b = data[pos++];
    } else if (tag === QOI_OP_RGBA) {
      r = data[pos++];
      g = data[pos++];
      b = data[pos++];
      a = data[pos++];
    } else {
      const op = tag & QOI_MASK_2;

      if (op === QOI_OP_INDEX) {
        const pixel = index.get(tag & 0x3f);
        r = pixel >>> 24;
        g = (pixel >>> 16) & 0xff;
        b = (pixel >>> 8) & 0xff;
        a = pixel & 0xff;
        decoded = emit(output, decoded, r, g, b, a);
        continue;
      }

      if (op === QOI_OP_RUN) {
        const run = (tag & 0x3f) + 1;
        if (decoded + run > pixelCount) {
          throw new QoiFormatError(
            'RunOverflow',
            `Run of ${run} at pixel ${decoded} exceeds the ${pixelCount} pixels in the image`
          );
        }
        for (let i = 0; i < run; i++) {
          decoded = emit(output, decoded, r, g, b, a);
        }
        continue;
      }

      if (op === QOI_OP_DIFF) {
        r = wrapAdd(r, ((tag >> 4) & 0x03) + QOI_DIFF_MIN);
        g = wrapAdd(g, ((tag >> 2) & 0x03) + QOI_DIFF_MIN);
        b = wrapAdd(b, (tag & 0x03) + QOI_DIFF_MIN);
      } else {
        // QOI_OP_LUMA
        const redBlue = data[pos++];
        const dg = (tag & 0x3f) + QOI_LUMA_GREEN_MIN;
        r = wrapAdd(r, ((redBlue >> 4) & 0x0f) + QOI_LUMA_RED_BLUE_MIN + dg);
        g = wrapAdd(g, dg);
        b = wrapAdd(b, (redBlue & 0x0f) + QOI_LUMA_RED_BLUE_MIN + dg);
      }
    }

    index.put(packPixel(r, g, b, a));
    decoded = emit(output, decoded, r, g, b, a);
  }

  if (decoded < pixelCount) {
    throw new QoiFormatError(
      'UnexpectedEof',
      `End marker reached after ${decoded} of ${pixelCount} pixels`
    );
  }

  if (data.length < pos + QOI_END_MARKER_SIZE) {
    throw new QoiFormatError('UnexpectedEof', 'The file ends before the end marker');
  }

  if (!hasEndMarkerAt(data, pos)) {
    throw new QoiFormatError('BadEndMarker', `Invalid end marker at offset ${pos}`);
  }

  const end = pos + QOI_END_MARKER_SIZE;
  if (end !== data.length) {
    throw new QoiFormatError(
      'TrailingData',
      `File contains ${data.length - end} bytes past the end marker`
    );
  }

  const hasAlpha = header.channels === QoiChannels.RGBA;
  if (!hasAlpha) {
    // RGBA chunks may still appear in a 3-channel stream; they only feed the index
    for (let i = 3; i < output.length; i += 4) {
      output[i] = 255;
    }
  }

  return {
    width,
    height,
    hasAlpha,
    colorspace: header.colorspace,
    data: output
  };
}

function emit(output: Uint8Array, pixelIndex: number, r: number, g: number, b: number, a: number): number {
  const offset = pixelIndex * 4;
  output[offset] = r;
  output[offset + 1] = g;
  output[offset + 2] = b;
  output[offset + 3] = a;
  return pixelIndex + 1;
}
