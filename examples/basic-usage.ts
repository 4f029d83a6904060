/**
 * Basic usage example for qoi-kit
 *
 * Builds a small gradient, writes it as QOI, reads it back and converts it
 * to PNG. Run from the repository root with a TypeScript loader, e.g.
 * `node --import tsx examples/basic-usage.ts`.
 */

import { writeFileSync } from 'node:fs';
import {
  createQoiImage,
  setPixel,
  saveQoiFile,
  loadQoiFile,
  convertQoiToPng,
  convertToQoi,
  QoiColorspace,
  QoiError
} from '../src/index.js';

async function main(): Promise<void> {
  const width = 64;
  const height = 32;
  const image = createQoiImage(width, height, { hasAlpha: true, colorspace: QoiColorspace.SRGB });

  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      setPixel(image, x, y, { r: x * 4, g: y * 8, b: 128, a: 255 - x * 2 });
    }
  }

  await saveQoiFile('gradient.qoi', image);
  console.log('✓ Wrote gradient.qoi');

  const loaded = await loadQoiFile('gradient.qoi');
  console.log(`  ${loaded.width}x${loaded.height}, alpha: ${loaded.hasAlpha}`);

  const png = await convertQoiToPng('gradient.qoi');
  writeFileSync('gradient.png', png);
  console.log('✓ Wrote gradient.png');

  // And back again, without the alpha channel
  const qoi = await convertToQoi('gradient.png', {
    alpha: false,
    logger: (message) => console.log(`  note: ${message}`)
  });
  writeFileSync('gradient-opaque.qoi', qoi);
  console.log(`✓ Wrote gradient-opaque.qoi (${qoi.length} bytes)`);
}

main().catch((err: unknown) => {
  if (err instanceof QoiError) {
    console.error(`Error [${err.code}]: ${err.message}`);
  } else {
    console.error(err);
  }
  process.exit(1);
});
