import type { DecoderPlugin } from './types.js';
import { qoiDecoder } from './qoi-decoder.js';

let defaultPlugins: DecoderPlugin[] | null = null;

function ensureDefaultPlugins(): DecoderPlugin[] {
  if (!defaultPlugins || defaultPlugins.length === 0) {
    // The QOI decoder has no third-party dependencies, so it is always there
    defaultPlugins = [qoiDecoder];
  }
  return defaultPlugins;
}

export function setDefaultDecoderPlugins(plugins: DecoderPlugin[]): void {
  defaultPlugins = [...plugins];
}

export function getDefaultDecoderPlugins(): DecoderPlugin[] {
  return ensureDefaultPlugins();
}

export function clearDefaultDecoderPlugins(): void {
  defaultPlugins = null;
}
