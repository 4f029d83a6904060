/**
 * Decoder Factory
 *
 * Auto-detects image format and creates the matching decoder instance.
 */

import type { ImageDecoder, ImageInput, DecoderOptions, DecoderPlugin } from './types.js';
import { detectFormat, validateFormat } from './format-detection.js';
import { getDefaultDecoderPlugins } from './plugin-registry.js';
import { UnsupportedFormatError } from '../errors.js';

/**
 * Type guard for inputs that are already decoders
 */
export function isImageDecoder(input: ImageInput): input is ImageDecoder {
  return (
    typeof input === 'object' &&
    input !== null &&
    'getHeader' in input &&
    'scanlines' in input &&
    'close' in input
  );
}

/**
 * Create appropriate decoder for any image input
 *
 * Automatically detects image format and creates the correct decoder type.
 * Supports file paths, buffers, or existing decoder instances.
 *
 * @param input - Image source (file path, Uint8Array, ArrayBuffer, or existing decoder)
 * @param options - Format-specific decoder options
 * @param plugins - Decoder plugins to choose from (default: registered plugins)
 *
 * @example
 * // Auto-detect from file
 * const decoder = await createDecoder('photo.qoi');
 *
 * // Auto-detect from buffer, with limits
 * const decoder = await createDecoder(imageBytes, { jpeg: { maxMemoryMB: 128 } });
 */
export async function createDecoder(
  input: ImageInput,
  options: DecoderOptions = {},
  plugins: DecoderPlugin[] = getDefaultDecoderPlugins()
): Promise<ImageDecoder> {
  if (isImageDecoder(input)) {
    return input;
  }

  const availablePlugins = plugins.length > 0 ? plugins : getDefaultDecoderPlugins();
  const source = input instanceof ArrayBuffer ? new Uint8Array(input) : input;

  const format = await detectFormat(source);
  validateFormat(format);

  const plugin = availablePlugins.find(candidate => candidate.format === format);
  if (!plugin) {
    throw new UnsupportedFormatError(
      `No decoder registered for format "${format}". Provide a matching plugin via options.decoders.`
    );
  }

  return plugin.create(source, options);
}

/**
 * Create multiple decoders from an array of inputs
 *
 * Processes inputs in parallel.
 */
export async function createDecoders(
  inputs: ImageInput[],
  options: DecoderOptions = {},
  plugins: DecoderPlugin[] = getDefaultDecoderPlugins()
): Promise<ImageDecoder[]> {
  return Promise.all(inputs.map((input) => createDecoder(input, options, plugins)));
}
