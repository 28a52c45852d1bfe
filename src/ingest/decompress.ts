/**
 * Streaming decompression for dump files
 */

import { open } from 'node:fs/promises';
import { DecompressionStream, TransformStream } from 'node:stream/web';
import type { CompressionType } from './types.js';

/** Magic bytes for compression format detection */
const GZIP_MAGIC = [0x1f, 0x8b];

/**
 * Create a decompression TransformStream.
 *
 * @example
 * ```typescript
 * const decompressed = fileStream.pipeThrough(createDecompressor('gzip'));
 * ```
 */
export function createDecompressor(
  type: Exclude<CompressionType, 'auto'>
): TransformStream<Uint8Array, Uint8Array> {
  if (type === 'gzip') {
    return new DecompressionStream('gzip');
  }
  return new TransformStream<Uint8Array, Uint8Array>();
}

/**
 * Detect compression format from magic bytes
 */
export function detectFormat(header: Uint8Array): Exclude<CompressionType, 'auto'> {
  if (header[0] === GZIP_MAGIC[0] && header[1] === GZIP_MAGIC[1]) {
    return 'gzip';
  }
  return 'none';
}

/**
 * Detect compression of a local file by reading its first two bytes
 */
export async function detectFileCompression(path: string): Promise<Exclude<CompressionType, 'auto'>> {
  const handle = await open(path, 'r');
  try {
    const header = new Uint8Array(2);
    const { bytesRead } = await handle.read(header, 0, 2, 0);
    return bytesRead < 2 ? 'none' : detectFormat(header);
  } finally {
    await handle.close();
  }
}
