import { concatBytes } from '../streams/buffer.js';
import { prependBytes } from '../streams/web.js';
import { detectCompression, MAGIC_LOOKAHEAD } from './detect.js';
import { nodeBackend } from './node-backend.js';
import type { ByteTransform, Compression, DecompressOptions } from './types.js';

export { compressionFromFlags, detectCompression } from './detect.js';
export { CompressionError } from './errors.js';
export type { CompressionErrorCode } from './errors.js';
export type { ByteTransform, Compression, CompressionMode, DecompressOptions } from './types.js';

/** Transform that compresses plain tar bytes with the chosen codec. */
export function wrapWriter(codec: Compression): ByteTransform {
  return nodeBackend.create(codec, 'compress');
}

/**
 * Sniff the codec from the stream's first bytes and return the
 * decompressed tar stream.
 */
export async function wrapReader(
  source: ReadableStream<Uint8Array>,
  options?: DecompressOptions
): Promise<{ codec: Compression; stream: ReadableStream<Uint8Array> }> {
  const reader = source.getReader();
  const head: Uint8Array[] = [];
  let length = 0;
  try {
    while (length < MAGIC_LOOKAHEAD) {
      const result = await reader.read();
      if (result.done) break;
      head.push(result.value);
      length += result.value.length;
    }
  } finally {
    reader.releaseLock();
  }
  const prefix = concatBytes(head, length);
  const codec = detectCompression(prefix);
  const restored = prependBytes(prefix, source);
  if (codec === 'none') return { codec, stream: restored };
  return { codec, stream: restored.pipeThrough(nodeBackend.create(codec, 'decompress', options)) };
}
