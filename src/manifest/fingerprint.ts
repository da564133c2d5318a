import { createHash } from 'node:crypto';
import { forEachFileChunk } from '../node/files.js';

const TEXT_ENCODER = new TextEncoder();

export function sha256Hex(data: Uint8Array): string {
  return createHash('sha256').update(data).digest('hex');
}

/** Digest of the empty byte sequence; the fingerprint of every directory. */
export const EMPTY_SHA256 = sha256Hex(new Uint8Array(0));

/** Digest of a symlink: the UTF-8 bytes of its target. */
export function hashLinkTarget(target: string): string {
  return sha256Hex(TEXT_ENCODER.encode(target));
}

/** Stream a file through SHA-256 with a fixed-size buffer. */
export async function hashFile(path: string): Promise<string> {
  const hash = createHash('sha256');
  await forEachFileChunk(path, (chunk) => {
    hash.update(chunk);
  });
  return hash.digest('hex');
}

/** Hash a byte stream, returning the digest and the number of bytes seen. */
export async function hashStream(stream: ReadableStream<Uint8Array>): Promise<{ sha256: string; size: bigint }> {
  const hash = createHash('sha256');
  const reader = stream.getReader();
  let size = 0n;
  try {
    while (true) {
      const result = await reader.read();
      if (result.done) break;
      hash.update(result.value);
      size += BigInt(result.value.length);
    }
  } finally {
    reader.releaseLock();
  }
  return { sha256: hash.digest('hex'), size };
}
