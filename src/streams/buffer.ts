import { ArchiveError } from '../archive/errors.js';

/** Drain a stream into one buffer, failing once more than `maxBytes` arrive. */
export async function readAllBytes(
  stream: ReadableStream<Uint8Array>,
  options?: { maxBytes?: bigint | number }
): Promise<Uint8Array> {
  const reader = stream.getReader();
  const chunks: Uint8Array[] = [];
  let total = 0n;
  const maxBytes = options?.maxBytes !== undefined ? BigInt(options.maxBytes) : undefined;

  try {
    while (true) {
      const result = await reader.read();
      if (result.done) break;
      const value = result.value;
      if (value.length === 0) continue;
      total += BigInt(value.length);
      if (maxBytes !== undefined && total > maxBytes) {
        throw new ArchiveError('ARCHIVE_LIMIT_EXCEEDED', `Stream exceeds maximum allowed size of ${maxBytes} bytes`);
      }
      chunks.push(value);
    }
  } finally {
    reader.releaseLock();
  }
  return concatBytes(chunks, Number(total));
}

export function concatBytes(chunks: readonly Uint8Array[], totalLength?: number): Uint8Array {
  if (chunks.length === 0) return new Uint8Array(0);
  if (chunks.length === 1) return chunks[0] ?? new Uint8Array(0);
  const length = totalLength ?? chunks.reduce((sum, chunk) => sum + chunk.length, 0);
  const output = new Uint8Array(length);
  let offset = 0;
  for (const chunk of chunks) {
    output.set(chunk, offset);
    offset += chunk.length;
  }
  return output;
}
