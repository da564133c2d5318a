import type { Compression } from './types.js';

const MAGIC: ReadonlyArray<{ codec: Exclude<Compression, 'none'>; bytes: readonly number[] }> = [
  { codec: 'gzip', bytes: [0x1f, 0x8b] },
  { codec: 'xz', bytes: [0xfd, 0x37, 0x7a, 0x58, 0x5a, 0x00] },
  { codec: 'zstd', bytes: [0x28, 0xb5, 0x2f, 0xfd] }
];

/** Bytes needed to recognise every supported magic number. */
export const MAGIC_LOOKAHEAD = Math.max(...MAGIC.map((magic) => magic.bytes.length));

/** Identify the codec from leading bytes; anything unrecognised is plain tar. */
export function detectCompression(prefix: Uint8Array): Compression {
  for (const magic of MAGIC) {
    if (prefix.length < magic.bytes.length) continue;
    if (magic.bytes.every((byte, index) => prefix[index] === byte)) return magic.codec;
  }
  return 'none';
}

/** Resolve codec flags; asking for more than one picks zstd. */
export function compressionFromFlags(flags: { gzip?: boolean; xz?: boolean; zstd?: boolean }): Compression {
  const selected = [flags.gzip, flags.xz, flags.zstd].filter(Boolean).length;
  if (selected > 1 || flags.zstd) return 'zstd';
  if (flags.gzip) return 'gzip';
  if (flags.xz) return 'xz';
  return 'none';
}
