/** Stream compression applied around a tar archive. */
export type Compression = 'none' | 'gzip' | 'xz' | 'zstd';

export type CompressionMode = 'compress' | 'decompress';

/** A byte-to-byte transform usable with `pipeThrough`. */
export type ByteTransform = {
  readable: ReadableStream<Uint8Array>;
  writable: WritableStream<Uint8Array>;
};

export type DecompressOptions = {
  /** Ceiling on decompressed output for codecs that inflate in one step. */
  maxOutputBytes?: bigint;
};
