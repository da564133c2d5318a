import { Duplex } from 'node:stream';
import { createGunzip, createGzip } from 'node:zlib';
import { xz } from '@napi-rs/lzma';
import { compress as zstdCompress, decompress as zstdDecompress, init as initZstd } from '@bokuweb/zstd-wasm';
import { concatBytes } from '../streams/buffer.js';
import { CompressionError } from './errors.js';
import type { ByteTransform, Compression, CompressionMode, DecompressOptions } from './types.js';

const OUTPUT_CHUNK = 64 * 1024;
const ZSTD_LEVEL = 3;
/** Output buffer for zstd frames that do not record their content size. */
const ZSTD_UNSIZED_HEAP = 64 * 1024 * 1024;

let zstdReady: Promise<void> | undefined;

async function zstd(mode: CompressionMode, input: Uint8Array): Promise<Uint8Array> {
  if (!zstdReady) zstdReady = initZstd();
  await zstdReady;
  return mode === 'compress'
    ? zstdCompress(input, ZSTD_LEVEL)
    : zstdDecompress(input, { defaultHeapSize: ZSTD_UNSIZED_HEAP });
}

/** Plain Uint8Array view over a binding's output, which may be a Buffer. */
function plainBytes(bytes: Uint8Array): Uint8Array {
  return new Uint8Array(bytes.buffer, bytes.byteOffset, bytes.byteLength);
}

function toWebTransform(duplex: Duplex): ByteTransform {
  const { readable, writable } = Duplex.toWeb(duplex);
  return {
    readable: readable as ReadableStream<Uint8Array>,
    writable: writable as WritableStream<Uint8Array>
  };
}

function passthroughStream(): ByteTransform {
  return new TransformStream<Uint8Array, Uint8Array>({
    transform(chunk, controller) {
      controller.enqueue(chunk);
    }
  });
}

/**
 * Collect the whole input and run a one-shot codec on flush. Used for the
 * xz binding and the zstd WebAssembly build, which expose buffer APIs only.
 */
function bufferedTransform(
  codec: Compression,
  mode: CompressionMode,
  run: (input: Uint8Array) => Promise<Uint8Array>,
  maxOutputBytes?: bigint
): ByteTransform {
  const chunks: Uint8Array[] = [];
  return new TransformStream<Uint8Array, Uint8Array>({
    transform(chunk) {
      chunks.push(chunk);
    },
    async flush(controller) {
      const input = concatBytes(chunks);
      chunks.length = 0;
      let output: Uint8Array;
      try {
        output = plainBytes(await run(input));
      } catch (err) {
        throw new CompressionError(
          mode === 'compress' ? 'COMPRESSION_FAILED' : 'COMPRESSION_BAD_DATA',
          `${codec} ${mode} failed`,
          { algorithm: codec, cause: err }
        );
      }
      if (maxOutputBytes !== undefined && BigInt(output.length) > maxOutputBytes) {
        throw new CompressionError('COMPRESSION_RESOURCE_LIMIT', `${codec} output exceeds ${maxOutputBytes} bytes`, {
          algorithm: codec
        });
      }
      for (let offset = 0; offset < output.length; offset += OUTPUT_CHUNK) {
        controller.enqueue(output.subarray(offset, offset + OUTPUT_CHUNK));
      }
    }
  });
}

function create(codec: Compression, mode: CompressionMode, options?: DecompressOptions): ByteTransform {
  switch (codec) {
    case 'none':
      return passthroughStream();
    case 'gzip':
      return toWebTransform(mode === 'compress' ? createGzip() : createGunzip());
    case 'xz':
      return bufferedTransform(
        codec,
        mode,
        async (input) => (mode === 'compress' ? xz.compress(input) : xz.decompress(input)),
        options?.maxOutputBytes
      );
    case 'zstd':
      return bufferedTransform(
        codec,
        mode,
        (input) => zstd(mode, input),
        options?.maxOutputBytes
      );
    default: {
      const exhaustive: never = codec;
      return exhaustive;
    }
  }
}

export const nodeBackend = {
  create
};
