import test from 'node:test';
import assert from 'node:assert/strict';
import { compressionFromFlags, detectCompression, wrapReader, wrapWriter } from '../src/compression/index.js';
import { CompressionError } from '../src/compression/errors.js';
import type { Compression } from '../src/compression/types.js';
import { readAllBytes } from '../src/streams/buffer.js';
import { readableFromBytes } from '../src/streams/web.js';
import { buildTar } from './helpers.js';

const CODECS: readonly Compression[] = ['none', 'gzip', 'xz', 'zstd'];

async function compress(codec: Compression, data: Uint8Array): Promise<Uint8Array> {
  const transform = wrapWriter(codec);
  const collected = readAllBytes(transform.readable);
  const writer = transform.writable.getWriter();
  await writer.write(data);
  await writer.close();
  return collected;
}

test('detectCompression recognises each magic number', () => {
  assert.equal(detectCompression(Uint8Array.from([0x1f, 0x8b, 0x08])), 'gzip');
  assert.equal(detectCompression(Uint8Array.from([0xfd, 0x37, 0x7a, 0x58, 0x5a, 0x00])), 'xz');
  assert.equal(detectCompression(Uint8Array.from([0x28, 0xb5, 0x2f, 0xfd, 0x00])), 'zstd');
  assert.equal(detectCompression(Uint8Array.from([0x1f])), 'none');
  assert.equal(detectCompression(new TextEncoder().encode('ustar')), 'none');
  assert.equal(detectCompression(new Uint8Array(0)), 'none');
});

test('compressionFromFlags picks zstd when several codecs are requested', () => {
  assert.equal(compressionFromFlags({}), 'none');
  assert.equal(compressionFromFlags({ gzip: true }), 'gzip');
  assert.equal(compressionFromFlags({ xz: true }), 'xz');
  assert.equal(compressionFromFlags({ zstd: true }), 'zstd');
  assert.equal(compressionFromFlags({ gzip: true, xz: true }), 'zstd');
});

for (const codec of CODECS) {
  test(`${codec} output is detected and restored by wrapReader`, async () => {
    const tar = await buildTar([{ name: 'a.txt', data: 'hello '.repeat(200) }]);
    const compressed = await compress(codec, tar);
    if (codec !== 'none') assert.notDeepEqual(compressed, tar);
    const { codec: detected, stream } = await wrapReader(readableFromBytes(compressed));
    assert.equal(detected, codec);
    assert.deepEqual(await readAllBytes(stream), tar);
  });
}

for (const codec of ['xz', 'zstd'] as const) {
  test(`${codec} output chunks are plain Uint8Arrays`, async () => {
    const tar = await buildTar([{ name: 'a.txt', data: 'abc' }]);
    const { stream } = await wrapReader(readableFromBytes(await compress(codec, tar)));
    const reader = stream.getReader();
    const chunks: Uint8Array[] = [];
    while (true) {
      const result = await reader.read();
      if (result.done) break;
      chunks.push(result.value);
    }
    assert.ok(chunks.length > 0);
    for (const chunk of chunks) assert.equal(Object.getPrototypeOf(chunk), Uint8Array.prototype);
  });
}

test('wrapReader handles sources shorter than the magic lookahead', async () => {
  const { codec, stream } = await wrapReader(readableFromBytes(Uint8Array.from([1, 2, 3])));
  assert.equal(codec, 'none');
  assert.deepEqual(await readAllBytes(stream), Uint8Array.from([1, 2, 3]));
});

for (const codec of ['xz', 'zstd'] as const) {
  test(`${codec} decompression stops at the output ceiling`, async () => {
    const compressed = await compress(codec, new Uint8Array(4096));
    const { stream } = await wrapReader(readableFromBytes(compressed), { maxOutputBytes: 1024n });
    await assert.rejects(
      readAllBytes(stream),
      (err: unknown) => err instanceof CompressionError && err.code === 'COMPRESSION_RESOURCE_LIMIT'
    );
  });
}

test('corrupt xz data is reported as a compression error', async () => {
  const bogus = Uint8Array.from([0xfd, 0x37, 0x7a, 0x58, 0x5a, 0x00, 0x01, 0x02, 0x03, 0x04]);
  const { codec, stream } = await wrapReader(readableFromBytes(bogus));
  assert.equal(codec, 'xz');
  await assert.rejects(
    readAllBytes(stream),
    (err: unknown) => err instanceof CompressionError && err.code === 'COMPRESSION_BAD_DATA'
  );
});
