import test from 'node:test';
import assert from 'node:assert/strict';
import { readFile, stat, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { readFileChunks, writeNewFile } from '../src/node/files.js';
import { readableFromAsyncIterable, readableFromBytes } from '../src/streams/web.js';
import { withTempDir } from './helpers.js';

const encoder = new TextEncoder();

async function* pieces(...parts: string[]): AsyncGenerator<Uint8Array> {
  for (const part of parts) yield encoder.encode(part);
}

test('writeNewFile settles once the data is written', async () => {
  await withTempDir(async (dir) => {
    const path = join(dir, 'out.txt');
    await writeNewFile(path, readableFromBytes(encoder.encode('hello')), 0o600);
    assert.equal(await readFile(path, 'utf8'), 'hello');
    assert.equal((await stat(path)).mode & 0o777, 0o600);
  });
});

test('writeNewFile concatenates every chunk in order', async () => {
  await withTempDir(async (dir) => {
    const path = join(dir, 'out.txt');
    await writeNewFile(path, readableFromAsyncIterable(pieces('ab', '', 'cd', 'e')), 0o644);
    assert.equal(await readFile(path, 'utf8'), 'abcde');
  });
});

test('writeNewFile refuses to replace an existing file', async () => {
  await withTempDir(async (dir) => {
    const path = join(dir, 'taken.txt');
    await writeFile(path, 'original');
    await assert.rejects(writeNewFile(path, readableFromBytes(encoder.encode('x')), 0o644), { code: 'EEXIST' });
    assert.equal(await readFile(path, 'utf8'), 'original');
  });
});

test('readFileChunks yields the whole file across chunk boundaries', async () => {
  await withTempDir(async (dir) => {
    const path = join(dir, 'big.bin');
    const content = 'z'.repeat(64 * 1024 + 7);
    await writeFile(path, content);
    const sizes: number[] = [];
    for await (const chunk of readFileChunks(path)) sizes.push(chunk.length);
    assert.deepEqual(sizes, [64 * 1024, 7]);
  });
});
