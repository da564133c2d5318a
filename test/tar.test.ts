import test from 'node:test';
import assert from 'node:assert/strict';
import { ArchiveError } from '../src/archive/errors.js';
import { readAllBytes } from '../src/streams/buffer.js';
import { readableFromBytes } from '../src/streams/web.js';
import { TarReader } from '../src/tar/TarReader.js';
import { TarWriter } from '../src/tar/TarWriter.js';
import { buildTar } from './helpers.js';

const encoder = new TextEncoder();
const decoder = new TextDecoder();

function rewriteChecksum(block: Uint8Array): void {
  let sum = 0;
  for (let i = 0; i < 512; i += 1) {
    sum += i >= 148 && i < 156 ? 0x20 : block[i] ?? 0;
  }
  block.set(encoder.encode(sum.toString(8).padStart(6, '0')), 148);
  block[154] = 0;
  block[155] = 0x20;
}

function isArchiveError(code: ArchiveError['code']) {
  return (err: unknown) => err instanceof ArchiveError && err.code === code;
}

test('writer output reads back entry by entry', async () => {
  const bytes = await buildTar([
    { name: 'dir', type: 'directory' },
    { name: 'dir/a.txt', data: 'hello' },
    { name: 'link', type: 'symlink', linkName: 'dir/a.txt' }
  ]);
  assert.equal(bytes.length % 512, 0);

  const seen: Array<{ name: string; type: string; data: string; linkName?: string | undefined }> = [];
  for await (const entry of TarReader.fromUint8Array(bytes).iterEntries()) {
    const data = entry.type === 'file' ? decoder.decode(await readAllBytes(entry.open())) : '';
    seen.push({ name: entry.name, type: entry.type, data, linkName: entry.linkName });
  }
  assert.deepEqual(seen, [
    { name: 'dir/', type: 'directory', data: '', linkName: undefined },
    { name: 'dir/a.txt', type: 'file', data: 'hello', linkName: undefined },
    { name: 'link', type: 'symlink', data: '', linkName: 'dir/a.txt' }
  ]);
});

test('unread bodies are skipped when iteration advances', async () => {
  const bytes = await buildTar([
    { name: 'a', data: 'x'.repeat(700) },
    { name: 'b', data: 'y' }
  ]);
  const entries = await TarReader.fromUint8Array(bytes).entries();
  assert.deepEqual(
    entries.map((entry) => [entry.name, entry.size]),
    [
      ['a', 700n],
      ['b', 1n]
    ]
  );
});

test('deterministic headers zero timestamps and ownership and keep only the exec bit', async () => {
  const chunks: Uint8Array[] = [];
  const writer = TarWriter.toWritable(
    new WritableStream<Uint8Array>({
      write(chunk) {
        chunks.push(chunk.slice());
      }
    }),
    { isDeterministic: true }
  );
  await writer.add('tool', encoder.encode('#!/bin/sh\n'), {
    mode: 0o700,
    mtime: new Date(1_700_000_000_000),
    uid: 1000,
    gid: 1000,
    uname: 'someone',
    gname: 'staff'
  });
  await writer.add('plain', encoder.encode('data'), { mode: 0o640 });
  await writer.close();

  const [tool, plain] = await TarReader.fromUint8Array(Buffer.concat(chunks)).entries();
  assert.equal(tool?.mode, 0o755);
  assert.equal(tool?.mtime?.getTime(), 0);
  assert.equal(tool?.uid, 0);
  assert.equal(tool?.gid, 0);
  assert.equal(tool?.uname, undefined);
  assert.equal(plain?.mode, 0o644);
});

test('names longer than the header field travel in PAX records', async () => {
  const longName = `${'nested/'.repeat(20)}file.txt`;
  const longTarget = `${'t'.repeat(120)}`;
  const bytes = await buildTar([
    { name: longName, data: 'content' },
    { name: 'short', type: 'symlink', linkName: longTarget }
  ]);
  const [file, link] = await TarReader.fromUint8Array(bytes).entries();
  assert.equal(file?.name, longName);
  assert.equal(file?.pax?.path, longName);
  assert.equal(file?.size, 7n);
  assert.equal(link?.linkName, longTarget);
});

test('streamed sources must match the declared size', async () => {
  const writer = TarWriter.toWritable(new WritableStream<Uint8Array>());
  await assert.rejects(
    writer.add('grown', readableFromBytes(encoder.encode('12345')), { size: 10n }),
    isArchiveError('ARCHIVE_SIZE_MISMATCH')
  );
});

test('checksum mismatches fail in strict mode and warn otherwise', async () => {
  const bytes = await buildTar([{ name: 'a.txt', data: 'hello' }]);
  bytes[148] = 0x37;

  await assert.rejects(TarReader.fromUint8Array(bytes, { isStrict: true }).entries(), isArchiveError('ARCHIVE_BAD_HEADER'));

  const lenient = TarReader.fromUint8Array(bytes, { isStrict: false });
  const entries = await lenient.entries();
  assert.deepEqual(
    entries.map((entry) => entry.name),
    ['a.txt']
  );
  assert.deepEqual(lenient.warnings(), [{ code: 'TAR_BAD_CHECKSUM', message: 'Header checksum mismatch', offset: '0' }]);
});

test('entry names must be UTF-8', async () => {
  const bytes = await buildTar([{ name: 'a.txt', data: 'hello' }]);
  bytes[0] = 0xff;
  rewriteChecksum(bytes);
  await assert.rejects(TarReader.fromUint8Array(bytes).entries(), isArchiveError('ARCHIVE_INVALID_ENCODING'));
});

test('truncated entry data is reported', async () => {
  const bytes = await buildTar([{ name: 'a.txt', data: 'hello' }]);
  await assert.rejects(TarReader.fromUint8Array(bytes.subarray(0, 515)).entries(), isArchiveError('ARCHIVE_TRUNCATED'));
  await assert.rejects(TarReader.fromUint8Array(bytes.subarray(0, 300)).entries(), isArchiveError('ARCHIVE_TRUNCATED'));
});

test('empty input and a bare trailer hold no entries', async () => {
  assert.deepEqual(await TarReader.fromUint8Array(new Uint8Array(0)).entries(), []);
  assert.deepEqual(await TarReader.fromUint8Array(await buildTar([])).entries(), []);
});

test('input beyond the byte ceiling is refused', async () => {
  const bytes = await buildTar([{ name: 'a.txt', data: 'hello' }]);
  await assert.rejects(
    TarReader.fromUint8Array(bytes, { maxInputBytes: 100 }).entries(),
    isArchiveError('ARCHIVE_LIMIT_EXCEEDED')
  );
});

test('a reader iterates only once', async () => {
  const reader = TarReader.fromUint8Array(await buildTar([]));
  await reader.entries();
  await assert.rejects(reader.entries(), isArchiveError('ARCHIVE_STREAM_CONSUMED'));
});
