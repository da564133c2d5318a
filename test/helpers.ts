import { mkdir, mkdtemp, realpath, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import type { CliIo } from '../src/cli/io.js';
import { concatBytes } from '../src/streams/buffer.js';
import { TarWriter } from '../src/tar/TarWriter.js';
import type { TarEntryType } from '../src/tar/types.js';

const encoder = new TextEncoder();

/** Run `fn` in a fresh canonical temp directory that is removed afterwards. */
export async function withTempDir<T>(fn: (dir: string) => Promise<T>): Promise<T> {
  const dir = await realpath(await mkdtemp(join(tmpdir(), 'tarward-test-')));
  try {
    return await fn(dir);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}

/** Write text files under `root`, creating parent directories. */
export async function writeTree(root: string, files: Record<string, string>): Promise<void> {
  for (const [relative, content] of Object.entries(files)) {
    const path = join(root, relative);
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, content);
  }
}

export type RawTarEntry = {
  name: string;
  type?: TarEntryType;
  data?: string;
  linkName?: string;
  mode?: number;
};

/** Build tar bytes without any path checks, for feeding hostile archives to extraction. */
export async function buildTar(entries: readonly RawTarEntry[]): Promise<Uint8Array> {
  const chunks: Uint8Array[] = [];
  const sink = new WritableStream<Uint8Array>({
    write(chunk) {
      chunks.push(chunk.slice());
    }
  });
  const writer = TarWriter.toWritable(sink, { isDeterministic: true });
  for (const entry of entries) {
    await writer.add(entry.name, entry.data !== undefined ? encoder.encode(entry.data) : undefined, {
      ...(entry.type !== undefined ? { type: entry.type } : {}),
      ...(entry.linkName !== undefined ? { linkName: entry.linkName } : {}),
      ...(entry.mode !== undefined ? { mode: entry.mode } : {})
    });
  }
  await writer.close();
  return concatBytes(chunks);
}

/** CliIo that records output instead of printing it. */
export function captureIo(): CliIo & { out(): string; err(): string } {
  let out = '';
  let err = '';
  return {
    stdout: (text) => {
      out += text;
    },
    stderr: (text) => {
      err += text;
    },
    color: false,
    out: () => out,
    err: () => err
  };
}

export const SHA256_EMPTY = 'e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855';
export const SHA256_HELLO = '2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824';
