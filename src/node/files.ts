import { open } from 'node:fs/promises';

/** Fixed read buffer used for hashing and archiving file contents. */
const FILE_CHUNK_SIZE = 64 * 1024;

/** Yield a file's contents in chunks of at most FILE_CHUNK_SIZE bytes. */
export async function* readFileChunks(path: string): AsyncGenerator<Uint8Array> {
  const handle = await open(path, 'r');
  try {
    const buffer = new Uint8Array(FILE_CHUNK_SIZE);
    while (true) {
      const { bytesRead } = await handle.read(buffer, 0, buffer.length, null);
      if (bytesRead === 0) break;
      yield buffer.slice(0, bytesRead);
    }
  } finally {
    await handle.close();
  }
}

/** Feed every chunk of a file to `consume`, reusing one buffer. */
export async function forEachFileChunk(path: string, consume: (chunk: Uint8Array) => void): Promise<void> {
  const handle = await open(path, 'r');
  try {
    const buffer = new Uint8Array(FILE_CHUNK_SIZE);
    while (true) {
      const { bytesRead } = await handle.read(buffer, 0, buffer.length, null);
      if (bytesRead === 0) break;
      consume(buffer.subarray(0, bytesRead));
    }
  } finally {
    await handle.close();
  }
}

/** Create `path` exclusively and stream `data` into it; the handle is closed before returning. */
export async function writeNewFile(path: string, data: ReadableStream<Uint8Array>, mode: number): Promise<void> {
  const handle = await open(path, 'wx', mode);
  const reader = data.getReader();
  try {
    while (true) {
      const result = await reader.read();
      if (result.done) break;
      let offset = 0;
      while (offset < result.value.length) {
        const { bytesWritten } = await handle.write(result.value, offset, result.value.length - offset);
        offset += bytesWritten;
      }
    }
  } finally {
    reader.releaseLock();
    await handle.close();
  }
}
