import { ArchiveError } from '../archive/errors.js';
import { readAllBytes } from '../streams/buffer.js';
import { readableFromAsyncIterable, readableFromBytes } from '../streams/web.js';
import type { TarEntryType, TarWriterAddOptions, TarWriterOptions } from './types.js';

const BLOCK_SIZE = 512;
const TEXT_ENCODER = new TextEncoder();

type TarSource = Uint8Array | ReadableStream<Uint8Array> | AsyncIterable<Uint8Array>;

/** Write TAR archives to a writable stream. */
export class TarWriter {
  private readonly writer: WritableStreamDefaultWriter<Uint8Array>;
  private readonly deterministic: boolean;
  private closed = false;
  private paxCounter = 0;

  private constructor(stream: WritableStream<Uint8Array>, options?: TarWriterOptions) {
    this.writer = stream.getWriter();
    this.deterministic = options?.isDeterministic ?? false;
  }

  /** Create a TAR writer that targets a WritableStream. */
  static toWritable(writable: WritableStream<Uint8Array>, options?: TarWriterOptions): TarWriter {
    return new TarWriter(writable, options);
  }

  /**
   * Add an entry. When `options.size` is given for a streamed source, the
   * stream must produce exactly that many bytes.
   */
  async add(name: string, source?: TarSource, options?: TarWriterAddOptions): Promise<void> {
    if (this.closed) throw new ArchiveError('ARCHIVE_WRITER_CLOSED', 'Writer is closed');
    if (name.includes('\u0000')) {
      throw new ArchiveError('ARCHIVE_BAD_HEADER', 'Entry name contains NUL byte', { entryName: name });
    }

    const type = options?.type ?? inferType(name);
    const normalizedName = type === 'directory' && !name.endsWith('/') ? `${name}/` : name;

    const resolved = await resolveSource(source, options?.size);
    const size = hasData(type) ? resolved.size : 0n;
    const mtime = resolveMtime(options?.mtime, this.deterministic);
    const mode = resolveMode(options?.mode, type, this.deterministic);
    const uid = resolveId(options?.uid, this.deterministic);
    const gid = resolveId(options?.gid, this.deterministic);
    const uname = this.deterministic ? '' : options?.uname ?? '';
    const gname = this.deterministic ? '' : options?.gname ?? '';

    const paxRecords: Record<string, string> = { ...(options?.pax ?? {}) };
    const nameForHeader = fitField(normalizedName, paxRecords, 'path');
    const linkForHeader = fitField(options?.linkName ?? '', paxRecords, 'linkpath');

    if (!Number.isInteger(mtime.getTime() / 1000)) {
      paxRecords.mtime = (mtime.getTime() / 1000).toString();
    }
    if (!fitsInOctal(size, 12)) {
      paxRecords.size = size.toString();
    }

    if (Object.keys(paxRecords).length > 0) {
      await this.writePaxHeader(paxRecords, mtime);
    }

    const header = createTarHeader({
      name: nameForHeader,
      mode,
      uid,
      gid,
      size,
      mtime,
      type,
      linkName: linkForHeader,
      uname,
      gname
    });
    await this.writeChunk(header);

    if (size > 0n && resolved.stream) {
      await this.pipeData(resolved.stream, size, name);
    }
    await this.writePadding(size);
  }

  /** Finalize and close the TAR archive. */
  async close(): Promise<void> {
    if (this.closed) return;
    await this.writeChunk(new Uint8Array(BLOCK_SIZE * 2));
    this.closed = true;
    await this.writer.close();
  }

  /** Abort the destination stream; the archive is left incomplete. */
  async abort(reason?: unknown): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.writer.abort(reason);
  }

  /** @internal */
  private async writePaxHeader(records: Record<string, string>, mtime: Date): Promise<void> {
    const data = encodePaxRecords(records);
    const name = `PaxHeader/${++this.paxCounter}`;
    const header = createTarHeader({
      name,
      mode: 0o644,
      uid: 0,
      gid: 0,
      size: BigInt(data.length),
      mtime,
      type: 'pax',
      linkName: '',
      uname: '',
      gname: ''
    });
    await this.writeChunk(header);
    await this.writeChunk(data);
    await this.writePadding(BigInt(data.length));
  }

  /** @internal */
  private async pipeData(stream: ReadableStream<Uint8Array>, expected: bigint, name: string): Promise<void> {
    const reader = stream.getReader();
    let written = 0n;
    try {
      while (true) {
        const result = await reader.read();
        if (result.done) break;
        const value = result.value;
        if (value.length === 0) continue;
        written += BigInt(value.length);
        if (written > expected) break;
        await this.writeChunk(value);
      }
    } finally {
      reader.releaseLock();
    }
    if (written !== expected) {
      throw new ArchiveError('ARCHIVE_SIZE_MISMATCH', `Entry data changed size while writing (expected ${expected} bytes)`, {
        entryName: name,
        context: { expected: expected.toString() }
      });
    }
  }

  /** @internal */
  private async writePadding(size: bigint): Promise<void> {
    const padding = Number((BigInt(BLOCK_SIZE) - (size % BigInt(BLOCK_SIZE))) % BigInt(BLOCK_SIZE));
    if (padding > 0) {
      await this.writeChunk(new Uint8Array(padding));
    }
  }

  /** @internal */
  private async writeChunk(chunk: Uint8Array): Promise<void> {
    await this.writer.write(chunk);
  }
}

function inferType(name: string): TarEntryType {
  return name.endsWith('/') ? 'directory' : 'file';
}

function hasData(type: TarEntryType): boolean {
  return type !== 'directory' && type !== 'symlink' && type !== 'link';
}

async function resolveSource(
  source: TarSource | undefined,
  sizeHint: bigint | undefined
): Promise<{ size: bigint; stream?: ReadableStream<Uint8Array> }> {
  if (!source) return { size: 0n };
  if (source instanceof Uint8Array) {
    return { size: BigInt(source.length), stream: readableFromBytes(source) };
  }
  const stream = source instanceof ReadableStream ? source : readableFromAsyncIterable(source);
  if (sizeHint !== undefined) return { size: sizeHint, stream };
  const data = await readAllBytes(stream);
  return { size: BigInt(data.length), stream: readableFromBytes(data) };
}

function resolveMtime(mtime: Date | undefined, deterministic: boolean): Date {
  if (deterministic) return new Date(0);
  return mtime ?? new Date();
}

function resolveMode(mode: number | undefined, type: TarEntryType, deterministic: boolean): number {
  if (type === 'directory') return deterministic || mode === undefined ? 0o755 : mode & 0o7777;
  if (type === 'symlink' || type === 'link') return 0o777;
  if (mode === undefined) return 0o644;
  if (!deterministic) return mode & 0o7777;
  // Deterministic headers keep only the executable bit.
  return (mode & 0o111) !== 0 ? 0o755 : 0o644;
}

function resolveId(id: number | undefined, deterministic: boolean): number {
  if (deterministic) return 0;
  return id ?? 0;
}

/** Fit a value into a 100-byte header field; longer values go to PAX. */
function fitField(value: string, pax: Record<string, string>, key: string): string {
  const encoded = TEXT_ENCODER.encode(value);
  if (encoded.length <= 100) return value;
  pax[key] = value;
  return truncateUtf8(value, 100);
}

function truncateUtf8(value: string, maxBytes: number): string {
  let out = '';
  let used = 0;
  for (const char of value) {
    const length = TEXT_ENCODER.encode(char).length;
    if (used + length > maxBytes) break;
    out += char;
    used += length;
  }
  return out;
}

function createTarHeader(options: {
  name: string;
  mode: number;
  uid: number;
  gid: number;
  size: bigint;
  mtime: Date;
  type: TarEntryType | 'pax';
  linkName: string;
  uname: string;
  gname: string;
}): Uint8Array {
  const header = new Uint8Array(BLOCK_SIZE);
  writeString(header, 0, 100, options.name);
  writeOctal(header, 100, 8, BigInt(options.mode));
  writeOctal(header, 108, 8, BigInt(options.uid));
  writeOctal(header, 116, 8, BigInt(options.gid));
  writeOctal(header, 124, 12, options.size);
  writeOctal(header, 136, 12, BigInt(Math.max(0, Math.floor(options.mtime.getTime() / 1000))));
  // checksum placeholder (spaces)
  for (let i = 148; i < 156; i += 1) header[i] = 0x20;
  header[156] = typeFlag(options.type);
  writeString(header, 157, 100, options.linkName);
  writeString(header, 257, 6, 'ustar');
  writeString(header, 263, 2, '00');
  writeString(header, 265, 32, options.uname);
  writeString(header, 297, 32, options.gname);

  writeChecksum(header, computeChecksum(header));
  return header;
}

function typeFlag(type: TarEntryType | 'pax'): number {
  switch (type) {
    case 'file':
    case 'unknown':
      return 0x30;
    case 'link':
      return 0x31;
    case 'symlink':
      return 0x32;
    case 'character':
      return 0x33;
    case 'block':
      return 0x34;
    case 'directory':
      return 0x35;
    case 'fifo':
      return 0x36;
    case 'contiguous':
      return 0x37;
    case 'sparse':
      return 0x53;
    case 'pax':
      return 0x78;
    default: {
      const exhaustive: never = type;
      return exhaustive;
    }
  }
}

function computeChecksum(header: Uint8Array): number {
  let sum = 0;
  for (const byte of header) {
    sum += byte;
  }
  return sum;
}

function writeString(buffer: Uint8Array, offset: number, length: number, value: string): void {
  const encoded = TEXT_ENCODER.encode(value);
  buffer.set(encoded.subarray(0, length), offset);
}

function writeOctal(buffer: Uint8Array, offset: number, length: number, value: bigint): void {
  if (!fitsInOctal(value, length)) {
    writeBase256(buffer, offset, length, value);
    return;
  }
  const text = value.toString(8).padStart(length - 1, '0');
  buffer.set(TEXT_ENCODER.encode(text), offset);
  buffer[offset + length - 1] = 0;
}

function writeChecksum(buffer: Uint8Array, value: number): void {
  const text = value.toString(8).padStart(6, '0');
  buffer.set(TEXT_ENCODER.encode(text), 148);
  buffer[154] = 0;
  buffer[155] = 0x20;
}

function fitsInOctal(value: bigint, length: number): boolean {
  const max = (1n << BigInt((length - 1) * 3)) - 1n;
  return value >= 0n && value <= max;
}

function writeBase256(buffer: Uint8Array, offset: number, length: number, value: bigint): void {
  let val = value;
  for (let i = offset + length - 1; i >= offset; i -= 1) {
    buffer[i] = Number(val & 0xffn);
    val >>= 8n;
  }
  buffer[offset] = (buffer[offset] ?? 0) | 0x80;
}

function encodePaxRecords(records: Record<string, string>): Uint8Array {
  let out = '';
  for (const [key, value] of Object.entries(records)) {
    const record = `${key}=${value}\n`;
    const recordBytes = TEXT_ENCODER.encode(record).length;
    let length = recordBytes + 2;
    while (true) {
      const total = `${length} `.length + recordBytes;
      if (total === length) {
        out += `${length} ${record}`;
        break;
      }
      length = total;
    }
  }
  return TEXT_ENCODER.encode(out);
}
