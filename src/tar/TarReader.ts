import { ArchiveError } from '../archive/errors.js';
import { ByteSource } from '../streams/byteSource.js';
import { readableFromBytes } from '../streams/web.js';
import type { TarEntry, TarEntryType, TarIssue, TarReadEntry, TarReaderOptions } from './types.js';

const BLOCK_SIZE = 512;
const BLOCK = BigInt(BLOCK_SIZE);
const DATA_CHUNK = 64 * 1024;
const MAX_METADATA_BYTES = 1024 * 1024;

const TEXT_DECODER = new TextDecoder('utf-8');
const STRICT_DECODER = new TextDecoder('utf-8', { fatal: true });

type HeaderFields = {
  name: string;
  mode: bigint | undefined;
  uid: bigint | undefined;
  gid: bigint | undefined;
  size: bigint;
  mtime: bigint | undefined;
  typeflag: string;
  linkName: string;
  uname: string;
  gname: string;
};

/**
 * Read TAR archives one entry at a time from a stream. Entries are parsed
 * lazily, so format errors surface in stream order; an entry's body must be
 * read before the iterator advances, after which it is skipped.
 */
export class TarReader {
  private readonly strict: boolean;
  private readonly warningsList: TarIssue[] = [];
  private started = false;

  private constructor(
    private readonly source: ByteSource,
    options?: TarReaderOptions
  ) {
    this.strict = options?.isStrict ?? true;
  }

  /** Create a reader from a readable stream. */
  static fromStream(stream: ReadableStream<Uint8Array>, options?: TarReaderOptions): TarReader {
    const maxBytes = options?.maxInputBytes !== undefined ? BigInt(options.maxInputBytes) : undefined;
    return new TarReader(new ByteSource(stream, maxBytes), options);
  }

  /** Create a reader from in-memory bytes. */
  static fromUint8Array(data: Uint8Array, options?: TarReaderOptions): TarReader {
    return TarReader.fromStream(readableFromBytes(data), options);
  }

  /** Return non-fatal warnings encountered so far. */
  warnings(): TarIssue[] {
    return [...this.warningsList];
  }

  /** Iterate entries in stream order. The underlying stream is cancelled when iteration stops. */
  async *iterEntries(): AsyncGenerator<TarReadEntry> {
    if (this.started) {
      throw new ArchiveError('ARCHIVE_STREAM_CONSUMED', 'TAR stream can only be iterated once');
    }
    this.started = true;

    let globalPax: Record<string, string> | null = null;
    let pendingPax: Record<string, string> | null = null;
    let longName: string | null = null;
    let longLink: string | null = null;

    try {
      while (true) {
        const offset = this.source.position;
        const header = await this.source.read(BLOCK_SIZE);
        if (header.length === 0 || isZeroBlock(header)) break;
        if (header.length < BLOCK_SIZE) {
          throw new ArchiveError('ARCHIVE_TRUNCATED', 'TAR header truncated', { offset });
        }
        this.verifyChecksum(header, offset);

        const fields = parseHeader(header, offset);
        const padding = paddingFor(fields.size);

        if (fields.typeflag === 'x' || fields.typeflag === 'g') {
          const records = parsePaxRecords(await this.readMetadata(fields.size, offset), offset);
          await this.skipExact(padding, offset);
          if (fields.typeflag === 'g') {
            globalPax = { ...(globalPax ?? {}), ...records };
          } else {
            pendingPax = { ...(pendingPax ?? {}), ...records };
          }
          continue;
        }
        if (fields.typeflag === 'L' || fields.typeflag === 'K') {
          const value = decodeText(trimNul(await this.readMetadata(fields.size, offset)), 'GNU long name', offset);
          await this.skipExact(padding, offset);
          if (fields.typeflag === 'L') longName = value;
          else longLink = value;
          continue;
        }

        const pax = pendingPax || globalPax ? { ...(globalPax ?? {}), ...(pendingPax ?? {}) } : undefined;
        pendingPax = null;

        const name = pax?.path ?? longName ?? fields.name;
        const linkName = pax?.linkpath ?? longLink ?? fields.linkName;
        longName = null;
        longLink = null;

        const size = pax?.size !== undefined ? parsePaxSize(pax.size, offset) : fields.size;
        const entryType = typeFromFlag(fields.typeflag);
        if (entryType === 'unknown') {
          this.warningsList.push({
            code: 'TAR_UNKNOWN_TYPE',
            message: `Unknown type flag ${JSON.stringify(fields.typeflag)}`,
            offset: offset.toString(),
            entryName: name
          });
        }
        const mtime = pax?.mtime !== undefined ? parseMtime(pax.mtime) : fields.mtime !== undefined ? new Date(Number(fields.mtime) * 1000) : undefined;
        const uid = pax?.uid !== undefined ? parseOptionalInteger(pax.uid) : toNumber(fields.uid);
        const gid = pax?.gid !== undefined ? parseOptionalInteger(pax.gid) : toNumber(fields.gid);
        const uname = pax?.uname ?? fields.uname;
        const gname = pax?.gname ?? fields.gname;

        const entry: TarEntry = {
          name,
          size,
          type: entryType,
          isDirectory: entryType === 'directory',
          isSymlink: entryType === 'symlink',
          ...(pax ? { pax } : {})
        };
        if (mtime) entry.mtime = mtime;
        if (fields.mode !== undefined) entry.mode = Number(fields.mode);
        if (uid !== undefined) entry.uid = uid;
        if (gid !== undefined) entry.gid = gid;
        if (uname) entry.uname = uname;
        if (gname) entry.gname = gname;
        if (linkName) entry.linkName = linkName;

        const body = new EntryBody(this.source, size, name, offset);
        yield { ...entry, open: () => body.open() };
        await body.drain();
        await this.skipExact(paddingFor(size), offset);
      }
    } finally {
      await this.source.cancel();
    }
  }

  /** Read every entry's metadata, discarding bodies. */
  async entries(): Promise<TarEntry[]> {
    const out: TarEntry[] = [];
    for await (const item of this.iterEntries()) {
      const { open: _open, ...entry } = item;
      out.push(entry);
    }
    return out;
  }

  /** @internal */
  private verifyChecksum(header: Uint8Array, offset: bigint): void {
    const stored = parseOctal(header.subarray(148, 156));
    const { unsigned, signed } = computeChecksums(header);
    if (stored !== undefined && (Number(stored) === unsigned || Number(stored) === signed)) return;
    const message = 'Header checksum mismatch';
    if (this.strict) {
      throw new ArchiveError('ARCHIVE_BAD_HEADER', message, { offset });
    }
    this.warningsList.push({ code: 'TAR_BAD_CHECKSUM', message, offset: offset.toString() });
  }

  /** @internal */
  private async readMetadata(size: bigint, offset: bigint): Promise<Uint8Array> {
    if (size > BigInt(MAX_METADATA_BYTES)) {
      throw new ArchiveError('ARCHIVE_LIMIT_EXCEEDED', 'TAR extended header exceeds 1 MiB', { offset });
    }
    const length = Number(size);
    const data = await this.source.read(length);
    if (data.length < length) {
      throw new ArchiveError('ARCHIVE_TRUNCATED', 'TAR extended header truncated', { offset });
    }
    return data;
  }

  /** @internal */
  private async skipExact(length: bigint, offset: bigint): Promise<void> {
    const skipped = await this.source.skip(length);
    if (skipped < length) {
      throw new ArchiveError('ARCHIVE_TRUNCATED', 'TAR entry truncated', { offset });
    }
  }
}

class EntryBody {
  private remaining: bigint;
  private opened = false;
  private detached = false;

  constructor(
    private readonly source: ByteSource,
    size: bigint,
    private readonly entryName: string,
    private readonly offset: bigint
  ) {
    this.remaining = size;
  }

  open(): ReadableStream<Uint8Array> {
    if (this.opened || this.detached) {
      throw new ArchiveError('ARCHIVE_STREAM_CONSUMED', 'Entry data is no longer readable', { entryName: this.entryName });
    }
    this.opened = true;
    return new ReadableStream<Uint8Array>({
      pull: async (controller) => {
        if (this.detached) {
          controller.error(new ArchiveError('ARCHIVE_STREAM_CONSUMED', 'Entry data is no longer readable', { entryName: this.entryName }));
          return;
        }
        if (this.remaining === 0n) {
          controller.close();
          return;
        }
        const want = this.remaining > BigInt(DATA_CHUNK) ? DATA_CHUNK : Number(this.remaining);
        const chunk = await this.source.readChunk(want);
        if (chunk.length === 0) {
          controller.error(this.truncated());
          return;
        }
        this.remaining -= BigInt(chunk.length);
        controller.enqueue(chunk);
      }
    });
  }

  async drain(): Promise<void> {
    this.detached = true;
    if (this.remaining === 0n) return;
    const skipped = await this.source.skip(this.remaining);
    const short = skipped < this.remaining;
    this.remaining = 0n;
    if (short) throw this.truncated();
  }

  private truncated(): ArchiveError {
    return new ArchiveError('ARCHIVE_TRUNCATED', 'TAR entry data truncated', { entryName: this.entryName, offset: this.offset });
  }
}

function parseHeader(header: Uint8Array, offset: bigint): HeaderFields {
  const size = parseNumeric(header.subarray(124, 136));
  if (size === undefined) {
    throw new ArchiveError('ARCHIVE_BAD_HEADER', 'Header size field is not a number', { offset });
  }
  const flagByte = header[156] ?? 0;
  const typeflag = flagByte === 0 ? '0' : String.fromCharCode(flagByte);
  const name = decodeText(fieldBytes(header, 0, 100), 'entry name', offset);
  const posixUstar = TEXT_DECODER.decode(header.subarray(257, 263)) === 'ustar\u0000';
  const prefix = posixUstar ? decodeText(fieldBytes(header, 345, 155), 'entry name prefix', offset) : '';
  return {
    name: prefix ? `${prefix}/${name}` : name,
    mode: parseNumeric(header.subarray(100, 108)),
    uid: parseNumeric(header.subarray(108, 116)),
    gid: parseNumeric(header.subarray(116, 124)),
    size,
    mtime: parseNumeric(header.subarray(136, 148)),
    typeflag,
    linkName: decodeText(fieldBytes(header, 157, 100), 'link name', offset),
    uname: TEXT_DECODER.decode(fieldBytes(header, 265, 32)),
    gname: TEXT_DECODER.decode(fieldBytes(header, 297, 32))
  };
}

function fieldBytes(buffer: Uint8Array, start: number, length: number): Uint8Array {
  return trimNul(buffer.subarray(start, start + length));
}

function trimNul(buffer: Uint8Array): Uint8Array {
  const end = buffer.indexOf(0);
  return end === -1 ? buffer : buffer.subarray(0, end);
}

function decodeText(bytes: Uint8Array, field: string, offset: bigint): string {
  try {
    return STRICT_DECODER.decode(bytes);
  } catch (err) {
    throw new ArchiveError('ARCHIVE_INVALID_ENCODING', `TAR ${field} is not valid UTF-8`, { offset, cause: err });
  }
}

function parseNumeric(buffer: Uint8Array): bigint | undefined {
  if (buffer.length === 0) return undefined;
  const first = buffer[0] ?? 0;
  if ((first & 0x80) !== 0) {
    return parseBase256(buffer);
  }
  return parseOctal(buffer);
}

function parseOctal(buffer: Uint8Array): bigint | undefined {
  const text = TEXT_DECODER.decode(trimNul(buffer)).trim();
  if (!text || !/^[0-7]+$/.test(text)) return undefined;
  return BigInt(`0o${text}`);
}

function parseBase256(buffer: Uint8Array): bigint | undefined {
  let result = 0n;
  for (const byte of buffer) {
    result = (result << 8n) | BigInt(byte & 0xff);
  }
  // Clear the marker bit.
  const bits = BigInt(buffer.length * 8 - 1);
  const mask = (1n << bits) - 1n;
  return result & mask;
}

function toNumber(value: bigint | undefined): number | undefined {
  if (value === undefined || value > BigInt(Number.MAX_SAFE_INTEGER)) return undefined;
  return Number(value);
}

function parseOptionalInteger(value: string): number | undefined {
  const parsed = Number(value.trim());
  return Number.isSafeInteger(parsed) && parsed >= 0 ? parsed : undefined;
}

function parseMtime(value: string): Date | undefined {
  const num = Number(value);
  if (!Number.isFinite(num)) return undefined;
  return new Date(num * 1000);
}

function parsePaxSize(value: string, offset: bigint): bigint {
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) {
    throw new ArchiveError('ARCHIVE_BAD_HEADER', `PAX size is not a number: ${value}`, { offset });
  }
  return BigInt(trimmed);
}

function paddingFor(size: bigint): bigint {
  return (BLOCK - (size % BLOCK)) % BLOCK;
}

function computeChecksums(header: Uint8Array): { unsigned: number; signed: number } {
  let unsigned = 0;
  let signed = 0;
  for (let i = 0; i < header.length; i += 1) {
    const byte = i >= 148 && i < 156 ? 0x20 : header[i] ?? 0;
    unsigned += byte;
    signed += byte > 127 ? byte - 256 : byte;
  }
  return { unsigned, signed };
}

function isZeroBlock(block: Uint8Array): boolean {
  for (let i = 0; i < block.length; i += 1) {
    if (block[i] !== 0) return false;
  }
  return true;
}

function typeFromFlag(flag: string): TarEntryType {
  switch (flag) {
    case '0':
      return 'file';
    case '1':
      return 'link';
    case '2':
      return 'symlink';
    case '3':
      return 'character';
    case '4':
      return 'block';
    case '5':
      return 'directory';
    case '6':
      return 'fifo';
    case '7':
      return 'contiguous';
    case 'S':
      return 'sparse';
    default:
      return 'unknown';
  }
}

function parsePaxRecords(buffer: Uint8Array, offset: bigint): Record<string, string> {
  const out: Record<string, string> = {};
  let cursor = 0;
  while (cursor < buffer.length) {
    const spaceIndex = buffer.indexOf(0x20, cursor);
    if (spaceIndex === -1) break;
    const length = parseInt(TEXT_DECODER.decode(buffer.subarray(cursor, spaceIndex)), 10);
    if (!Number.isFinite(length) || length <= 0 || cursor + length > buffer.length) {
      throw new ArchiveError('ARCHIVE_BAD_HEADER', 'Malformed PAX record', { offset });
    }
    const record = decodeText(buffer.subarray(spaceIndex + 1, cursor + length), 'PAX record', offset);
    const eqIndex = record.indexOf('=');
    if (eqIndex > 0) {
      const key = record.slice(0, eqIndex);
      out[key] = record.slice(eqIndex + 1).replace(/\n$/, '');
    }
    cursor += length;
  }
  return out;
}
