import { ArchiveError } from '../archive/errors.js';

/**
 * Pull-based byte queue over a web stream. Hands out exact-length reads
 * for headers and bounded chunks for entry bodies.
 */
export class ByteSource {
  private readonly reader: ReadableStreamDefaultReader<Uint8Array>;
  private readonly chunks: Uint8Array[] = [];
  private buffered = 0;
  private ended = false;
  private failed = false;
  private pulled = 0n;

  constructor(
    stream: ReadableStream<Uint8Array>,
    private readonly maxBytes?: bigint
  ) {
    this.reader = stream.getReader();
  }

  /** Bytes handed out so far. */
  get position(): bigint {
    return this.pulled - BigInt(this.buffered);
  }

  /** Buffer at least `length` bytes; false when the stream ends first. */
  async ensure(length: number): Promise<boolean> {
    while (this.buffered < length && !this.ended) {
      const result = await this.pull();
      if (result.done) {
        this.ended = true;
        break;
      }
      const value = result.value;
      if (value.length === 0) continue;
      this.pulled += BigInt(value.length);
      if (this.maxBytes !== undefined && this.pulled > this.maxBytes) {
        throw new ArchiveError('ARCHIVE_LIMIT_EXCEEDED', `TAR stream exceeds ${this.maxBytes} bytes`);
      }
      this.chunks.push(value);
      this.buffered += value.length;
    }
    return this.buffered >= length;
  }

  /** Read `length` bytes, or fewer if the stream ends. */
  async read(length: number): Promise<Uint8Array> {
    await this.ensure(length);
    return this.take(Math.min(length, this.buffered));
  }

  /** Next run of at most `max` bytes; empty once the stream has ended. */
  async readChunk(max: number): Promise<Uint8Array> {
    if (this.buffered === 0) await this.ensure(1);
    const head = this.chunks[0];
    if (!head) return new Uint8Array(0);
    return this.take(Math.min(max, head.length));
  }

  /** Discard up to `length` bytes and return how many were skipped. */
  async skip(length: bigint): Promise<bigint> {
    let remaining = length;
    while (remaining > 0n) {
      const chunk = await this.readChunk(remaining > SKIP_CHUNK ? Number(SKIP_CHUNK) : Number(remaining));
      if (chunk.length === 0) break;
      remaining -= BigInt(chunk.length);
    }
    return length - remaining;
  }

  /** Stop reading; cancels the underlying stream unless it already finished or failed. */
  async cancel(reason?: unknown): Promise<void> {
    const settled = this.ended || this.failed;
    this.chunks.length = 0;
    this.buffered = 0;
    this.ended = true;
    if (settled) {
      this.reader.releaseLock();
      return;
    }
    await this.reader.cancel(reason);
  }

  /** @internal */
  private async pull() {
    try {
      return await this.reader.read();
    } catch (err) {
      this.failed = true;
      throw err;
    }
  }

  /** @internal */
  private take(length: number): Uint8Array {
    const head = this.chunks[0];
    if (length === 0 || !head) return new Uint8Array(0);
    if (head.length >= length) {
      if (head.length === length) {
        this.chunks.shift();
      } else {
        this.chunks[0] = head.subarray(length);
      }
      this.buffered -= length;
      return head.subarray(0, length);
    }
    const out = new Uint8Array(length);
    let filled = 0;
    while (filled < length) {
      const chunk = this.chunks[0];
      if (!chunk) break;
      const count = Math.min(chunk.length, length - filled);
      out.set(chunk.subarray(0, count), filled);
      filled += count;
      if (count === chunk.length) {
        this.chunks.shift();
      } else {
        this.chunks[0] = chunk.subarray(count);
      }
    }
    this.buffered -= filled;
    return filled === length ? out : out.subarray(0, filled);
  }
}

const SKIP_CHUNK = 1n << 20n;
