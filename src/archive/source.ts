import { open, type FileHandle } from 'node:fs/promises';
import { Readable } from 'node:stream';
import { errnoCode, IoError, UserInputError } from '../errors.js';
import type { PolicyLimits } from '../limits.js';

const BLOCK_SIZE = 512n;
/** Header, PAX header, PAX records and data padding allowed per entry. */
const ENTRY_OVERHEAD = 4n * BLOCK_SIZE;
/** End-of-archive blocks plus record padding. */
const TRAILER_ALLOWANCE = 20n * BLOCK_SIZE;

/** Open an archive file as a byte stream; a missing file is a caller error. */
export async function openArchiveStream(path: string): Promise<ReadableStream<Uint8Array>> {
  let handle: FileHandle;
  try {
    handle = await open(path, 'r');
  } catch (err) {
    if (errnoCode(err) === 'ENOENT') {
      throw new UserInputError('INPUT_NOT_FOUND', `archive not found: ${path}`, { path, cause: err });
    }
    throw new IoError('IO_FAILED', 'open archive', path, { cause: err });
  }
  return Readable.toWeb(handle.createReadStream());
}

/**
 * Most decompressed bytes an archive within `limits` can occupy. Reading
 * stops beyond this, before entry accounting would notice.
 */
export function archiveReadCeiling(limits: Readonly<PolicyLimits>): bigint {
  return limits.maxTotalBytes + BigInt(limits.maxFiles) * ENTRY_OVERHEAD + TRAILER_ALLOWANCE;
}
