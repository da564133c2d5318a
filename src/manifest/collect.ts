import { availableParallelism } from 'node:os';
import { ArchiveError } from '../archive/errors.js';
import { withIo } from '../errors.js';
import { EMPTY_SHA256, hashFile, hashLinkTarget } from './fingerprint.js';
import type { ManifestEntry, ManifestItem } from './types.js';

export type CollectManifestOptions = {
  /** Worker count; defaults to the machine's available parallelism. */
  concurrency?: number;
};

/**
 * Fingerprint every item with a bounded pool of workers, then sort by path.
 * Each worker touches only its own item, so output order is independent of
 * scheduling.
 */
export async function collectManifest(
  items: readonly ManifestItem[],
  options?: CollectManifestOptions
): Promise<ManifestEntry[]> {
  const concurrency = Math.max(1, Math.floor(options?.concurrency ?? availableParallelism()));
  const entries = await mapConcurrent(items, concurrency, toManifestEntry);
  return sortManifest(entries);
}

/** Sort by the UTF-8 bytes of each path. */
export function sortManifest(entries: readonly ManifestEntry[]): ManifestEntry[] {
  return [...entries].sort((a, b) => comparePaths(a.path, b.path));
}

export function comparePaths(a: string, b: string): number {
  return Buffer.compare(Buffer.from(a, 'utf8'), Buffer.from(b, 'utf8'));
}

async function toManifestEntry(item: ManifestItem): Promise<ManifestEntry> {
  return {
    path: item.relative,
    size: manifestSize(item.size, item.relative),
    sha256: await fingerprint(item),
    kind: item.kind,
    target: item.linkTarget ?? null,
    mtime: toUnixSeconds(item.mtime)
  };
}

async function fingerprint(item: ManifestItem): Promise<string> {
  switch (item.kind) {
    case 'File':
      return withIo('hash', item.absolute, () => hashFile(item.absolute));
    case 'Directory':
      return EMPTY_SHA256;
    case 'Symlink':
      return hashLinkTarget(item.linkTarget ?? '');
    default: {
      const exhaustive: never = item.kind;
      return exhaustive;
    }
  }
}

/** Manifest sizes are JSON numbers; refuse any that would lose precision. */
export function manifestSize(size: bigint, path: string): number {
  if (size > BigInt(Number.MAX_SAFE_INTEGER)) {
    throw new ArchiveError('ARCHIVE_LIMIT_EXCEEDED', `entry too large for a manifest: ${path} (${size} bytes)`, {
      entryName: path,
      context: { size: size.toString() }
    });
  }
  return Number(size);
}

export function toUnixSeconds(mtime: Date | undefined): number | null {
  if (!mtime) return null;
  const seconds = Math.floor(mtime.getTime() / 1000);
  return Number.isSafeInteger(seconds) && seconds >= 0 ? seconds : null;
}

async function mapConcurrent<T, R>(
  items: readonly T[],
  concurrency: number,
  fn: (item: T) => Promise<R>
): Promise<R[]> {
  const results = new Array<R>(items.length);
  let next = 0;
  const worker = async (): Promise<void> => {
    while (next < items.length) {
      const index = next;
      next += 1;
      const item = items[index];
      if (item === undefined) continue;
      results[index] = await fn(item);
    }
  };
  const workers = Array.from({ length: Math.min(concurrency, items.length) }, () => worker());
  await Promise.all(workers);
  return results;
}
