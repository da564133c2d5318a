import { wrapReader } from '../compression/index.js';
import { manifestSize, toUnixSeconds } from '../manifest/collect.js';
import { EMPTY_SHA256, hashLinkTarget, hashStream } from '../manifest/fingerprint.js';
import type { ManifestEntry } from '../manifest/types.js';
import { TarReader } from '../tar/TarReader.js';
import type { TarReadEntry } from '../tar/types.js';
import type { EntryKind } from '../types.js';
import { classifyEntry } from './classify.js';
import { openArchiveStream } from './source.js';
import type { ListOptions, ListResult } from './types.js';

/**
 * Describe every entry in archive order, hashing the data stored in the
 * archive. Nothing is written and entry names are reported as stored.
 */
export async function listArchive(options: ListOptions): Promise<ListResult> {
  const { codec, stream } = await wrapReader(await openArchiveStream(options.archivePath));
  const reader = TarReader.fromStream(stream, { isStrict: options.strict ?? false });
  const entries: ManifestEntry[] = [];
  for await (const entry of reader.iterEntries()) {
    const kind = classifyEntry(entry.type);
    const path = kind === 'Directory' ? entry.name.replace(/\/+$/, '') : entry.name;
    const target = kind === 'Symlink' ? entry.linkName ?? '' : undefined;
    options.onProgress?.({
      phase: 'list',
      path,
      kind,
      size: entry.size,
      ...(target !== undefined ? { target } : {}),
      ...(entry.pax ? { pax: entry.pax } : {})
    });
    entries.push({
      path,
      size: manifestSize(entry.size, path),
      sha256: await digestOf(entry, kind),
      kind,
      target: target ?? null,
      mtime: toUnixSeconds(entry.mtime)
    });
  }
  return { entries, compression: codec, warnings: reader.warnings() };
}

async function digestOf(entry: TarReadEntry, kind: EntryKind): Promise<string> {
  switch (kind) {
    case 'File':
      return (await hashStream(entry.open())).sha256;
    case 'Directory':
      return EMPTY_SHA256;
    case 'Symlink':
      return hashLinkTarget(entry.linkName ?? '');
    default: {
      const exhaustive: never = kind;
      return exhaustive;
    }
  }
}
