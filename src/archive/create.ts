import { open } from 'node:fs/promises';
import { Writable } from 'node:stream';
import { wrapWriter } from '../compression/index.js';
import { IoError, UserInputError, withIo } from '../errors.js';
import { collectManifest } from '../manifest/collect.js';
import { writeManifestJson } from '../manifest/json.js';
import type { ManifestItem } from '../manifest/types.js';
import { readFileChunks } from '../node/files.js';
import { SecurityPolicy } from '../policy/SecurityPolicy.js';
import { TarWriter } from '../tar/TarWriter.js';
import type { ProgressCallback } from '../types.js';
import { ArchiveError } from './errors.js';
import { compileExcludes, loadExcludePatterns } from './exclude.js';
import type { ArchiveEntry, CreateOptions, CreateResult } from './types.js';
import { resolveBase, walkInputs } from './walk.js';

/**
 * Archive the inputs under the policy. Every entry is validated and counted
 * before the first byte is written, so a rejected tree leaves no archive
 * content behind. Headers are deterministic; the returned manifest is
 * computed from the source tree.
 */
export async function createArchive(
  options: CreateOptions,
  policy: SecurityPolicy = SecurityPolicy.create()
): Promise<CreateResult> {
  if (options.inputs.length === 0) {
    throw new UserInputError('INPUT_INVALID_OPTION', 'no inputs to archive');
  }
  const compression = options.compression ?? 'none';
  const base = await resolveBase(options.workDir);
  const patterns = [...(options.excludes ?? []), ...(await loadExcludePatterns(options.excludeFrom ?? []))];
  const entries = await walkInputs({
    base,
    inputs: options.inputs,
    excluded: compileExcludes(patterns),
    policy,
    usage: policy.usage()
  });
  const collectOptions = options.manifestConcurrency !== undefined ? { concurrency: options.manifestConcurrency } : {};

  if (options.printPlan) {
    for (const entry of entries) emitProgress(options.onProgress, 'plan', entry);
    return { entries: await collectManifest(entries.map(toManifestItem), collectOptions), compression, written: false };
  }

  await writeArchive(options.archivePath, entries, compression, options.onProgress);
  const manifest = await collectManifest(entries.map(toManifestItem), collectOptions);
  if (options.manifestOut !== undefined) {
    await writeManifestJson(options.manifestOut, manifest);
  }
  return { entries: manifest, compression, written: true };
}

async function writeArchive(
  path: string,
  entries: readonly ArchiveEntry[],
  compression: CreateResult['compression'],
  onProgress: ProgressCallback | undefined
): Promise<void> {
  const handle = await withIo('create archive', path, () => open(path, 'w'));
  const compressor = wrapWriter(compression);
  const piping = compressor.readable.pipeTo(Writable.toWeb(handle.createWriteStream()));
  const writer = TarWriter.toWritable(compressor.writable, { isDeterministic: true });

  const producing = (async () => {
    try {
      for (const entry of entries) {
        emitProgress(onProgress, 'add', entry);
        await addEntry(writer, entry);
      }
      await writer.close();
    } catch (err) {
      await writer.abort(err);
      throw err;
    }
  })();

  try {
    await Promise.all([producing, piping]);
  } catch (err) {
    if (err instanceof ArchiveError || err instanceof IoError) throw err;
    throw new IoError('IO_FAILED', 'write archive', path, { cause: err });
  }
}

async function addEntry(writer: TarWriter, entry: ArchiveEntry): Promise<void> {
  try {
    switch (entry.kind) {
      case 'Directory':
        await writer.add(entry.relative, undefined, { type: 'directory' });
        return;
      case 'Symlink':
        await writer.add(entry.relative, undefined, { type: 'symlink', linkName: entry.linkTarget ?? '' });
        return;
      case 'File':
        await writer.add(entry.relative, readFileChunks(entry.absolute), {
          type: 'file',
          size: entry.size,
          ...(entry.mode !== undefined ? { mode: entry.mode } : {})
        });
        return;
      default: {
        const exhaustive: never = entry.kind;
        return exhaustive;
      }
    }
  } catch (err) {
    if (err instanceof ArchiveError) throw err;
    throw new IoError('IO_FAILED', 'archive', entry.absolute, { cause: err });
  }
}

function emitProgress(onProgress: ProgressCallback | undefined, phase: 'plan' | 'add', entry: ArchiveEntry): void {
  onProgress?.({
    phase,
    path: entry.relative,
    kind: entry.kind,
    size: entry.size,
    ...(entry.linkTarget !== undefined ? { target: entry.linkTarget } : {})
  });
}

function toManifestItem(entry: ArchiveEntry): ManifestItem {
  return {
    relative: entry.relative,
    absolute: entry.absolute,
    kind: entry.kind,
    size: entry.size,
    ...(entry.linkTarget !== undefined ? { linkTarget: entry.linkTarget } : {}),
    ...(entry.mtime !== undefined ? { mtime: entry.mtime } : {})
  };
}
