import { chmod, lchown, link, lstat, mkdir, realpath, symlink, unlink, utimes } from 'node:fs/promises';
import { resolve } from 'node:path';
import { wrapReader } from '../compression/index.js';
import { errnoCode, IoError, withIo } from '../errors.js';
import { collectManifest } from '../manifest/collect.js';
import { readManifestJson } from '../manifest/json.js';
import type { ManifestItem } from '../manifest/types.js';
import { verifyManifest } from '../manifest/verify.js';
import { writeNewFile } from '../node/files.js';
import { PolicyError } from '../policy/errors.js';
import { cleanPath, isAbsolutePath, isWithinRoot, joinPath, parentPath } from '../policy/paths.js';
import { SecurityPolicy } from '../policy/SecurityPolicy.js';
import type { ValidatedPath } from '../policy/types.js';
import { TarReader } from '../tar/TarReader.js';
import type { TarReadEntry } from '../tar/types.js';
import type { EntryKind } from '../types.js';
import { ArchiveError } from './errors.js';
import { classifyEntry } from './classify.js';
import { canRestoreOwnership, loadAccountDatabase, resolveOwner, type AccountDatabase } from './owner.js';
import { archiveReadCeiling, openArchiveStream } from './source.js';
import type { ExtractOptions, ExtractResult } from './types.js';

const DEFAULT_FILE_MODE = 0o644;

type ExtractContext = {
  root: string;
  policy: SecurityPolicy;
  options: ExtractOptions;
  restoreOwner: boolean;
  accounts?: AccountDatabase | undefined;
};

/**
 * Extract an archive into the destination root. Each entry is validated and
 * counted before anything is written for it; the first violation stops the
 * run, leaving earlier entries in place. When a manifest is given the
 * extracted tree is checked against it afterwards.
 */
export async function extractArchive(
  options: ExtractOptions,
  policy: SecurityPolicy = SecurityPolicy.create()
): Promise<ExtractResult> {
  const expected = options.manifest !== undefined ? await readManifestJson(options.manifest) : undefined;
  const root = await prepareDestination(options.destination ?? process.cwd());
  const restoreOwner = canRestoreOwnership() && !options.noSameOwner;
  const context: ExtractContext = {
    root,
    policy,
    options,
    restoreOwner,
    accounts: restoreOwner && !options.numericOwner ? await loadAccountDatabase() : undefined
  };

  const ceiling = archiveReadCeiling(policy.limits);
  const { codec, stream } = await wrapReader(await openArchiveStream(options.archivePath), { maxOutputBytes: ceiling });
  const reader = TarReader.fromStream(stream, { isStrict: options.strict ?? false, maxInputBytes: ceiling });
  const usage = policy.usage();
  const items: ManifestItem[] = [];

  for await (const entry of reader.iterEntries()) {
    const kind = classifyEntry(entry.type);
    const validated = policy.normalizeAndValidate(entry.name, root);
    usage.observe(validated, entry.size);
    options.onProgress?.({
      phase: 'extract',
      path: validated.rel,
      kind,
      size: entry.size,
      ...(entry.linkName !== undefined && kind === 'Symlink' ? { target: entry.linkName } : {})
    });
    const item = await materialize(context, entry, kind, validated);
    if (item && validated.rel.length > 0) items.push(item);
  }

  const entries = await collectManifest(
    items,
    options.manifestConcurrency !== undefined ? { concurrency: options.manifestConcurrency } : {}
  );
  if (expected) verifyManifest(expected, entries, options.manifestRelaxed ?? false);
  return { entries, compression: codec, warnings: reader.warnings() };
}

async function prepareDestination(destination: string): Promise<string> {
  const requested = resolve(destination);
  await withIo('mkdir', requested, () => mkdir(requested, { recursive: true }));
  return withIo('realpath', requested, () => realpath(requested));
}

async function materialize(
  context: ExtractContext,
  entry: TarReadEntry,
  kind: EntryKind,
  validated: ValidatedPath
): Promise<ManifestItem | undefined> {
  switch (kind) {
    case 'Directory':
      return extractDirectory(context, entry, validated);
    case 'Symlink':
      return extractSymlink(context, entry, validated);
    case 'File':
      return entry.type === 'link' ? extractHardlink(context, entry, validated) : extractFile(context, entry, validated);
    default: {
      const exhaustive: never = kind;
      return exhaustive;
    }
  }
}

async function extractDirectory(context: ExtractContext, entry: TarReadEntry, target: ValidatedPath): Promise<ManifestItem> {
  await assertContained(target.abs, context.root);
  await withIo('mkdir', target.abs, () => mkdir(target.abs, { recursive: true }));
  await restoreOwnership(context, entry, target.abs);
  return { relative: target.rel, absolute: target.abs, kind: 'Directory', size: entry.size, ...mtimeOf(entry) };
}

async function extractFile(context: ExtractContext, entry: TarReadEntry, target: ValidatedPath): Promise<ManifestItem> {
  await prepareParent(target.abs, context.root);
  await clearPath(target.abs);
  const mode = (entry.mode ?? DEFAULT_FILE_MODE) & 0o777;
  await withIo('write', target.abs, () => writeNewFile(target.abs, entry.open(), mode));
  // The process umask applies at creation; set the recorded bits explicitly.
  await withIo('chmod', target.abs, () => chmod(target.abs, mode));
  if (entry.mtime) {
    const mtime = entry.mtime;
    await withIo('utimes', target.abs, () => utimes(target.abs, mtime, mtime));
  }
  await restoreOwnership(context, entry, target.abs);
  return { relative: target.rel, absolute: target.abs, kind: 'File', size: entry.size, ...mtimeOf(entry) };
}

async function extractHardlink(context: ExtractContext, entry: TarReadEntry, target: ValidatedPath): Promise<ManifestItem> {
  const linkName = requireLinkName(entry);
  context.policy.enforceLinkPolicy(linkName, context.root, 'hardlink');
  // Hardlink targets name an earlier entry, so they resolve against the root.
  const existing = cleanPath(isAbsolutePath(linkName) ? linkName : joinPath(context.root, linkName));
  // link(2) does not follow a final symlink, so only the source's directory needs resolving.
  await assertContained(parentPath(existing), context.root, (resolved) =>
    new PolicyError('POLICY_LINK_OUTSIDE_ROOT', `link target escapes root: ${linkName}`, {
      path: linkName,
      context: { linkKind: 'hardlink', resolved }
    })
  );
  await prepareParent(target.abs, context.root);
  await clearPath(target.abs);
  await withIo('link', target.abs, () => link(existing, target.abs));
  const info = await withIo('lstat', target.abs, () => lstat(target.abs, { bigint: true }));
  return { relative: target.rel, absolute: target.abs, kind: 'File', size: info.size, ...mtimeOf(entry) };
}

async function extractSymlink(context: ExtractContext, entry: TarReadEntry, target: ValidatedPath): Promise<ManifestItem> {
  const linkName = requireLinkName(entry);
  const resolved = isAbsolutePath(linkName) ? linkName : joinPath(parentPath(target.abs), linkName);
  context.policy.enforceLinkPolicy(resolved, context.root, 'symlink');
  await prepareParent(target.abs, context.root);
  await clearPath(target.abs);
  await withIo('symlink', target.abs, () => symlink(linkName, target.abs));
  await restoreOwnership(context, entry, target.abs);
  return {
    relative: target.rel,
    absolute: target.abs,
    kind: 'Symlink',
    linkTarget: linkName,
    size: entry.size,
    ...mtimeOf(entry)
  };
}

function requireLinkName(entry: TarReadEntry): string {
  if (!entry.linkName) {
    throw new ArchiveError('ARCHIVE_BAD_HEADER', `link entry has no target: ${entry.name}`, { entryName: entry.name });
  }
  return entry.linkName;
}

function mtimeOf(entry: TarReadEntry): { mtime?: Date } {
  return entry.mtime ? { mtime: entry.mtime } : {};
}

async function prepareParent(path: string, root: string): Promise<void> {
  const parent = parentPath(path);
  await assertContained(parent, root);
  await withIo('mkdir', parent, () => mkdir(parent, { recursive: true }));
}

/**
 * Path checks are lexical; links created by earlier entries could still route
 * a write elsewhere. Resolve the deepest existing ancestor and require it to
 * stay under the root.
 */
async function assertContained(
  path: string,
  root: string,
  escaped: (resolved: string) => PolicyError = (resolved) =>
    new PolicyError('POLICY_ROOT_ESCAPE', `path resolves outside root: ${path}`, { path, context: { resolved } })
): Promise<void> {
  let current = path;
  while (current !== root && isWithinRoot(current, root)) {
    let resolved: string | undefined;
    try {
      resolved = await realpath(current);
    } catch (err) {
      if (errnoCode(err) !== 'ENOENT') throw new IoError('IO_FAILED', 'realpath', current, { cause: err });
    }
    if (resolved !== undefined) {
      if (!isWithinRoot(resolved, root)) throw escaped(resolved);
      return;
    }
    current = parentPath(current);
  }
}

/** Remove a non-directory already at `path`; directories are left for the caller to trip over. */
async function clearPath(path: string): Promise<void> {
  let isDirectory: boolean;
  try {
    isDirectory = (await lstat(path)).isDirectory();
  } catch (err) {
    if (errnoCode(err) === 'ENOENT') return;
    throw new IoError('IO_FAILED', 'lstat', path, { cause: err });
  }
  if (!isDirectory) await withIo('unlink', path, () => unlink(path));
}

async function restoreOwnership(context: ExtractContext, entry: TarReadEntry, path: string): Promise<void> {
  if (!context.restoreOwner) return;
  const owner = resolveOwner(entry, { numericOwner: context.options.numericOwner ?? false, accounts: context.accounts });
  if (!owner) return;
  await withIo('chown', path, () => lchown(path, owner.uid, owner.gid));
}
