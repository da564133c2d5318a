import { lstat, readdir, readlink, realpath, stat } from 'node:fs/promises';
import { resolve } from 'node:path';
import { errnoCode, IoError, UserInputError, withIo } from '../errors.js';
import { isAbsolutePath, isWithinRoot, joinPath, parentPath, relativeToRoot } from '../policy/paths.js';
import type { SecurityPolicy } from '../policy/SecurityPolicy.js';
import type { UsageTracker } from '../policy/UsageTracker.js';
import type { EntryKind } from '../types.js';
import type { ExcludeMatcher } from './exclude.js';
import type { ArchiveEntry } from './types.js';

const NAME_DECODER = new TextDecoder('utf-8', { fatal: true });

export type WalkOptions = {
  /** Canonical base directory that file inputs must stay within. */
  base: string;
  inputs: readonly string[];
  excluded: ExcludeMatcher;
  policy: SecurityPolicy;
  usage: UsageTracker;
};

/** Resolve the base directory for inputs to its canonical form. */
export async function resolveBase(workDir?: string): Promise<string> {
  const requested = resolve(workDir ?? process.cwd());
  const base = await canonicalInput(requested);
  const info = await withIo('stat', base, () => stat(base));
  if (!info.isDirectory()) {
    throw new UserInputError('INPUT_INVALID_PATH', `base is not a directory: ${requested}`, { path: requested });
  }
  return base;
}

/**
 * Walk every input depth-first, parents before children and siblings in byte
 * order. A directory input contributes its contents relative to itself; a
 * file input keeps its path relative to the base. Every accepted entry has
 * passed path validation and quota accounting.
 */
export async function walkInputs(options: WalkOptions): Promise<ArchiveEntry[]> {
  const entries: ArchiveEntry[] = [];
  for (const input of options.inputs) {
    const absolute = await canonicalInput(resolve(options.base, input));
    const info = await withIo('stat', absolute, () => stat(absolute));
    if (info.isDirectory()) {
      await visit(options, entries, absolute, absolute, []);
      continue;
    }
    if (!isWithinRoot(absolute, options.base)) {
      throw new UserInputError('INPUT_ESCAPES_BASE', `input escapes base: ${input}`, {
        path: input,
        context: { base: options.base }
      });
    }
    await visit(options, entries, absolute, options.base, []);
  }
  return entries;
}

async function visit(
  options: WalkOptions,
  entries: ArchiveEntry[],
  absolute: string,
  root: string,
  ancestors: readonly string[]
): Promise<void> {
  const relative = relativeToRoot(absolute, root);
  if (relative.length > 0 && options.excluded(relative)) return;

  const { policy } = options;
  const follow = policy.flags.followSymlinks;
  const info = await withIo(follow ? 'stat' : 'lstat', absolute, () =>
    follow ? stat(absolute, { bigint: true }) : lstat(absolute, { bigint: true })
  );
  const kind = kindOf(info);
  if (!kind) return;

  let linkTarget: string | undefined;
  if (kind === 'Symlink') {
    linkTarget = await readLinkText(absolute);
    const resolved = isAbsolutePath(linkTarget) ? linkTarget : joinPath(parentPath(absolute), linkTarget);
    policy.enforceLinkPolicy(resolved, root, 'symlink');
  }

  if (relative.length > 0) {
    const validated = policy.normalizeAndValidate(relative, root);
    const size = kind === 'File' ? info.size : 0n;
    options.usage.observe(validated, size);
    entries.push({
      absolute,
      relative: validated.rel,
      kind,
      size,
      mtime: info.mtime,
      mode: Number(info.mode),
      ...(linkTarget !== undefined ? { linkTarget } : {})
    });
  }

  if (kind !== 'Directory') return;
  let chain = ancestors;
  if (follow) {
    const real = await withIo('realpath', absolute, () => realpath(absolute));
    if (ancestors.includes(real)) {
      throw new IoError('IO_LOOP_DETECTED', 'walk', absolute, {
        message: `symlink loop detected at ${absolute}`
      });
    }
    chain = [...ancestors, real];
  }
  for (const name of await readChildren(absolute)) {
    await visit(options, entries, joinPath(absolute, name), root, chain);
  }
}

function kindOf(info: { isFile(): boolean; isDirectory(): boolean; isSymbolicLink(): boolean }): EntryKind | undefined {
  if (info.isDirectory()) return 'Directory';
  if (info.isFile()) return 'File';
  if (info.isSymbolicLink()) return 'Symlink';
  // Sockets, devices and fifos are not archived.
  return undefined;
}

async function canonicalInput(path: string): Promise<string> {
  try {
    return await realpath(path);
  } catch (err) {
    if (errnoCode(err) === 'ENOENT') {
      throw new UserInputError('INPUT_NOT_FOUND', `input not found: ${path}`, { path, cause: err });
    }
    throw new IoError('IO_FAILED', 'realpath', path, { cause: err });
  }
}

/** Child names sorted by their raw bytes; names that are not UTF-8 are rejected. */
async function readChildren(directory: string): Promise<string[]> {
  const raw = await withIo('readdir', directory, () => readdir(directory, { encoding: 'buffer' }));
  raw.sort(Buffer.compare);
  return raw.map((name) => decodeName(name, joinPath(directory, name.toString('utf8'))));
}

async function readLinkText(path: string): Promise<string> {
  const raw = await withIo('readlink', path, () => readlink(path, { encoding: 'buffer' }));
  return decodeName(raw, path);
}

function decodeName(raw: Uint8Array, displayPath: string): string {
  try {
    return NAME_DECODER.decode(raw);
  } catch (err) {
    throw new UserInputError('INPUT_INVALID_PATH', `path is not valid UTF-8: ${displayPath}`, {
      path: displayPath,
      cause: err
    });
  }
}
