import { readFile, writeFile } from 'node:fs/promises';
import { z } from 'zod';
import { errnoCode, IoError, UserInputError, withIo } from '../errors.js';
import type { ManifestEntry } from './types.js';

const manifestEntrySchema = z.object({
  path: z.string(),
  size: z.number().int().nonnegative(),
  sha256: z.string().regex(/^[0-9a-f]{64}$/, 'expected a lowercase hex SHA-256 digest'),
  kind: z.enum(['File', 'Directory', 'Symlink']),
  target: z.string().nullable().default(null),
  mtime: z.number().int().nonnegative().nullable().default(null)
});

const manifestSchema = z.array(manifestEntrySchema);

/** Pretty JSON with keys in a fixed order and a trailing newline. */
export function serializeManifest(entries: readonly ManifestEntry[]): string {
  const ordered = entries.map((entry) => ({
    path: entry.path,
    size: entry.size,
    sha256: entry.sha256,
    kind: entry.kind,
    target: entry.target,
    mtime: entry.mtime
  }));
  return `${JSON.stringify(ordered, null, 2)}\n`;
}

/** Parse and validate manifest JSON; missing target/mtime read as null. */
export function parseManifest(text: string, source = 'manifest'): ManifestEntry[] {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new UserInputError('INPUT_INVALID_MANIFEST', `${source} is not valid JSON`, { path: source, cause: err });
  }
  const parsed = manifestSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? issue.path.join('.') : 'root';
    throw new UserInputError('INPUT_INVALID_MANIFEST', `${source} is not a valid manifest (${where}: ${issue?.message ?? 'invalid'})`, {
      path: source,
      cause: parsed.error
    });
  }
  return parsed.data;
}

export async function writeManifestJson(path: string, entries: readonly ManifestEntry[]): Promise<void> {
  await withIo('write manifest', path, () => writeFile(path, serializeManifest(entries), 'utf8'));
}

export async function readManifestJson(path: string): Promise<ManifestEntry[]> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (err) {
    if (errnoCode(err) === 'ENOENT') {
      throw new UserInputError('INPUT_NOT_FOUND', `manifest not found: ${path}`, { path, cause: err });
    }
    throw new IoError('IO_FAILED', 'read manifest', path, { cause: err });
  }
  return parseManifest(text, path);
}
