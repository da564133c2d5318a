import { readFile } from 'node:fs/promises';
import { errnoCode, IoError } from '../errors.js';

/** Name to id tables read from the system account files. */
export type AccountDatabase = {
  users: ReadonlyMap<string, number>;
  groups: ReadonlyMap<string, number>;
};

/** Ownership fields recorded in an archive header. */
export type RecordedOwner = {
  uid?: number | undefined;
  gid?: number | undefined;
  uname?: string | undefined;
  gname?: string | undefined;
};

export type ResolvedOwner = {
  uid: number;
  gid: number;
};

const PASSWD_PATH = '/etc/passwd';
const GROUP_PATH = '/etc/group';

/**
 * Parse colon-separated account records ("name:x:id:..."). Comment lines and
 * records without a numeric id are skipped; the first record for a name wins.
 */
export function parseAccountFile(text: string): Map<string, number> {
  const ids = new Map<string, number>();
  for (const line of text.split(/\r?\n/)) {
    if (line.length === 0 || line.startsWith('#')) continue;
    const [name, , idText] = line.split(':');
    if (!name || idText === undefined || !/^\d+$/.test(idText)) continue;
    if (!ids.has(name)) ids.set(name, Number(idText));
  }
  return ids;
}

/** Load the passwd and group tables; a missing file yields an empty table. */
export async function loadAccountDatabase(paths?: { passwd?: string; group?: string }): Promise<AccountDatabase> {
  const [users, groups] = await Promise.all([
    readAccountFile(paths?.passwd ?? PASSWD_PATH),
    readAccountFile(paths?.group ?? GROUP_PATH)
  ]);
  return { users, groups };
}

/**
 * Pick the ids to restore. Names win when the local system knows them,
 * unless `numericOwner` is set; otherwise the recorded numeric ids apply.
 * Returns undefined when the header carries no usable ids.
 */
export function resolveOwner(
  recorded: RecordedOwner,
  options: { numericOwner: boolean; accounts?: AccountDatabase | undefined }
): ResolvedOwner | undefined {
  const accounts = options.numericOwner ? undefined : options.accounts;
  const uid = lookup(accounts?.users, recorded.uname) ?? recorded.uid;
  const gid = lookup(accounts?.groups, recorded.gname) ?? recorded.gid;
  if (uid === undefined || gid === undefined) return undefined;
  return { uid, gid };
}

/** Ownership can only be changed by the superuser. */
export function canRestoreOwnership(): boolean {
  return typeof process.getuid === 'function' && process.getuid() === 0;
}

function lookup(table: ReadonlyMap<string, number> | undefined, name: string | undefined): number | undefined {
  if (!table || !name) return undefined;
  return table.get(name);
}

async function readAccountFile(path: string): Promise<Map<string, number>> {
  try {
    return parseAccountFile(await readFile(path, 'utf8'));
  } catch (err) {
    if (errnoCode(err) === 'ENOENT') return new Map();
    throw new IoError('IO_FAILED', 'read account file', path, { cause: err });
  }
}
