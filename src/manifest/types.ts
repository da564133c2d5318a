import type { EntryKind } from '../types.js';

/** Something to fingerprint: an entry as it exists on disk after create or extract. */
export type ManifestItem = {
  relative: string;
  absolute: string;
  kind: EntryKind;
  linkTarget?: string;
  size: bigint;
  mtime?: Date;
};

/** One record of a manifest file. Optional fields serialize as null. */
export type ManifestEntry = {
  path: string;
  size: number;
  sha256: string;
  kind: EntryKind;
  target: string | null;
  mtime: number | null;
};
