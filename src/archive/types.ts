import type { Compression } from '../compression/types.js';
import type { ManifestEntry } from '../manifest/types.js';
import type { TarIssue } from '../tar/types.js';
import type { EntryKind, ProgressCallback } from '../types.js';

/** A filesystem entry accepted for archiving. */
export type ArchiveEntry = {
  absolute: string;
  relative: string;
  kind: EntryKind;
  size: bigint;
  linkTarget?: string;
  mtime?: Date;
  mode?: number;
};

export type CreateOptions = {
  /** Archive file to write, relative to the process working directory. */
  archivePath: string;
  /** Files or directories to archive, relative to `workDir`. */
  inputs: readonly string[];
  /** Base directory for inputs; defaults to the process working directory. */
  workDir?: string;
  compression?: Compression;
  /** Glob patterns; a pattern without "/" matches any basename. */
  excludes?: readonly string[];
  /** Files holding one exclude pattern per line. Missing files are skipped. */
  excludeFrom?: readonly string[];
  /** Write the manifest JSON here after archiving. */
  manifestOut?: string;
  /** Validate and report entries without writing the archive. */
  printPlan?: boolean;
  onProgress?: ProgressCallback;
  /** Hashing workers for the manifest. */
  manifestConcurrency?: number;
};

export type CreateResult = {
  entries: ManifestEntry[];
  compression: Compression;
  /** False for a plan-only run. */
  written: boolean;
};

export type ExtractOptions = {
  archivePath: string;
  /** Destination root, created when missing; defaults to the process working directory. */
  destination?: string;
  /** Fail on header checksum mismatches instead of warning. */
  strict?: boolean;
  /** Manifest JSON the extracted tree must match. */
  manifest?: string;
  /** Tolerate extracted entries the manifest does not list. */
  manifestRelaxed?: boolean;
  /** Restore ownership from numeric ids only, ignoring user and group names. */
  numericOwner?: boolean;
  /** Never restore ownership, even when running as root. */
  noSameOwner?: boolean;
  onProgress?: ProgressCallback;
  manifestConcurrency?: number;
};

export type ExtractResult = {
  entries: ManifestEntry[];
  compression: Compression;
  warnings: TarIssue[];
};

export type ListOptions = {
  archivePath: string;
  strict?: boolean;
  onProgress?: ProgressCallback;
};

export type ListResult = {
  /** Entries in archive order, fingerprinted from archive data. */
  entries: ManifestEntry[];
  compression: Compression;
  warnings: TarIssue[];
};
