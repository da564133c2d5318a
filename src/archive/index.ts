export { createArchive } from './create.js';
export { extractArchive } from './extract.js';
export { listArchive } from './list.js';
export { classifyEntry } from './classify.js';
export { compileExcludes, loadExcludePatterns, parseExcludeFile } from './exclude.js';
export type { ExcludeMatcher } from './exclude.js';
export { canRestoreOwnership, loadAccountDatabase, parseAccountFile, resolveOwner } from './owner.js';
export type { AccountDatabase, RecordedOwner, ResolvedOwner } from './owner.js';
export { archiveReadCeiling } from './source.js';
export { ArchiveError } from './errors.js';
export type { ArchiveErrorCode } from './errors.js';
export type {
  ArchiveEntry,
  CreateOptions,
  CreateResult,
  ExtractOptions,
  ExtractResult,
  ListOptions,
  ListResult
} from './types.js';
