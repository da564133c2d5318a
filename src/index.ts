export {
  createArchive,
  extractArchive,
  listArchive,
  classifyEntry,
  compileExcludes,
  loadExcludePatterns,
  parseExcludeFile,
  loadAccountDatabase,
  parseAccountFile,
  resolveOwner,
  archiveReadCeiling,
  ArchiveError
} from './archive/index.js';
export type {
  AccountDatabase,
  ArchiveEntry,
  ArchiveErrorCode,
  CreateOptions,
  CreateResult,
  ExcludeMatcher,
  ExtractOptions,
  ExtractResult,
  ListOptions,
  ListResult
} from './archive/index.js';

export { SecurityPolicy, UsageTracker, PolicyError, cleanPath, isWithinRoot, relativeToRoot } from './policy/index.js';
export type { LinkKind, PolicyErrorCode, PolicyFlags, SecurityPolicyOptions, ValidatedPath } from './policy/index.js';
export { DEFAULT_POLICY_LIMITS, resolvePolicyLimits } from './limits.js';
export type { PolicyLimitOverrides, PolicyLimits } from './limits.js';

export {
  collectManifest,
  verifyManifest,
  serializeManifest,
  parseManifest,
  readManifestJson,
  writeManifestJson,
  hashStream,
  sha256Hex,
  EMPTY_SHA256,
  ManifestError
} from './manifest/index.js';
export type { ManifestEntry, ManifestErrorCode, ManifestItem } from './manifest/index.js';

export { TarReader, TarWriter } from './tar/index.js';
export type { TarEntry, TarEntryType, TarIssue, TarReadEntry, TarReaderOptions, TarWriterOptions } from './tar/index.js';

export { wrapReader, wrapWriter, detectCompression, compressionFromFlags, CompressionError } from './compression/index.js';
export type { Compression, CompressionErrorCode, ByteTransform } from './compression/index.js';

export { UserInputError, IoError, classifyError, exitCodeFor, EXIT_CODES } from './errors.js';
export type { ErrorClass, IoErrorCode, UserInputErrorCode } from './errors.js';
export type { EntryKind, ProgressCallback, ProgressEvent } from './types.js';
