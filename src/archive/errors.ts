import { sanitizeErrorContext } from '../errorContext.js';
import { REPORT_SCHEMA_VERSION } from '../reportSchema.js';

/** Stable tar container error codes. */
export type ArchiveErrorCode =
  | 'ARCHIVE_TRUNCATED'
  | 'ARCHIVE_BAD_HEADER'
  | 'ARCHIVE_INVALID_ENCODING'
  | 'ARCHIVE_SIZE_MISMATCH'
  | 'ARCHIVE_LIMIT_EXCEEDED'
  | 'ARCHIVE_STREAM_CONSUMED'
  | 'ARCHIVE_WRITER_CLOSED';

/** Error thrown for malformed tar streams and writer misuse. */
export class ArchiveError extends Error {
  /** Machine-readable error code. */
  readonly code: ArchiveErrorCode;
  /** Entry name related to the error, if available. */
  readonly entryName?: string | undefined;
  /** Offset (in bytes) of the offending header, if available. */
  readonly offset?: bigint | undefined;
  /** Underlying cause, if available. */
  override readonly cause?: unknown;
  /** Additional context for serialization. */
  readonly context?: Record<string, string> | undefined;

  constructor(
    code: ArchiveErrorCode,
    message: string,
    options?: {
      entryName?: string | undefined;
      offset?: bigint | undefined;
      context?: Record<string, string> | undefined;
      cause?: unknown;
    }
  ) {
    super(message, options?.cause ? { cause: options.cause } : undefined);
    this.name = 'ArchiveError';
    this.code = code;
    this.entryName = options?.entryName;
    this.offset = options?.offset;
    this.context = options?.context;
    this.cause = options?.cause;
  }

  /** JSON-safe serialization with schemaVersion "1". */
  toJSON(): {
    schemaVersion: string;
    name: string;
    code: ArchiveErrorCode;
    message: string;
    hint: string;
    context: Record<string, string>;
    entryName?: string;
    offset?: string;
  } {
    const topLevelShadowKeys: string[] = [];
    if (this.entryName !== undefined) topLevelShadowKeys.push('entryName');
    if (this.offset !== undefined) topLevelShadowKeys.push('offset');
    const context = sanitizeErrorContext(this.context, topLevelShadowKeys);
    return {
      schemaVersion: REPORT_SCHEMA_VERSION,
      name: this.name,
      code: this.code,
      message: this.message,
      hint: this.message,
      context,
      ...(this.entryName !== undefined ? { entryName: this.entryName } : {}),
      ...(this.offset !== undefined ? { offset: this.offset.toString() } : {})
    };
  }
}
