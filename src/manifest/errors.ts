import { sanitizeErrorContext } from '../errorContext.js';
import { REPORT_SCHEMA_VERSION } from '../reportSchema.js';

/** Stable manifest verification codes. */
export type ManifestErrorCode = 'MANIFEST_MISSING_ENTRY' | 'MANIFEST_MISMATCH' | 'MANIFEST_UNEXPECTED_ENTRY';

/** Error thrown when archive contents disagree with an expected manifest. */
export class ManifestError extends Error {
  /** Machine-readable error code. */
  readonly code: ManifestErrorCode;
  /** Manifest path that failed verification. */
  readonly path: string;
  /** Expected digest, for mismatches. */
  readonly expected?: string | undefined;
  /** Observed digest, for mismatches. */
  readonly actual?: string | undefined;
  /** Additional context for serialization. */
  readonly context?: Record<string, string> | undefined;

  constructor(
    code: ManifestErrorCode,
    message: string,
    options: {
      path: string;
      expected?: string | undefined;
      actual?: string | undefined;
      context?: Record<string, string> | undefined;
    }
  ) {
    super(message);
    this.name = 'ManifestError';
    this.code = code;
    this.path = options.path;
    this.expected = options.expected;
    this.actual = options.actual;
    this.context = options.context;
  }

  /** JSON-safe serialization with schemaVersion "1". */
  toJSON(): {
    schemaVersion: string;
    name: string;
    code: ManifestErrorCode;
    message: string;
    hint: string;
    context: Record<string, string>;
    path: string;
    expected?: string;
    actual?: string;
  } {
    const topLevelShadowKeys = ['path'];
    if (this.expected !== undefined) topLevelShadowKeys.push('expected');
    if (this.actual !== undefined) topLevelShadowKeys.push('actual');
    const context = sanitizeErrorContext(this.context, topLevelShadowKeys);
    return {
      schemaVersion: REPORT_SCHEMA_VERSION,
      name: this.name,
      code: this.code,
      message: this.message,
      hint: this.message,
      context,
      path: this.path,
      ...(this.expected !== undefined ? { expected: this.expected } : {}),
      ...(this.actual !== undefined ? { actual: this.actual } : {})
    };
  }
}
