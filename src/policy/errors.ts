import { sanitizeErrorContext } from '../errorContext.js';
import { REPORT_SCHEMA_VERSION } from '../reportSchema.js';

/** Stable policy violation codes. */
export type PolicyErrorCode =
  | 'POLICY_EMPTY_PATH'
  | 'POLICY_ABSOLUTE_PATH'
  | 'POLICY_ROOT_ESCAPE'
  | 'POLICY_PARENT_TRAVERSAL'
  | 'POLICY_INVALID_UTF8'
  | 'POLICY_LINK_OUTSIDE_ROOT'
  | 'POLICY_FILE_COUNT_EXCEEDED'
  | 'POLICY_TOTAL_BYTES_EXCEEDED'
  | 'POLICY_SINGLE_FILE_TOO_LARGE'
  | 'POLICY_DEPTH_EXCEEDED';

/** Error thrown when an entry path, link target or quota breaks the security policy. */
export class PolicyError extends Error {
  /** Machine-readable error code. */
  readonly code: PolicyErrorCode;
  /** Offending path or link target, if the violation concerns one. */
  readonly path?: string | undefined;
  /** Configured ceiling for quota violations. */
  readonly limit?: bigint | undefined;
  /** Observed value for quota violations. */
  readonly actual?: bigint | undefined;
  /** Underlying cause, if available. */
  override readonly cause?: unknown;
  /** Additional context for serialization. */
  readonly context?: Record<string, string> | undefined;

  constructor(
    code: PolicyErrorCode,
    message: string,
    options?: {
      path?: string | undefined;
      limit?: bigint | number | undefined;
      actual?: bigint | number | undefined;
      context?: Record<string, string> | undefined;
      cause?: unknown;
    }
  ) {
    super(message, options?.cause ? { cause: options.cause } : undefined);
    this.name = 'PolicyError';
    this.code = code;
    this.path = options?.path;
    this.limit = options?.limit !== undefined ? BigInt(options.limit) : undefined;
    this.actual = options?.actual !== undefined ? BigInt(options.actual) : undefined;
    this.context = options?.context;
    this.cause = options?.cause;
  }

  /** True for the four quota codes. */
  get isQuotaViolation(): boolean {
    return (
      this.code === 'POLICY_FILE_COUNT_EXCEEDED' ||
      this.code === 'POLICY_TOTAL_BYTES_EXCEEDED' ||
      this.code === 'POLICY_SINGLE_FILE_TOO_LARGE' ||
      this.code === 'POLICY_DEPTH_EXCEEDED'
    );
  }

  /** JSON-safe serialization with schemaVersion "1". */
  toJSON(): {
    schemaVersion: string;
    name: string;
    code: PolicyErrorCode;
    message: string;
    hint: string;
    context: Record<string, string>;
    path?: string;
    limit?: string;
    actual?: string;
  } {
    const topLevelShadowKeys: string[] = [];
    if (this.path !== undefined) topLevelShadowKeys.push('path');
    if (this.limit !== undefined) topLevelShadowKeys.push('limit');
    if (this.actual !== undefined) topLevelShadowKeys.push('actual');
    const context = sanitizeErrorContext(this.context, topLevelShadowKeys);
    return {
      schemaVersion: REPORT_SCHEMA_VERSION,
      name: this.name,
      code: this.code,
      message: this.message,
      hint: hintFor(this.code),
      context,
      ...(this.path !== undefined ? { path: this.path } : {}),
      ...(this.limit !== undefined ? { limit: this.limit.toString() } : {}),
      ...(this.actual !== undefined ? { actual: this.actual.toString() } : {})
    };
  }
}

function hintFor(code: PolicyErrorCode): string {
  switch (code) {
    case 'POLICY_EMPTY_PATH':
      return 'Entry names must not be empty.';
    case 'POLICY_ABSOLUTE_PATH':
      return 'Entry names must be relative to the archive root.';
    case 'POLICY_ROOT_ESCAPE':
    case 'POLICY_PARENT_TRAVERSAL':
      return 'Entry names must stay inside the archive root and must not contain "..".';
    case 'POLICY_INVALID_UTF8':
      return 'Entry names must be valid UTF-8 text without NUL characters.';
    case 'POLICY_LINK_OUTSIDE_ROOT':
      return 'Link targets must resolve inside the archive root.';
    case 'POLICY_FILE_COUNT_EXCEEDED':
      return 'Raise --max-files if the archive is trusted.';
    case 'POLICY_TOTAL_BYTES_EXCEEDED':
      return 'Raise --max-total-bytes if the archive is trusted.';
    case 'POLICY_SINGLE_FILE_TOO_LARGE':
      return 'Raise --max-single-file if the archive is trusted.';
    case 'POLICY_DEPTH_EXCEEDED':
      return 'Raise --max-depth if the archive is trusted.';
    default: {
      const exhaustive: never = code;
      return exhaustive;
    }
  }
}
