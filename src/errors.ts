import { sanitizeErrorContext } from './errorContext.js';
import { ManifestError } from './manifest/errors.js';
import { PolicyError } from './policy/errors.js';
import { REPORT_SCHEMA_VERSION } from './reportSchema.js';

/** Stable codes for problems with what the caller asked for. */
export type UserInputErrorCode =
  | 'INPUT_NOT_FOUND'
  | 'INPUT_ESCAPES_BASE'
  | 'INPUT_INVALID_PATH'
  | 'INPUT_INVALID_MANIFEST'
  | 'INPUT_INVALID_OPTION';

/** Error thrown for missing inputs, malformed paths and invalid options. */
export class UserInputError extends Error {
  /** Machine-readable error code. */
  readonly code: UserInputErrorCode;
  /** Path the caller supplied, if the error concerns one. */
  readonly path?: string | undefined;
  /** Underlying cause, if available. */
  override readonly cause?: unknown;
  /** Additional context for serialization. */
  readonly context?: Record<string, string> | undefined;

  constructor(
    code: UserInputErrorCode,
    message: string,
    options?: { path?: string | undefined; context?: Record<string, string> | undefined; cause?: unknown }
  ) {
    super(message, options?.cause ? { cause: options.cause } : undefined);
    this.name = 'UserInputError';
    this.code = code;
    this.path = options?.path;
    this.context = options?.context;
    this.cause = options?.cause;
  }

  /** JSON-safe serialization with schemaVersion "1". */
  toJSON(): {
    schemaVersion: string;
    name: string;
    code: UserInputErrorCode;
    message: string;
    hint: string;
    context: Record<string, string>;
    path?: string;
  } {
    const context = sanitizeErrorContext(this.context, this.path !== undefined ? ['path'] : []);
    return {
      schemaVersion: REPORT_SCHEMA_VERSION,
      name: this.name,
      code: this.code,
      message: this.message,
      hint: this.message,
      context,
      ...(this.path !== undefined ? { path: this.path } : {})
    };
  }
}

/** Stable codes for filesystem failures. */
export type IoErrorCode = 'IO_FAILED' | 'IO_LOOP_DETECTED';

/** Error thrown when a filesystem call fails underneath an operation. */
export class IoError extends Error {
  /** Machine-readable error code. */
  readonly code: IoErrorCode;
  /** Operation that failed, such as "open" or "mkdir". */
  readonly operation: string;
  /** Path the operation was applied to. */
  readonly path: string;
  /** errno code of the underlying failure, if any. */
  readonly errno?: string | undefined;
  /** Underlying cause, if available. */
  override readonly cause?: unknown;

  constructor(code: IoErrorCode, operation: string, path: string, options?: { cause?: unknown; message?: string }) {
    const errno = errnoCode(options?.cause);
    const detail = errno ? ` (${errno})` : '';
    super(options?.message ?? `${operation} failed for ${path}${detail}`, options?.cause ? { cause: options.cause } : undefined);
    this.name = 'IoError';
    this.code = code;
    this.operation = operation;
    this.path = path;
    this.errno = errno;
    this.cause = options?.cause;
  }

  /** JSON-safe serialization with schemaVersion "1". */
  toJSON(): {
    schemaVersion: string;
    name: string;
    code: IoErrorCode;
    message: string;
    hint: string;
    context: Record<string, string>;
  } {
    return {
      schemaVersion: REPORT_SCHEMA_VERSION,
      name: this.name,
      code: this.code,
      message: this.message,
      hint: this.message,
      context: {
        operation: this.operation,
        path: this.path,
        ...(this.errno !== undefined ? { errno: this.errno } : {})
      }
    };
  }
}

/** Run a filesystem call and wrap any failure in an IoError. */
export async function withIo<T>(operation: string, path: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    throw new IoError('IO_FAILED', operation, path, { cause: err });
  }
}

/** Extract the errno code (e.g. "ENOENT") from a Node error. */
export function errnoCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') return err.code;
  return undefined;
}

/** Error classes that decide the process exit status. */
export type ErrorClass = 'policy' | 'manifest' | 'user-input' | 'io';

/** Classify an error by walking its cause chain; anything unrecognized is an I/O failure. */
export function classifyError(err: unknown): ErrorClass {
  const seen = new Set<unknown>();
  let current: unknown = err;
  while (current instanceof Error && !seen.has(current)) {
    seen.add(current);
    if (current instanceof PolicyError) return 'policy';
    if (current instanceof ManifestError) return 'manifest';
    if (current instanceof UserInputError) return 'user-input';
    current = current.cause;
  }
  return 'io';
}

/** Process exit status per error class. */
export const EXIT_CODES = Object.freeze({
  success: 0,
  io: 1,
  'user-input': 2,
  policy: 3,
  manifest: 3
} as const);

/** Map an error to the exit status the CLI reports. */
export function exitCodeFor(err: unknown): number {
  return EXIT_CODES[classifyError(err)];
}
