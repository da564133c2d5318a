import { sanitizeErrorContext } from '../errorContext.js';
import { REPORT_SCHEMA_VERSION } from '../reportSchema.js';

/** Stable error codes for compression operations. */
export type CompressionErrorCode = 'COMPRESSION_FAILED' | 'COMPRESSION_BAD_DATA' | 'COMPRESSION_RESOURCE_LIMIT';

/** Error thrown when a codec fails to compress or decompress a stream. */
export class CompressionError extends Error {
  /** Machine-readable error code. */
  readonly code: CompressionErrorCode;
  /** Codec involved in the failure, if available. */
  readonly algorithm?: string;
  /** Underlying cause, if available. */
  override readonly cause?: unknown;
  /** Additional context for serialization. */
  readonly context?: Record<string, string> | undefined;

  constructor(
    code: CompressionErrorCode,
    message: string,
    options?: { algorithm?: string; context?: Record<string, string> | undefined; cause?: unknown }
  ) {
    super(message, options?.cause ? { cause: options.cause } : undefined);
    this.name = 'CompressionError';
    this.code = code;
    if (options?.algorithm !== undefined) this.algorithm = options.algorithm;
    if (options?.context !== undefined) this.context = options.context;
    if (options?.cause !== undefined) this.cause = options.cause;
  }

  /** JSON-safe serialization with schemaVersion "1". */
  toJSON(): {
    schemaVersion: string;
    name: string;
    code: CompressionErrorCode;
    message: string;
    hint: string;
    context: Record<string, string>;
    algorithm?: string;
  } {
    const topLevelShadowKeys = this.algorithm !== undefined ? ['algorithm'] : [];
    const context = sanitizeErrorContext(this.context, topLevelShadowKeys);
    return {
      schemaVersion: REPORT_SCHEMA_VERSION,
      name: this.name,
      code: this.code,
      message: this.message,
      hint: this.message,
      context,
      ...(this.algorithm !== undefined ? { algorithm: this.algorithm } : {})
    };
  }
}
