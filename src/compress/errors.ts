import { buildErrorReport, type ErrorReport } from '../errorReport.js';

/** Stable error codes for compression operations. */
export type CompressionErrorCode = 'COMPRESSION_BAD_DATA' | 'COMPRESSION_RESOURCE_LIMIT';

/** Error thrown when a gzip stream is corrupt or expands past its limit. */
export class CompressionError extends Error {
  /** Machine-readable error code. */
  readonly code: CompressionErrorCode;
  /** Algorithm involved in the failure, if available. */
  readonly algorithm?: string;
  /** Underlying cause, if available. */
  override readonly cause?: unknown;
  /** Additional context for serialization. */
  readonly context?: Record<string, string> | undefined;

  /** Create a CompressionError with a stable code. */
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
  toJSON(): ErrorReport<CompressionErrorCode> & { algorithm?: string } {
    return buildErrorReport(this, this.algorithm !== undefined ? { algorithm: this.algorithm } : {});
  }
}
