import { buildErrorReport, type ErrorReport } from '../errorReport.js';

/** Stable archive error codes. */
export type ArchiveErrorCode = 'ARCHIVE_TRUNCATED' | 'ARCHIVE_BAD_HEADER' | 'ARCHIVE_LIMIT_EXCEEDED';

/** Error thrown for malformed TAR data or archives that exceed resource limits. */
export class ArchiveError extends Error {
  /** Machine-readable error code. */
  readonly code: ArchiveErrorCode;
  /** Entry name related to the error, if available. */
  readonly entryName?: string | undefined;
  /** Offset (in bytes) related to the error, if available. */
  readonly offset?: bigint | undefined;
  /** Underlying cause, if available. */
  override readonly cause?: unknown;
  /** Additional context for serialization. */
  readonly context?: Record<string, string> | undefined;

  /** Create an ArchiveError with a stable code. */
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
  toJSON(): ErrorReport<ArchiveErrorCode> & { entryName?: string; offset?: string } {
    const extra: { entryName?: string; offset?: string } = {};
    if (this.entryName !== undefined) extra.entryName = this.entryName;
    if (this.offset !== undefined) extra.offset = this.offset.toString();
    return buildErrorReport(this, extra);
  }
}
