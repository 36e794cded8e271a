import { buildErrorReport, type ErrorReport } from './errorReport.js';

/** Stable container error codes. */
export type ContainerErrorCode =
  | 'CONTAINER_BAD_FORMAT'
  | 'CONTAINER_UNSUPPORTED_VERSION'
  | 'CONTAINER_PASSWORD_REQUIRED'
  | 'CONTAINER_BAD_PASSWORD'
  | 'CONTAINER_INVALID_STATE';

/** Error thrown when a container file cannot be opened, verified or saved. */
export class ContainerError extends Error {
  /** Machine-readable error code. */
  readonly code: ContainerErrorCode;
  /** Container file the error relates to, if available. */
  readonly path?: string | undefined;
  /** Underlying cause, if available. */
  override readonly cause?: unknown;
  /** Additional context for serialization. */
  readonly context?: Record<string, string> | undefined;

  /** Create a ContainerError with a stable code. */
  constructor(
    code: ContainerErrorCode,
    message: string,
    options?: {
      path?: string | undefined;
      context?: Record<string, string> | undefined;
      cause?: unknown;
    }
  ) {
    super(message, options?.cause ? { cause: options.cause } : undefined);
    this.name = 'ContainerError';
    this.code = code;
    this.path = options?.path;
    this.context = options?.context;
    this.cause = options?.cause;
  }

  /** JSON-safe serialization with schemaVersion "1". */
  toJSON(): ErrorReport<ContainerErrorCode> & { path?: string } {
    return buildErrorReport(this, this.path !== undefined ? { path: this.path } : {});
  }
}
