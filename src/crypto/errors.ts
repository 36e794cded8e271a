import { buildErrorReport, type ErrorReport } from '../errorReport.js';

/** Stable error codes for key derivation and authenticated encryption. */
export type CryptoErrorCode = 'CRYPTO_AUTH_FAILED' | 'CRYPTO_BAD_INPUT';

/** Error thrown when ciphertext fails authentication or crypto inputs are unusable. */
export class CryptoError extends Error {
  /** Machine-readable error code. */
  readonly code: CryptoErrorCode;
  /** Underlying cause, if available. */
  override readonly cause?: unknown;
  /** Additional context for serialization. */
  readonly context?: Record<string, string> | undefined;

  /** Create a CryptoError with a stable code. */
  constructor(
    code: CryptoErrorCode,
    message: string,
    options?: { context?: Record<string, string> | undefined; cause?: unknown }
  ) {
    super(message, options?.cause ? { cause: options.cause } : undefined);
    this.name = 'CryptoError';
    this.code = code;
    if (options?.context !== undefined) this.context = options.context;
    if (options?.cause !== undefined) this.cause = options.cause;
  }

  /** JSON-safe serialization with schemaVersion "1". */
  toJSON(): ErrorReport<CryptoErrorCode> {
    return buildErrorReport(this, {});
  }
}
