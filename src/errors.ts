/**
 * Error codes surfaced at the host boundary.
 * Every failure maps to exactly one of these.
 */
export const ErrorCode = {
  INPUT_FORMAT_ERROR: 'INPUT_FORMAT_ERROR',
  ENCODING_ERROR: 'ENCODING_ERROR',
  INVALID_KEY_MATERIAL: 'INVALID_KEY_MATERIAL',
  SIGNATURE_INVALID: 'SIGNATURE_INVALID',
  KEY_EXCHANGE_FAILED: 'KEY_EXCHANGE_FAILED',
  AUTHENTICATION_FAILED: 'AUTHENTICATION_FAILED',
  PAYLOAD_TOO_LARGE: 'PAYLOAD_TOO_LARGE',
  PERSISTENCE_DISABLED: 'PERSISTENCE_DISABLED',
  PLATFORM_SERVICE_UNAVAILABLE: 'PLATFORM_SERVICE_UNAVAILABLE',
  KDF_ERROR: 'KDF_ERROR',
  DECRYPTION_FAILED: 'DECRYPTION_FAILED',
  CRYPTO_UNAVAILABLE: 'CRYPTO_UNAVAILABLE',
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

/**
 * Base error class for chanseal errors.
 */
export class ChansealError extends Error {
  readonly code: ErrorCode;

  constructor(message: string, code: ErrorCode) {
    super(message);
    this.name = 'ChansealError';
    this.code = code;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Error thrown for cryptographic operation failures.
 */
export class CryptoError extends ChansealError {
  constructor(message: string, code: ErrorCode = ErrorCode.CRYPTO_UNAVAILABLE) {
    super(message, code);
    this.name = 'CryptoError';
  }
}

/**
 * Error thrown for malformed input: wire text, encodings, key lengths.
 */
export class ValidationError extends ChansealError {
  readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.INPUT_FORMAT_ERROR,
    details?: Record<string, unknown>
  ) {
    super(message, code);
    this.name = 'ValidationError';
    this.details = details;
  }
}

/**
 * Error thrown for secure store and storage backend failures.
 */
export class StorageError extends ChansealError {
  constructor(message: string, code: ErrorCode = ErrorCode.DECRYPTION_FAILED) {
    super(message, code);
    this.name = 'StorageError';
  }
}

/**
 * Map any thrown value to the single error code reported to the host.
 */
export function toErrorCode(error: unknown): ErrorCode {
  if (error instanceof ChansealError) {
    return error.code;
  }
  if (error instanceof SyntaxError || error instanceof TypeError) {
    return ErrorCode.INPUT_FORMAT_ERROR;
  }
  return ErrorCode.CRYPTO_UNAVAILABLE;
}

/**
 * Extract a printable message from an unknown thrown value.
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
