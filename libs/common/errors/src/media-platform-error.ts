import { ErrorCode } from './error-codes';

export interface MediaPlatformErrorOptions {
  code: ErrorCode;
  message: string;
  httpStatusCode: number;
  resource?: string;
  details?: unknown;
  originalError?: unknown;
}

export interface ErrorEnvelope {
  error: {
    code: string;
    message: string;
    details?: unknown;
  };
}

export class MediaPlatformError extends Error {
  readonly code: ErrorCode;
  readonly httpStatusCode: number;
  readonly resource?: string;
  readonly details?: unknown;
  readonly originalError?: unknown;

  constructor(options: MediaPlatformErrorOptions) {
    super(options.message);
    this.name = 'MediaPlatformError';
    this.code = options.code;
    this.httpStatusCode = options.httpStatusCode;
    this.resource = options.resource;
    this.details = options.details;
    this.originalError = options.originalError;

    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(exposeDetails = true): ErrorEnvelope {
    return {
      error: {
        code: this.code,
        message: this.message,
        ...(exposeDetails && this.details !== undefined && { details: this.details }),
      },
    };
  }
}

export function isMediaPlatformError(
  error: unknown,
  code?: ErrorCode,
): error is MediaPlatformError {
  return error instanceof MediaPlatformError && (code === undefined || error.code === code);
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Match a driver error code (errno names such as ENOENT, SQLSTATE such as 23505)
 */
export function hasErrorCode(error: unknown, code: string): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === code;
}
