import { ErrorCode } from './error-codes';
import { MediaPlatformError, describeError } from './media-platform-error';

export const ERRORS = {
  // Auth errors
  InvalidCredentials: () =>
    new MediaPlatformError({
      code: ErrorCode.InvalidCredentials,
      message: 'Invalid email or password',
      httpStatusCode: 401,
    }),

  UserAlreadyExists: (email: string, e?: unknown) =>
    new MediaPlatformError({
      code: ErrorCode.UserAlreadyExists,
      message: 'User with this email already exists',
      httpStatusCode: 400,
      resource: email,
      originalError: e,
    }),

  TokenMissing: () =>
    new MediaPlatformError({
      code: ErrorCode.TokenMissing,
      message: 'Missing or invalid authorization header',
      httpStatusCode: 401,
    }),

  TokenExpired: (e?: unknown) =>
    new MediaPlatformError({
      code: ErrorCode.TokenExpired,
      message: 'Token has expired',
      httpStatusCode: 401,
      originalError: e,
    }),

  TokenInvalid: (e?: unknown) =>
    new MediaPlatformError({
      code: ErrorCode.TokenInvalid,
      message: 'Invalid token',
      httpStatusCode: 401,
      originalError: e,
    }),

  // Media errors
  MediaNotFound: (mediaId: string) =>
    new MediaPlatformError({
      code: ErrorCode.MediaNotFound,
      message: 'Media not found',
      httpStatusCode: 404,
      resource: mediaId,
    }),

  AccessDenied: (action: string, resource?: string) =>
    new MediaPlatformError({
      code: ErrorCode.AccessDenied,
      message: `You don't have permission to ${action} this media`,
      httpStatusCode: 403,
      resource,
    }),

  UnsupportedMediaType: (contentType: string, allowed: string[]) =>
    new MediaPlatformError({
      code: ErrorCode.UnsupportedMediaType,
      message: `File type '${contentType}' is not allowed`,
      httpStatusCode: 400,
      resource: contentType,
      details: { allowedTypes: allowed },
    }),

  PayloadTooLarge: (sizeBytes: number, maxBytes: number) =>
    new MediaPlatformError({
      code: ErrorCode.PayloadTooLarge,
      message: `File size (${(sizeBytes / (1024 * 1024)).toFixed(2)} MB) exceeds maximum allowed size (${(maxBytes / (1024 * 1024)).toFixed(0)} MB)`,
      httpStatusCode: 413,
      details: { sizeBytes, maxBytes },
    }),

  // Storage errors
  ObjectNotFound: (storedName: string) =>
    new MediaPlatformError({
      code: ErrorCode.ObjectNotFound,
      message: 'Object not found',
      httpStatusCode: 404,
      resource: storedName,
    }),

  InvalidPath: (storedName: string) =>
    new MediaPlatformError({
      code: ErrorCode.InvalidPath,
      message: 'Invalid object path',
      httpStatusCode: 400,
      resource: storedName,
    }),

  SignedUrlExpired: () =>
    new MediaPlatformError({
      code: ErrorCode.SignedUrlExpired,
      message: 'Signed URL has expired or is invalid',
      httpStatusCode: 401,
    }),

  // Backend errors
  BackendUnavailable: (operation: string, e?: unknown) =>
    new MediaPlatformError({
      code: ErrorCode.BackendUnavailable,
      message: `Storage backend failed during ${operation}`,
      httpStatusCode: 500,
      resource: operation,
      details: e === undefined ? undefined : describeError(e),
      originalError: e,
    }),

  // General
  ValidationError: (message: string, details?: unknown) =>
    new MediaPlatformError({
      code: ErrorCode.ValidationError,
      message,
      httpStatusCode: 400,
      details,
    }),

  RouteNotFound: (route: string) =>
    new MediaPlatformError({
      code: ErrorCode.RouteNotFound,
      message: 'Endpoint not found',
      httpStatusCode: 404,
      resource: route,
    }),

  InternalError: (e?: unknown) =>
    new MediaPlatformError({
      code: ErrorCode.InternalError,
      message: 'An unexpected error occurred',
      httpStatusCode: 500,
      details: e === undefined ? undefined : describeError(e),
      originalError: e,
    }),
};
