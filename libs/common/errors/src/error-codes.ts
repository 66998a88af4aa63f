export enum ErrorCode {
  // Auth errors
  InvalidCredentials = 'InvalidCredentials',
  UserAlreadyExists = 'UserAlreadyExists',
  TokenMissing = 'TokenMissing',
  TokenExpired = 'TokenExpired',
  TokenInvalid = 'TokenInvalid',

  // Media errors
  MediaNotFound = 'MediaNotFound',
  AccessDenied = 'AccessDenied',
  UnsupportedMediaType = 'UnsupportedMediaType',
  PayloadTooLarge = 'PayloadTooLarge',

  // Storage errors
  ObjectNotFound = 'ObjectNotFound',
  InvalidPath = 'InvalidPath',
  SignedUrlExpired = 'SignedUrlExpired',

  // Backend errors
  BackendUnavailable = 'BackendUnavailable',

  // General errors
  ValidationError = 'ValidationError',
  RouteNotFound = 'RouteNotFound',
  InternalError = 'InternalError',
}
