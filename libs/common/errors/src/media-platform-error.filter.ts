import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { Request, Response } from 'express';
import { ErrorCode } from './error-codes';
import { ERRORS } from './errors-factory';
import { MediaPlatformError } from './media-platform-error';

/**
 * Top-level error boundary: every exception leaves the API as
 * `{ error: { code, message, details? } }`
 */
@Catch()
export class MediaPlatformErrorFilter implements ExceptionFilter {
  private readonly logger = new Logger(MediaPlatformErrorFilter.name);

  /**
   * @param exposeDetails - include details of 5xx errors in responses (off in production)
   */
  constructor(private readonly exposeDetails = false) {}

  catch(exception: unknown, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const request = ctx.getRequest<Request>();
    const response = ctx.getResponse<Response>();

    const error = this.normalize(exception, `${request.method} ${request.url}`);
    const isServerError = error.httpStatusCode >= 500;

    if (isServerError) {
      const cause = error.originalError ?? exception;
      this.logger.error(
        `${error.code}: ${error.message}`,
        cause instanceof Error ? cause.stack : String(cause),
      );
    } else {
      this.logger.warn(`${error.code}: ${error.message} (${request.method} ${request.url})`);
    }

    response
      .status(error.httpStatusCode)
      .json(error.toJSON(!isServerError || this.exposeDetails));
  }

  normalize(exception: unknown, route: string): MediaPlatformError {
    if (exception instanceof MediaPlatformError) {
      return exception;
    }

    if (exception instanceof HttpException) {
      return fromHttpException(exception, route);
    }

    return ERRORS.InternalError(exception);
  }
}

const CODES_BY_STATUS: Partial<Record<number, ErrorCode>> = {
  [HttpStatus.BAD_REQUEST]: ErrorCode.ValidationError,
  [HttpStatus.UNAUTHORIZED]: ErrorCode.TokenInvalid,
  [HttpStatus.FORBIDDEN]: ErrorCode.AccessDenied,
  [HttpStatus.NOT_FOUND]: ErrorCode.RouteNotFound,
  [HttpStatus.PAYLOAD_TOO_LARGE]: ErrorCode.PayloadTooLarge,
};

function fromHttpException(exception: HttpException, route: string): MediaPlatformError {
  const status = exception.getStatus();
  const body = exception.getResponse();

  if (status === HttpStatus.NOT_FOUND) {
    return ERRORS.RouteNotFound(route);
  }

  // ValidationPipe reports every failed constraint in `message`
  const messages =
    typeof body === 'object' && body !== null && 'message' in body ? body.message : undefined;

  if (status === HttpStatus.BAD_REQUEST && Array.isArray(messages)) {
    return ERRORS.ValidationError('Invalid request data', messages);
  }

  return new MediaPlatformError({
    code: CODES_BY_STATUS[status] ?? (status >= 500 ? ErrorCode.InternalError : ErrorCode.ValidationError),
    message: typeof messages === 'string' ? messages : exception.message,
    httpStatusCode: status,
    originalError: exception,
  });
}
