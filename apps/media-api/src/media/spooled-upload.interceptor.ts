import { CallHandler, ExecutionContext, Injectable, Logger, NestInterceptor } from '@nestjs/common';
import { Request } from 'express';
import * as fs from 'fs/promises';
import { Observable, finalize } from 'rxjs';
import { describeError } from '@cloudmedia/common/errors';

/**
 * Removes the multer temp file once the request has been handled, whatever the outcome.
 * Must be listed after FileInterceptor so the file is already spooled.
 */
@Injectable()
export class SpooledUploadInterceptor implements NestInterceptor {
  private readonly logger = new Logger(SpooledUploadInterceptor.name);

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const request = context.switchToHttp().getRequest<Request>();
    const spooledPath = request.file?.path;

    return next.handle().pipe(
      finalize(() => {
        if (spooledPath) {
          fs.rm(spooledPath, { force: true }).catch((error: unknown) => {
            this.logger.warn(`Failed to remove spooled upload ${spooledPath}: ${describeError(error)}`);
          });
        }
      }),
    );
  }
}
