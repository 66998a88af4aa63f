/**
 * Files Controller
 * Signed downloads for the disk object store
 * Route: /files/*
 */

import { Controller, Get, Param, Query, Res, StreamableFile } from '@nestjs/common';
import { Response } from 'express';
import { ERRORS } from '@cloudmedia/common/errors';
import { DiskObjectStore } from './disk-object-store';
import { ObjectStore } from './object-store';

@Controller('files')
export class FilesController {
  constructor(private objectStore: ObjectStore) {}

  /**
   * GET /files/*?expires=<unix seconds>&signature=<hex>
   */
  @Get('*')
  async download(
    @Param('0') storedName: string,
    @Query('expires') expires: string | undefined,
    @Query('signature') signature: string | undefined,
    @Res({ passthrough: true }) res: Response,
  ): Promise<StreamableFile> {
    // S3 serves its own presigned URLs
    if (!(this.objectStore instanceof DiskObjectStore)) {
      throw ERRORS.RouteNotFound(`GET /api/files/${storedName}`);
    }

    const file = await this.objectStore.openSigned(storedName, expires, signature);

    const filename = storedName.split('/').pop() || 'download';
    const sanitizedFilename = filename.replace(/["\r\n]/g, '_');

    res.set({
      'Content-Type': file.contentType,
      'Content-Length': String(file.sizeBytes),
      'Content-Disposition': `inline; filename="${sanitizedFilename}"`,
    });

    return new StreamableFile(file.stream);
  }
}
