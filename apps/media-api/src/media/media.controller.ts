/**
 * Media Controller
 * Routes: /media, /media/search, /media/:id
 */

import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  Post,
  Put,
  Query,
  Req,
  UploadedFile,
  UseGuards,
  UseInterceptors,
} from '@nestjs/common';
import { FileInterceptor } from '@nestjs/platform-express';
import { createReadStream } from 'fs';
import { ERRORS } from '@cloudmedia/common/errors';
import { AuthenticatedRequest } from '../auth/authenticated-request';
import { JwtAuthGuard } from '../auth/guards/jwt-auth.guard';
import { UpdateMediaDto, UploadMediaDto } from './dto/media-body.dto';
import { ListMediaQueryDto, SearchMediaQueryDto } from './dto/media-query.dto';
import {
  MediaPageResponse,
  MediaResponse,
  toMediaPageResponse,
  toMediaResponse,
} from './dto/media-response.dto';
import { decodeUploadFilename } from './media-policy';
import { MediaService } from './media.service';
import { SpooledUploadInterceptor } from './spooled-upload.interceptor';

@Controller('media')
@UseGuards(JwtAuthGuard)
export class MediaController {
  constructor(private mediaService: MediaService) {}

  /**
   * POST /media
   * Multipart upload: `file`, optional `description` and `tags`
   */
  @Post()
  @UseInterceptors(FileInterceptor('file'), SpooledUploadInterceptor)
  @HttpCode(HttpStatus.CREATED)
  async upload(
    @Req() request: AuthenticatedRequest,
    @UploadedFile() file: Express.Multer.File | undefined,
    @Body() dto: UploadMediaDto,
  ): Promise<MediaResponse> {
    if (!file) {
      throw ERRORS.ValidationError('No file uploaded');
    }

    const record = await this.mediaService.uploadMedia({
      ownerId: request.user.subjectId,
      filename: decodeUploadFilename(file.originalname),
      contentType: file.mimetype,
      source: {
        sizeBytes: file.size,
        open: () => createReadStream(file.path),
      },
      description: dto.description,
      tags: dto.tags,
    });

    return toMediaResponse(record);
  }

  /**
   * GET /media?page&pageSize&mediaType
   */
  @Get()
  async list(
    @Req() request: AuthenticatedRequest,
    @Query() query: ListMediaQueryDto,
  ): Promise<MediaPageResponse> {
    const page = await this.mediaService.listMedia(request.user.subjectId, query);
    return toMediaPageResponse(page);
  }

  /**
   * GET /media/search?query&page&pageSize
   */
  @Get('search')
  async search(
    @Req() request: AuthenticatedRequest,
    @Query() query: SearchMediaQueryDto,
  ): Promise<MediaPageResponse> {
    const page = await this.mediaService.searchMedia(request.user.subjectId, query.query, query);
    return toMediaPageResponse(page);
  }

  /**
   * GET /media/:id
   */
  @Get(':id')
  async get(@Req() request: AuthenticatedRequest, @Param('id') id: string): Promise<MediaResponse> {
    return toMediaResponse(await this.mediaService.getMedia(id, request.user.subjectId));
  }

  /**
   * PUT /media/:id
   */
  @Put(':id')
  async update(
    @Req() request: AuthenticatedRequest,
    @Param('id') id: string,
    @Body() dto: UpdateMediaDto,
  ): Promise<MediaResponse> {
    const record = await this.mediaService.updateMedia(id, request.user.subjectId, {
      description: dto.description,
      tags: dto.tags,
    });
    return toMediaResponse(record);
  }

  /**
   * DELETE /media/:id
   */
  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  async delete(@Req() request: AuthenticatedRequest, @Param('id') id: string): Promise<void> {
    await this.mediaService.deleteMedia(id, request.user.subjectId);
  }
}
