/**
 * Media Service
 * Upload, ownership-checked read/update/delete, list and search
 */

import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Readable } from 'stream';
import { buffer } from 'stream/consumers';
import { v4 as uuidv4 } from 'uuid';
import { Clock } from '@cloudmedia/common/clock';
import type { AppConfig } from '@cloudmedia/common/config';
import { ERRORS, describeError } from '@cloudmedia/common/errors';
import { MediaRepository } from '../metadata/media.repository';
import { MediaRecord, MediaType, Page, PageRequest, isMediaType, pageOffset } from '../metadata/records';
import { thumbnailNameFor } from '../objects/object-key';
import { ObjectStore } from '../objects/object-store';
import {
  MediaTypeMapping,
  checkDescription,
  checkFileSize,
  classifyContentType,
  normalizeContentType,
  parseTags,
} from './media-policy';
import { ThumbnailService } from './thumbnail.service';

export const DEFAULT_PAGE_SIZE = 20;
export const MAX_PAGE_SIZE = 100;

export interface UploadSource {
  sizeBytes: number;
  /** Each call starts a fresh read of the content */
  open(): Readable;
}

export interface UploadMediaInput {
  ownerId: string;
  filename: string;
  contentType: string;
  source: UploadSource;
  description?: string | null;
  tags?: string | readonly string[] | null;
}

export interface UpdateMediaInput {
  description?: string | null;
  tags?: string | readonly string[] | null;
}

export interface PageQuery {
  page?: number;
  pageSize?: number;
}

export interface ListMediaQuery extends PageQuery {
  mediaType?: string;
}

export interface MediaPage extends Page<MediaRecord>, PageRequest {}

@Injectable()
export class MediaService {
  private readonly logger = new Logger(MediaService.name);
  private readonly mapping: MediaTypeMapping;
  private readonly maxFileSizeBytes: number;

  constructor(
    configService: ConfigService<AppConfig, true>,
    private mediaRepository: MediaRepository,
    private objectStore: ObjectStore,
    private thumbnailService: ThumbnailService,
    private clock: Clock,
  ) {
    this.mapping = {
      image: configService.get('allowedImageTypes', { infer: true }),
      video: configService.get('allowedVideoTypes', { infer: true }),
    };
    this.maxFileSizeBytes = configService.get('maxFileSizeMb', { infer: true }) * 1024 * 1024;
  }

  /**
   * Validate, store the object (and a thumbnail for images), then persist the record.
   * A failure after the object is stored leaves it orphaned.
   */
  async uploadMedia(input: UploadMediaInput): Promise<MediaRecord> {
    const mediaType = classifyContentType(input.contentType, this.mapping);
    checkFileSize(input.source.sizeBytes, this.maxFileSizeBytes);
    const tags = parseTags(input.tags);
    const description = checkDescription(input.description);
    const mimeType = normalizeContentType(input.contentType);

    const { storedName, url } = await this.objectStore.upload(
      input.source.open(),
      input.ownerId,
      input.filename,
      mimeType,
      input.source.sizeBytes,
    );

    const thumbnailUrl = mediaType === 'image' ? await this.storeThumbnail(storedName, input.source) : null;

    const now = this.clock.now();
    const record: MediaRecord = {
      id: uuidv4(),
      ownerId: input.ownerId,
      storedName,
      originalName: input.filename,
      mediaType,
      sizeBytes: input.source.sizeBytes,
      mimeType,
      objectUrl: url,
      thumbnailUrl,
      description,
      tags,
      uploadedAt: now,
      updatedAt: now,
    };

    const result = await this.mediaRepository.create(record);
    if (result.kind === 'already_exists') {
      throw ERRORS.BackendUnavailable('create media record', new Error(`Duplicate media id ${record.id}`));
    }

    this.logger.log(`Media uploaded: ${record.id} (${mediaType}, ${record.sizeBytes} bytes) by ${input.ownerId}`);
    return result.value;
  }

  async getMedia(mediaId: string, callerId: string): Promise<MediaRecord> {
    return this.findOwned(mediaId, callerId, 'access');
  }

  /**
   * Only supplied fields change; updatedAt always moves forward
   */
  async updateMedia(mediaId: string, callerId: string, input: UpdateMediaInput): Promise<MediaRecord> {
    const description = input.description === undefined ? undefined : checkDescription(input.description);
    const tags = input.tags === undefined ? undefined : parseTags(input.tags);

    const existing = await this.findOwned(mediaId, callerId, 'update');
    const updatedAt = new Date(Math.max(this.clock.now().getTime(), existing.updatedAt.getTime() + 1));

    const result = await this.mediaRepository.update(mediaId, callerId, {
      ...(description !== undefined && { description }),
      ...(tags !== undefined && { tags }),
      updatedAt,
    });
    // Deleted between the read and the write
    if (result.kind === 'not_found') {
      throw ERRORS.MediaNotFound(mediaId);
    }

    this.logger.log(`Media updated: ${mediaId}`);
    return result.value;
  }

  /**
   * Object and thumbnail removal is best effort; the metadata deletion decides the outcome
   */
  async deleteMedia(mediaId: string, callerId: string): Promise<void> {
    const existing = await this.findOwned(mediaId, callerId, 'delete');

    await this.objectStore.delete(existing.storedName);
    if (existing.thumbnailUrl) {
      await this.objectStore.delete(thumbnailNameFor(existing.storedName));
    }

    const deleted = await this.mediaRepository.delete(mediaId, callerId);
    if (!deleted) {
      throw ERRORS.MediaNotFound(mediaId);
    }

    this.logger.log(`Media deleted: ${mediaId}`);
  }

  async listMedia(ownerId: string, query: ListMediaQuery = {}): Promise<MediaPage> {
    const request = resolvePage(query);
    let mediaType: MediaType | undefined;
    if (query.mediaType !== undefined) {
      if (!isMediaType(query.mediaType)) {
        throw ERRORS.ValidationError("mediaType must be 'image' or 'video'");
      }
      mediaType = query.mediaType;
    }

    const page = await this.mediaRepository.listPaginated(ownerId, { ...request, mediaType });
    return { ...page, ...request };
  }

  async searchMedia(ownerId: string, query: string, pageQuery: PageQuery = {}): Promise<MediaPage> {
    const request = resolvePage(pageQuery);
    const trimmed = query.trim();
    if (trimmed.length === 0) {
      throw ERRORS.ValidationError('Search query must not be empty');
    }

    const page = await this.mediaRepository.search(ownerId, trimmed, request);
    return { ...page, ...request };
  }

  private async findOwned(mediaId: string, callerId: string, action: string): Promise<MediaRecord> {
    const result = await this.mediaRepository.findById(mediaId, callerId);
    if (result.kind === 'not_found') {
      throw ERRORS.MediaNotFound(mediaId);
    }
    if (result.value.ownerId !== callerId) {
      this.logger.warn(`User ${callerId} denied ${action} on media ${mediaId}`);
      throw ERRORS.AccessDenied(action, mediaId);
    }
    return result.value;
  }

  /**
   * Thumbnail failures never fail the upload
   */
  private async storeThumbnail(storedName: string, source: UploadSource): Promise<string | null> {
    try {
      const content = await buffer(source.open());
      const thumbnail = await this.thumbnailService.generate(content);
      return await this.objectStore.put(
        thumbnailNameFor(storedName),
        Readable.from([thumbnail]),
        'image/jpeg',
        thumbnail.length,
      );
    } catch (error) {
      this.logger.warn(`Thumbnail generation failed for ${storedName}: ${describeError(error)}`);
      return null;
    }
  }
}

function resolvePage({ page = 1, pageSize = DEFAULT_PAGE_SIZE }: PageQuery): PageRequest {
  if (!Number.isInteger(page) || page < 1) {
    throw ERRORS.ValidationError('page must be an integer of at least 1');
  }
  if (!Number.isInteger(pageSize) || pageSize < 1 || pageSize > MAX_PAGE_SIZE) {
    throw ERRORS.ValidationError(`pageSize must be an integer between 1 and ${MAX_PAGE_SIZE}`);
  }
  // Offsets past 2^53 lose precision and reach SQL in exponent notation
  if (pageOffset({ page, pageSize }) > Number.MAX_SAFE_INTEGER) {
    throw ERRORS.ValidationError('page is too large');
  }
  return { page, pageSize };
}
