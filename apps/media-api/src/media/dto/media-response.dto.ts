import { MediaRecord, MediaType } from '../../metadata/records';
import { MediaPage } from '../media.service';

export interface MediaResponse {
  id: string;
  userId: string;
  fileName: string;
  originalFileName: string;
  mediaType: MediaType;
  fileSize: number;
  mimeType: string;
  blobUrl: string;
  thumbnailUrl: string | null;
  description: string | null;
  tags: string[] | null;
  uploadedAt: string;
  updatedAt: string;
}

export interface MediaPageResponse {
  items: MediaResponse[];
  total: number;
  page: number;
  pageSize: number;
}

export function toMediaResponse(record: MediaRecord): MediaResponse {
  return {
    id: record.id,
    userId: record.ownerId,
    fileName: record.storedName,
    originalFileName: record.originalName,
    mediaType: record.mediaType,
    fileSize: record.sizeBytes,
    mimeType: record.mimeType,
    blobUrl: record.objectUrl,
    thumbnailUrl: record.thumbnailUrl,
    description: record.description,
    tags: record.tags,
    uploadedAt: record.uploadedAt.toISOString(),
    updatedAt: record.updatedAt.toISOString(),
  };
}

export function toMediaPageResponse(page: MediaPage): MediaPageResponse {
  return {
    items: page.items.map(toMediaResponse),
    total: page.total,
    page: page.page,
    pageSize: page.pageSize,
  };
}
