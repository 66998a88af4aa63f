/**
 * Metadata records and result variants shared by every metadata store
 */

export type MediaType = 'image' | 'video';

export const MEDIA_TYPES: readonly MediaType[] = ['image', 'video'];

export function isMediaType(value: unknown): value is MediaType {
  return value === 'image' || value === 'video';
}

export interface UserRecord {
  id: string;
  username: string;
  email: string;
  passwordHash: string;
  createdAt: Date;
}

export interface MediaRecord {
  id: string;
  ownerId: string;
  storedName: string;
  originalName: string;
  mediaType: MediaType;
  sizeBytes: number;
  mimeType: string;
  objectUrl: string;
  thumbnailUrl: string | null;
  description: string | null;
  tags: string[] | null;
  uploadedAt: Date;
  updatedAt: Date;
}

/**
 * Fields an owner may change; absent keys are left untouched
 */
export interface MediaPatch {
  description?: string | null;
  tags?: string[] | null;
  updatedAt: Date;
}

export type FindResult<T> = { kind: 'found'; value: T } | { kind: 'not_found' };

export type CreateResult<T> = { kind: 'created'; value: T } | { kind: 'already_exists' };

export const found = <T>(value: T): FindResult<T> => ({ kind: 'found', value });
export const notFound = (): { kind: 'not_found' } => ({ kind: 'not_found' });
export const created = <T>(value: T): CreateResult<T> => ({ kind: 'created', value });
export const alreadyExists = (): { kind: 'already_exists' } => ({ kind: 'already_exists' });

export interface PageRequest {
  page: number; // 1-indexed
  pageSize: number;
}

export interface ListMediaOptions extends PageRequest {
  mediaType?: MediaType;
}

export interface Page<T> {
  items: T[];
  total: number;
}

export function pageOffset({ page, pageSize }: PageRequest): number {
  return (page - 1) * pageSize;
}
