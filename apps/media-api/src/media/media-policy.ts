/**
 * Upload checks: content type classification, filename decoding, size ceiling, tags and description
 */

import { ERRORS } from '@cloudmedia/common/errors';
import { MediaType } from '../metadata/records';

export const MAX_DESCRIPTION_LENGTH = 500;

export interface MediaTypeMapping {
  image: readonly string[];
  video: readonly string[];
}

/**
 * `Image/JPEG; charset=binary` -> `image/jpeg`
 */
export function normalizeContentType(contentType: string): string {
  return contentType.split(';')[0].trim().toLowerCase();
}

export function classifyContentType(contentType: string, mapping: MediaTypeMapping): MediaType {
  const normalized = normalizeContentType(contentType);

  if (mapping.image.includes(normalized)) {
    return 'image';
  }
  if (mapping.video.includes(normalized)) {
    return 'video';
  }

  throw ERRORS.UnsupportedMediaType(contentType, [...mapping.image, ...mapping.video]);
}

/**
 * Multipart filenames arrive as latin1-decoded UTF-8 bytes; re-read them as UTF-8.
 * Names that are not valid UTF-8 that way, or already hold wider characters, are kept.
 */
export function decodeUploadFilename(filename: string): string {
  if (/[^\u0000-\u00ff]/.test(filename)) {
    return filename;
  }
  const decoded = Buffer.from(filename, 'latin1').toString('utf8');
  return decoded.includes('\ufffd') ? filename : decoded;
}

export function checkFileSize(sizeBytes: number, maxBytes: number): void {
  if (sizeBytes > maxBytes) {
    throw ERRORS.PayloadTooLarge(sizeBytes, maxBytes);
  }
}

/**
 * Accepts a JSON array of strings (multipart form field) or a string array.
 * Duplicates are dropped, keeping the first occurrence.
 */
export function parseTags(raw: string | readonly string[] | null | undefined): string[] | null {
  if (raw === undefined || raw === null) {
    return null;
  }

  let candidate: unknown = raw;
  if (typeof raw === 'string') {
    if (raw.trim() === '') {
      return null;
    }
    try {
      candidate = JSON.parse(raw);
    } catch {
      throw ERRORS.ValidationError('Tags must be a JSON array of strings');
    }
  }

  if (!Array.isArray(candidate) || !candidate.every((tag): tag is string => typeof tag === 'string')) {
    throw ERRORS.ValidationError('Tags must be a JSON array of strings');
  }

  return [...new Set(candidate)];
}

export function checkDescription(description: string | null | undefined): string | null {
  if (description === undefined || description === null) {
    return null;
  }
  if (description.length > MAX_DESCRIPTION_LENGTH) {
    throw ERRORS.ValidationError(`Description must be at most ${MAX_DESCRIPTION_LENGTH} characters`, {
      length: description.length,
      maxLength: MAX_DESCRIPTION_LENGTH,
    });
  }
  return description;
}
