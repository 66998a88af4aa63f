import * as path from 'path';
import { v4 as uuidv4 } from 'uuid';

const KEPT_EXTENSION = /^\.[A-Za-z0-9]{1,10}$/;

/**
 * Extension of the uploaded file name, or '' when it is missing or unusual
 */
export function extensionOf(filename: string): string {
  const ext = path.posix.extname(filename.replace(/\\/g, '/'));
  return KEPT_EXTENSION.test(ext) ? ext : '';
}

/**
 * yyyyMMddHHmmss in UTC
 */
export function formatTimestamp(date: Date): string {
  return date.toISOString().replace(/[-:T]/g, '').slice(0, 14);
}

/**
 * `{ownerId}/{yyyyMMddHHmmss}_{8 hex}{ext}`
 */
export function generateStoredName(
  ownerId: string,
  originalFilename: string,
  now: Date,
  randomId: string = uuidv4(),
): string {
  return `${ownerId}/${formatTimestamp(now)}_${randomId.slice(0, 8)}${extensionOf(originalFilename)}`;
}

export function thumbnailNameFor(storedName: string): string {
  const ext = path.posix.extname(storedName);
  const base = ext ? storedName.slice(0, -ext.length) : storedName;
  return `${base}_thumb.jpg`;
}

const CONTENT_TYPES: Record<string, string> = {
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.png': 'image/png',
  '.gif': 'image/gif',
  '.webp': 'image/webp',
  '.mp4': 'video/mp4',
  '.mpeg': 'video/mpeg',
  '.mpg': 'video/mpeg',
  '.mov': 'video/quicktime',
  '.webm': 'video/webm',
};

export function contentTypeFor(storedName: string): string {
  return CONTENT_TYPES[path.posix.extname(storedName).toLowerCase()] ?? 'application/octet-stream';
}
