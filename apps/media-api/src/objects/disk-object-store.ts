/**
 * Disk Object Store
 * Files under <STORAGE_BASE_PATH>/<container>/<storedName>, each with a
 * `<storedName>.meta.json` sidecar holding its content type, read back through
 * HMAC-signed URLs served by the API itself
 */

import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as fs from 'fs/promises';
import { createReadStream, createWriteStream } from 'fs';
import * as path from 'path';
import { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import { Clock } from '@cloudmedia/common/clock';
import type { AppConfig } from '@cloudmedia/common/config';
import { UrlSignerService } from '@cloudmedia/common/crypto';
import { ERRORS, describeError, hasErrorCode } from '@cloudmedia/common/errors';
import { contentTypeFor } from './object-key';
import { ObjectStore } from './object-store';

export interface StoredFile {
  stream: Readable;
  sizeBytes: number;
  contentType: string;
}

interface ObjectMetadata {
  contentType: string;
}

const METADATA_SUFFIX = '.meta.json';

// Generated stored names carry a single extension, so `<name>.meta.json` never names an object
function metadataPathOf(fullPath: string): string {
  return `${fullPath}${METADATA_SUFFIX}`;
}

function isObjectMetadata(value: unknown): value is ObjectMetadata {
  return (
    typeof value === 'object' &&
    value !== null &&
    'contentType' in value &&
    typeof value.contentType === 'string' &&
    value.contentType.length > 0
  );
}

@Injectable()
export class DiskObjectStore extends ObjectStore {
  private readonly logger = new Logger(DiskObjectStore.name);
  private readonly basePath: string;
  private readonly container: string;
  private readonly publicBaseUrl: string;
  private readonly signingSecret: string;
  private readonly defaultTtlSeconds: number;

  constructor(
    configService: ConfigService<AppConfig, true>,
    private urlSigner: UrlSignerService,
    clock: Clock,
  ) {
    super(clock);
    const secret = configService.get('storageSigningSecret', { infer: true });
    if (!secret) {
      throw new Error('STORAGE_SIGNING_SECRET is required for the disk object store');
    }

    this.signingSecret = secret;
    this.basePath = configService.get('storageBasePath', { infer: true });
    this.container = configService.get('storageContainer', { infer: true });
    this.publicBaseUrl = configService.get('publicBaseUrl', { infer: true });
    this.defaultTtlSeconds = configService.get('signedUrlTtlSeconds', { infer: true });
  }

  async put(storedName: string, stream: Readable, contentType: string, sizeBytes: number): Promise<string> {
    const fullPath = this.getFullPath(storedName);
    const metadata: ObjectMetadata = { contentType };

    try {
      await fs.mkdir(path.dirname(fullPath), { recursive: true });
      await pipeline(stream, createWriteStream(fullPath));
      await fs.writeFile(metadataPathOf(fullPath), JSON.stringify(metadata));
    } catch (error) {
      throw ERRORS.BackendUnavailable(`write ${storedName}`, error);
    }

    this.logger.log(`Object written: ${this.container}/${storedName} (${sizeBytes} bytes)`);

    return this.signUrl(storedName);
  }

  async delete(storedName: string): Promise<boolean> {
    try {
      const fullPath = this.getFullPath(storedName);
      await fs.unlink(fullPath);
      await fs.rm(metadataPathOf(fullPath), { force: true });
      this.logger.log(`Object deleted: ${this.container}/${storedName}`);
      return true;
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT')) {
        this.logger.warn(`Object not found for deletion: ${this.container}/${storedName}`);
      } else {
        this.logger.error(`Failed to delete object ${this.container}/${storedName}: ${describeError(error)}`);
      }
      return false;
    }
  }

  async signUrl(storedName: string, ttlSeconds = this.defaultTtlSeconds): Promise<string> {
    this.getFullPath(storedName);

    const expires = Math.floor(this.clock.now().getTime() / 1000) + ttlSeconds;
    const signature = this.urlSigner.sign(this.signingSecret, this.resourceOf(storedName), expires);
    const encodedName = storedName.split('/').map(encodeURIComponent).join('/');

    return `${this.publicBaseUrl}/api/files/${encodedName}?expires=${expires}&signature=${signature}`;
  }

  /**
   * Open an object for a signed download.
   * Throws SignedUrlExpired for a bad or stale signature, ObjectNotFound when the file is gone.
   */
  async openSigned(storedName: string, expires: string | undefined, signature: string | undefined): Promise<StoredFile> {
    const fullPath = this.getFullPath(storedName);
    const expiresAt = Number(expires);
    const nowSeconds = Math.floor(this.clock.now().getTime() / 1000);

    if (
      !signature ||
      !Number.isInteger(expiresAt) ||
      expiresAt < nowSeconds ||
      !this.urlSigner.verify(this.signingSecret, this.resourceOf(storedName), expiresAt, signature)
    ) {
      throw ERRORS.SignedUrlExpired();
    }

    let sizeBytes: number;
    try {
      const stats = await fs.stat(fullPath);
      sizeBytes = stats.size;
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT')) {
        throw ERRORS.ObjectNotFound(storedName);
      }
      throw ERRORS.BackendUnavailable(`read ${storedName}`, error);
    }

    return {
      stream: createReadStream(fullPath),
      sizeBytes,
      contentType: (await this.readContentType(fullPath)) ?? contentTypeFor(storedName),
    };
  }

  /**
   * Content type recorded at write time; null when the sidecar is missing or unreadable
   */
  private async readContentType(fullPath: string): Promise<string | null> {
    let raw: string;
    try {
      raw = await fs.readFile(metadataPathOf(fullPath), 'utf8');
    } catch (error) {
      if (!hasErrorCode(error, 'ENOENT')) {
        this.logger.warn(`Failed to read object metadata ${fullPath}: ${describeError(error)}`);
      }
      return null;
    }

    try {
      const parsed: unknown = JSON.parse(raw);
      return isObjectMetadata(parsed) ? parsed.contentType : null;
    } catch (error) {
      this.logger.warn(`Corrupt object metadata ${fullPath}: ${describeError(error)}`);
      return null;
    }
  }

  private resourceOf(storedName: string): string {
    return `${this.container}/${storedName}`;
  }

  /**
   * Resolve a stored name inside the container directory, refusing absolute
   * paths and `..` segments
   */
  private getFullPath(storedName: string): string {
    const segments = storedName.split('/');
    if (
      storedName.length === 0 ||
      storedName.includes('\\') ||
      storedName.includes('\0') ||
      segments.some((segment) => segment === '' || segment === '.' || segment === '..')
    ) {
      throw ERRORS.InvalidPath(storedName);
    }

    const allowedBase = path.resolve(this.basePath, this.container);
    const resolved = path.resolve(allowedBase, ...segments);

    if (!resolved.startsWith(allowedBase + path.sep)) {
      throw ERRORS.InvalidPath(storedName);
    }

    return resolved;
  }
}
