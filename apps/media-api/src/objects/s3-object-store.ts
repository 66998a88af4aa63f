/**
 * S3-compatible Object Store
 * Objects under <S3_BUCKET>/<storedName>, read back through presigned GET URLs
 */

import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  DeleteObjectCommand,
  GetObjectCommand,
  HeadObjectCommand,
  PutObjectCommand,
  S3Client,
} from '@aws-sdk/client-s3';
import { getSignedUrl } from '@aws-sdk/s3-request-presigner';
import { Readable } from 'stream';
import { Clock } from '@cloudmedia/common/clock';
import type { AppConfig } from '@cloudmedia/common/config';
import { ERRORS, describeError } from '@cloudmedia/common/errors';
import { ObjectStore } from './object-store';

// SigV4 presigned URLs cannot outlive seven days
export const MAX_PRESIGN_SECONDS = 7 * 24 * 60 * 60;

export function createS3Client(config: ConfigService<AppConfig, true>): S3Client {
  const accessKeyId = config.get('s3AccessKeyId', { infer: true });
  const secretAccessKey = config.get('s3SecretAccessKey', { infer: true });

  return new S3Client({
    region: config.get('s3Region', { infer: true }),
    endpoint: config.get('s3Endpoint', { infer: true }),
    forcePathStyle: config.get('s3ForcePathStyle', { infer: true }),
    // Without explicit keys the SDK's default provider chain applies
    credentials: accessKeyId && secretAccessKey ? { accessKeyId, secretAccessKey } : undefined,
  });
}

@Injectable()
export class S3ObjectStore extends ObjectStore {
  private readonly logger = new Logger(S3ObjectStore.name);
  private readonly bucket: string;
  private readonly defaultTtlSeconds: number;

  constructor(
    configService: ConfigService<AppConfig, true>,
    clock: Clock,
    private readonly s3: S3Client = createS3Client(configService),
  ) {
    super(clock);
    this.bucket = configService.get('s3Bucket', { infer: true });
    this.defaultTtlSeconds = configService.get('signedUrlTtlSeconds', { infer: true });
  }

  async put(storedName: string, stream: Readable, contentType: string, sizeBytes: number): Promise<string> {
    try {
      await this.s3.send(
        new PutObjectCommand({
          Bucket: this.bucket,
          Key: storedName,
          Body: stream,
          ContentType: contentType,
          ContentLength: sizeBytes,
        }),
      );
    } catch (error) {
      throw ERRORS.BackendUnavailable(`write ${storedName}`, error);
    }

    this.logger.log(`Object written: ${this.bucket}/${storedName} (${sizeBytes} bytes)`);
    return this.signUrl(storedName);
  }

  async delete(storedName: string): Promise<boolean> {
    try {
      // DeleteObject succeeds for missing keys, so existence is checked first
      await this.s3.send(new HeadObjectCommand({ Bucket: this.bucket, Key: storedName }));
    } catch (error) {
      if (error instanceof Error && error.name === 'NotFound') {
        this.logger.warn(`Object not found for deletion: ${this.bucket}/${storedName}`);
      } else {
        this.logger.error(`Failed to look up object ${this.bucket}/${storedName}: ${describeError(error)}`);
      }
      return false;
    }

    try {
      await this.s3.send(new DeleteObjectCommand({ Bucket: this.bucket, Key: storedName }));
      this.logger.log(`Object deleted: ${this.bucket}/${storedName}`);
      return true;
    } catch (error) {
      this.logger.error(`Failed to delete object ${this.bucket}/${storedName}: ${describeError(error)}`);
      return false;
    }
  }

  async signUrl(storedName: string, ttlSeconds = this.defaultTtlSeconds): Promise<string> {
    const command = new GetObjectCommand({ Bucket: this.bucket, Key: storedName });

    try {
      return await getSignedUrl(this.s3, command, {
        expiresIn: Math.min(ttlSeconds, MAX_PRESIGN_SECONDS),
        signingDate: this.clock.now(),
      });
    } catch (error) {
      throw ERRORS.BackendUnavailable(`sign ${storedName}`, error);
    }
  }
}
