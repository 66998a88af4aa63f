/**
 * Boundary checks for documents read back from the metadata database
 */

import { Type, plainToInstance } from 'class-transformer';
import {
  IsArray,
  IsDate,
  IsEmail,
  IsIn,
  IsInt,
  IsOptional,
  IsString,
  Min,
  MinLength,
  validateSync,
} from 'class-validator';
import { ERRORS } from '@cloudmedia/common/errors';
import { MEDIA_TYPES, MediaRecord, MediaType, UserRecord } from './records';

export class UserDocument implements UserRecord {
  @IsString()
  @MinLength(1)
  id!: string;

  @IsString()
  username!: string;

  @IsEmail()
  email!: string;

  @IsString()
  passwordHash!: string;

  @Type(() => Date)
  @IsDate()
  createdAt!: Date;
}

export class MediaDocument implements MediaRecord {
  @IsString()
  @MinLength(1)
  id!: string;

  @IsString()
  @MinLength(1)
  ownerId!: string;

  @IsString()
  @MinLength(1)
  storedName!: string;

  @IsString()
  originalName!: string;

  @IsIn(MEDIA_TYPES)
  mediaType!: MediaType;

  @IsInt()
  @Min(0)
  sizeBytes!: number;

  @IsString()
  mimeType!: string;

  @IsString()
  objectUrl!: string;

  @IsOptional()
  @IsString()
  thumbnailUrl!: string | null;

  @IsOptional()
  @IsString()
  description!: string | null;

  @IsOptional()
  @IsArray()
  @IsString({ each: true })
  tags!: string[] | null;

  @Type(() => Date)
  @IsDate()
  uploadedAt!: Date;

  @Type(() => Date)
  @IsDate()
  updatedAt!: Date;
}

type DocumentClass<T> = new () => T;

/**
 * Convert a raw document into its typed form, rejecting anything malformed
 * as a backend failure
 */
export function parseDocument<T extends object>(
  documentClass: DocumentClass<T>,
  plain: object,
  collection: string,
): T {
  const document = plainToInstance(documentClass, plain);
  const errors = validateSync(document);

  if (errors.length > 0) {
    const fields = errors.map((error) => error.property).join(', ');
    throw ERRORS.BackendUnavailable(
      `read from ${collection}`,
      new Error(`Malformed document in ${collection}: invalid ${fields}`),
    );
  }

  return document;
}
