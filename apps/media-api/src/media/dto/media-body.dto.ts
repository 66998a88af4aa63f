/**
 * Upload (multipart fields) and update DTOs
 */

import { IsArray, IsOptional, IsString, MaxLength } from 'class-validator';
import { MAX_DESCRIPTION_LENGTH } from '../media-policy';

export class UploadMediaDto {
  @IsOptional()
  @IsString()
  @MaxLength(MAX_DESCRIPTION_LENGTH)
  description?: string;

  // JSON array of strings, e.g. '["beach","2024"]'
  @IsOptional()
  @IsString()
  tags?: string;
}

export class UpdateMediaDto {
  @IsOptional()
  @IsString()
  @MaxLength(MAX_DESCRIPTION_LENGTH)
  description?: string | null;

  @IsOptional()
  @IsArray()
  @IsString({ each: true })
  tags?: string[] | null;
}
