/**
 * List and search query DTOs
 */

import { Type } from 'class-transformer';
import { IsIn, IsInt, IsNotEmpty, IsOptional, IsString, Max, Min } from 'class-validator';
import { MEDIA_TYPES, MediaType } from '../../metadata/records';

export class PageQueryDto {
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  page?: number;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(100)
  pageSize?: number;
}

export class ListMediaQueryDto extends PageQueryDto {
  @IsOptional()
  @IsIn(MEDIA_TYPES)
  mediaType?: MediaType;
}

export class SearchMediaQueryDto extends PageQueryDto {
  @IsString()
  @IsNotEmpty()
  query!: string;
}
