/**
 * Thumbnail Service
 * JPEG previews of uploaded images, fitted inside the configured box
 */

import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import sharp from 'sharp';
import type { AppConfig } from '@cloudmedia/common/config';

@Injectable()
export class ThumbnailService {
  private readonly maxWidth: number;
  private readonly maxHeight: number;
  private readonly quality: number;

  constructor(configService: ConfigService<AppConfig, true>) {
    this.maxWidth = configService.get('thumbnailMaxWidth', { infer: true });
    this.maxHeight = configService.get('thumbnailMaxHeight', { infer: true });
    this.quality = configService.get('thumbnailQuality', { infer: true });
  }

  /**
   * Transparency is flattened onto white; smaller images are never enlarged.
   * Rejects when the content is not a decodable image.
   */
  async generate(content: Buffer): Promise<Buffer> {
    return sharp(content)
      .rotate()
      .flatten({ background: '#ffffff' })
      .resize(this.maxWidth, this.maxHeight, { fit: 'inside', withoutEnlargement: true })
      .jpeg({ quality: this.quality })
      .toBuffer();
  }
}
