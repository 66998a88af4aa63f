import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { MulterModule } from '@nestjs/platform-express';
import { diskStorage } from 'multer';
import type { AppConfig } from '@cloudmedia/common/config';
import { AuthModule } from '../auth/auth.module';
import { MetadataModule } from '../metadata/metadata.module';
import { ObjectsModule } from '../objects/objects.module';
import { MediaController } from './media.controller';
import { MediaService } from './media.service';
import { ThumbnailService } from './thumbnail.service';

@Module({
  imports: [
    ConfigModule,
    AuthModule,
    MetadataModule,
    ObjectsModule,
    // Uploads are spooled to disk, then streamed to the object store
    MulterModule.registerAsync({
      imports: [ConfigModule],
      inject: [ConfigService],
      useFactory: (config: ConfigService<AppConfig, true>) => ({
        storage: diskStorage({ destination: config.get('uploadTmpDir', { infer: true }) }),
        limits: { fileSize: config.get('maxFileSizeMb', { infer: true }) * 1024 * 1024 },
      }),
    }),
  ],
  controllers: [MediaController],
  providers: [MediaService, ThumbnailService],
})
export class MediaModule {}
