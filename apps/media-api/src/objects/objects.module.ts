/**
 * Object store adapters, selected by OBJECT_STORE_DRIVER
 */

import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { Clock } from '@cloudmedia/common/clock';
import type { AppConfig } from '@cloudmedia/common/config';
import { CryptoModule, UrlSignerService } from '@cloudmedia/common/crypto';
import { DiskObjectStore } from './disk-object-store';
import { FilesController } from './files.controller';
import { ObjectStore } from './object-store';
import { S3ObjectStore } from './s3-object-store';

@Module({
  imports: [ConfigModule, CryptoModule],
  controllers: [FilesController],
  providers: [
    {
      provide: ObjectStore,
      inject: [ConfigService, UrlSignerService, Clock],
      useFactory: (
        config: ConfigService<AppConfig, true>,
        urlSigner: UrlSignerService,
        clock: Clock,
      ): ObjectStore =>
        config.get('objectStoreDriver', { infer: true }) === 's3'
          ? new S3ObjectStore(config, clock)
          : new DiskObjectStore(config, urlSigner, clock),
    },
  ],
  exports: [ObjectStore],
})
export class ObjectsModule {}
