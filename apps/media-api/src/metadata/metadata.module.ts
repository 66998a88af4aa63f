/**
 * Metadata store adapters, selected by METADATA_DRIVER
 */

import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import type { AppConfig } from '@cloudmedia/common/config';
import { DatabaseModule, DatabaseService } from '@cloudmedia/common/database';
import { MediaRepository } from './media.repository';
import { InMemoryMediaRepository } from './memory/in-memory-media.repository';
import { InMemoryUsersRepository } from './memory/in-memory-users.repository';
import { MetadataSchemaService } from './metadata-schema.service';
import { PgMediaRepository } from './postgres/pg-media.repository';
import { PgUsersRepository } from './postgres/pg-users.repository';
import { UsersRepository } from './users.repository';

@Module({
  imports: [ConfigModule, DatabaseModule],
  providers: [
    MetadataSchemaService,
    {
      provide: UsersRepository,
      inject: [ConfigService, DatabaseService],
      useFactory: (config: ConfigService<AppConfig, true>, database: DatabaseService): UsersRepository =>
        config.get('metadataDriver', { infer: true }) === 'memory'
          ? new InMemoryUsersRepository()
          : new PgUsersRepository(database, config),
    },
    {
      provide: MediaRepository,
      inject: [ConfigService, DatabaseService],
      useFactory: (config: ConfigService<AppConfig, true>, database: DatabaseService): MediaRepository =>
        config.get('metadataDriver', { infer: true }) === 'memory'
          ? new InMemoryMediaRepository()
          : new PgMediaRepository(database, config),
    },
  ],
  exports: [UsersRepository, MediaRepository, MetadataSchemaService],
})
export class MetadataModule {}
