/**
 * Creates the metadata tables on startup when they do not exist yet
 */

import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { AppConfig } from '@cloudmedia/common/config';
import { DatabaseService } from '@cloudmedia/common/database';
import { tableName } from './postgres/pg-helpers';

@Injectable()
export class MetadataSchemaService {
  private readonly logger = new Logger(MetadataSchemaService.name);

  constructor(
    private configService: ConfigService<AppConfig, true>,
    private database: DatabaseService,
  ) {}

  async initialize(): Promise<void> {
    if (this.configService.get('metadataDriver', { infer: true }) === 'memory') {
      this.logger.warn('Using the in-memory metadata store; records are lost on restart');
      return;
    }

    const users = tableName(this.configService.get('usersCollection', { infer: true }), 'USERS_COLLECTION');
    const media = tableName(this.configService.get('mediaCollection', { infer: true }), 'MEDIA_COLLECTION');

    await this.database.connect();

    await this.database.query(
      `CREATE TABLE IF NOT EXISTS ${users} (
         id text PRIMARY KEY,
         username text NOT NULL,
         email text NOT NULL UNIQUE,
         password_hash text NOT NULL,
         created_at timestamptz NOT NULL
       )`,
    );

    await this.database.query(
      `CREATE TABLE IF NOT EXISTS ${media} (
         id text PRIMARY KEY,
         owner_id text NOT NULL,
         stored_name text NOT NULL UNIQUE,
         original_name text NOT NULL,
         media_type text NOT NULL CHECK (media_type IN ('image', 'video')),
         size_bytes bigint NOT NULL CHECK (size_bytes >= 0),
         mime_type text NOT NULL,
         object_url text NOT NULL,
         thumbnail_url text,
         description text,
         tags text[],
         uploaded_at timestamptz NOT NULL,
         updated_at timestamptz NOT NULL
       )`,
    );

    await this.database.query(
      `CREATE INDEX IF NOT EXISTS ${media}_owner_uploaded_idx
       ON ${media} (owner_id, uploaded_at DESC, id DESC)`,
    );

    this.logger.log(`Metadata tables ready: ${users}, ${media}`);
  }
}
