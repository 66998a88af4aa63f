import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { QueryResultRow } from 'pg';
import type { AppConfig } from '@cloudmedia/common/config';
import { hasErrorCode } from '@cloudmedia/common/errors';
import { DatabaseService, withTransaction } from '@cloudmedia/common/database';
import { MediaDocument, parseDocument } from '../document-schema';
import { MediaRepository } from '../media.repository';
import {
  CreateResult,
  FindResult,
  ListMediaOptions,
  MediaPatch,
  MediaRecord,
  Page,
  PageRequest,
  alreadyExists,
  created,
  found,
  notFound,
  pageOffset,
} from '../records';
import { PG_UNIQUE_VIOLATION, escapeLike, guardBackend, tableName } from './pg-helpers';

interface MediaRow extends QueryResultRow {
  id: string;
  owner_id: string;
  stored_name: string;
  original_name: string;
  media_type: string;
  size_bytes: string; // bigint arrives as text
  mime_type: string;
  object_url: string;
  thumbnail_url: string | null;
  description: string | null;
  tags: string[] | null;
  uploaded_at: Date;
  updated_at: Date;
}

interface CountRow extends QueryResultRow {
  total: string;
}

const COLUMNS = `id, owner_id, stored_name, original_name, media_type, size_bytes, mime_type,
  object_url, thumbnail_url, description, tags, uploaded_at, updated_at`;

@Injectable()
export class PgMediaRepository extends MediaRepository {
  private readonly table: string;

  constructor(
    private database: DatabaseService,
    configService: ConfigService<AppConfig, true>,
  ) {
    super();
    this.table = tableName(configService.get('mediaCollection', { infer: true }), 'MEDIA_COLLECTION');
  }

  async create(record: MediaRecord): Promise<CreateResult<MediaRecord>> {
    return guardBackend(`create in ${this.table}`, async () => {
      try {
        await this.database.query(
          `INSERT INTO ${this.table} (${COLUMNS})
           VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13)`,
          [
            record.id,
            record.ownerId,
            record.storedName,
            record.originalName,
            record.mediaType,
            record.sizeBytes,
            record.mimeType,
            record.objectUrl,
            record.thumbnailUrl,
            record.description,
            record.tags,
            record.uploadedAt,
            record.updatedAt,
          ],
        );
      } catch (error) {
        if (hasErrorCode(error, PG_UNIQUE_VIOLATION)) {
          return alreadyExists();
        }
        throw error;
      }
      return created({ ...record });
    });
  }

  async findById(id: string, _partitionKey: string): Promise<FindResult<MediaRecord>> {
    // Located by id alone so the caller can tell a foreign record from a missing one
    return guardBackend(`read from ${this.table}`, async () => {
      const row = await this.database.queryOne<MediaRow>(
        `SELECT ${COLUMNS}
         FROM ${this.table}
         WHERE id = $1`,
        [id],
      );
      return row ? found(this.toRecord(row)) : notFound();
    });
  }

  async listPaginated(ownerId: string, options: ListMediaOptions): Promise<Page<MediaRecord>> {
    const params: unknown[] = [ownerId];
    let where = 'owner_id = $1';
    if (options.mediaType) {
      params.push(options.mediaType);
      where += ` AND media_type = $${params.length}`;
    }

    return this.page(`list ${this.table}`, where, params, options);
  }

  async search(ownerId: string, query: string, options: PageRequest): Promise<Page<MediaRecord>> {
    const params: unknown[] = [ownerId, `%${escapeLike(query)}%`, query];
    const where = `owner_id = $1 AND (
        original_name ILIKE $2 ESCAPE '\\'
        OR description ILIKE $2 ESCAPE '\\'
        OR EXISTS (SELECT 1 FROM unnest(tags) AS t(tag) WHERE lower(t.tag) = lower($3))
      )`;

    return this.page(`search ${this.table}`, where, params, options);
  }

  async update(id: string, partitionKey: string, patch: MediaPatch): Promise<FindResult<MediaRecord>> {
    return guardBackend(`update ${this.table}`, async () => {
      const client = await this.database.acquireClient();

      return withTransaction(client, async (tx) => {
        // Lock the row so the read-modify-write cannot interleave with another update
        const locked = await tx.query(
          `SELECT id FROM ${this.table}
           WHERE id = $1 AND owner_id = $2
           FOR UPDATE`,
          [id, partitionKey],
        );
        if (locked.rows.length === 0) {
          return notFound();
        }

        const params: unknown[] = [id, patch.updatedAt];
        const assignments = ['updated_at = $2'];
        if (patch.description !== undefined) {
          params.push(patch.description);
          assignments.push(`description = $${params.length}`);
        }
        if (patch.tags !== undefined) {
          params.push(patch.tags);
          assignments.push(`tags = $${params.length}`);
        }

        const result = await tx.query<MediaRow>(
          `UPDATE ${this.table}
           SET ${assignments.join(', ')}
           WHERE id = $1
           RETURNING ${COLUMNS}`,
          params,
        );
        const [row] = result.rows;
        return row ? found(this.toRecord(row)) : notFound();
      });
    });
  }

  async delete(id: string, partitionKey: string): Promise<boolean> {
    return guardBackend(`delete from ${this.table}`, async () => {
      const result = await this.database.query(
        `DELETE FROM ${this.table}
         WHERE id = $1 AND owner_id = $2`,
        [id, partitionKey],
      );
      return (result.rowCount ?? 0) > 0;
    });
  }

  private async page(
    operation: string,
    where: string,
    params: unknown[],
    { page, pageSize }: PageRequest,
  ): Promise<Page<MediaRecord>> {
    return guardBackend(operation, async () => {
      const count = await this.database.queryOne<CountRow>(
        `SELECT count(*) AS total FROM ${this.table} WHERE ${where}`,
        params,
      );

      const limitIndex = params.length + 1;
      const rows = await this.database.queryMany<MediaRow>(
        `SELECT ${COLUMNS}
         FROM ${this.table}
         WHERE ${where}
         ORDER BY uploaded_at DESC, id DESC
         LIMIT $${limitIndex} OFFSET $${limitIndex + 1}`,
        [...params, pageSize, pageOffset({ page, pageSize })],
      );

      return {
        items: rows.map((row) => this.toRecord(row)),
        total: count ? Number(count.total) : 0,
      };
    });
  }

  private toRecord(row: MediaRow): MediaRecord {
    const document = parseDocument(
      MediaDocument,
      {
        id: row.id,
        ownerId: row.owner_id,
        storedName: row.stored_name,
        originalName: row.original_name,
        mediaType: row.media_type,
        sizeBytes: Number(row.size_bytes),
        mimeType: row.mime_type,
        objectUrl: row.object_url,
        thumbnailUrl: row.thumbnail_url,
        description: row.description,
        tags: row.tags,
        uploadedAt: row.uploaded_at,
        updatedAt: row.updated_at,
      },
      this.table,
    );
    return { ...document };
  }
}
