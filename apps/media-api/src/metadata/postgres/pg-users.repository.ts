import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { QueryResultRow } from 'pg';
import type { AppConfig } from '@cloudmedia/common/config';
import { hasErrorCode } from '@cloudmedia/common/errors';
import { DatabaseService } from '@cloudmedia/common/database';
import { UserDocument, parseDocument } from '../document-schema';
import {
  CreateResult,
  FindResult,
  UserRecord,
  alreadyExists,
  created,
  found,
  notFound,
} from '../records';
import { UsersRepository } from '../users.repository';
import { PG_UNIQUE_VIOLATION, guardBackend, tableName } from './pg-helpers';

interface UserRow extends QueryResultRow {
  id: string;
  username: string;
  email: string;
  password_hash: string;
  created_at: Date;
}

@Injectable()
export class PgUsersRepository extends UsersRepository {
  private readonly table: string;

  constructor(
    private database: DatabaseService,
    configService: ConfigService<AppConfig, true>,
  ) {
    super();
    this.table = tableName(configService.get('usersCollection', { infer: true }), 'USERS_COLLECTION');
  }

  async create(user: UserRecord): Promise<CreateResult<UserRecord>> {
    return guardBackend(`create in ${this.table}`, async () => {
      try {
        await this.database.query(
          `INSERT INTO ${this.table} (id, username, email, password_hash, created_at)
           VALUES ($1, $2, $3, $4, $5)`,
          [user.id, user.username, user.email, user.passwordHash, user.createdAt],
        );
      } catch (error) {
        // Unique violation on id or email
        if (hasErrorCode(error, PG_UNIQUE_VIOLATION)) {
          return alreadyExists();
        }
        throw error;
      }
      return created({ ...user });
    });
  }

  async findById(id: string): Promise<FindResult<UserRecord>> {
    return guardBackend(`read from ${this.table}`, async () => {
      const row = await this.database.queryOne<UserRow>(
        `SELECT id, username, email, password_hash, created_at
         FROM ${this.table}
         WHERE id = $1`,
        [id],
      );
      return row ? found(this.toRecord(row)) : notFound();
    });
  }

  async findByEmail(email: string): Promise<FindResult<UserRecord>> {
    return guardBackend(`read from ${this.table}`, async () => {
      const row = await this.database.queryOne<UserRow>(
        `SELECT id, username, email, password_hash, created_at
         FROM ${this.table}
         WHERE email = $1`,
        [email],
      );
      return row ? found(this.toRecord(row)) : notFound();
    });
  }

  async listAll(): Promise<UserRecord[]> {
    return guardBackend(`list ${this.table}`, async () => {
      const rows = await this.database.queryMany<UserRow>(
        `SELECT id, username, email, password_hash, created_at
         FROM ${this.table}
         ORDER BY created_at ASC, id ASC`,
      );
      return rows.map((row) => this.toRecord(row));
    });
  }

  async updatePasswordHash(id: string, passwordHash: string): Promise<FindResult<UserRecord>> {
    return guardBackend(`update ${this.table}`, async () => {
      const row = await this.database.queryOne<UserRow>(
        `UPDATE ${this.table}
         SET password_hash = $2
         WHERE id = $1
         RETURNING id, username, email, password_hash, created_at`,
        [id, passwordHash],
      );
      return row ? found(this.toRecord(row)) : notFound();
    });
  }

  private toRecord(row: UserRow): UserRecord {
    const document = parseDocument(
      UserDocument,
      {
        id: row.id,
        username: row.username,
        email: row.email,
        passwordHash: row.password_hash,
        createdAt: row.created_at,
      },
      this.table,
    );
    return { ...document };
  }
}
