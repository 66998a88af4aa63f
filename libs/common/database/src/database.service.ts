/**
 * Cloud Media Database Service
 * PostgreSQL connection pooling and query utilities
 */

import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Pool, PoolClient, QueryResult, QueryResultRow } from 'pg';
import retry from 'async-retry';
import type { AppConfig } from '@cloudmedia/common/config';
import { describeError } from '@cloudmedia/common/errors';

export const CONNECT_RETRIES = 5;

@Injectable()
export class DatabaseService implements OnModuleDestroy {
  private readonly logger = new Logger(DatabaseService.name);
  private pool: Pool | null = null;

  constructor(private configService: ConfigService<AppConfig, true>) {}

  async onModuleDestroy() {
    if (this.pool) {
      await this.pool.end();
      this.pool = null;
      this.logger.log('Metadata database pool closed');
    }
  }

  /**
   * Get (and lazily create) the metadata database pool
   */
  getPool(): Pool {
    if (!this.pool) {
      const connectionString = this.configService.get('databaseUrl', { infer: true });
      if (!connectionString) {
        throw new Error('DATABASE_URL is required for the postgres metadata driver');
      }

      this.pool = new Pool({
        connectionString,
        min: 2,
        max: 20,
        connectionTimeoutMillis: 10000,
        idleTimeoutMillis: 30000,
      });
      this.pool.on('error', (err) => {
        this.logger.error(`Idle database client error: ${err.message}`);
      });

      this.logger.log('Metadata database pool initialized');
    }

    return this.pool;
  }

  /**
   * Wait for the database to accept connections (startup only).
   * Request-path queries are never retried.
   */
  async connect(): Promise<void> {
    await retry(
      async () => {
        await this.getPool().query('SELECT 1');
      },
      {
        retries: CONNECT_RETRIES,
        minTimeout: 1000, // 1 second
        maxTimeout: 10000, // 10 seconds
        onRetry: (error, attempt) => {
          this.logger.warn(
            `Database connection attempt ${attempt}/${CONNECT_RETRIES} failed: ${describeError(error)}`,
          );
        },
      },
    );
  }

  async query<T extends QueryResultRow = QueryResultRow>(
    sql: string,
    params: unknown[] = [],
  ): Promise<QueryResult<T>> {
    return this.getPool().query<T>(sql, params);
  }

  /**
   * Execute query and return single row
   */
  async queryOne<T extends QueryResultRow = QueryResultRow>(
    sql: string,
    params: unknown[] = [],
  ): Promise<T | null> {
    const result = await this.query<T>(sql, params);
    return result.rows[0] ?? null;
  }

  /**
   * Execute query and return all rows
   */
  async queryMany<T extends QueryResultRow = QueryResultRow>(
    sql: string,
    params: unknown[] = [],
  ): Promise<T[]> {
    const result = await this.query<T>(sql, params);
    return result.rows;
  }

  /**
   * Acquire a client for a transaction
   */
  async acquireClient(): Promise<PoolClient> {
    return this.getPool().connect();
  }
}
