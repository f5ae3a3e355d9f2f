/**
 * PostgreSQL Database Adapter
 *
 * Implements DatabaseAdapter using node-postgres (pg) with connection
 * pooling. A transaction pins one pooled client until it commits or rolls back.
 */

import { Pool, type PoolClient, type PoolConfig } from 'pg';

import { logger } from '../../core/utils/logger.js';
import type { DatabaseAdapter } from '../repository.js';

const log = logger.child('postgresql');

export class PostgreSQLAdapter implements DatabaseAdapter {
  private readonly pool: Pool;
  private transactionClient: PoolClient | null = null;

  constructor(config: PoolConfig) {
    this.pool = new Pool({
      max: 10,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 5000,
      ...config,
    });

    this.pool.on('error', (err: Error) => {
      log.error('Unexpected PostgreSQL pool error', {
        error: err.message,
        stack: err.stack,
      });
    });
  }

  async queryOne<T>(sql: string, params: ReadonlyArray<unknown> = []): Promise<T | null> {
    const rows = await this.query<T>(sql, params);
    return rows[0] ?? null;
  }

  async queryMany<T>(sql: string, params: ReadonlyArray<unknown> = []): Promise<ReadonlyArray<T>> {
    return this.query<T>(sql, params);
  }

  async execute(sql: string, params: ReadonlyArray<unknown> = []): Promise<number> {
    const client = this.transactionClient ?? this.pool;
    const result = await client.query(parameterize(sql), [...params]);
    return result.rowCount ?? 0;
  }

  async transaction<T>(fn: () => Promise<T>): Promise<T> {
    const client = await this.pool.connect();
    this.transactionClient = client;
    try {
      await client.query('BEGIN');
      const result = await fn();
      await client.query('COMMIT');
      return result;
    } catch (error) {
      await client.query('ROLLBACK');
      throw error;
    } finally {
      this.transactionClient = null;
      client.release();
    }
  }

  async initializeSchema(schemaSQL: string): Promise<void> {
    await this.pool.query(schemaSQL);
  }

  async close(): Promise<void> {
    await this.pool.end();
  }

  private async query<T>(sql: string, params: ReadonlyArray<unknown>): Promise<T[]> {
    const client = this.transactionClient ?? this.pool;
    const result = await client.query(parameterize(sql), [...params]);
    // Row shape is fixed by the SELECT list in the repository
    return result.rows as T[];
  }
}

/**
 * Convert SQLite-style ? placeholders to PostgreSQL $1, $2, etc.
 */
export function parameterize(sql: string): string {
  let paramIndex = 1;
  return sql.replace(/\?/g, () => `$${paramIndex++}`);
}
