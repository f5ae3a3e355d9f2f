/**
 * SQLite Database Adapter
 *
 * DatabaseAdapter over better-sqlite3. The driver is synchronous; methods
 * return promises to share the interface with PostgreSQL. Transactions use
 * explicit BEGIN/COMMIT so that async callbacks can run inside them.
 */

import Database from 'better-sqlite3';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';

import type { DatabaseAdapter } from '../repository.js';

type SqlParam = string | number | bigint | Buffer | null;

function toSqlParams(params: ReadonlyArray<unknown>): SqlParam[] {
  return params.map((value) => {
    if (value === undefined || value === null) return null;
    if (typeof value === 'boolean') return value ? 1 : 0;
    if (
      typeof value === 'string' ||
      typeof value === 'number' ||
      typeof value === 'bigint' ||
      Buffer.isBuffer(value)
    ) {
      return value;
    }
    if (value instanceof Date) return value.toISOString();
    return JSON.stringify(value);
  });
}

export class SQLiteAdapter implements DatabaseAdapter {
  private readonly db: Database.Database;

  constructor(filepath: string) {
    if (filepath !== ':memory:') {
      mkdirSync(dirname(filepath), { recursive: true });
    }

    this.db = new Database(filepath);
    this.db.pragma('foreign_keys = ON');
    if (filepath !== ':memory:') {
      this.db.pragma('journal_mode = WAL');
    }
  }

  async queryOne<T>(sql: string, params: ReadonlyArray<unknown> = []): Promise<T | null> {
    const row: T | undefined = this.db.prepare<SqlParam[], T>(sql).get(...toSqlParams(params));
    return row ?? null;
  }

  async queryMany<T>(sql: string, params: ReadonlyArray<unknown> = []): Promise<ReadonlyArray<T>> {
    return this.db.prepare<SqlParam[], T>(sql).all(...toSqlParams(params));
  }

  async execute(sql: string, params: ReadonlyArray<unknown> = []): Promise<number> {
    return this.db.prepare<SqlParam[]>(sql).run(...toSqlParams(params)).changes;
  }

  async transaction<T>(fn: () => Promise<T>): Promise<T> {
    this.db.exec('BEGIN');
    try {
      const result = await fn();
      this.db.exec('COMMIT');
      return result;
    } catch (error) {
      this.db.exec('ROLLBACK');
      throw error;
    }
  }

  async initializeSchema(schemaSQL: string): Promise<void> {
    this.db.exec(schemaSQL);
  }

  async close(): Promise<void> {
    this.db.close();
  }
}
