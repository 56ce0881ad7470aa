// src/db/sqlite.ts
// SQLite adapter: better-sqlite3 behind the async DbAdapter interface.
// better-sqlite3 is synchronous, so every method resolves immediately.

import fs from 'node:fs';
import path from 'node:path';
import Database from 'better-sqlite3';
import type { DbAdapter, RunResult, SqlParam } from './types.js';

export class SqliteAdapter implements DbAdapter {
  readonly dbType = 'sqlite' as const;
  private readonly db: Database.Database;

  constructor(db: Database.Database) {
    this.db = db;
  }

  /**
   * Open a database file (parent directories are created) or ':memory:'.
   * File databases run in WAL mode.
   */
  static open(filename: string): SqliteAdapter {
    if (filename !== ':memory:') {
      fs.mkdirSync(path.dirname(filename), { recursive: true });
    }
    const raw = new Database(filename);
    if (filename !== ':memory:') {
      raw.pragma('journal_mode = WAL');
    }
    raw.pragma('busy_timeout = 5000');
    return new SqliteAdapter(raw);
  }

  queryOne<T = Record<string, unknown>>(sql: string, params: SqlParam[] = []): Promise<T | undefined> {
    const row = this.db.prepare(sql).get(...params) as T | undefined;
    return Promise.resolve(row);
  }

  queryAll<T = Record<string, unknown>>(sql: string, params: SqlParam[] = []): Promise<T[]> {
    const rows = this.db.prepare(sql).all(...params) as T[];
    return Promise.resolve(rows);
  }

  run(sql: string, params: SqlParam[] = []): Promise<RunResult> {
    const result = this.db.prepare(sql).run(...params);
    return Promise.resolve({ changes: result.changes });
  }

  exec(sql: string): Promise<void> {
    this.db.exec(sql);
    return Promise.resolve();
  }

  close(): Promise<void> {
    this.db.close();
    return Promise.resolve();
  }
}
