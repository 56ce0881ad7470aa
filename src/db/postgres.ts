// src/db/postgres.ts
// PostgreSQL adapter: the `pg` pool behind DbAdapter.
// SQL keeps SQLite-style '?' placeholders and is rewritten to '$1, $2, ...'.

import { Pool, type QueryResult } from 'pg';
import type { DbAdapter, RunResult, SqlParam } from './types.js';

/**
 * "WHERE object_id = ? AND status = ?" → "WHERE object_id = $1 AND status = $2"
 */
export function toPositional(sql: string): string {
  let i = 0;
  return sql.replace(/\?/g, () => `$${++i}`);
}

export class PostgresAdapter implements DbAdapter {
  readonly dbType = 'postgresql' as const;
  private readonly pool: Pool;

  constructor(connectionString: string) {
    this.pool = new Pool({ connectionString, max: 10 });
  }

  private send(sql: string, params: SqlParam[] = []): Promise<QueryResult> {
    return this.pool.query(sql, params);
  }

  async queryOne<T = Record<string, unknown>>(sql: string, params: SqlParam[] = []): Promise<T | undefined> {
    const result = await this.send(toPositional(sql), params);
    return result.rows[0] as T | undefined;
  }

  async queryAll<T = Record<string, unknown>>(sql: string, params: SqlParam[] = []): Promise<T[]> {
    const result = await this.send(toPositional(sql), params);
    return result.rows as T[];
  }

  async run(sql: string, params: SqlParam[] = []): Promise<RunResult> {
    const result = await this.send(toPositional(sql), params);
    return { changes: result.rowCount ?? 0 };
  }

  async exec(sql: string): Promise<void> {
    await this.send(sql);
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
