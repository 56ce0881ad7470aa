// src/db/types.ts
// Database adapter contract shared by the SQLite and PostgreSQL backends

/* ---------- Result Types ---------- */

export interface RunResult {
  /** Rows inserted, updated or deleted by the statement. */
  changes: number;
}

export type SqlParam = string | number | bigint | null;

/* ---------- DbAdapter Interface ---------- */

/**
 * Async database interface used by every store module.
 *
 * SQL is written once with '?' placeholders; the PostgreSQL adapter rewrites
 * them to '$1, $2, ...'. Statements must stay within the dialect subset both
 * engines accept (INSERT ... ON CONFLICT ... DO UPDATE, no RETURNING reliance).
 */
export interface DbAdapter {
  readonly dbType: 'sqlite' | 'postgresql';

  /** First matching row, or undefined. */
  queryOne<T = Record<string, unknown>>(sql: string, params?: SqlParam[]): Promise<T | undefined>;

  queryAll<T = Record<string, unknown>>(sql: string, params?: SqlParam[]): Promise<T[]>;

  /** INSERT / UPDATE / DELETE. */
  run(sql: string, params?: SqlParam[]): Promise<RunResult>;

  /** Parameterless DDL, possibly several ';'-separated statements. */
  exec(sql: string): Promise<void>;

  close(): Promise<void>;
}
