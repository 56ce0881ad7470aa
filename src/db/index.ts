// src/db/index.ts
// Database adapter factory: DATABASE_URL postgres://... → PostgresAdapter,
// anything else → SqliteAdapter at the configured file path.

import type { AppConfig } from '../config.js';
import { SqliteAdapter } from './sqlite.js';
import { PostgresAdapter } from './postgres.js';
import type { DbAdapter } from './types.js';

export type { DbAdapter, RunResult, SqlParam } from './types.js';
export { SqliteAdapter } from './sqlite.js';
export { PostgresAdapter } from './postgres.js';
export { initSchema } from './schema.js';

export function createAdapter(database: AppConfig['database']): DbAdapter {
  if (database.driver === 'postgresql') {
    return new PostgresAdapter(database.url);
  }
  return SqliteAdapter.open(database.sqlitePath);
}
