// src/db/schema.ts
// Idempotent DDL for the pipeline tables. Timestamps are epoch milliseconds.

import type { DbAdapter } from './types.js';

const TABLES = [
  `CREATE TABLE IF NOT EXISTS processing_ledger (
    object_id    TEXT PRIMARY KEY,
    display_name TEXT NOT NULL DEFAULT '',
    status       TEXT NOT NULL,
    error        TEXT NOT NULL DEFAULT '',
    recorded_at  BIGINT NOT NULL
  )`,
  `CREATE INDEX IF NOT EXISTS idx_processing_ledger_status
    ON processing_ledger (status)`,
  `CREATE TABLE IF NOT EXISTS object_claims (
    object_id  TEXT PRIMARY KEY,
    worker_id  TEXT NOT NULL,
    claimed_at BIGINT NOT NULL
  )`,
  `CREATE TABLE IF NOT EXISTS meeting_records (
    id          TEXT PRIMARY KEY,
    object_id   TEXT NOT NULL,
    file_name   TEXT NOT NULL DEFAULT '',
    record_json TEXT NOT NULL,
    created_at  BIGINT NOT NULL
  )`,
  `CREATE INDEX IF NOT EXISTS idx_meeting_records_object
    ON meeting_records (object_id)`,
];

export async function initSchema(db: DbAdapter): Promise<void> {
  for (const ddl of TABLES) {
    await db.exec(ddl);
  }
}
