// src/store/meetingRecords.ts
// Meeting records stored as JSON rows in the pipeline database.
//
// Tables: meeting_records

import { nanoid } from "nanoid";
import { CANONICAL_FIELDS, NA, type CanonicalRecord } from "../ai/normalizer/schema.js";
import type { DbAdapter } from "../db/types.js";
import type { RecordMeta, RecordSink } from "./recordSink.js";

/* ---------- Types ---------- */

export interface StoredMeetingRecord {
  id: string;
  objectId: string;
  fileName: string;
  record: CanonicalRecord;
  createdAt: string; // ISO string
}

interface MeetingRecordRow {
  id: string;
  object_id: string;
  file_name: string;
  record_json: string;
  created_at: number | string;
}

/* ---------- Row to Domain Converters ---------- */

/** Parse stored JSON back into canonical order; missing or bad values become N/A. */
function parseRecord(json: string): CanonicalRecord {
  let parsed: unknown = null;
  try {
    parsed = JSON.parse(json);
  } catch {
    parsed = null;
  }
  const record: Record<string, string> = {};
  for (const field of CANONICAL_FIELDS) {
    const value: unknown = parsed && typeof parsed === "object" ? Reflect.get(parsed, field) : undefined;
    record[field] = typeof value === "string" ? value : NA;
  }
  return record;
}

function rowToRecord(row: MeetingRecordRow): StoredMeetingRecord {
  return {
    id: row.id,
    objectId: row.object_id,
    fileName: row.file_name,
    record: parseRecord(row.record_json),
    createdAt: new Date(Number(row.created_at)).toISOString(),
  };
}

/* ---------- Sink ---------- */

export class DbRecordSink implements RecordSink {
  readonly kind = "db" as const;

  constructor(
    private readonly db: DbAdapter,
    private readonly now: () => number = Date.now
  ) {}

  async append(record: CanonicalRecord, meta: RecordMeta): Promise<void> {
    await this.db.run(
      `INSERT INTO meeting_records (id, object_id, file_name, record_json, created_at)
       VALUES (?, ?, ?, ?, ?)`,
      [nanoid(12), meta.objectId, meta.fileName, JSON.stringify(record), this.now()]
    );
  }

  async listByObject(objectId: string): Promise<StoredMeetingRecord[]> {
    const rows = await this.db.queryAll<MeetingRecordRow>(
      `SELECT id, object_id, file_name, record_json, created_at
       FROM meeting_records WHERE object_id = ? ORDER BY created_at ASC`,
      [objectId]
    );
    return rows.map(rowToRecord);
  }

  async count(): Promise<number> {
    const row = await this.db.queryOne<{ n: number | string }>(`SELECT COUNT(*) AS n FROM meeting_records`);
    return Number(row?.n ?? 0);
  }
}
