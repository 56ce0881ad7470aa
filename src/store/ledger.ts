// src/store/ledger.ts
// Processing ledger: one durable outcome per source object, plus short-lived
// claims that stop two workers from processing the same object at once.
//
// Tables: processing_ledger, object_claims (see db/schema.ts)

import type { DbAdapter } from "../db/types.js";
import { PipelineError, errorMessage } from "../pipeline/errors.js";

/* ---------- Types ---------- */

export type LedgerStatus = "Processed" | "Failed";

export const MAX_LEDGER_ERROR_LENGTH = 500;

// Domain type
export interface LedgerEntry {
  objectId: string;
  displayName: string;
  status: LedgerStatus;
  error: string;
  recordedAt: string; // ISO string
}

// Row type (snake_case, matches DB)
interface LedgerRow {
  object_id: string;
  display_name: string;
  status: string;
  error: string;
  recorded_at: number | string; // pg returns BIGINT as string
}

/* ---------- Row to Domain Converters ---------- */

function isLedgerStatus(value: string): value is LedgerStatus {
  return value === "Processed" || value === "Failed";
}

function rowToEntry(row: LedgerRow): LedgerEntry {
  return {
    objectId: row.object_id,
    displayName: row.display_name,
    status: isLedgerStatus(row.status) ? row.status : "Failed",
    error: row.error,
    recordedAt: new Date(Number(row.recorded_at)).toISOString(),
  };
}

/* ---------- Store ---------- */

export class LedgerStore {
  constructor(
    private readonly db: DbAdapter,
    private readonly now: () => number = Date.now
  ) {}

  /** True only when the object has a Processed entry. */
  async isProcessed(objectId: string): Promise<boolean> {
    const row = await this.db.queryOne<{ status: string }>(
      `SELECT status FROM processing_ledger WHERE object_id = ?`,
      [objectId]
    );
    return row?.status === "Processed";
  }

  /** Ids of every Processed object, for pre-filtering a listing. */
  async processedIds(): Promise<Set<string>> {
    const rows = await this.db.queryAll<{ object_id: string }>(
      `SELECT object_id FROM processing_ledger WHERE status = 'Processed'`
    );
    return new Set(rows.map((r) => r.object_id));
  }

  /**
   * Upsert the outcome for an object. Last write wins; error text is cut to
   * 500 characters. Driver failures surface as LedgerWriteFailure.
   */
  async recordOutcome(
    objectId: string,
    status: LedgerStatus,
    errorText: string,
    displayName: string
  ): Promise<void> {
    const error = status === "Processed" ? "" : errorText.slice(0, MAX_LEDGER_ERROR_LENGTH);
    try {
      await this.db.run(
        `INSERT INTO processing_ledger (object_id, display_name, status, error, recorded_at)
         VALUES (?, ?, ?, ?, ?)
         ON CONFLICT (object_id) DO UPDATE SET
           display_name = excluded.display_name,
           status = excluded.status,
           error = excluded.error,
           recorded_at = excluded.recorded_at`,
        [objectId, displayName, status, error, this.now()]
      );
    } catch (err) {
      throw new PipelineError(
        "LedgerWriteFailure",
        `Failed to record ${status} for ${objectId}: ${errorMessage(err)}`,
        { objectId, cause: err }
      );
    }
  }

  async getEntry(objectId: string): Promise<LedgerEntry | null> {
    const row = await this.db.queryOne<LedgerRow>(
      `SELECT object_id, display_name, status, error, recorded_at
       FROM processing_ledger WHERE object_id = ?`,
      [objectId]
    );
    return row ? rowToEntry(row) : null;
  }

  async listEntries(status?: LedgerStatus): Promise<LedgerEntry[]> {
    const rows = status
      ? await this.db.queryAll<LedgerRow>(
          `SELECT object_id, display_name, status, error, recorded_at
           FROM processing_ledger WHERE status = ? ORDER BY recorded_at ASC`,
          [status]
        )
      : await this.db.queryAll<LedgerRow>(
          `SELECT object_id, display_name, status, error, recorded_at
           FROM processing_ledger ORDER BY recorded_at ASC`
        );
    return rows.map(rowToEntry);
  }

  /* ---------- Claims ---------- */

  /**
   * Atomically claim an object for `workerId`. Succeeds when nobody holds it,
   * when the same worker already does, or when the existing claim is older
   * than `staleMs`.
   */
  async claim(objectId: string, workerId: string, staleMs: number): Promise<boolean> {
    const now = this.now();
    try {
      const result = await this.db.run(
        `INSERT INTO object_claims (object_id, worker_id, claimed_at)
         VALUES (?, ?, ?)
         ON CONFLICT (object_id) DO UPDATE SET
           worker_id = excluded.worker_id,
           claimed_at = excluded.claimed_at
         WHERE object_claims.worker_id = excluded.worker_id
            OR object_claims.claimed_at < ?`,
        [objectId, workerId, now, now - staleMs]
      );
      return result.changes > 0;
    } catch (err) {
      throw new PipelineError(
        "LedgerWriteFailure",
        `Failed to claim ${objectId}: ${errorMessage(err)}`,
        { objectId, stage: "discovered", cause: err }
      );
    }
  }

  /** Drop a claim held by `workerId`; a claim taken over by someone else stays. */
  async release(objectId: string, workerId: string): Promise<void> {
    await this.db.run(
      `DELETE FROM object_claims WHERE object_id = ? AND worker_id = ?`,
      [objectId, workerId]
    );
  }
}
