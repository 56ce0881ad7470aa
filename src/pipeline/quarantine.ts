// src/pipeline/quarantine.ts
// Moves failed objects into a holding folder with the failure reason
// attached, and moves them back after a cool-off window.

import { createChildLogger, createLogger } from "../observability/logger.js";
import { recordQuarantineMove } from "../observability/metrics.js";
import type { LedgerStore } from "../store/ledger.js";
import type { ObjectStore } from "../storage/types.js";
import { computeBackoffDelay, DEFAULT_BACKOFF, sleep, type BackoffOptions, type SleepFn } from "../utils/backoff.js";
import { errorMessage } from "./errors.js";

const log = createLogger("pipeline/quarantine");

export const QUARANTINE_REASON_MAX_CHARS = 300;
export const PROP_ORIGIN = "quarantineOrigin";
export const PROP_QUARANTINED_AT = "quarantinedAt";

/* ---------- Types ---------- */

export interface QuarantineResult {
  moved: boolean;
  attempts: number;
  annotated: boolean;
  /** Last move error when moved is false. */
  error?: string;
}

export interface QuarantineOptions {
  quarantineFolderId: string;
  maxAttempts: number;
  /** Cool-off before a quarantined object is released for another run. */
  retryAfterHours: number;
  /** Release target when an object has no recorded origin. */
  fallbackReleaseFolderId?: string;
  backoff?: BackoffOptions;
  sleep?: SleepFn;
  random?: () => number;
  now?: () => number;
}

export function quarantineDescription(reason: string): string {
  return `Quarantined: ${reason.slice(0, QUARANTINE_REASON_MAX_CHARS)}`;
}

/* ---------- QuarantineManager ---------- */

export class QuarantineManager {
  private readonly backoff: BackoffOptions;
  private readonly sleep: SleepFn;
  private readonly random: () => number;
  private readonly now: () => number;

  constructor(
    private readonly store: ObjectStore,
    private readonly ledger: LedgerStore,
    private readonly options: QuarantineOptions
  ) {
    this.backoff = options.backoff ?? DEFAULT_BACKOFF;
    this.sleep = options.sleep ?? sleep;
    this.random = options.random ?? Math.random;
    this.now = options.now ?? Date.now;
  }

  /**
   * Annotate (best effort) and move the object to the holding folder.
   * Never throws; exhaustion is logged and returned.
   */
  async quarantine(objectId: string, currentContainerId: string, reason: string): Promise<QuarantineResult> {
    const qlog = createChildLogger(log, { objectId });
    let annotated = false;

    try {
      await this.store.annotate(objectId, {
        description: quarantineDescription(reason),
        properties: {
          [PROP_ORIGIN]: currentContainerId,
          [PROP_QUARANTINED_AT]: new Date(this.now()).toISOString(),
        },
      });
      annotated = true;
    } catch (err) {
      qlog.warn({ err }, "Could not annotate quarantined object");
    }

    const move = await this.moveWithRetry(objectId, this.options.quarantineFolderId);
    if (move.moved) {
      recordQuarantineMove("moved");
      qlog.warn({ attempts: move.attempts, reason: reason.slice(0, QUARANTINE_REASON_MAX_CHARS) }, "Object quarantined");
    } else {
      recordQuarantineMove("failed");
      qlog.error({ attempts: move.attempts, error: move.error }, "Quarantine move failed, object left in place");
    }
    return { ...move, annotated };
  }

  /**
   * Move objects quarantined longer than the cool-off back to their origin
   * folder. Objects already Processed stay where they are.
   */
  async releaseExpired(): Promise<string[]> {
    const cutoff = this.now() - this.options.retryAfterHours * 60 * 60 * 1000;
    const objects = await this.store.listObjects(this.options.quarantineFolderId);
    const released: string[] = [];

    for (const obj of objects) {
      const olog = createChildLogger(log, { objectId: obj.id, fileName: obj.name });
      const stamp = Date.parse(obj.properties[PROP_QUARANTINED_AT] || obj.createdTime);
      if (!Number.isFinite(stamp) || stamp > cutoff) continue;

      const target = obj.properties[PROP_ORIGIN] || this.options.fallbackReleaseFolderId;
      if (!target) {
        olog.warn("Quarantined object has no origin folder, leaving it");
        continue;
      }

      try {
        if (await this.ledger.isProcessed(obj.id)) continue;
        const move = await this.moveWithRetry(obj.id, target);
        if (!move.moved) {
          olog.error({ error: move.error }, "Release from quarantine failed");
          continue;
        }
        await this.store.annotate(obj.id, {
          description: "",
          properties: { [PROP_ORIGIN]: "", [PROP_QUARANTINED_AT]: "" },
        });
        released.push(obj.id);
        olog.info({ target }, "Released from quarantine");
      } catch (err) {
        olog.error({ err }, "Release from quarantine failed");
      }
    }

    return released;
  }

  private async moveWithRetry(
    objectId: string,
    targetId: string
  ): Promise<{ moved: boolean; attempts: number; error?: string }> {
    const max = Math.max(1, this.options.maxAttempts);
    let lastError = "";
    for (let attempt = 1; attempt <= max; attempt++) {
      try {
        await this.store.moveObject(objectId, targetId);
        return { moved: true, attempts: attempt };
      } catch (err) {
        lastError = errorMessage(err);
        log.warn({ err, objectId, targetId, attempt, maxAttempts: max }, "Move failed");
        if (attempt < max) {
          await this.sleep(computeBackoffDelay(attempt - 1, this.backoff, this.random));
        }
      }
    }
    return { moved: false, attempts: max, error: lastError };
  }
}
