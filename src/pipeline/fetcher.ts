// src/pipeline/fetcher.ts
// Resilient retrieval of a remote object into the local temp directory.
//
// Transfers byte ranges chunk by chunk. A transient failure retries the same
// chunk after an exponential backoff, with no attempt limit; anything else
// aborts and removes the partial file.

import fs, { type FileHandle } from "node:fs/promises";
import path from "node:path";
import { createChildLogger, createLogger, type Logger } from "../observability/logger.js";
import { recordRetrievalRetry } from "../observability/metrics.js";
import type { ObjectStore, SourceObject } from "../storage/types.js";
import { computeBackoffDelay, DEFAULT_BACKOFF, sleep, type BackoffOptions, type SleepFn } from "../utils/backoff.js";
import { isTransientError } from "../utils/retryable.js";
import { sanitizeFileName } from "../utils/sanitize.js";
import { PipelineError, errorMessage } from "./errors.js";

const log = createLogger("pipeline/fetcher");

/* ---------- Types ---------- */

export interface LocalHandle {
  path: string;
  sizeBytes: number;
  mimeType: string;
}

export interface ProgressEvent {
  objectId: string;
  percent: number;
  bytes: number;
  totalBytes: number | null;
}

export type ProgressObserver = (event: ProgressEvent) => void;

export interface FetcherOptions {
  tmpDir: string;
  chunkSizeBytes: number;
  backoff?: BackoffOptions;
  sleep?: SleepFn;
  random?: () => number;
  onProgress?: ProgressObserver;
}

/* ---------- Fetcher ---------- */

export class Fetcher {
  private readonly backoff: BackoffOptions;
  private readonly sleep: SleepFn;
  private readonly random: () => number;

  constructor(
    private readonly store: ObjectStore,
    private readonly options: FetcherOptions
  ) {
    if (options.chunkSizeBytes < 1) {
      throw new RangeError("chunkSizeBytes must be at least 1");
    }
    this.backoff = options.backoff ?? DEFAULT_BACKOFF;
    this.sleep = options.sleep ?? sleep;
    this.random = options.random ?? Math.random;
  }

  localPathFor(objectId: string, displayName: string): string {
    return path.join(this.options.tmpDir, `${sanitizeFileName(objectId)}_${sanitizeFileName(displayName)}`);
  }

  async retrieve(objectId: string, displayName: string, onProgress?: ProgressObserver): Promise<LocalHandle> {
    const flog = createChildLogger(log, { objectId, fileName: displayName });
    const observer = onProgress ?? this.options.onProgress;

    const meta = await this.withTransientRetry(flog, "metadata", () => this.store.getObject(objectId));
    const localPath = this.localPathFor(objectId, displayName);
    await fs.mkdir(this.options.tmpDir, { recursive: true });

    const handle = await fs.open(localPath, "w");
    let written = 0;
    try {
      written = await this.transfer(meta, handle, flog, observer);
    } catch (err) {
      await handle.close().catch((closeErr: unknown) => flog.warn({ err: closeErr }, "Closing partial file failed"));
      await fs.rm(localPath, { force: true });
      throw err;
    }
    await handle.close();

    flog.info({ localPath, bytes: written }, "Retrieved object");
    return { path: localPath, sizeBytes: written, mimeType: meta.mimeType };
  }

  private async transfer(
    meta: SourceObject,
    handle: FileHandle,
    flog: Logger,
    observer: ProgressObserver | undefined
  ): Promise<number> {
    const total = meta.sizeBytes;
    const chunk = this.options.chunkSizeBytes;
    let offset = 0;
    let lastPercent = -1;

    const report = () => {
      const percent = total ? Math.floor((offset * 100) / total) : total === 0 ? 100 : 0;
      if (percent === lastPercent) return;
      lastPercent = percent;
      this.notify(observer, { objectId: meta.id, percent, bytes: offset, totalBytes: total }, flog);
    };

    while (total === null || offset < total) {
      const end = total === null ? offset + chunk - 1 : Math.min(offset + chunk, total) - 1;
      const requested = end - offset + 1;
      const bytes = await this.withTransientRetry(flog, `bytes ${offset}-${end}`, () =>
        this.store.readRange(meta.id, offset, end)
      );
      if (bytes.length > 0) {
        await handle.write(bytes);
        offset += bytes.length;
        report();
      }
      // Unknown size: a short read marks the end.
      if (bytes.length === 0 || (total === null && bytes.length < requested)) break;
    }

    if (total !== null && offset < total) {
      throw new PipelineError("RetrievalFailed", `Retrieval failed: received ${offset} of ${total} bytes`, {
        stage: "retrieving",
      });
    }
    if (total === 0) report();
    return offset;
  }

  /**
   * Run `op` until it succeeds or fails permanently. Transient failures wait
   * min(base·2^attempt + jitter, cap) and retry; the count restarts per call.
   */
  private async withTransientRetry<T>(flog: Logger, what: string, op: () => Promise<T>): Promise<T> {
    for (let attempt = 0; ; attempt++) {
      try {
        return await op();
      } catch (err) {
        if (!isTransientError(err)) {
          throw new PipelineError("RetrievalFailed", `Retrieval failed (${what}): ${errorMessage(err)}`, {
            stage: "retrieving",
            cause: err,
          });
        }
        const delayMs = computeBackoffDelay(attempt, this.backoff, this.random);
        recordRetrievalRetry();
        flog.warn({ err, what, attempt: attempt + 1, delayMs: Math.round(delayMs) }, "Transient transfer error, retrying");
        await this.sleep(delayMs);
      }
    }
  }

  private notify(observer: ProgressObserver | undefined, event: ProgressEvent, flog: Logger): void {
    if (!observer) return;
    try {
      observer(event);
    } catch (err) {
      flog.warn({ err }, "Progress observer threw, ignoring");
    }
  }
}
