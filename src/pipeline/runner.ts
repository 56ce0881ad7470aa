// src/pipeline/runner.ts
// One batch run: release cooled-off quarantined objects, discover owner
// folders (root → region → owner), list unprocessed media and process it with
// a concurrency limit.
//
// Failures are isolated per object. The run stops scheduling new objects on
// QuotaExhausted, or on any failure when haltOnFailure is set.

import { createLogger } from "../observability/logger.js";
import type { FolderRef, ObjectStore, SourceObject } from "../storage/types.js";
import { pLimit } from "../utils/concurrency.js";
import type { PipelineContext } from "./context.js";
import { errorMessage, isFatalForRun, toPipelineError, type PipelineErrorKind } from "./errors.js";
import { processObject } from "./processor.js";

const log = createLogger("pipeline/runner");

/* ---------- Types ---------- */

export interface RunOptions {
  concurrency?: number;
  haltOnFailure?: boolean;
  releaseQuarantine?: boolean;
}

export interface RunFailure {
  objectId: string;
  fileName: string;
  kind: PipelineErrorKind;
  message: string;
}

export interface RunSummary {
  startedAt: string;
  finishedAt: string;
  ownerFolders: number;
  folderErrors: number;
  discovered: number;
  processed: number;
  skipped: number;
  failed: number;
  /** Objects never started because the run halted. */
  notAttempted: number;
  failures: RunFailure[];
  released: string[];
  halted: boolean;
  haltReason?: string;
}

export interface OwnerWorkItem {
  object: SourceObject;
  ownerName: string;
}

/* ---------- Discovery ---------- */

/**
 * Owner folders are grandchildren of the root: root/<region>/<owner>.
 * Names in `ignored` (lower-case) are skipped at both levels.
 */
export async function discoverOwnerFolders(
  store: ObjectStore,
  rootFolderId: string,
  ignored: readonly string[]
): Promise<{ folders: FolderRef[]; errors: number }> {
  const keep = (f: FolderRef) => !ignored.includes(f.name.trim().toLowerCase());
  const regions = (await store.listFolders(rootFolderId)).filter(keep);
  const folders: FolderRef[] = [];
  let errors = 0;

  for (const region of regions) {
    try {
      folders.push(...(await store.listFolders(region.id)).filter(keep));
    } catch (err) {
      errors++;
      log.error({ err, folderId: region.id, folder: region.name }, "Could not list region folder");
    }
  }
  return { folders, errors };
}

/** Unprocessed, non-empty media objects of every owner folder, folder by folder. */
export async function collectWork(
  store: ObjectStore,
  folders: readonly FolderRef[],
  processed: ReadonlySet<string>
): Promise<{ items: OwnerWorkItem[]; errors: number }> {
  const items: OwnerWorkItem[] = [];
  const seen = new Set<string>();
  let errors = 0;
  for (const folder of folders) {
    try {
      const objects = await store.listMediaObjects(folder.id);
      for (const object of objects) {
        if (object.sizeBytes === 0) {
          log.debug({ objectId: object.id, fileName: object.name }, "Skipping zero-byte object");
          continue;
        }
        if (processed.has(object.id) || seen.has(object.id)) continue;
        seen.add(object.id);
        items.push({ object, ownerName: folder.name });
      }
    } catch (err) {
      errors++;
      log.error({ err, folderId: folder.id, owner: folder.name }, "Could not list owner folder");
    }
  }
  return { items, errors };
}

/* ---------- Run ---------- */

export async function runBatch(ctx: PipelineContext, options: RunOptions = {}): Promise<RunSummary> {
  const startedAt = new Date().toISOString();
  const concurrency = options.concurrency ?? ctx.settings.concurrency;
  const haltOnFailure = options.haltOnFailure ?? ctx.settings.haltOnFailure;
  const releaseQuarantine = options.releaseQuarantine ?? ctx.settings.autoReleaseQuarantine;

  let released: string[] = [];
  if (releaseQuarantine) {
    try {
      released = await ctx.quarantine.releaseExpired();
      if (released.length > 0) log.info({ count: released.length }, "Released objects from quarantine");
    } catch (err) {
      log.error({ err }, "Quarantine release pass failed");
    }
  }

  const discovery = await discoverOwnerFolders(ctx.store, ctx.settings.rootFolderId, ctx.settings.ignoredFolderNames);
  const processedIds = await ctx.ledger.processedIds();
  const work = await collectWork(ctx.store, discovery.folders, processedIds);

  const summary: RunSummary = {
    startedAt,
    finishedAt: startedAt,
    ownerFolders: discovery.folders.length,
    folderErrors: discovery.errors + work.errors,
    discovered: work.items.length,
    processed: 0,
    skipped: 0,
    failed: 0,
    notAttempted: 0,
    failures: [],
    released,
    halted: false,
  };
  log.info(
    { ownerFolders: summary.ownerFolders, discovered: summary.discovered, concurrency },
    "Batch run started"
  );

  const limit = pLimit(concurrency);
  await Promise.all(
    work.items.map((item) =>
      limit(async () => {
        if (summary.halted) {
          summary.notAttempted++;
          return;
        }
        try {
          const outcome = await processObject(ctx, item.object, item.ownerName);
          if (outcome.status === "processed") summary.processed++;
          else summary.skipped++;
        } catch (err) {
          const failure = toPipelineError(err, "discovered", item.object.id);
          summary.failed++;
          summary.failures.push({
            objectId: item.object.id,
            fileName: item.object.name,
            kind: failure.kind,
            message: errorMessage(failure),
          });
          if (!summary.halted && (isFatalForRun(failure.kind) || haltOnFailure)) {
            summary.halted = true;
            summary.haltReason = `${failure.kind} on ${item.object.name}`;
            log.error({ objectId: item.object.id, kind: failure.kind }, "Halting batch run");
          }
        }
      })
    )
  );

  summary.finishedAt = new Date().toISOString();
  log.info(
    {
      processed: summary.processed,
      skipped: summary.skipped,
      failed: summary.failed,
      notAttempted: summary.notAttempted,
      halted: summary.halted,
    },
    "Batch run finished"
  );
  return summary;
}
