// src/pipeline/processor.ts
// One source object through the whole pipeline:
//   claim → dedup check → retrieve → transcribe → analyze → enrich
//   → persist → ledger Processed → move to the processed folder
//
// Any stage failure records a Failed ledger entry, quarantines the object and
// rethrows as a PipelineError. The local media file and the claim are always
// released.

import fs from "node:fs/promises";
import { nanoid } from "nanoid";
import type { CanonicalRecord } from "../ai/normalizer/schema.js";
import { enrichRecord } from "../enrichment/index.js";
import { createLogger, createObjectLogger, setObjectStage, type Logger } from "../observability/logger.js";
import { recordObjectOutcome } from "../observability/metrics.js";
import type { SourceObject } from "../storage/types.js";
import type { PipelineContext } from "./context.js";
import { PipelineError, errorMessage, toPipelineError } from "./errors.js";
import { PipelineStateTracker, isTerminal } from "./state.js";

const log = createLogger("pipeline/processor");

/* ---------- Types ---------- */

export type SkipReason = "already_processed" | "claimed_elsewhere";

export type ProcessOutcome =
  | {
      status: "processed";
      objectId: string;
      record: CanonicalRecord;
      provider: string;
      transcriptChars: number;
    }
  | { status: "skipped"; objectId: string; reason: SkipReason };

/* ---------- Processor ---------- */

export async function processObject(
  ctx: PipelineContext,
  object: SourceObject,
  ownerName: string
): Promise<ProcessOutcome> {
  const olog = createObjectLogger(log, { objectId: object.id, fileName: object.name, owner: ownerName });
  const tracker = new PipelineStateTracker((change) => {
    setObjectStage(olog, change.to);
    olog.debug({ from: change.from }, "State change");
  });
  const started = Date.now();

  // Concurrent tasks of one worker each hold their own claim.
  const claimId = `${ctx.workerId}:${nanoid(6)}`;
  const claimed = await ctx.ledger.claim(object.id, claimId, ctx.settings.claimStaleMs);
  if (!claimed) {
    tracker.transition("skipped");
    olog.info("Object is claimed by another worker, skipping");
    recordObjectOutcome("skipped");
    return { status: "skipped", objectId: object.id, reason: "claimed_elsewhere" };
  }

  let localPath: string | null = null;
  try {
    tracker.transition("claimed");
    if (await ctx.ledger.isProcessed(object.id)) {
      tracker.transition("skipped");
      olog.info("Object already processed, skipping");
      recordObjectOutcome("skipped");
      return { status: "skipped", objectId: object.id, reason: "already_processed" };
    }

    try {
      tracker.transition("retrieving");
      const handle = await ctx.fetcher.retrieve(object.id, object.name);
      localPath = handle.path;

      tracker.transition("transcribing");
      const transcript = await ctx.transcriber.transcribe(handle.path);
      if (!transcript.text.trim()) {
        throw new PipelineError("TranscriptionEmpty", "Transcription produced no text", { stage: "transcribing" });
      }

      tracker.transition("analyzing");
      const analysis = await ctx.analyzer.analyze(transcript.text, object.name);
      if (analysis.kind === "empty") {
        throw analysis.reason === "empty_transcript"
          ? new PipelineError("TranscriptionEmpty", "Transcript is empty", { stage: "analyzing" })
          : new PipelineError("UnparsableResponse", `No JSON record in ${analysis.provider ?? "provider"} response`, {
              stage: "analyzing",
            });
      }

      tracker.transition("enriching");
      const record = enrichRecord(analysis.record, {
        object,
        ownerName,
        transcript: transcript.text,
        durationMinutes: transcript.durationMinutes,
        directory: ctx.directory,
        catalog: ctx.catalog,
      });

      tracker.transition("persisting");
      try {
        await ctx.sink.append(record, { objectId: object.id, fileName: object.name });
      } catch (err) {
        throw new PipelineError("PersistenceFailure", `Could not write record: ${errorMessage(err)}`, {
          stage: "persisting",
          cause: err,
        });
      }

      tracker.transition("recording");
      await ctx.ledger.recordOutcome(object.id, "Processed", "", object.name);
      tracker.transition("processed");

      await moveToProcessed(ctx, object, olog);

      recordObjectOutcome("processed", (Date.now() - started) / 1000);
      olog.info({ provider: analysis.provider, transcriptChars: transcript.text.length }, "Object processed");
      return {
        status: "processed",
        objectId: object.id,
        record,
        provider: analysis.provider,
        transcriptChars: transcript.text.length,
      };
    } catch (err) {
      throw await handleFailure(ctx, object, tracker, err, olog);
    }
  } finally {
    if (localPath) {
      const toRemove = localPath;
      await fs.rm(toRemove, { force: true }).catch((err: unknown) => {
        olog.warn({ err, localPath: toRemove }, "Could not remove local media file");
      });
    }
    await ctx.ledger.release(object.id, claimId).catch((err: unknown) => {
      olog.warn({ err }, "Could not release claim");
    });
  }
}

/**
 * Failure path: Failed ledger entry, then quarantine. Returns the error of
 * record for the caller to throw.
 */
async function handleFailure(
  ctx: PipelineContext,
  object: SourceObject,
  tracker: PipelineStateTracker,
  err: unknown,
  olog: Logger
): Promise<PipelineError> {
  const failure = toPipelineError(err, tracker.state, object.id);
  if (!isTerminal(tracker.state)) tracker.transition("failed");
  olog.error({ err: failure, kind: failure.kind, stage: failure.stage }, "Object failed");

  try {
    await ctx.ledger.recordOutcome(object.id, "Failed", `${failure.kind}: ${failure.message}`, object.name);
  } catch (ledgerErr) {
    failure.ledgerError = toPipelineError(ledgerErr, "failed", object.id);
    olog.error({ err: ledgerErr }, "Could not record Failed ledger entry");
  }

  await ctx.quarantine.quarantine(object.id, object.containerId, `${failure.kind}: ${failure.message}`);
  recordObjectOutcome("failed");
  return failure;
}

async function moveToProcessed(ctx: PipelineContext, object: SourceObject, olog: Logger): Promise<void> {
  const target = ctx.settings.processedFolderId;
  if (!target || target === object.containerId) return;
  try {
    await ctx.store.moveObject(object.id, target);
  } catch (err) {
    olog.warn({ err, target }, "Processed object could not be moved");
  }
}
