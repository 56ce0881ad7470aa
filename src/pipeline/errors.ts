// src/pipeline/errors.ts
// Closed error taxonomy for the processing pipeline.
//
// Policy per kind:
//   TransientTransfer    retried inside the fetcher / quarantine mover
//   RetrievalFailed      fatal for the object
//   TranscriptionEmpty   fatal for the object
//   UnparsableResponse   fatal for the object
//   ProviderUnavailable  triggers provider fallback, never escapes the analyzer alone
//   AnalysisFailed       fatal once every provider is exhausted
//   QuotaExhausted       fatal for the object, halts the batch
//   EnrichmentFailed     fatal for the object
//   PersistenceFailure   fatal for the object
//   LedgerWriteFailure   fatal, surfaced even on the failure path
//   QuarantineFailure    logged and returned, never thrown

import type { PipelineState } from "./state.js";

export type PipelineErrorKind =
  | "TransientTransfer"
  | "RetrievalFailed"
  | "TranscriptionEmpty"
  | "UnparsableResponse"
  | "ProviderUnavailable"
  | "AnalysisFailed"
  | "QuotaExhausted"
  | "EnrichmentFailed"
  | "PersistenceFailure"
  | "LedgerWriteFailure"
  | "QuarantineFailure";

export interface PipelineErrorOptions {
  stage?: PipelineState;
  objectId?: string;
  cause?: unknown;
}

export class PipelineError extends Error {
  readonly kind: PipelineErrorKind;
  stage: PipelineState | undefined;
  objectId: string | undefined;
  /** Set when recording the Failed ledger entry also failed. */
  ledgerError: PipelineError | undefined;

  constructor(kind: PipelineErrorKind, message: string, options: PipelineErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "PipelineError";
    this.kind = kind;
    this.stage = options.stage;
    this.objectId = options.objectId;
    this.ledgerError = undefined;
  }
}

export function isPipelineError(err: unknown): err is PipelineError {
  return err instanceof PipelineError;
}

/** Message text of any thrown value. */
export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === "string") return err;
  try {
    return JSON.stringify(err) ?? String(err);
  } catch {
    return String(err);
  }
}

/** Kind assigned to an unclassified error, by the stage it escaped from. */
const KIND_BY_STAGE: Record<PipelineState, PipelineErrorKind> = {
  discovered: "LedgerWriteFailure",
  claimed: "LedgerWriteFailure",
  retrieving: "RetrievalFailed",
  transcribing: "TranscriptionEmpty",
  analyzing: "AnalysisFailed",
  enriching: "EnrichmentFailed",
  persisting: "PersistenceFailure",
  recording: "LedgerWriteFailure",
  processed: "LedgerWriteFailure",
  failed: "LedgerWriteFailure",
  skipped: "LedgerWriteFailure",
};

/**
 * Classify any thrown value as a PipelineError, filling in stage and object
 * id where the error does not carry them yet.
 */
export function toPipelineError(err: unknown, stage: PipelineState, objectId?: string): PipelineError {
  if (err instanceof PipelineError) {
    err.stage ??= stage;
    err.objectId ??= objectId;
    return err;
  }
  return new PipelineError(KIND_BY_STAGE[stage], errorMessage(err), { stage, objectId, cause: err });
}

/** Errors that stop the whole batch, not only the current object. */
export function isFatalForRun(kind: PipelineErrorKind): boolean {
  return kind === "QuotaExhausted";
}
