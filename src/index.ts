// src/index.ts
// Library entry: build a context from config and run a batch.
//
//   const ctx = await createPipelineContext(loadConfig());
//   try { await runBatch(ctx); } finally { await ctx.close(); }

export { loadConfig } from "./config.js";
export type { AppConfig, AIProviderName } from "./config.js";

export { createPipelineContext, settingsFromConfig } from "./pipeline/context.js";
export type { PipelineContext, PipelineSettings } from "./pipeline/context.js";
export { runBatch, discoverOwnerFolders, collectWork } from "./pipeline/runner.js";
export type { RunOptions, RunSummary, RunFailure } from "./pipeline/runner.js";
export { processObject } from "./pipeline/processor.js";
export type { ProcessOutcome } from "./pipeline/processor.js";
export { PipelineError, isPipelineError, toPipelineError } from "./pipeline/errors.js";
export type { PipelineErrorKind } from "./pipeline/errors.js";
export { TRANSITIONS, PipelineStateTracker } from "./pipeline/state.js";
export type { PipelineState } from "./pipeline/state.js";
export { Fetcher } from "./pipeline/fetcher.js";
export type { LocalHandle, ProgressObserver } from "./pipeline/fetcher.js";
export { QuarantineManager } from "./pipeline/quarantine.js";
export type { QuarantineResult } from "./pipeline/quarantine.js";

export { Analyzer } from "./ai/analyzer.js";
export type { AnalysisOutcome } from "./ai/analyzer.js";
export { normalizeResponse, extractRecord, coerce, CANONICAL_FIELDS, NA } from "./ai/normalizer/index.js";
export type { CanonicalRecord } from "./ai/normalizer/index.js";

export { LedgerStore } from "./store/ledger.js";
export type { LedgerEntry, LedgerStatus } from "./store/ledger.js";
export { registry as metricsRegistry } from "./observability/metrics.js";
