// src/observability/metrics.ts
// Prometheus metrics for the processing pipeline.
//
// The registry is exported so a host process can expose it (e.g. a /metrics
// endpoint or a push gateway job).

import {
  Registry,
  Counter,
  Histogram,
  collectDefaultMetrics,
} from "prom-client";

/* ---------- Configuration ---------- */
const METRICS_PREFIX = process.env.METRICS_PREFIX || "meeting_pipeline";
const METRICS_ENABLED = process.env.METRICS_ENABLED !== "false";

/* ---------- Registry ---------- */
export const registry = new Registry();

registry.setDefaultLabels({
  service: "meeting-pipeline",
});

// Collect default Node.js metrics (memory, CPU, event loop, etc.)
if (METRICS_ENABLED) {
  collectDefaultMetrics({ register: registry, prefix: `${METRICS_PREFIX}_` });
}

/* ---------- Pipeline Metrics ---------- */

export const objectsTotal = new Counter({
  name: `${METRICS_PREFIX}_objects_total`,
  help: "Media objects handled by the pipeline, by outcome",
  labelNames: ["outcome"] as const,
  registers: [registry],
});

export const objectDuration = new Histogram({
  name: `${METRICS_PREFIX}_object_duration_seconds`,
  help: "End-to-end processing time per media object",
  buckets: [5, 15, 30, 60, 120, 300, 600, 1200],
  registers: [registry],
});

export const retrievalRetriesTotal = new Counter({
  name: `${METRICS_PREFIX}_retrieval_retries_total`,
  help: "Chunk transfers retried after a transient error",
  registers: [registry],
});

export const quarantineMovesTotal = new Counter({
  name: `${METRICS_PREFIX}_quarantine_moves_total`,
  help: "Quarantine relocation attempts, by result",
  labelNames: ["status"] as const,
  registers: [registry],
});

/* ---------- AI Metrics ---------- */

export const aiRequestsTotal = new Counter({
  name: `${METRICS_PREFIX}_ai_requests_total`,
  help: "Provider requests, by provider and status",
  labelNames: ["provider", "status"] as const,
  registers: [registry],
});

export const aiRequestDuration = new Histogram({
  name: `${METRICS_PREFIX}_ai_request_duration_seconds`,
  help: "Provider request duration in seconds",
  labelNames: ["provider"] as const,
  buckets: [0.5, 1, 2.5, 5, 10, 30, 60, 120],
  registers: [registry],
});

/* ---------- Helper Functions ---------- */

export type ObjectOutcome = "processed" | "skipped" | "failed";
export type AiRequestStatus = "success" | "error" | "empty";

export function recordObjectOutcome(outcome: ObjectOutcome, durationSeconds?: number): void {
  objectsTotal.inc({ outcome });
  if (typeof durationSeconds === "number") {
    objectDuration.observe(durationSeconds);
  }
}

export function recordAiRequest(
  provider: string,
  status: AiRequestStatus,
  durationSeconds: number
): void {
  aiRequestsTotal.inc({ provider, status });
  aiRequestDuration.observe({ provider }, durationSeconds);
}

export function recordRetrievalRetry(): void {
  retrievalRetriesTotal.inc();
}

export function recordQuarantineMove(status: "moved" | "failed"): void {
  quarantineMovesTotal.inc({ status });
}
