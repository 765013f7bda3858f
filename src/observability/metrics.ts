// src/observability/metrics.ts
// Prometheus metrics for runs, corrections and evidence integrity.
// Exposed via GET /metrics.

import {
  Registry,
  Counter,
  Histogram,
  Gauge,
  collectDefaultMetrics,
} from "prom-client";

/* ---------- Configuration ---------- */
const METRICS_PREFIX = process.env.METRICS_PREFIX || "lorekeeper";
const METRICS_ENABLED = process.env.METRICS_ENABLED !== "false";

/* ---------- Registry ---------- */
export const registry = new Registry();

registry.setDefaultLabels({
  service: "lorekeeper",
});

if (METRICS_ENABLED) {
  collectDefaultMetrics({ register: registry, prefix: `${METRICS_PREFIX}_` });
}

/* ---------- HTTP Metrics ---------- */

export const httpRequestsTotal = new Counter({
  name: `${METRICS_PREFIX}_http_requests_total`,
  help: "Total number of HTTP requests",
  labelNames: ["method", "route", "status_code"] as const,
  registers: [registry],
});

export const httpRequestDuration = new Histogram({
  name: `${METRICS_PREFIX}_http_request_duration_seconds`,
  help: "HTTP request duration in seconds",
  labelNames: ["method", "route"] as const,
  buckets: [0.01, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10],
  registers: [registry],
});

/* ---------- Run Metrics ---------- */

/**
 * Runs reaching a final (or partial) status
 */
export const runsTotal = new Counter({
  name: `${METRICS_PREFIX}_runs_total`,
  help: "Runs by resulting status",
  labelNames: ["status"] as const,
  registers: [registry],
});

export const runStageAttemptsTotal = new Counter({
  name: `${METRICS_PREFIX}_run_stage_attempts_total`,
  help: "Pipeline stage attempts by stage and outcome",
  labelNames: ["stage", "status"] as const,
  registers: [registry],
});

export const runStageDuration = new Histogram({
  name: `${METRICS_PREFIX}_run_stage_duration_seconds`,
  help: "Pipeline stage attempt duration in seconds",
  labelNames: ["stage"] as const,
  buckets: [0.05, 0.25, 1, 5, 15, 60, 300],
  registers: [registry],
});

/* ---------- Correction Metrics ---------- */

export const correctionsTotal = new Counter({
  name: `${METRICS_PREFIX}_corrections_total`,
  help: "Corrections by action and resulting state",
  labelNames: ["target_type", "action", "state"] as const,
  registers: [registry],
});

/* ---------- Resolution & Evidence Metrics ---------- */

export const mentionsDroppedTotal = new Counter({
  name: `${METRICS_PREFIX}_mentions_dropped_total`,
  help: "Mentions dropped during resolution by reason",
  labelNames: ["reason"] as const,
  registers: [registry],
});

export const evidenceSpansTotal = new Counter({
  name: `${METRICS_PREFIX}_evidence_spans_total`,
  help: "Evidence spans checked by validation outcome",
  labelNames: ["outcome"] as const,
  registers: [registry],
});

export const jobsByStatus = new Gauge({
  name: `${METRICS_PREFIX}_jobs_total`,
  help: "Total number of jobs by status",
  labelNames: ["status"] as const,
  registers: [registry],
});

/* ---------- Helper Functions ---------- */

export function recordHttpRequest(
  method: string,
  route: string,
  statusCode: number,
  durationMs: number
): void {
  if (!METRICS_ENABLED) return;

  httpRequestsTotal.inc({
    method,
    route: normalizeRoute(route),
    status_code: statusCode.toString(),
  });
  httpRequestDuration.observe({ method, route: normalizeRoute(route) }, durationMs / 1000);
}

export function recordRunStatus(status: string): void {
  if (!METRICS_ENABLED) return;
  runsTotal.inc({ status });
}

export function recordStageAttempt(
  stage: string,
  status: "succeeded" | "failed",
  durationMs: number
): void {
  if (!METRICS_ENABLED) return;
  runStageAttemptsTotal.inc({ stage, status });
  runStageDuration.observe({ stage }, durationMs / 1000);
}

export function recordCorrection(targetType: string, action: string, state: string): void {
  if (!METRICS_ENABLED) return;
  correctionsTotal.inc({ target_type: targetType, action, state });
}

export function recordDroppedMentions(reason: string, count: number): void {
  if (!METRICS_ENABLED || count <= 0) return;
  mentionsDroppedTotal.inc({ reason }, count);
}

export function recordEvidenceOutcomes(counts: {
  valid: number;
  repaired: number;
  dropped: number;
}): void {
  if (!METRICS_ENABLED) return;
  for (const [outcome, count] of Object.entries(counts)) {
    if (count > 0) evidenceSpansTotal.inc({ outcome }, count);
  }
}

export function updateJobMetrics(jobs: Record<string, number>): void {
  if (!METRICS_ENABLED) return;
  for (const [status, count] of Object.entries(jobs)) {
    jobsByStatus.set({ status }, count);
  }
}

/* ---------- Route Normalization ---------- */

/**
 * Collapse dynamic segments to keep label cardinality bounded.
 */
export function normalizeRoute(route: string): string {
  const path = route.split("?")[0] ?? route;

  return path
    .replace(/\/(run|cor|ent|thr|cmp|ses)_[a-zA-Z0-9_-]+/g, "/:id")
    .replace(/\/[a-zA-Z0-9_-]{21}/g, "/:id") // nanoid
    .replace(/\/\d+/g, "/:id");
}

export { METRICS_ENABLED };
