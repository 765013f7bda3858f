// src/observability/index.ts
// Central export point for observability.

/* ---------- Logger ---------- */
export {
  createLogger,
  createChildLogger,
  logger,
  getLogLevel,
  isPrettyEnabled,
  type LogLevel,
} from "./logger.js";

/* ---------- Request ID ---------- */
export {
  generateRequestId,
  registerRequestIdHook,
  requestIdGenerator,
  REQUEST_ID_HEADER,
  REQUEST_ID_LENGTH,
} from "./requestId.js";

/* ---------- Request Logger ---------- */
export { registerRequestLogger } from "./requestLogger.js";

/* ---------- Metrics ---------- */
export {
  registry,
  recordHttpRequest,
  recordRunStatus,
  recordStageAttempt,
  recordCorrection,
  recordDroppedMentions,
  recordEvidenceOutcomes,
  updateJobMetrics,
  METRICS_ENABLED,
} from "./metrics.js";

/* ---------- Combined Registration ---------- */
import type { FastifyInstance } from "fastify";
import { registerRequestIdHook } from "./requestId.js";
import { registerRequestLogger } from "./requestLogger.js";

/**
 * Register all observability hooks with Fastify.
 * Call this right after creating the Fastify instance.
 */
export function registerObservability(app: FastifyInstance): void {
  registerRequestIdHook(app);
  registerRequestLogger(app);
}
