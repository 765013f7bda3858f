// src/observability/requestLogger.ts
// Request/response logging with timing and campaign/run context.

import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { createLogger, createChildLogger } from "./logger.js";
import { recordHttpRequest } from "./metrics.js";

/* ---------- Types ---------- */
interface RequestContext {
  requestId: string;
  method: string;
  url: string;
  userId?: string;
  campaignSlug?: string;
  runId?: string;
}

/* ---------- Context Extraction ---------- */

function readParam(params: unknown, key: string): string | undefined {
  if (typeof params !== "object" || params === null) return undefined;
  const value: unknown = Reflect.get(params, key);
  return typeof value === "string" ? value : undefined;
}

function buildRequestContext(req: FastifyRequest): RequestContext {
  const userId = req.headers["x-user-id"];
  const url = req.url;

  return {
    requestId: req.id,
    method: req.method,
    url,
    userId: typeof userId === "string" ? userId : undefined,
    campaignSlug: readParam(req.params, "slug"),
    runId: url.startsWith("/runs/") ? readParam(req.params, "id") : undefined,
  };
}

/* ---------- Hook Registration ---------- */

const baseLogger = createLogger("http");
const requestStartTimes = new WeakMap<FastifyRequest, number>();

/**
 * Logs request completion (level by status code), request errors,
 * and records HTTP metrics.
 */
export function registerRequestLogger(app: FastifyInstance): void {
  app.addHook("onRequest", async (req: FastifyRequest) => {
    requestStartTimes.set(req, Date.now());
  });

  app.addHook("onResponse", async (req: FastifyRequest, reply: FastifyReply) => {
    const startTime = requestStartTimes.get(req);
    const duration = startTime ? Date.now() - startTime : 0;
    requestStartTimes.delete(req);

    const log = createChildLogger(baseLogger, {
      ...buildRequestContext(req),
      statusCode: reply.statusCode,
      duration,
    });

    if (reply.statusCode >= 500) {
      log.error("request failed");
    } else if (reply.statusCode >= 400) {
      log.warn("request error");
    } else {
      log.info("request completed");
    }

    recordHttpRequest(req.method, req.routeOptions.url ?? req.url, reply.statusCode, duration);
  });

  app.addHook("onError", async (req: FastifyRequest, _reply: FastifyReply, error: Error) => {
    const log = createChildLogger(baseLogger, { ...buildRequestContext(req) });
    log.error(
      { err: { message: error.message, name: error.name, stack: error.stack } },
      "request error"
    );
  });
}
