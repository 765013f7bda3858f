// src/server.ts
// Fastify application: observability hooks, CORS, rate limiting, the error
// mapping and every route group over one AppContext.

import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import type { AppContext } from './context.js';
import { registerRateLimit } from './middleware/rateLimit.js';
import {
  getLogLevel,
  registerObservability,
  requestIdGenerator,
} from './observability/index.js';
import { createCampaignRoutes } from './routes/campaigns.js';
import { createCorrectionRoutes } from './routes/corrections.js';
import { createHealthRoutes } from './routes/health.js';
import { registerErrorHandler } from './routes/http.js';
import { createMetricsRoutes } from './routes/metrics.js';
import { createRunRoutes } from './routes/runs.js';

export async function createApp(ctx: AppContext): Promise<FastifyInstance> {
  const app = Fastify({
    logger: { level: getLogLevel() },
    genReqId: requestIdGenerator,
  });

  // Request ID and request logging hooks
  registerObservability(app);

  await app.register(cors, { origin: true });

  // Must be registered before the routes that opt in
  await registerRateLimit(app);

  registerErrorHandler(app);

  await app.register(createCampaignRoutes(ctx));
  await app.register(createCorrectionRoutes(ctx));
  await app.register(createRunRoutes(ctx));
  await app.register(createHealthRoutes(ctx.db));
  await app.register(createMetricsRoutes(ctx.queue));

  return app;
}
