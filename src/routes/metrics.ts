// src/routes/metrics.ts
// GET /metrics in Prometheus text format. Job counts are refreshed on scrape.

import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import type { SQLiteJobQueue } from '../jobs/queue.js';
import { registry } from '../observability/metrics.js';

export function createMetricsRoutes(queue: SQLiteJobQueue) {
  return async function metricsRoutes(app: FastifyInstance) {
    app.get('/metrics', async (_req: FastifyRequest, reply: FastifyReply) => {
      try {
        await queue.getStats();
        const metrics = await registry.metrics();
        return reply.header('Content-Type', registry.contentType).send(metrics);
      } catch (err) {
        app.log.error({ err }, 'Failed to collect metrics');
        return reply.code(500).send({ error: 'metrics_unavailable' });
      }
    });
  };
}
