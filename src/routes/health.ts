// src/routes/health.ts
// Health checks with probe support.
// - GET /health        - Status with the database check
// - GET /health/ready  - Readiness probe
// - GET /health/live   - Liveness probe

import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { describeError } from '../canon/errors.js';
import type { DbAdapter } from '../db/types.js';

interface CheckResult {
  status: 'up' | 'down';
  latencyMs: number;
  error?: string;
}

async function checkDatabase(db: DbAdapter): Promise<CheckResult> {
  const started = Date.now();
  try {
    await db.queryOne<{ ok: number }>('SELECT 1 AS ok');
    return { status: 'up', latencyMs: Date.now() - started };
  } catch (err) {
    return { status: 'down', latencyMs: Date.now() - started, error: describeError(err) };
  }
}

export function createHealthRoutes(db: DbAdapter) {
  const startedAt = Date.now();

  return async function healthRoutes(app: FastifyInstance) {
    app.get('/health', async (_req: FastifyRequest, reply: FastifyReply) => {
      const database = await checkDatabase(db);
      const healthy = database.status === 'up';
      return reply.code(healthy ? 200 : 503).send({
        status: healthy ? 'healthy' : 'unhealthy',
        uptimeSeconds: Math.floor((Date.now() - startedAt) / 1000),
        checks: { database },
      });
    });

    app.get('/health/ready', async (_req: FastifyRequest, reply: FastifyReply) => {
      const database = await checkDatabase(db);
      const ready = database.status === 'up';
      return reply.code(ready ? 200 : 503).send({ ready });
    });

    app.get('/health/live', async (_req: FastifyRequest, reply: FastifyReply) => {
      return reply.code(200).send({ alive: true });
    });
  };
}
