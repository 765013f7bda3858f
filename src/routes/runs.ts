// src/routes/runs.ts
// Run control. Starting and resuming only enqueue work; the job queue
// drives the RunController.

import type { FastifyInstance, FastifyRequest } from 'fastify';
import { InvalidRunTransition, RunNotFound } from '../canon/errors.js';
import type { Actor } from '../canon/types.js';
import type { AppContext } from '../context.js';
import { RUN_RATE_LIMITS } from '../middleware/rateLimit.js';
import type { Run } from '../store/runs.js';
import { requireActor, requireDm, requireUserId } from './http.js';

interface RunParams {
  id: string;
}

export function createRunRoutes(ctx: AppContext) {
  const { campaigns, runs } = ctx.stores;

  async function loadRun(
    runId: string,
    req: FastifyRequest,
    check: typeof requireActor
  ): Promise<{ run: Run; actor: Actor }> {
    const run = await runs.getById(runId);
    if (!run) throw new RunNotFound(runId);
    const actor = await check(campaigns, run.campaignId, req);
    return { run, actor };
  }

  async function hasLiveJob(runId: string): Promise<boolean> {
    const jobs = await ctx.queue.getJobsByRun(runId);
    return jobs.some((job) => job.status === 'pending' || job.status === 'processing');
  }

  return async function runRoutes(app: FastifyInstance) {
    // -------------------------------------------
    // POST /campaigns/:slug/sessions/:sessionSlug/runs  { reprocess? }
    // An unknown campaign is created with the caller as DM
    // -------------------------------------------
    app.post<{
      Params: { slug: string; sessionSlug: string };
      Body: { reprocess?: unknown } | undefined;
    }>(
      '/campaigns/:slug/sessions/:sessionSlug/runs',
      { config: { rateLimit: RUN_RATE_LIMITS.start } },
      async (req, reply) => {
        const userId = requireUserId(req);
        const { slug, sessionSlug } = req.params;
        const existing = await campaigns.getBySlug(slug);
        if (existing) await requireDm(campaigns, existing.id, req);

        const { run, created } = await ctx.runs.startRun(slug, sessionSlug, {
          reprocess: req.body?.reprocess === true,
          requestedBy: userId,
        });
        // A running run whose job was lost gets a fresh one
        if (created || (run.status === 'running' && !(await hasLiveJob(run.id)))) {
          await ctx.queue.add('run:process', { runId: run.id }, userId, run.id);
        }
        return reply.code(202).send({ runId: run.id, created, status: run.status });
      }
    );

    // -------------------------------------------
    // GET /runs/:id
    // -------------------------------------------
    app.get<{ Params: RunParams }>('/runs/:id', async (req) => {
      const { run } = await loadRun(req.params.id, req, requireActor);
      return ctx.runs.getRunStatus(run.id);
    });

    // -------------------------------------------
    // POST /runs/:id/resume
    // -------------------------------------------
    app.post<{ Params: RunParams }>(
      '/runs/:id/resume',
      { config: { rateLimit: RUN_RATE_LIMITS.resume } },
      async (req, reply) => {
        const { run, actor } = await loadRun(req.params.id, req, requireDm);
        if (run.status !== 'partial') {
          throw new InvalidRunTransition(`Run ${run.id} is ${run.status}; only partial runs resume`);
        }
        const job = await ctx.queue.add('run:resume', { runId: run.id }, actor.userId, run.id);
        return reply.code(202).send({ runId: run.id, jobId: job.id });
      }
    );

    // -------------------------------------------
    // POST /runs/:id/cancel  { reason? }
    // -------------------------------------------
    app.post<{ Params: RunParams; Body: { reason?: unknown } | undefined }>(
      '/runs/:id/cancel',
      async (req) => {
        const { run, actor } = await loadRun(req.params.id, req, requireDm);
        const given = req.body?.reason;
        const reason =
          typeof given === 'string' && given.trim() ? given.trim() : `requested by ${actor.userId}`;
        const cancelled = await ctx.runs.cancelRun(run.id, reason);
        // Queued work for this run would only be skipped later
        for (const job of await ctx.queue.getJobsByRun(run.id)) {
          if (job.status === 'pending') await ctx.queue.cancel(job.id);
        }
        return cancelled;
      }
    );
  };
}
