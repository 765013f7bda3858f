import type { FastifyInstance } from 'fastify';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type { CanonicalEntity } from '../../canon/canonicalMap.js';
import { createHarness, type TestHarness } from '../../runs/__tests__/fixtures.js';
import { createApp } from '../../server.js';

const as = (userId: string) => ({ 'x-user-id': userId });

describe('HTTP routes', () => {
  let h: TestHarness;
  let app: FastifyInstance;

  beforeEach(async () => {
    h = await createHarness();
    app = await createApp(h.ctx);
  });

  afterEach(async () => {
    await app.close();
    await h.ctx.queue.stop();
    await h.db.close();
  });

  async function createCampaign() {
    const res = await app.inject({
      method: 'POST',
      url: '/campaigns',
      headers: as('dm-1'),
      payload: { slug: 'barovia', name: 'Curse of Strahd' },
    });
    expect(res.statusCode).toBe(201);
  }

  /** Start and process a run for barovia/session-01; returns its id. */
  async function completeRun(): Promise<string> {
    const res = await app.inject({
      method: 'POST',
      url: '/campaigns/barovia/sessions/session-01/runs',
      headers: as('dm-1'),
    });
    expect(res.statusCode).toBe(202);
    await h.ctx.queue.drain();
    return res.json<{ runId: string }>().runId;
  }

  async function listEntities(userId = 'dm-1'): Promise<CanonicalEntity[]> {
    const res = await app.inject({
      method: 'GET',
      url: '/campaigns/barovia/entities',
      headers: as(userId),
    });
    expect(res.statusCode).toBe(200);
    return res.json<{ entities: CanonicalEntity[] }>().entities;
  }

  describe('campaigns', () => {
    it('creates a campaign with the caller as DM', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/campaigns',
        headers: as('dm-1'),
        payload: { slug: 'barovia', name: 'Curse of Strahd' },
      });

      expect(res.statusCode).toBe(201);
      expect(res.json()).toMatchObject({ slug: 'barovia', name: 'Curse of Strahd', createdBy: 'dm-1' });
    });

    it('refuses duplicates, missing slugs and anonymous callers', async () => {
      await createCampaign();

      const duplicate = await app.inject({
        method: 'POST',
        url: '/campaigns',
        headers: as('dm-2'),
        payload: { slug: 'barovia' },
      });
      expect(duplicate.statusCode).toBe(409);
      expect(duplicate.json()).toEqual({
        error: 'campaign_exists',
        message: 'Campaign barovia already exists',
      });

      const noSlug = await app.inject({
        method: 'POST',
        url: '/campaigns',
        headers: as('dm-1'),
        payload: { name: 'Nameless' },
      });
      expect(noSlug.statusCode).toBe(400);

      const anonymous = await app.inject({ method: 'POST', url: '/campaigns', payload: { slug: 'x' } });
      expect(anonymous.statusCode).toBe(403);
      expect(anonymous.json()).toEqual({
        error: 'not_authorized',
        message: 'The x-user-id header is required',
      });
    });

    it('lets only the DM add members', async () => {
      await createCampaign();

      const byStranger = await app.inject({
        method: 'POST',
        url: '/campaigns/barovia/members',
        headers: as('stranger'),
        payload: { userId: 'stranger', role: 'dm' },
      });
      expect(byStranger.statusCode).toBe(403);

      const badRole = await app.inject({
        method: 'POST',
        url: '/campaigns/barovia/members',
        headers: as('dm-1'),
        payload: { userId: 'player-1', role: 'overlord' },
      });
      expect(badRole.statusCode).toBe(400);
      expect(badRole.json()).toEqual({
        error: 'bad_request',
        message: 'role must be one of: dm, player',
      });

      const added = await app.inject({
        method: 'POST',
        url: '/campaigns/barovia/members',
        headers: as('dm-1'),
        payload: { userId: 'player-1' },
      });
      expect(added.statusCode).toBe(201);
      expect(added.json()).toMatchObject({ userId: 'player-1', role: 'player' });
    });

    it('keeps reads to members', async () => {
      await createCampaign();

      const stranger = await app.inject({
        method: 'GET',
        url: '/campaigns/barovia/sessions',
        headers: as('stranger'),
      });
      expect(stranger.statusCode).toBe(403);
      expect(stranger.json()).toEqual({
        error: 'not_authorized',
        message: 'stranger is not a member of this campaign',
      });

      const missing = await app.inject({
        method: 'GET',
        url: '/campaigns/nowhere/sessions',
        headers: as('dm-1'),
      });
      expect(missing.statusCode).toBe(404);
      expect(missing.json<{ error: string }>().error).toBe('campaign_not_found');

      const sessions = await app.inject({
        method: 'GET',
        url: '/campaigns/barovia/sessions',
        headers: as('dm-1'),
      });
      expect(sessions.json()).toEqual({ sessions: [], count: 0 });
    });
  });

  describe('runs', () => {
    it('enqueues a new run once per transcript', async () => {
      const first = await app.inject({
        method: 'POST',
        url: '/campaigns/barovia/sessions/session-01/runs',
        headers: as('dm-1'),
      });
      expect(first.statusCode).toBe(202);
      const body = first.json<{ runId: string; created: boolean; status: string }>();
      expect(body).toMatchObject({ created: true, status: 'running' });

      const second = await app.inject({
        method: 'POST',
        url: '/campaigns/barovia/sessions/session-01/runs',
        headers: as('dm-1'),
      });
      expect(second.json()).toEqual({ runId: body.runId, created: false, status: 'running' });

      const jobs = await h.ctx.queue.getJobsByRun(body.runId);
      expect(jobs.map((j) => [j.type, j.status])).toEqual([['run:process', 'pending']]);
    });

    it('enqueues again for a running run that lost its job', async () => {
      const first = await app.inject({
        method: 'POST',
        url: '/campaigns/barovia/sessions/session-01/runs',
        headers: as('dm-1'),
      });
      const { runId } = first.json<{ runId: string }>();
      await h.db.run(`UPDATE jobs SET status = 'failed' WHERE run_id = ?`, [runId]);

      const again = await app.inject({
        method: 'POST',
        url: '/campaigns/barovia/sessions/session-01/runs',
        headers: as('dm-1'),
      });
      expect(again.json()).toEqual({ runId, created: false, status: 'running' });

      const statuses = (await h.ctx.queue.getJobsByRun(runId)).map((j) => j.status).sort();
      expect(statuses).toEqual(['failed', 'pending']);
      await h.ctx.queue.drain();
      expect((await h.ctx.stores.runs.getById(runId))?.status).toBe('completed');
    });

    it('reports status to members once the worker has run', async () => {
      const runId = await completeRun();

      const res = await app.inject({ method: 'GET', url: `/runs/${runId}`, headers: as('dm-1') });
      expect(res.statusCode).toBe(200);
      const view = res.json<{ status: string; steps: unknown[]; counters: Record<string, unknown> }>();
      expect(view.status).toBe('completed');
      expect(view.steps).toHaveLength(7);
      expect(view.counters.resolve).toMatchObject({ entities_created: 2 });

      const stranger = await app.inject({ method: 'GET', url: `/runs/${runId}`, headers: as('stranger') });
      expect(stranger.statusCode).toBe(403);

      const unknown = await app.inject({ method: 'GET', url: '/runs/run_nope', headers: as('dm-1') });
      expect(unknown.statusCode).toBe(404);
      expect(unknown.json()).toEqual({ error: 'run_not_found', message: 'Run run_nope not found' });
    });

    it('only resumes partial runs', async () => {
      const runId = await completeRun();

      const res = await app.inject({ method: 'POST', url: `/runs/${runId}/resume`, headers: as('dm-1') });

      expect(res.statusCode).toBe(409);
      expect(res.json()).toEqual({
        error: 'invalid_run_transition',
        message: `Run ${runId} is completed; only partial runs resume`,
      });
    });

    it('resumes a partial run through the queue', async () => {
      h.renderer.failuresLeft = 2;
      const runId = await completeRun();
      expect((await h.ctx.stores.runs.getById(runId))?.status).toBe('partial');

      const res = await app.inject({ method: 'POST', url: `/runs/${runId}/resume`, headers: as('dm-1') });
      expect(res.statusCode).toBe(202);
      await h.ctx.queue.drain();

      expect((await h.ctx.stores.runs.getById(runId))?.status).toBe('completed');
    });

    it('cancels with a default reason', async () => {
      await completeRun();
      const started = await app.inject({
        method: 'POST',
        url: '/campaigns/barovia/sessions/session-01/runs',
        headers: as('dm-1'),
        payload: { reprocess: true },
      });
      const { runId, created } = started.json<{ runId: string; created: boolean }>();
      expect(created).toBe(true);

      const res = await app.inject({ method: 'POST', url: `/runs/${runId}/cancel`, headers: as('dm-1') });

      expect(res.statusCode).toBe(200);
      expect(res.json()).toMatchObject({
        status: 'failed',
        failureReason: 'cancelled: requested by dm-1',
      });
      const jobs = await h.ctx.queue.getJobsByRun(runId);
      expect(jobs.map((j) => j.status)).toEqual(['cancelled']);
    });

    it('reports a missing transcript', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/campaigns/barovia/sessions/session-99/runs',
        headers: as('dm-1'),
      });

      expect(res.statusCode).toBe(404);
      expect(res.json()).toEqual({
        error: 'transcript_not_found',
        message: 'No transcript found for barovia/session-99',
      });
    });
  });

  describe('corrections', () => {
    it('applies a player rename once the DM approves it', async () => {
      await completeRun();
      await app.inject({
        method: 'POST',
        url: '/campaigns/barovia/members',
        headers: as('dm-1'),
        payload: { userId: 'player-1' },
      });
      const crone = (await listEntities()).find((e) => e.canonicalName === 'Baba Yaga');
      if (!crone) throw new Error('expected Baba Yaga to be extracted');

      const submitted = await app.inject({
        method: 'POST',
        url: '/campaigns/barovia/corrections',
        headers: as('player-1'),
        payload: { targetType: 'entity', targetId: crone.id, action: 'rename', payload: { name: 'The Crone' } },
      });
      expect(submitted.statusCode).toBe(201);
      const correction = submitted.json<{ id: string; state: string }>();
      expect(correction.state).toBe('pending');
      expect((await listEntities()).map((e) => e.canonicalName)).toContain('Baba Yaga');

      const badDecision = await app.inject({
        method: 'POST',
        url: `/corrections/${correction.id}/decision`,
        headers: as('dm-1'),
        payload: { decision: 'maybe' },
      });
      expect(badDecision.statusCode).toBe(400);

      const byStranger = await app.inject({
        method: 'POST',
        url: `/corrections/${correction.id}/decision`,
        headers: as('stranger'),
        payload: { decision: 'approve' },
      });
      expect(byStranger.statusCode).toBe(404);
      expect(byStranger.json()).toEqual({
        error: 'correction_not_found',
        message: `Correction ${correction.id} not found`,
      });
      const unknown = await app.inject({
        method: 'POST',
        url: '/corrections/cor_missing/decision',
        headers: as('stranger'),
        payload: { decision: 'approve' },
      });
      expect(unknown.json()).toEqual({
        error: 'correction_not_found',
        message: 'Correction cor_missing not found',
      });

      const byPlayer = await app.inject({
        method: 'POST',
        url: `/corrections/${correction.id}/decision`,
        headers: as('player-1'),
        payload: { decision: 'approve' },
      });
      expect(byPlayer.statusCode).toBe(403);

      const approved = await app.inject({
        method: 'POST',
        url: `/corrections/${correction.id}/decision`,
        headers: as('dm-1'),
        payload: { decision: 'approve' },
      });
      expect(approved.statusCode).toBe(200);
      expect(approved.json()).toMatchObject({ id: correction.id, state: 'approved' });

      const renamed = (await listEntities('player-1')).find((e) => e.id === crone.id);
      expect(renamed).toMatchObject({
        canonicalName: 'The Crone',
        originalName: 'Baba Yaga',
        corrected: true,
      });

      const listed = await app.inject({
        method: 'GET',
        url: '/campaigns/barovia/corrections?state=approved',
        headers: as('player-1'),
      });
      expect(listed.json<{ count: number }>().count).toBe(1);

      const badFilter = await app.inject({
        method: 'GET',
        url: '/campaigns/barovia/corrections?state=bogus',
        headers: as('player-1'),
      });
      expect(badFilter.statusCode).toBe(400);
      expect(badFilter.json()).toEqual({ error: 'bad_request', message: 'Invalid state "bogus"' });
    });

    it('rejects invalid corrections', async () => {
      await createCampaign();

      const res = await app.inject({
        method: 'POST',
        url: '/campaigns/barovia/corrections',
        headers: as('dm-1'),
        payload: { targetType: 'entity', targetId: 'ent_1', action: 'teleport' },
      });

      expect(res.statusCode).toBe(400);
      expect(res.json()).toEqual({
        error: 'invalid_correction',
        message: 'Unknown entity action "teleport"',
      });
    });
  });

  describe('health', () => {
    it('reports the database check', async () => {
      const res = await app.inject({ method: 'GET', url: '/health' });

      expect(res.statusCode).toBe(200);
      expect(res.json()).toMatchObject({ status: 'healthy', checks: { database: { status: 'up' } } });

      const live = await app.inject({ method: 'GET', url: '/health/live' });
      expect(live.json()).toEqual({ alive: true });
      const ready = await app.inject({ method: 'GET', url: '/health/ready' });
      expect(ready.json()).toEqual({ ready: true });
    });
  });
});
