import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { openDatabase, type SqliteAdapter } from '../../db/index.js';
import { createHarness, type TestHarness } from '../../runs/__tests__/fixtures.js';
import { createJobQueue, type SQLiteJobQueue } from '../queue.js';

describe('SQLiteJobQueue', () => {
  let db: SqliteAdapter;
  let queue: SQLiteJobQueue;

  beforeEach(async () => {
    db = await openDatabase(':memory:');
    queue = createJobQueue(db);
  });

  afterEach(async () => {
    await queue.stop();
    await db.close();
  });

  it('enqueues pending jobs with a single attempt by default', async () => {
    const job = await queue.add('run:process', { runId: 'run_1' }, 'dm-1', 'run_1');

    expect(job).toMatchObject({
      type: 'run:process',
      runId: 'run_1',
      userId: 'dm-1',
      payload: { runId: 'run_1' },
      status: 'pending',
      attempts: 0,
      maxAttempts: 1,
    });
    expect((await queue.getJobsByRun('run_1')).map((j) => j.id)).toEqual([job.id]);
  });

  it('returns false when nothing is due', async () => {
    await queue.add('run:process', { runId: 'run_1' }, 'dm-1', 'run_1', { delay: 60_000 });
    expect(await queue.processNext()).toBe(false);
  });

  it('stores the handler result on success', async () => {
    const handler = vi.fn(async () => ({ ok: true }));
    queue.registerHandler('run:process', handler);
    const job = await queue.add('run:process', { runId: 'run_1' }, 'dm-1');

    expect(await queue.processNext()).toBe(true);

    expect(handler).toHaveBeenCalledTimes(1);
    expect(await queue.getJob(job.id)).toMatchObject({
      status: 'completed',
      attempts: 1,
      result: { ok: true },
      error: null,
    });
  });

  it('fails jobs without a handler', async () => {
    const job = await queue.add('run:resume', { runId: 'run_1' }, 'dm-1');

    await queue.processNext();

    expect(await queue.getJob(job.id)).toMatchObject({
      status: 'failed',
      error: 'No handler registered for job type: run:resume',
    });
  });

  it('requeues a failing job until its attempts are used up', async () => {
    queue.registerHandler('run:process', async () => {
      throw new Error('database busy');
    });
    const job = await queue.add('run:process', {}, 'dm-1', undefined, { maxAttempts: 2 });

    await queue.processNext();
    expect(await queue.getJob(job.id)).toMatchObject({
      status: 'pending',
      attempts: 1,
      error: 'database busy',
    });

    await queue.processNext();
    expect(await queue.getJob(job.id)).toMatchObject({ status: 'failed', attempts: 2 });
  });

  it('takes higher priority first', async () => {
    const seen: string[] = [];
    queue.registerHandler('run:process', async (job) => {
      seen.push(job.id);
      return null;
    });
    const low = await queue.add('run:process', {}, 'dm-1', undefined, { priority: 0 });
    const high = await queue.add('run:process', {}, 'dm-1', undefined, { priority: 5 });

    await queue.drain();

    expect(seen).toEqual([high.id, low.id]);
  });

  it('requeues jobs a dead worker left in processing', async () => {
    const job = await queue.add('run:process', { runId: 'run_1' }, 'dm-1', 'run_1');
    await db.run(
      `UPDATE jobs SET status = 'processing', worker_id = 'worker-gone', started_at = 1, attempts = 1 WHERE id = ?`,
      [job.id]
    );
    queue.registerHandler('run:process', async () => ({ ok: true }));

    expect(await queue.processNext()).toBe(false);
    expect(await queue.recoverStale()).toBe(1);
    expect(await queue.getJob(job.id)).toMatchObject({
      status: 'pending',
      workerId: null,
      startedAt: null,
    });

    await queue.drain();
    expect(await queue.getJob(job.id)).toMatchObject({ status: 'completed', attempts: 2 });
    expect(await queue.recoverStale()).toBe(0);
  });

  it('cancels pending jobs and counts by status', async () => {
    const a = await queue.add('run:process', {}, 'dm-1');
    await queue.add('run:resume', {}, 'dm-1');

    expect(await queue.cancel(a.id)).toBe(true);
    expect(await queue.cancel(a.id)).toBe(false);
    expect(await queue.getStats()).toEqual({
      pending: 1,
      processing: 0,
      completed: 0,
      failed: 0,
      cancelled: 1,
    });
  });
});

describe('run workers', () => {
  let h: TestHarness;

  beforeEach(async () => {
    h = await createHarness();
  });

  afterEach(async () => {
    await h.ctx.queue.stop();
    await h.db.close();
  });

  it('drives a run to completion', async () => {
    const { run } = await h.ctx.runs.startRun('barovia', 'session-01', { requestedBy: 'dm-1' });
    const job = await h.ctx.queue.add('run:process', { runId: run.id }, 'dm-1', run.id);

    await h.ctx.queue.drain();

    expect(await h.ctx.queue.getJob(job.id)).toMatchObject({
      status: 'completed',
      result: { runId: run.id, status: 'completed' },
    });
    expect((await h.ctx.stores.runs.getById(run.id))?.status).toBe('completed');
  });

  it('finishes a run whose job was stranded by a crash', async () => {
    const { run } = await h.ctx.runs.startRun('barovia', 'session-01', { requestedBy: 'dm-1' });
    const job = await h.ctx.queue.add('run:process', { runId: run.id }, 'dm-1', run.id);
    await h.db.run(`UPDATE jobs SET status = 'processing', worker_id = 'worker-gone' WHERE id = ?`, [
      job.id,
    ]);

    await h.ctx.queue.recoverStale();
    await h.ctx.queue.drain();

    expect((await h.ctx.stores.runs.getById(run.id))?.status).toBe('completed');
  });

  it('skips runs that already finished', async () => {
    const { run } = await h.ctx.runs.startRun('barovia', 'session-01');
    await h.ctx.runs.execute(run.id);
    const job = await h.ctx.queue.add('run:process', { runId: run.id }, 'dm-1', run.id);

    await h.ctx.queue.processNext();

    expect(await h.ctx.queue.getJob(job.id)).toMatchObject({
      status: 'completed',
      result: {
        runId: run.id,
        status: 'skipped',
        message: `Run ${run.id} is completed; only running runs execute`,
      },
    });
  });

  it('fails jobs whose payload names no run', async () => {
    const job = await h.ctx.queue.add('run:resume', { note: 'no run here' }, 'dm-1');

    await h.ctx.queue.processNext();

    expect(await h.ctx.queue.getJob(job.id)).toMatchObject({
      status: 'failed',
      error: `Job ${job.id} has no runId in its payload`,
    });
  });
});
