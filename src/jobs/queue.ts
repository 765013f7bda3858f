// src/jobs/queue.ts
// SQLite-backed job queue. Runs are enqueued by the HTTP layer and driven
// by a polling worker in the same process.

import { nanoid } from "nanoid";
import { describeError } from "../canon/errors.js";
import type { DbAdapter } from "../db/types.js";
import { createLogger, updateJobMetrics } from "../observability/index.js";
import { oneOf, parseJsonColumn } from "../store/rows.js";
import { newId } from "../utils/ids.js";
import {
  JOB_STATUSES,
  JOB_TYPES,
  type Job,
  type JobHandler,
  type JobOptions,
  type JobRow,
  type JobStats,
  type JobType,
} from "./types.js";

/* ---------- Row to Job Mapper ---------- */
function rowToJob(row: JobRow): Job {
  return {
    id: row.id,
    type: oneOf(JOB_TYPES, row.type, "run:process"),
    runId: row.run_id,
    userId: row.user_id,
    payload: parseJsonColumn(row.payload),
    status: oneOf(JOB_STATUSES, row.status, "failed"),
    priority: row.priority,
    attempts: row.attempts,
    maxAttempts: row.max_attempts,
    createdAt: row.created_at,
    startedAt: row.started_at,
    completedAt: row.completed_at,
    scheduledAt: row.scheduled_at,
    error: row.error,
    result: parseJsonColumn(row.result),
    workerId: row.worker_id,
  };
}

/* ---------- Logger ---------- */
const log = createLogger("jobs/queue");

/* ---------- SQLite Job Queue ---------- */
export class SQLiteJobQueue {
  private handlers: Map<JobType, JobHandler> = new Map();
  private readonly workerId: string;
  private stopped = false;
  private draining: Promise<void> | null = null;
  private pollInterval: ReturnType<typeof setInterval> | null = null;

  constructor(private readonly db: DbAdapter) {
    this.workerId = `worker-${nanoid(8)}`;
  }

  /** Add a job to the queue */
  async add(
    type: JobType,
    payload: unknown,
    userId: string,
    runId?: string,
    options: JobOptions = {}
  ): Promise<Job> {
    const id = newId("job");
    const now = Date.now();

    await this.db.run(
      `INSERT INTO jobs (
         id, type, run_id, user_id, payload, status, priority,
         attempts, max_attempts, created_at, scheduled_at
       ) VALUES (?, ?, ?, ?, ?, 'pending', ?, 0, ?, ?, ?)`,
      [
        id,
        type,
        runId ?? null,
        userId,
        JSON.stringify(payload),
        options.priority ?? 0,
        options.maxAttempts ?? 1,
        now,
        options.delay ? now + options.delay : (options.scheduledAt ?? null),
      ]
    );

    const job = await this.getJob(id);
    if (!job) throw new Error(`Job ${id} vanished after insert`);
    log.debug({ jobId: id, type, runId }, "Job enqueued");
    return job;
  }

  /** Get a job by ID */
  async getJob(id: string): Promise<Job | null> {
    const row = await this.db.queryOne<JobRow>(`SELECT * FROM jobs WHERE id = ?`, [id]);
    return row ? rowToJob(row) : null;
  }

  /** Get jobs for a run */
  async getJobsByRun(runId: string): Promise<Job[]> {
    const rows = await this.db.queryAll<JobRow>(
      `SELECT * FROM jobs WHERE run_id = ? ORDER BY created_at DESC`,
      [runId]
    );
    return rows.map(rowToJob);
  }

  /** Cancel a pending job */
  async cancel(id: string): Promise<boolean> {
    const result = await this.db.run(
      `UPDATE jobs SET status = 'cancelled' WHERE id = ? AND status = 'pending'`,
      [id]
    );
    return result.changes > 0;
  }

  /**
   * Return jobs left in 'processing' by a worker other than this one to
   * 'pending'. Call once at boot, before start(): a process that died
   * mid-job leaves its claim behind.
   */
  async recoverStale(): Promise<number> {
    const result = await this.db.run(
      `UPDATE jobs SET status = 'pending', started_at = NULL, worker_id = NULL
       WHERE status = 'processing' AND (worker_id IS NULL OR worker_id != ?)`,
      [this.workerId]
    );
    if (result.changes > 0) {
      log.warn({ recovered: result.changes, workerId: this.workerId }, "Requeued stale jobs");
    }
    return result.changes;
  }

  /** Register a handler for a job type */
  registerHandler(type: JobType, handler: JobHandler): void {
    this.handlers.set(type, handler);
  }

  /** Process the next pending job; false when nothing was due */
  async processNext(): Promise<boolean> {
    const now = Date.now();

    const next = await this.db.queryOne<{ id: string }>(
      `SELECT id FROM jobs
       WHERE status = 'pending'
         AND (scheduled_at IS NULL OR scheduled_at <= ?)
       ORDER BY priority DESC, created_at ASC
       LIMIT 1`,
      [now]
    );
    if (!next) return false;

    // Claim it; another worker may have taken it in between
    const claim = await this.db.run(
      `UPDATE jobs
       SET status = 'processing', started_at = ?, worker_id = ?, attempts = attempts + 1
       WHERE id = ? AND status = 'pending'`,
      [now, this.workerId, next.id]
    );
    if (claim.changes === 0) return true;

    const job = await this.getJob(next.id);
    if (!job) return false;

    const handler = this.handlers.get(job.type);
    if (!handler) {
      await this.db.run(
        `UPDATE jobs SET status = 'failed', error = ?, completed_at = ? WHERE id = ?`,
        [`No handler registered for job type: ${job.type}`, Date.now(), job.id]
      );
      return true;
    }

    try {
      const result = await handler(job);
      await this.db.run(
        `UPDATE jobs SET status = 'completed', result = ?, completed_at = ? WHERE id = ?`,
        [JSON.stringify(result ?? null), Date.now(), job.id]
      );
    } catch (err) {
      const message = describeError(err);

      if (job.attempts < job.maxAttempts) {
        await this.db.run(
          `UPDATE jobs SET status = 'pending', error = ?, started_at = NULL, worker_id = NULL
           WHERE id = ?`,
          [message, job.id]
        );
      } else {
        await this.db.run(
          `UPDATE jobs SET status = 'failed', error = ?, completed_at = ? WHERE id = ?`,
          [message, Date.now(), job.id]
        );
      }
      log.warn({ jobId: job.id, type: job.type, attempts: job.attempts, err: message }, "Job failed");
    }

    return true;
  }

  /** Process jobs until none are due. Concurrent calls share one pass. */
  drain(): Promise<void> {
    if (!this.draining) {
      this.draining = this.drainLoop().finally(() => {
        this.draining = null;
      });
    }
    return this.draining;
  }

  /** Start the job processor */
  start(intervalMs: number = 1000): void {
    if (this.pollInterval) return;

    this.stopped = false;
    log.info({ workerId: this.workerId }, "Job queue started");

    this.pollInterval = setInterval(() => void this.drain(), intervalMs);
    void this.drain(); // Start immediately
  }

  /** Stop the job processor; resolves once the current pass finishes */
  async stop(): Promise<void> {
    this.stopped = true;
    if (this.pollInterval) {
      clearInterval(this.pollInterval);
      this.pollInterval = null;
    }
    if (this.draining) await this.draining;
    log.info({ workerId: this.workerId }, "Job queue stopped");
  }

  /** Get queue statistics */
  async getStats(): Promise<JobStats> {
    const rows = await this.db.queryAll<{ status: string; count: number }>(
      `SELECT status, COUNT(*) as count FROM jobs GROUP BY status`
    );

    const stats: JobStats = {
      pending: 0,
      processing: 0,
      completed: 0,
      failed: 0,
      cancelled: 0,
    };

    for (const row of rows) {
      const status = oneOf(JOB_STATUSES, row.status, "failed");
      if (status === row.status) stats[status] = row.count;
    }

    updateJobMetrics(stats);
    return stats;
  }

  private async drainLoop(): Promise<void> {
    try {
      while (!this.stopped) {
        const processed = await this.processNext();
        if (!processed) break;
      }
    } catch (err) {
      log.error({ err, workerId: this.workerId }, "Job processing error");
    }
  }
}

export function createJobQueue(db: DbAdapter): SQLiteJobQueue {
  return new SQLiteJobQueue(db);
}
