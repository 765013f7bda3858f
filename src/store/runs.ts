// src/store/runs.ts
// Runs and their step history. Step rows are appended per attempt and never
// rewritten once finished; the first attempt of a stage reuses the pending
// row created with the run.
//
// Tables: runs, run_steps

import type { DbAdapter } from '../db/types.js';
import {
  RUN_STATUSES,
  STAGES,
  STEP_STATUSES,
  type RunStatus,
  type StageCounters,
  type StageName,
  type StepStatus,
} from '../runs/types.js';
import { newId } from '../utils/ids.js';
import { oneOf, parseJsonColumn } from './rows.js';

/* ---------- Types ---------- */

export interface Run {
  id: string;
  campaignId: string;
  sessionId: string;
  transcriptHash: string;
  promptVersion: string;
  model: string;
  idempotencyKey: string;
  status: RunStatus;
  failureReason: string | null;
  cancelRequestedAt: number | null;
  cancelReason: string | null;
  createdAt: number;
  finishedAt: number | null;
}

export interface RunStep {
  id: string;
  runId: string;
  name: StageName;
  attempt: number;
  status: StepStatus;
  startedAt: number | null;
  finishedAt: number | null;
  error: string | null;
  result: StageCounters | null;
  seq: number;
}

export type NewRun = Omit<
  Run,
  'status' | 'failureReason' | 'cancelRequestedAt' | 'cancelReason' | 'finishedAt'
>;

export const MAX_STEP_ERROR_LENGTH = 2000;

export interface RunStore {
  /** Insert a running run with one pending step per stage. */
  create(run: NewRun, stages: readonly StageName[]): Promise<Run>;
  getById(id: string): Promise<Run | null>;
  findRunningForSession(sessionId: string): Promise<Run | null>;
  /** Most recent run with this idempotency key. */
  findByKey(idempotencyKey: string): Promise<Run | null>;
  listBySession(sessionId: string): Promise<Run[]>;

  listSteps(runId: string): Promise<RunStep[]>;
  /** Latest step row per stage. */
  latestSteps(runId: string): Promise<Map<StageName, RunStep>>;
  /** Mark a stage attempt as running, appending a row after the first attempt. */
  startAttempt(runId: string, stage: StageName, now: number): Promise<RunStep>;
  finishStep(
    stepId: string,
    status: 'succeeded' | 'failed',
    outcome: { error?: string | null; result?: StageCounters | null },
    now: number
  ): Promise<void>;

  setStatus(
    runId: string,
    status: RunStatus,
    opts?: { failureReason?: string | null; finishedAt?: number | null }
  ): Promise<void>;
  /** Record a cancellation request; false unless the run is running. */
  requestCancel(runId: string, reason: string, now: number): Promise<boolean>;
}

/* ---------- Rows ---------- */

interface RunRow {
  id: string;
  campaign_id: string;
  session_id: string;
  transcript_hash: string;
  prompt_version: string;
  model: string;
  idempotency_key: string;
  status: string;
  failure_reason: string | null;
  cancel_requested_at: number | null;
  cancel_reason: string | null;
  created_at: number;
  finished_at: number | null;
}

interface RunStepRow {
  id: string;
  run_id: string;
  name: string;
  attempt: number;
  status: string;
  started_at: number | null;
  finished_at: number | null;
  error: string | null;
  result: string | null;
  seq: number;
}

function rowToRun(row: RunRow): Run {
  return {
    id: row.id,
    campaignId: row.campaign_id,
    sessionId: row.session_id,
    transcriptHash: row.transcript_hash,
    promptVersion: row.prompt_version,
    model: row.model,
    idempotencyKey: row.idempotency_key,
    status: oneOf(RUN_STATUSES, row.status, 'failed'),
    failureReason: row.failure_reason,
    cancelRequestedAt: row.cancel_requested_at,
    cancelReason: row.cancel_reason,
    createdAt: row.created_at,
    finishedAt: row.finished_at,
  };
}

function parseCounters(json: string | null): StageCounters | null {
  const value = parseJsonColumn(json);
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return null;
  const counters: StageCounters = {};
  for (const [key, n] of Object.entries(value)) {
    if (typeof n === 'number') counters[key] = n;
  }
  return counters;
}

function rowToStep(row: RunStepRow): RunStep {
  return {
    id: row.id,
    runId: row.run_id,
    name: oneOf(STAGES, row.name, 'ingest'),
    attempt: row.attempt,
    status: oneOf(STEP_STATUSES, row.status, 'failed'),
    startedAt: row.started_at,
    finishedAt: row.finished_at,
    error: row.error,
    result: parseCounters(row.result),
    seq: row.seq,
  };
}

function truncateError(error: string | null | undefined): string | null {
  if (!error) return null;
  return error.length > MAX_STEP_ERROR_LENGTH ? error.slice(0, MAX_STEP_ERROR_LENGTH) : error;
}

/* ---------- Store ---------- */

export function createRunStore(db: DbAdapter): RunStore {
  const store: RunStore = {
    async create(run, stages) {
      await db.transaction(async (tx) => {
        await tx.run(
          `INSERT INTO runs (
             id, campaign_id, session_id, transcript_hash, prompt_version, model,
             idempotency_key, status, created_at
           ) VALUES (?, ?, ?, ?, ?, ?, ?, 'running', ?)`,
          [
            run.id,
            run.campaignId,
            run.sessionId,
            run.transcriptHash,
            run.promptVersion,
            run.model,
            run.idempotencyKey,
            run.createdAt,
          ]
        );
        let seq = 0;
        for (const name of stages) {
          await tx.run(
            `INSERT INTO run_steps (id, run_id, name, attempt, status, seq)
             VALUES (?, ?, ?, 1, 'pending', ?)`,
            [newId('stp'), run.id, name, seq++]
          );
        }
      });
      return {
        ...run,
        status: 'running',
        failureReason: null,
        cancelRequestedAt: null,
        cancelReason: null,
        finishedAt: null,
      };
    },

    async getById(id) {
      const row = await db.queryOne<RunRow>(`SELECT * FROM runs WHERE id = ?`, [id]);
      return row ? rowToRun(row) : null;
    },

    async findRunningForSession(sessionId) {
      const row = await db.queryOne<RunRow>(
        `SELECT * FROM runs WHERE session_id = ? AND status = 'running'
         ORDER BY created_at DESC, id DESC LIMIT 1`,
        [sessionId]
      );
      return row ? rowToRun(row) : null;
    },

    async findByKey(idempotencyKey) {
      const row = await db.queryOne<RunRow>(
        `SELECT * FROM runs WHERE idempotency_key = ?
         ORDER BY created_at DESC, id DESC LIMIT 1`,
        [idempotencyKey]
      );
      return row ? rowToRun(row) : null;
    },

    async listBySession(sessionId) {
      const rows = await db.queryAll<RunRow>(
        `SELECT * FROM runs WHERE session_id = ? ORDER BY created_at DESC, id DESC`,
        [sessionId]
      );
      return rows.map(rowToRun);
    },

    async listSteps(runId) {
      const rows = await db.queryAll<RunStepRow>(
        `SELECT * FROM run_steps WHERE run_id = ? ORDER BY seq ASC`,
        [runId]
      );
      return rows.map(rowToStep);
    },

    async latestSteps(runId) {
      const latest = new Map<StageName, RunStep>();
      for (const step of await store.listSteps(runId)) {
        latest.set(step.name, step);
      }
      return latest;
    },

    async startAttempt(runId, stage, now) {
      const latest = (await store.latestSteps(runId)).get(stage);

      if (latest && latest.status === 'pending') {
        await db.run(`UPDATE run_steps SET status = 'running', started_at = ? WHERE id = ?`, [
          now,
          latest.id,
        ]);
        return { ...latest, status: 'running', startedAt: now };
      }

      const seqRow = await db.queryOne<{ next: number }>(
        `SELECT COALESCE(MAX(seq), -1) + 1 AS next FROM run_steps WHERE run_id = ?`,
        [runId]
      );
      const step: RunStep = {
        id: newId('stp'),
        runId,
        name: stage,
        attempt: (latest?.attempt ?? 0) + 1,
        status: 'running',
        startedAt: now,
        finishedAt: null,
        error: null,
        result: null,
        seq: seqRow?.next ?? 0,
      };
      await db.run(
        `INSERT INTO run_steps (id, run_id, name, attempt, status, started_at, seq)
         VALUES (?, ?, ?, ?, 'running', ?, ?)`,
        [step.id, runId, stage, step.attempt, now, step.seq]
      );
      return step;
    },

    async finishStep(stepId, status, outcome, now) {
      await db.run(
        `UPDATE run_steps SET status = ?, finished_at = ?, error = ?, result = ? WHERE id = ?`,
        [
          status,
          now,
          truncateError(outcome.error),
          outcome.result ? JSON.stringify(outcome.result) : null,
          stepId,
        ]
      );
    },

    async setStatus(runId, status, opts = {}) {
      await db.run(
        `UPDATE runs SET status = ?, failure_reason = ?, finished_at = ? WHERE id = ?`,
        [status, opts.failureReason ?? null, opts.finishedAt ?? null, runId]
      );
    },

    async requestCancel(runId, reason, now) {
      const result = await db.run(
        `UPDATE runs SET cancel_requested_at = ?, cancel_reason = ?
         WHERE id = ? AND status = 'running' AND cancel_requested_at IS NULL`,
        [now, reason, runId]
      );
      return result.changes > 0;
    },
  };
  return store;
}
