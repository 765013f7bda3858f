// src/runs/controller.ts
// Run lifecycle for one session transcript.
//
//   running ──► completed | partial | failed
//   partial ──► completed            (resumption only)
//
// A run is identified by its idempotency key (campaign, session, transcript
// hash, prompt version, model). Stages run in order; each attempt is a
// RunStep row and a succeeded stage is never replayed.

import { createHash } from 'node:crypto';
import {
  IdempotencyConflict,
  InvalidRunTransition,
  RunNotFound,
  StageFailure,
  describeError,
} from '../canon/errors.js';
import { KeyedMutex } from '../concurrency/keyedMutex.js';
import { config } from '../config.js';
import { createChildLogger, createLogger } from '../observability/index.js';
import { recordRunStatus, recordStageAttempt } from '../observability/metrics.js';
import type { Stores } from '../store/index.js';
import type { Run, RunStep } from '../store/runs.js';
import type { TranscriptSource } from '../transcripts/source.js';
import { newId } from '../utils/ids.js';
import { backoffDelay, sleep, type RetryPolicy } from './retry.js';
import type { StageContext, StageRegistry } from './stages.js';
import {
  STAGES,
  STRUCTURAL_STAGES,
  type RunStatus,
  type StageCounters,
  type StageName,
  type StartRunOptions,
} from './types.js';

const log = createLogger('runs/controller');

/* ---------- Types ---------- */

export interface PipelineIdentity {
  promptVersion: string;
  model: string;
}

export interface RunControllerDeps {
  stores: Stores;
  transcripts: TranscriptSource;
  stages: StageRegistry;
  retry?: RetryPolicy;
  pipeline?: PipelineIdentity;
  locks?: KeyedMutex;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

export interface StartRunResult {
  run: Run;
  created: boolean;
}

export interface RunStatusView {
  run: Run;
  status: RunStatus;
  steps: RunStep[];
  /** Counters of each stage's latest successful attempt. */
  counters: Partial<Record<StageName, StageCounters>>;
}

type DriveMode = 'execute' | 'resume';

/* ---------- Keys ---------- */

export function idempotencyKey(parts: {
  campaignId: string;
  sessionId: string;
  transcriptHash: string;
  promptVersion: string;
  model: string;
}): string {
  const material = JSON.stringify([
    parts.campaignId,
    parts.sessionId,
    parts.transcriptHash,
    parts.promptVersion,
    parts.model,
  ]);
  return createHash('sha256').update(material, 'utf8').digest('hex');
}

const sessionLockKey = (sessionId: string) => `session:${sessionId}`;
const runLockKey = (runId: string) => `run:${runId}`;

/** Run status implied by the latest step of every stage. */
export function deriveRunStatus(latest: ReadonlyMap<StageName, RunStep>): RunStatus {
  const succeeded = (stage: StageName) => latest.get(stage)?.status === 'succeeded';
  if (STAGES.every(succeeded)) return 'completed';
  if ([...STRUCTURAL_STAGES].every(succeeded)) return 'partial';
  return 'failed';
}

/* ---------- Controller ---------- */

export class RunController {
  private readonly stores: Stores;
  private readonly transcripts: TranscriptSource;
  private readonly stages: StageRegistry;
  private readonly retry: RetryPolicy;
  private readonly pipeline: PipelineIdentity;
  private readonly locks: KeyedMutex;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(deps: RunControllerDeps) {
    this.stores = deps.stores;
    this.transcripts = deps.transcripts;
    this.stages = deps.stages;
    this.retry = deps.retry ?? config.runs;
    this.pipeline = deps.pipeline ?? config.pipeline;
    this.locks = deps.locks ?? new KeyedMutex();
    this.now = deps.now ?? Date.now;
    this.sleep = deps.sleep ?? sleep;
  }

  /**
   * Find or create the run for a session transcript. Returns the existing
   * run when the key matches, unless `reprocess` asks for a fresh one.
   */
  async startRun(
    campaignSlug: string,
    sessionSlug: string,
    options: StartRunOptions = {}
  ): Promise<StartRunResult> {
    const transcript = await this.transcripts.load(campaignSlug, sessionSlug);
    const campaign = await this.stores.campaigns.getOrCreate(
      campaignSlug,
      options.requestedBy ?? 'system'
    );
    const session = await this.stores.campaigns.getOrCreateSession(campaign.id, sessionSlug);
    const promptVersion = options.promptVersion ?? this.pipeline.promptVersion;
    const model = options.model ?? this.pipeline.model;
    const key = idempotencyKey({
      campaignId: campaign.id,
      sessionId: session.id,
      transcriptHash: transcript.hash,
      promptVersion,
      model,
    });

    return this.locks.runExclusive(sessionLockKey(session.id), async () => {
      const running = await this.stores.runs.findRunningForSession(session.id);
      if (running) {
        if (running.idempotencyKey === key && !options.reprocess) {
          return { run: running, created: false };
        }
        throw new IdempotencyConflict(
          `Session ${sessionSlug} already has run ${running.id} in progress`
        );
      }

      if (!options.reprocess) {
        const existing = await this.stores.runs.findByKey(key);
        if (existing) return { run: existing, created: false };
      }

      const run = await this.stores.runs.create(
        {
          id: newId('run'),
          campaignId: campaign.id,
          sessionId: session.id,
          transcriptHash: transcript.hash,
          promptVersion,
          model,
          idempotencyKey: key,
          createdAt: this.now(),
        },
        STAGES
      );
      log.info(
        { runId: run.id, campaignId: campaign.id, sessionId: session.id, reprocess: !!options.reprocess },
        'Run created'
      );
      return { run, created: true };
    });
  }

  /** Drive a running run through every stage that has not succeeded. */
  async execute(runId: string): Promise<Run> {
    return this.exclusive(runId, async () => {
      const run = await this.requireRun(runId);
      if (run.status !== 'running') {
        throw new InvalidRunTransition(`Run ${runId} is ${run.status}; only running runs execute`);
      }
      return this.drive(run, 'execute');
    });
  }

  /**
   * Re-enter the narrative stages of a partial run, reusing its stored
   * structured output. Extraction is never repeated.
   */
  async resumeRun(runId: string): Promise<Run> {
    return this.exclusive(runId, async () => {
      const run = await this.requireRun(runId);
      if (run.status !== 'partial') {
        throw new InvalidRunTransition(`Run ${runId} is ${run.status}; only partial runs resume`);
      }
      return this.drive(run, 'resume');
    });
  }

  /**
   * Request cancellation. An executing run stops before its next step;
   * a run with no active executor is finalized immediately.
   */
  async cancelRun(runId: string, reason: string): Promise<Run> {
    const run = await this.requireRun(runId);
    if (run.status !== 'running') {
      throw new InvalidRunTransition(`Run ${runId} is ${run.status}; only running runs cancel`);
    }
    await this.stores.runs.requestCancel(run.id, reason, this.now());
    log.info({ runId, reason }, 'Run cancellation requested');

    if (!this.locks.isLocked(runLockKey(runId))) {
      await this.locks.runExclusive(runLockKey(runId), async () => {
        const current = await this.requireRun(runId);
        if (current.status === 'running') await this.finishCancelled(current);
      });
    }
    return this.requireRun(runId);
  }

  async getRunStatus(runId: string): Promise<RunStatusView> {
    const run = await this.requireRun(runId);
    const steps = await this.stores.runs.listSteps(runId);
    const counters: RunStatusView['counters'] = {};
    for (const step of steps) {
      if (step.status === 'succeeded' && step.result) counters[step.name] = step.result;
    }
    return { run, status: run.status, steps, counters };
  }

  /* ---------- Internals ---------- */

  private async exclusive(runId: string, fn: () => Promise<Run>): Promise<Run> {
    const outcome = await this.locks.tryRunExclusive(runLockKey(runId), fn);
    if (outcome.status === 'rejected') {
      throw new IdempotencyConflict(`Run ${runId} is already being executed`);
    }
    return outcome.result;
  }

  private async requireRun(runId: string): Promise<Run> {
    const run = await this.stores.runs.getById(runId);
    if (!run) throw new RunNotFound(runId);
    return run;
  }

  private async drive(run: Run, mode: DriveMode): Promise<Run> {
    const runLog = createChildLogger(log, {
      runId: run.id,
      campaignId: run.campaignId,
      sessionId: run.sessionId,
      mode,
    });
    const campaign = await this.stores.campaigns.getById(run.campaignId);
    const session = await this.stores.campaigns.getSessionById(run.sessionId);
    if (!campaign || !session) {
      throw new Error(`Run ${run.id} references a missing campaign or session`);
    }
    const ctx: StageContext = { run, campaign, session, log: runLog };

    const latest = await this.stores.runs.latestSteps(run.id);
    if (mode === 'resume') {
      const unfinished = [...STRUCTURAL_STAGES].filter((s) => latest.get(s)?.status !== 'succeeded');
      if (unfinished.length > 0) {
        throw new InvalidRunTransition(
          `Run ${run.id} cannot resume: structural stages ${unfinished.join(', ')} did not succeed`
        );
      }
    }

    let failure: StageFailure | null = null;
    try {
      for (const stage of STAGES) {
        if (latest.get(stage)?.status === 'succeeded') continue;

        if (mode === 'execute') {
          const current = await this.requireRun(run.id);
          if (current.cancelRequestedAt !== null) return this.finishCancelled(current);
        }

        try {
          await this.runStage(ctx, stage);
        } catch (err) {
          if (!(err instanceof StageFailure)) throw err;
          failure = err;
          break;
        }
      }
    } catch (err) {
      // Bookkeeping failed outside any stage; a fresh run must not stay running
      if (mode === 'execute') {
        await this.finish(run, 'failed', describeError(err));
      }
      throw err;
    }

    const status = deriveRunStatus(await this.stores.runs.latestSteps(run.id));
    const finished = await this.finish(run, status, failure ? failure.message : null);
    runLog.info({ status, failedStage: failure?.stage ?? null }, 'Run finished');
    return finished;
  }

  private async runStage(ctx: StageContext, stage: StageName): Promise<StageCounters> {
    const handler = this.stages[stage];

    for (let attempt = 1; ; attempt++) {
      const step = await this.stores.runs.startAttempt(ctx.run.id, stage, this.now());
      const started = Date.now();
      ctx.log.info({ stage, attempt: step.attempt }, 'Stage started');

      try {
        const counters = await handler(ctx);
        await this.stores.runs.finishStep(step.id, 'succeeded', { result: counters }, this.now());
        recordStageAttempt(stage, 'succeeded', Date.now() - started);
        ctx.log.info({ stage, attempt: step.attempt, counters }, 'Stage succeeded');
        return counters;
      } catch (err) {
        const message = describeError(err);
        await this.stores.runs.finishStep(step.id, 'failed', { error: message }, this.now());
        recordStageAttempt(stage, 'failed', Date.now() - started);

        if (attempt >= this.retry.maxAttempts) {
          ctx.log.error({ stage, attempt: step.attempt, err: message }, 'Stage failed; attempts exhausted');
          throw new StageFailure(stage, attempt, err);
        }
        const delayMs = backoffDelay(attempt, this.retry);
        ctx.log.warn({ stage, attempt: step.attempt, delayMs, err: message }, 'Stage failed; retrying');
        await this.sleep(delayMs);
      }
    }
  }

  private async finishCancelled(run: Run): Promise<Run> {
    return this.finish(run, 'failed', `cancelled: ${run.cancelReason ?? 'no reason given'}`);
  }

  private async finish(run: Run, status: RunStatus, failureReason: string | null): Promise<Run> {
    await this.stores.runs.setStatus(run.id, status, {
      failureReason,
      finishedAt: this.now(),
    });
    recordRunStatus(status);
    return this.requireRun(run.id);
  }
}
