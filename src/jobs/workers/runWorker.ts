// src/jobs/workers/runWorker.ts
// Handles run:process and run:resume jobs by driving the RunController.

import { InvalidRunTransition, RunNotFound } from "../../canon/errors.js";
import { createLogger } from "../../observability/index.js";
import type { RunController } from "../../runs/controller.js";
import type { Job, JobHandler, JobType, RunJobPayload, RunJobResult } from "../types.js";

const log = createLogger("jobs/runWorker");

function readPayload(job: Job): RunJobPayload {
  const payload = job.payload;
  if (typeof payload === "object" && payload !== null && "runId" in payload) {
    const { runId } = payload;
    if (typeof runId === "string" && runId) return { runId };
  }
  throw new Error(`Job ${job.id} has no runId in its payload`);
}

/**
 * Build the handler for one run job type. Runs that were cancelled or
 * already finished before the job was picked up are skipped, not failed.
 */
export function createRunJobHandler(
  controller: RunController,
  type: JobType
): JobHandler<RunJobResult> {
  return async function runJob(job) {
    const { runId } = readPayload(job);

    try {
      const run =
        type === "run:resume" ? await controller.resumeRun(runId) : await controller.execute(runId);
      const status = run.status === "running" ? "failed" : run.status;
      return { runId, status };
    } catch (err) {
      if (err instanceof InvalidRunTransition || err instanceof RunNotFound) {
        log.info({ jobId: job.id, runId, reason: err.message }, "Run job skipped");
        return { runId, status: "skipped", message: err.message };
      }
      throw err;
    }
  };
}

/* ---------- Worker Registration ---------- */

export function registerRunWorkers(
  registerHandler: (type: JobType, handler: JobHandler) => void,
  controller: RunController
): void {
  registerHandler("run:process", createRunJobHandler(controller, "run:process"));
  registerHandler("run:resume", createRunJobHandler(controller, "run:resume"));
}
