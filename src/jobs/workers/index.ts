// src/jobs/workers/index.ts
// Registers all job workers with the job queue.

import { createLogger } from "../../observability/index.js";
import type { RunController } from "../../runs/controller.js";
import type { SQLiteJobQueue } from "../queue.js";
import { registerRunWorkers } from "./runWorker.js";

const log = createLogger("jobs/workers");

export function registerAllWorkers(queue: SQLiteJobQueue, controller: RunController): void {
  registerRunWorkers((type, handler) => queue.registerHandler(type, handler), controller);
  log.info({ types: ["run:process", "run:resume"] }, "Job workers registered");
}

export { createRunJobHandler } from "./runWorker.js";
