// src/jobs/types.ts
// Job queue type definitions for background run processing.

/* ---------- Job Types ---------- */
export const JOB_TYPES = ["run:process", "run:resume"] as const;
export type JobType = (typeof JOB_TYPES)[number];

export const JOB_STATUSES = [
  "pending",
  "processing",
  "completed",
  "failed",
  "cancelled",
] as const;
export type JobStatus = (typeof JOB_STATUSES)[number];

/* ---------- Job Interface ---------- */
export interface Job<T = unknown> {
  id: string;
  type: JobType;
  runId: string | null;
  userId: string;
  payload: T;
  status: JobStatus;
  priority: number;
  attempts: number;
  maxAttempts: number;
  createdAt: number;
  startedAt: number | null;
  completedAt: number | null;
  scheduledAt: number | null;
  error: string | null;
  result: unknown;
  workerId: string | null;
}

/* ---------- Job Row (Database) ---------- */
export interface JobRow {
  id: string;
  type: string;
  run_id: string | null;
  user_id: string;
  payload: string | null;
  status: string;
  priority: number;
  attempts: number;
  max_attempts: number;
  created_at: number;
  started_at: number | null;
  completed_at: number | null;
  scheduled_at: number | null;
  error: string | null;
  result: string | null;
  worker_id: string | null;
}

/* ---------- Job Options ---------- */
export interface JobOptions {
  /** Job priority (higher = more urgent, default: 0) */
  priority?: number;
  /** Delay execution by N milliseconds */
  delay?: number;
  /** Maximum attempts (default: 1; stage retries happen inside the run) */
  maxAttempts?: number;
  /** Schedule job for specific timestamp */
  scheduledAt?: number;
}

/* ---------- Job Handler ---------- */
export type JobHandler<R = unknown> = (job: Job) => Promise<R>;

/* ---------- Payload Types ---------- */
export interface RunJobPayload {
  runId: string;
}

/* ---------- Result Types ---------- */
export interface RunJobResult {
  runId: string;
  status: "completed" | "partial" | "failed" | "skipped";
  message?: string;
}

export type JobStats = Record<JobStatus, number>;
