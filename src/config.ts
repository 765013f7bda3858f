/* src/config.ts
   Centralized config: database, transcript and artifact roots, pipeline identity, retry policy */
import path from 'node:path';
import 'dotenv/config';

const env = (name: string, fallback?: string) =>
  (process.env[name] ?? fallback ?? '').toString();

const envInt = (name: string, fallback: number): number => {
  const parsed = Number.parseInt(env(name), 10);
  return Number.isFinite(parsed) && parsed >= 0 ? parsed : fallback;
};

export const config = {
  nodeEnv: env('NODE_ENV', 'development'),

  // ── HTTP ─────────────────────────────────────────────────────────
  server: {
    port: envInt('PORT', 4100),
    host: env('HOST', '127.0.0.1'),
  },

  // ── Database ─────────────────────────────────────────────────────
  database: {
    path: path.resolve(process.cwd(), env('DATABASE_PATH', 'data/lorekeeper.db')),
  },

  // ── Storage ──────────────────────────────────────────────────────
  storage: {
    transcripts: path.resolve(process.cwd(), env('TRANSCRIPTS_ROOT', 'transcripts')),
    artifacts: path.resolve(process.cwd(), env('ARTIFACTS_ROOT', 'storage/artifacts')),
  },

  // ── Pipeline identity (part of the run idempotency key) ──────────
  pipeline: {
    promptVersion: env('PIPELINE_PROMPT_VERSION', 'session-facts-v1'),
    model: env('PIPELINE_MODEL', 'dev'),
  },

  // ── Run retry policy ─────────────────────────────────────────────
  runs: {
    maxAttempts: Math.max(1, envInt('RUN_STAGE_MAX_ATTEMPTS', 3)),
    baseDelayMs: envInt('RUN_RETRY_BASE_MS', 500),
    maxDelayMs: envInt('RUN_RETRY_MAX_MS', 30_000),
  },

  // ── Job queue ────────────────────────────────────────────────────
  jobs: {
    pollIntervalMs: envInt('JOB_POLL_INTERVAL_MS', 1000),
  },
} as const;

export type AppConfig = typeof config;
