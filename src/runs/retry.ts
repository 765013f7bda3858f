// src/runs/retry.ts
// Stage retry policy: bounded attempts with exponential backoff.

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

/** Delay before retrying after failed attempt `attempt` (1-based). */
export function backoffDelay(attempt: number, policy: RetryPolicy): number {
  const exponent = Math.max(attempt, 1) - 1;
  return Math.min(policy.maxDelayMs, policy.baseDelayMs * Math.pow(2, exponent));
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
