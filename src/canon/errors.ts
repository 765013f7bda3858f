// src/canon/errors.ts
// Domain error taxonomy. Routes map every DomainError to
// `{ error: code, message }` with its HTTP status.

export abstract class DomainError extends Error {
  abstract readonly code: string;
  abstract readonly statusCode: number;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/* ---------- Authorization ---------- */

export class NotAuthorized extends DomainError {
  readonly code = 'not_authorized';
  readonly statusCode = 403;
}

/* ---------- Correction Ledger ---------- */

export class CorrectionNotFound extends DomainError {
  readonly code = 'correction_not_found';
  readonly statusCode = 404;

  constructor(readonly correctionId: string) {
    super(`Correction ${correctionId} not found`);
  }
}

export class AlreadyDecided extends DomainError {
  readonly code = 'already_decided';
  readonly statusCode = 409;

  constructor(readonly correctionId: string, readonly state: string) {
    super(`Correction ${correctionId} is already ${state}`);
  }
}

export class InvalidCorrection extends DomainError {
  readonly code = 'invalid_correction';
  readonly statusCode = 400;
}

export class CycleDetected extends DomainError {
  readonly code = 'cycle_detected';
  readonly statusCode = 409;
}

/* ---------- Evidence ---------- */

export class EvidenceIntegrityViolation extends DomainError {
  readonly code = 'evidence_integrity_violation';
  readonly statusCode = 422;
}

/* ---------- Campaigns & Runs ---------- */

export class CampaignNotFound extends DomainError {
  readonly code = 'campaign_not_found';
  readonly statusCode = 404;

  constructor(readonly slug: string) {
    super(`Campaign ${slug} not found`);
  }
}

export class RunNotFound extends DomainError {
  readonly code = 'run_not_found';
  readonly statusCode = 404;

  constructor(readonly runId: string) {
    super(`Run ${runId} not found`);
  }
}

export class IdempotencyConflict extends DomainError {
  readonly code = 'idempotency_conflict';
  readonly statusCode = 409;
}

export class InvalidRunTransition extends DomainError {
  readonly code = 'invalid_run_transition';
  readonly statusCode = 409;
}

export class StageFailure extends DomainError {
  readonly code = 'stage_failure';
  readonly statusCode = 500;

  constructor(readonly stage: string, readonly attempts: number, cause: unknown) {
    super(`Stage ${stage} failed after ${attempts} attempt(s): ${describeError(cause)}`);
  }
}

/* ---------- Helpers ---------- */

export function isDomainError(err: unknown): err is DomainError {
  return err instanceof DomainError;
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
