// src/runs/types.ts
// Run lifecycle vocabulary.

export const STAGES = ['ingest', 'extract', 'persist', 'resolve', 'plan', 'write', 'render'] as const;
export type StageName = (typeof STAGES)[number];

/** Stages whose output is canonical state; a failure here fails the run. */
export const STRUCTURAL_STAGES: ReadonlySet<StageName> = new Set([
  'ingest',
  'extract',
  'persist',
  'resolve',
]);

/** Summary stages; a failure here leaves the run partial and resumable. */
export const NARRATIVE_STAGES: ReadonlySet<StageName> = new Set(['plan', 'write', 'render']);

export const RUN_STATUSES = ['running', 'completed', 'partial', 'failed'] as const;
export type RunStatus = (typeof RUN_STATUSES)[number];

export const STEP_STATUSES = ['pending', 'running', 'succeeded', 'failed'] as const;
export type StepStatus = (typeof STEP_STATUSES)[number];

/** Quality counters a stage reports (mentions_total, spans_dropped, ...). */
export type StageCounters = Record<string, number>;

export interface StartRunOptions {
  reprocess?: boolean;
  promptVersion?: string;
  model?: string;
  /** Actor who requested the run; becomes DM of a newly created campaign. */
  requestedBy?: string;
}
