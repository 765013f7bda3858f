// src/extraction/types.ts
// Typed contract for extractor output and summary collaborators.

import type { EntityType, ThreadKind, ThreadStatus } from '../canon/types.js';
import type { QuoteCandidate, RawEvidenceSpan } from '../evidence/types.js';

export const EVENT_TYPES = [
  'combat',
  'social',
  'travel',
  'discovery',
  'loot',
  'economy',
  'relationship',
  'thread_update',
  'rules',
  'generic',
] as const;
export type EventType = (typeof EVENT_TYPES)[number];

/* ---------- Session Facts ---------- */

export interface RawMention {
  text: string;
  entityType: EntityType;
  description: string | null;
  evidence: RawEvidenceSpan[];
  confidence: number | null;
}

export interface RawScene {
  title: string | null;
  summary: string;
  location: string | null;
  startMs: number | null;
  endMs: number | null;
  participants: string[];
  evidence: RawEvidenceSpan[];
  confidence: number | null;
}

export interface RawEvent {
  eventType: EventType;
  summary: string;
  startMs: number | null;
  endMs: number | null;
  entities: string[];
  evidence: RawEvidenceSpan[];
  confidence: number | null;
}

export interface RawThreadUpdate {
  updateType: string;
  note: string;
  evidence: RawEvidenceSpan[];
  /** Indexes into SessionFacts.events. */
  relatedEventIndexes: number[];
  /** Entity names as the extractor wrote them. */
  relatedEntities: string[];
}

export interface RawThread {
  title: string;
  kind: ThreadKind;
  status: ThreadStatus;
  summary: string | null;
  updates: RawThreadUpdate[];
  evidence: RawEvidenceSpan[];
  confidence: number | null;
}

export interface SessionFacts {
  mentions: RawMention[];
  scenes: RawScene[];
  events: RawEvent[];
  threads: RawThread[];
  quotes: QuoteCandidate[];
}

/* ---------- Summary ---------- */

export interface SummaryBeat {
  title: string;
  summary: string;
  quoteIds: string[];
}

export interface SummaryPlan {
  beats: SummaryBeat[];
}

/* ---------- Collaborators ---------- */

export interface TranscriptLine {
  utteranceId: string;
  speaker: string;
  startMs: number;
  text: string;
}

export interface ExtractorInput {
  campaignId: string;
  sessionId: string;
  /** `[hh:mm:ss] Speaker: text` lines, keyed by timecode. */
  transcript: string;
  speakers: string[];
  /** Full utterance list, for extractors that cite ids directly. */
  lines: TranscriptLine[];
  canonical: {
    names: Record<string, string>;
    hidden: string[];
  };
}

/**
 * Opaque inference collaborator. Output is untyped JSON (or a JSON string)
 * and is validated by parseSessionFacts.
 */
export interface Extractor {
  extract(input: ExtractorInput): Promise<unknown>;
}

export interface SessionBundle {
  campaignId: string;
  sessionId: string;
  sessionTitle: string;
  runId: string;
  entities: Array<{ id: string; name: string; entityType: EntityType; mentions: number }>;
  threads: Array<{ id: string; title: string; status: ThreadStatus; notes: string[] }>;
  events: Array<{ id: string; eventType: EventType; summary: string; startMs: number | null }>;
  scenes: Array<{ id: string; title: string | null; summary: string }>;
  quotes: Array<{ id: string; text: string; speaker: string | null }>;
}

export interface Summarizer {
  plan(bundle: SessionBundle): Promise<SummaryPlan>;
  write(bundle: SessionBundle, plan: SummaryPlan): Promise<string>;
}

export interface RenderedArtifact {
  path: string;
  bytes: number;
}

export interface Renderer {
  render(bundle: SessionBundle, text: string): Promise<RenderedArtifact>;
}
