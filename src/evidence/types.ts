// src/evidence/types.ts

export const EVIDENCE_KINDS = ['quote', 'support', 'mention', 'other'] as const;
export type EvidenceKind = (typeof EVIDENCE_KINDS)[number];

/**
 * Pointer from a fact into the transcript. When both offsets are present,
 * the newline-normalized utterance text sliced [charStart, charEnd) is the
 * cited text; when both are absent the span cites the whole utterance.
 */
export interface EvidenceSpan {
  utteranceId: string;
  charStart: number | null;
  charEnd: number | null;
  kind: EvidenceKind;
  confidence: number | null;
}

/** Span as received from the extractor; offsets may be anything numeric. */
export interface RawEvidenceSpan {
  utteranceId: string;
  charStart: number | null;
  charEnd: number | null;
  kind: EvidenceKind;
  confidence: number | null;
}

export type DropReason =
  | 'unknown_utterance'
  | 'invalid_offsets'
  | 'inverted_range'
  | 'empty_span'
  | 'text_mismatch';

export type SpanOutcome =
  | { outcome: 'valid'; span: EvidenceSpan }
  | { outcome: 'repaired'; span: EvidenceSpan }
  | { outcome: 'dropped'; reason: DropReason };

export interface EvidenceCounts {
  valid: number;
  repaired: number;
  dropped: number;
  dropReasons: Partial<Record<DropReason, number>>;
}

/** Anything that carries evidence and an optional confidence. */
export interface EvidencedFact {
  evidence: RawEvidenceSpan[];
  confidence: number | null;
}

export interface CleanedEvidence {
  evidence: EvidenceSpan[];
  confidence: number | null;
  /** False when any of the fact's spans had to be dropped. */
  evidenceComplete: boolean;
}

export interface QuoteCandidate {
  utteranceId: string;
  charStart: number | null;
  charEnd: number | null;
  /** The words the extractor says were spoken; relocates a misaligned range. */
  text: string | null;
  speaker: string | null;
  note: string | null;
}
