// src/evidence/validator.ts
// Evidence integrity: every cited span must be an exact substring of the
// utterance it names. Invalid spans are repaired when a containing valid
// range exists and dropped otherwise.

import { EvidenceIntegrityViolation } from '../canon/errors.js';
import type {
  CleanedEvidence,
  DropReason,
  EvidenceCounts,
  EvidencedFact,
  EvidenceSpan,
  QuoteCandidate,
  RawEvidenceSpan,
  SpanOutcome,
} from './types.js';

/* ---------- Text Helpers ---------- */

export function normalizeNewlines(text: string): string {
  return text.replace(/\r\n?/g, '\n');
}

const isSpace = (ch: string | undefined) => ch !== undefined && /\s/.test(ch);

/** Index of the occurrence of `needle` closest to `anchor`; earlier wins ties. */
export function nearestOccurrence(haystack: string, needle: string, anchor: number): number {
  if (!needle) return -1;
  let best = -1;
  let from = haystack.indexOf(needle);
  while (from !== -1) {
    if (best === -1 || Math.abs(from - anchor) < Math.abs(best - anchor)) best = from;
    from = haystack.indexOf(needle, from + 1);
  }
  return best;
}

/* ---------- Span Validation ---------- */

/**
 * Check one span against its utterance text.
 *
 * @param utteranceText raw utterance text, or undefined when the id is unknown
 * @param expectedText  the text the span claims to cite, when the fact has one
 */
export function validateSpan(
  span: RawEvidenceSpan,
  utteranceText: string | undefined,
  expectedText?: string | null
): SpanOutcome {
  if (utteranceText === undefined) return dropped('unknown_utterance');

  const text = normalizeNewlines(utteranceText);
  const expected = expectedText ? normalizeNewlines(expectedText) : null;
  const needsRange = span.kind === 'quote' || (expected !== null && expected.trim() !== '');

  if (span.charStart === null && span.charEnd === null && !needsRange) {
    return { outcome: 'valid', span: { ...span } };
  }

  let repaired = false;
  let start: number;
  let end: number;

  if (span.charStart === null && span.charEnd === null) {
    start = 0;
    end = text.length;
    repaired = true;
  } else {
    if (
      (span.charStart !== null && !Number.isInteger(span.charStart)) ||
      (span.charEnd !== null && !Number.isInteger(span.charEnd))
    ) {
      return dropped('invalid_offsets');
    }
    start = span.charStart ?? 0;
    end = span.charEnd ?? text.length;
    if (span.charStart === null || span.charEnd === null) repaired = true;
  }

  const anchor = start;
  const clampedStart = Math.min(Math.max(start, 0), text.length);
  const clampedEnd = Math.min(Math.max(end, 0), text.length);
  if (clampedStart !== start || clampedEnd !== end) repaired = true;
  start = clampedStart;
  end = clampedEnd;
  if (start > end) return dropped('inverted_range');

  while (start < end && isSpace(text[start])) {
    start++;
    repaired = true;
  }
  while (end > start && isSpace(text[end - 1])) {
    end--;
    repaired = true;
  }
  if (start === end) return dropped('empty_span');

  if (expected !== null && expected.trim() !== '' && text.slice(start, end) !== expected) {
    let found = nearestOccurrence(text, expected, anchor);
    let length = expected.length;
    if (found === -1) {
      const trimmed = expected.trim();
      found = nearestOccurrence(text, trimmed, anchor);
      length = trimmed.length;
    }
    if (found === -1) return dropped('text_mismatch');
    start = found;
    end = found + length;
    repaired = true;
  }

  const result: EvidenceSpan = { ...span, charStart: start, charEnd: end };
  return repaired ? { outcome: 'repaired', span: result } : { outcome: 'valid', span: result };
}

function dropped(reason: DropReason): SpanOutcome {
  return { outcome: 'dropped', reason };
}

/* ---------- Verified Spans ---------- */

const VERIFIED: unique symbol = Symbol('verified-span');

/**
 * A span whose text has been checked against its utterance. Only the
 * validator holds the construction token, so quotes can only be persisted
 * through it.
 */
export class VerifiedSpan {
  readonly utteranceId: string;
  readonly charStart: number;
  readonly charEnd: number;
  readonly text: string;

  constructor(
    token: typeof VERIFIED,
    init: { utteranceId: string; charStart: number; charEnd: number; text: string }
  ) {
    if (token !== VERIFIED) {
      throw new EvidenceIntegrityViolation('VerifiedSpan can only be created by the validator');
    }
    this.utteranceId = init.utteranceId;
    this.charStart = init.charStart;
    this.charEnd = init.charEnd;
    this.text = init.text;
  }
}

export interface VerifiedQuote {
  span: VerifiedSpan;
  speaker: string | null;
  note: string | null;
}

/* ---------- Validator ---------- */

/**
 * Validates evidence for one session's utterances and tallies outcomes.
 */
export class EvidenceValidator {
  private readonly texts = new Map<string, string>();
  private readonly tally: EvidenceCounts = { valid: 0, repaired: 0, dropped: 0, dropReasons: {} };

  constructor(utterances: Iterable<{ id: string; text: string }>) {
    for (const u of utterances) this.texts.set(u.id, normalizeNewlines(u.text));
  }

  hasUtterance(id: string): boolean {
    return this.texts.has(id);
  }

  validateSpan(span: RawEvidenceSpan, expectedText?: string | null): SpanOutcome {
    const result = validateSpan(span, this.texts.get(span.utteranceId), expectedText);
    this.count(result);
    return result;
  }

  /** Kept spans plus repaired/dropped counts for one evidence list. */
  cleanEvidence(spans: readonly RawEvidenceSpan[]): {
    kept: EvidenceSpan[];
    repaired: number;
    dropped: number;
  } {
    const kept: EvidenceSpan[] = [];
    let repaired = 0;
    let droppedCount = 0;
    for (const span of spans) {
      const result = this.validateSpan(span);
      if (result.outcome === 'dropped') {
        droppedCount++;
        continue;
      }
      if (result.outcome === 'repaired') repaired++;
      kept.push(result.span);
    }
    return { kept, repaired, dropped: droppedCount };
  }

  /**
   * Clean a fact's evidence. Facts that lose spans are marked incomplete and
   * their confidence is scaled by the fraction of spans kept.
   */
  cleanFact(fact: EvidencedFact): CleanedEvidence {
    const { kept, dropped: lost } = this.cleanEvidence(fact.evidence);
    if (lost === 0) {
      return { evidence: kept, confidence: fact.confidence, evidenceComplete: true };
    }
    const fraction = kept.length / fact.evidence.length;
    return {
      evidence: kept,
      confidence: fact.confidence === null ? null : roundConfidence(fact.confidence * fraction),
      evidenceComplete: false,
    };
  }

  /** Turn a quote candidate into a VerifiedSpan, or report why it was dropped. */
  verifyQuote(
    candidate: QuoteCandidate
  ): { ok: true; quote: VerifiedQuote } | { ok: false; reason: DropReason } {
    const result = this.validateSpan(
      {
        utteranceId: candidate.utteranceId,
        charStart: candidate.charStart,
        charEnd: candidate.charEnd,
        kind: 'quote',
        confidence: null,
      },
      candidate.text
    );
    if (result.outcome === 'dropped') return { ok: false, reason: result.reason };

    const text = this.texts.get(candidate.utteranceId) ?? '';
    const { charStart, charEnd } = result.span;
    if (charStart === null || charEnd === null) return { ok: false, reason: 'invalid_offsets' };

    const span = new VerifiedSpan(VERIFIED, {
      utteranceId: candidate.utteranceId,
      charStart,
      charEnd,
      text: text.slice(charStart, charEnd),
    });
    return { ok: true, quote: { span, speaker: candidate.speaker, note: candidate.note } };
  }

  /**
   * Throw unless `span` still matches the utterance text exactly.
   * Run before a quote is persisted or displayed.
   */
  assertDisplayable(span: VerifiedSpan): void {
    const text = this.texts.get(span.utteranceId);
    if (text === undefined) {
      throw new EvidenceIntegrityViolation(`Unknown utterance ${span.utteranceId}`);
    }
    if (text.slice(span.charStart, span.charEnd) !== span.text) {
      throw new EvidenceIntegrityViolation(
        `Quote text does not match utterance ${span.utteranceId} [${span.charStart}, ${span.charEnd})`
      );
    }
  }

  counts(): EvidenceCounts {
    return { ...this.tally, dropReasons: { ...this.tally.dropReasons } };
  }

  private count(result: SpanOutcome): void {
    if (result.outcome === 'dropped') {
      this.tally.dropped++;
      this.tally.dropReasons[result.reason] = (this.tally.dropReasons[result.reason] ?? 0) + 1;
    } else {
      this.tally[result.outcome]++;
    }
  }
}

function roundConfidence(value: number): number {
  return Math.round(value * 1000) / 1000;
}
