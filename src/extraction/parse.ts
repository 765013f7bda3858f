// src/extraction/parse.ts
// Validates untyped extractor output into SessionFacts. Items that do not
// fit the schema are skipped and reported as issues; only a payload that is
// not an object at all is an error.

import { ENTITY_TYPES, THREAD_KINDS, THREAD_STATUSES } from '../canon/types.js';
import { EVIDENCE_KINDS, type QuoteCandidate, type RawEvidenceSpan } from '../evidence/types.js';
import { isOneOf } from '../store/rows.js';
import {
  EVENT_TYPES,
  type RawEvent,
  type RawMention,
  type RawScene,
  type RawThread,
  type RawThreadUpdate,
  type SessionFacts,
  type SummaryPlan,
} from './types.js';

export class ExtractionSchemaError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ExtractionSchemaError';
  }
}

export interface ParsedFacts {
  facts: SessionFacts;
  issues: string[];
}

type Obj = Record<string, unknown>;

/* ============= JSON Extraction ============= */

function stripCodeFences(raw: string): string {
  const fenced = /```(?:json)?\s*([\s\S]*?)```/i.exec(raw);
  return fenced?.[1] !== undefined ? fenced[1].trim() : raw.trim();
}

/**
 * Pull a JSON value out of a model response: code fences are stripped and,
 * failing a direct parse, the outermost {...} block is tried.
 */
export function extractJsonFromResponse(raw: string): { json: unknown; parseError?: string } {
  const text = stripCodeFences(raw);
  try {
    const json: unknown = JSON.parse(text);
    return { json };
  } catch (err) {
    const block = /\{[\s\S]*\}/.exec(text);
    if (block) {
      try {
        const json: unknown = JSON.parse(block[0]);
        return { json };
      } catch (inner) {
        return { json: null, parseError: `Failed to parse JSON: ${String(inner)}` };
      }
    }
    return { json: null, parseError: `Failed to parse JSON: ${String(err)}` };
  }
}

/* ============= Field Helpers ============= */

function isObj(value: unknown): value is Obj {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** First present value among camelCase / snake_case spellings. */
function field(obj: Obj, ...names: string[]): unknown {
  for (const name of names) {
    if (obj[name] !== undefined) return obj[name];
  }
  return undefined;
}

function str(value: unknown): string | null {
  if (typeof value !== 'string') return null;
  const trimmed = value.trim();
  return trimmed === '' ? null : trimmed;
}

function strList(value: unknown): string[] {
  if (!Array.isArray(value)) return [];
  return value.flatMap((v) => {
    const s = str(v);
    return s === null ? [] : [s];
  });
}

function intOrNull(value: unknown): number | null {
  if (typeof value === 'number' && Number.isFinite(value)) return Math.round(value);
  return null;
}

/** Offsets keep non-integer values so the validator can reject them. */
function offset(value: unknown): number | null {
  if (value === null || value === undefined) return null;
  if (typeof value === 'number') return value;
  if (typeof value === 'string' && value.trim() !== '') return Number(value);
  return Number.NaN;
}

function confidence(value: unknown): number | null {
  if (typeof value !== 'number' || !Number.isFinite(value)) return null;
  return Math.min(1, Math.max(0, value));
}

function list(value: unknown): unknown[] {
  return Array.isArray(value) ? value : [];
}

/* ============= Item Parsers ============= */

export function parseEvidenceSpan(
  value: unknown,
  keyToId: ReadonlyMap<string, string> = new Map()
): RawEvidenceSpan | null {
  if (!isObj(value)) return null;
  const ref = str(field(value, 'utteranceId', 'utterance_id'));
  if (ref === null) return null;
  const kind = field(value, 'kind');
  return {
    utteranceId: keyToId.get(ref) ?? ref,
    charStart: offset(field(value, 'charStart', 'char_start')),
    charEnd: offset(field(value, 'charEnd', 'char_end')),
    kind: isOneOf(EVIDENCE_KINDS, kind) ? kind : 'support',
    confidence: confidence(field(value, 'confidence')),
  };
}

/** Evidence arrays as stored in JSON columns. */
export function parseEvidenceList(
  value: unknown,
  keyToId?: ReadonlyMap<string, string>
): RawEvidenceSpan[] {
  return list(value).flatMap((v) => {
    const span = parseEvidenceSpan(v, keyToId);
    return span ? [span] : [];
  });
}

class FactsParser {
  readonly issues: string[] = [];

  constructor(private readonly keyToId: ReadonlyMap<string, string>) {}

  evidence(value: unknown): RawEvidenceSpan[] {
    return parseEvidenceList(value, this.keyToId);
  }

  mention(value: unknown, i: number): RawMention | null {
    if (!isObj(value)) return this.skip(`mentions[${i}] is not an object`);
    const text = str(field(value, 'text', 'name'));
    if (text === null) return this.skip(`mentions[${i}] has no text`);
    const entityType = field(value, 'entityType', 'entity_type', 'type');
    return {
      text,
      entityType: isOneOf(ENTITY_TYPES, entityType) ? entityType : 'other',
      description: str(field(value, 'description')),
      evidence: this.evidence(field(value, 'evidence')),
      confidence: confidence(field(value, 'confidence')),
    };
  }

  scene(value: unknown, i: number): RawScene | null {
    if (!isObj(value)) return this.skip(`scenes[${i}] is not an object`);
    const summary = str(field(value, 'summary'));
    if (summary === null) return this.skip(`scenes[${i}] has no summary`);
    return {
      title: str(field(value, 'title')),
      summary,
      location: str(field(value, 'location')),
      startMs: intOrNull(field(value, 'startMs', 'start_ms')),
      endMs: intOrNull(field(value, 'endMs', 'end_ms')),
      participants: strList(field(value, 'participants')),
      evidence: this.evidence(field(value, 'evidence')),
      confidence: confidence(field(value, 'confidence')),
    };
  }

  event(value: unknown, i: number): RawEvent | null {
    if (!isObj(value)) return this.skip(`events[${i}] is not an object`);
    const summary = str(field(value, 'summary'));
    if (summary === null) return this.skip(`events[${i}] has no summary`);
    const eventType = field(value, 'eventType', 'event_type', 'type');
    return {
      eventType: isOneOf(EVENT_TYPES, eventType) ? eventType : 'generic',
      summary,
      startMs: intOrNull(field(value, 'startMs', 'start_ms')),
      endMs: intOrNull(field(value, 'endMs', 'end_ms')),
      entities: strList(field(value, 'entities')),
      evidence: this.evidence(field(value, 'evidence')),
      confidence: confidence(field(value, 'confidence')),
    };
  }

  threadUpdate(value: unknown, label: string): RawThreadUpdate | null {
    if (!isObj(value)) return this.skip(`${label} is not an object`);
    const note = str(field(value, 'note'));
    if (note === null) return this.skip(`${label} has no note`);
    return {
      updateType: str(field(value, 'updateType', 'update_type')) ?? 'note',
      note,
      evidence: this.evidence(field(value, 'evidence')),
      relatedEventIndexes: list(
        field(value, 'relatedEventIndexes', 'related_event_indexes')
      ).filter((n): n is number => typeof n === 'number' && Number.isInteger(n) && n >= 0),
      relatedEntities: strList(field(value, 'relatedEntities', 'related_entities')),
    };
  }

  thread(value: unknown, i: number): RawThread | null {
    if (!isObj(value)) return this.skip(`threads[${i}] is not an object`);
    const title = str(field(value, 'title'));
    if (title === null) return this.skip(`threads[${i}] has no title`);
    const kind = field(value, 'kind');
    const status = field(value, 'status');
    const updates = list(field(value, 'updates')).flatMap((u, j) => {
      const update = this.threadUpdate(u, `threads[${i}].updates[${j}]`);
      return update ? [update] : [];
    });
    return {
      title,
      kind: isOneOf(THREAD_KINDS, kind) ? kind : 'other',
      status: isOneOf(THREAD_STATUSES, status) ? status : 'proposed',
      summary: str(field(value, 'summary')),
      updates,
      evidence: this.evidence(field(value, 'evidence')),
      confidence: confidence(field(value, 'confidence')),
    };
  }

  quote(value: unknown, i: number): QuoteCandidate | null {
    if (!isObj(value)) return this.skip(`quotes[${i}] is not an object`);
    const ref = str(field(value, 'utteranceId', 'utterance_id'));
    if (ref === null) return this.skip(`quotes[${i}] has no utterance id`);
    return {
      utteranceId: this.keyToId.get(ref) ?? ref,
      charStart: offset(field(value, 'charStart', 'char_start')),
      charEnd: offset(field(value, 'charEnd', 'char_end')),
      text: str(field(value, 'text')),
      speaker: str(field(value, 'speaker')),
      note: str(field(value, 'note')),
    };
  }

  private skip(issue: string): null {
    this.issues.push(issue);
    return null;
  }
}

function collect<T>(value: unknown, parse: (item: unknown, i: number) => T | null): T[] {
  return list(value).flatMap((item, i) => {
    const parsed = parse(item, i);
    return parsed === null ? [] : [parsed];
  });
}

/* ============= Entry Points ============= */

/**
 * Validate extractor output. Utterance references that match a transcript
 * key (e.g. "00:01:05#2") are mapped to utterance ids through `keyToId`.
 */
export function parseSessionFacts(
  output: unknown,
  keyToId: ReadonlyMap<string, string> = new Map()
): ParsedFacts {
  let value = output;
  if (typeof output === 'string') {
    const { json, parseError } = extractJsonFromResponse(output);
    if (parseError) throw new ExtractionSchemaError(parseError);
    value = json;
  }
  if (!isObj(value)) {
    throw new ExtractionSchemaError('Extractor output must be a JSON object');
  }

  const p = new FactsParser(keyToId);
  const facts: SessionFacts = {
    mentions: collect(value.mentions, (v, i) => p.mention(v, i)),
    scenes: collect(value.scenes, (v, i) => p.scene(v, i)),
    events: collect(value.events, (v, i) => p.event(v, i)),
    threads: collect(value.threads, (v, i) => p.thread(v, i)),
    quotes: collect(value.quotes, (v, i) => p.quote(v, i)),
  };
  return { facts, issues: p.issues };
}

export function parseSummaryPlan(value: unknown): SummaryPlan {
  if (!isObj(value)) throw new ExtractionSchemaError('Summary plan must be a JSON object');
  const beats = list(value.beats).flatMap((b) => {
    if (!isObj(b)) return [];
    const title = str(field(b, 'title'));
    const summary = str(field(b, 'summary'));
    if (title === null || summary === null) return [];
    return [{ title, summary, quoteIds: strList(field(b, 'quoteIds', 'quote_ids')) }];
  });
  return { beats };
}
