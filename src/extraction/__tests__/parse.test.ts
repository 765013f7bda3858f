import { describe, it, expect } from 'vitest';
import {
  ExtractionSchemaError,
  extractJsonFromResponse,
  parseEvidenceSpan,
  parseSessionFacts,
  parseSummaryPlan,
} from '../parse.js';

describe('extractJsonFromResponse', () => {
  it('strips code fences', () => {
    expect(extractJsonFromResponse('```json\n{"a": 1}\n```')).toEqual({ json: { a: 1 } });
  });

  it('falls back to the outermost object', () => {
    expect(extractJsonFromResponse('Here you go: {"a": {"b": 2}} hope it helps')).toEqual({
      json: { a: { b: 2 } },
    });
  });

  it('reports text without JSON', () => {
    const result = extractJsonFromResponse('no json here');
    expect(result.json).toBeNull();
    expect(result.parseError).toMatch(/^Failed to parse JSON: /);
  });
});

describe('parseEvidenceSpan', () => {
  it('maps transcript keys to utterance ids and accepts snake_case', () => {
    const keyToId = new Map([['00:01:05#2', 'utt_9']]);
    expect(
      parseEvidenceSpan({ utterance_id: '00:01:05#2', char_start: '3', char_end: 8, kind: 'quote' }, keyToId)
    ).toEqual({ utteranceId: 'utt_9', charStart: 3, charEnd: 8, kind: 'quote', confidence: null });
  });

  it('keeps unusable offsets for the validator to reject', () => {
    expect(parseEvidenceSpan({ utteranceId: 'utt_1', charStart: 'soon', kind: 'hearsay' })).toEqual({
      utteranceId: 'utt_1',
      charStart: Number.NaN,
      charEnd: null,
      kind: 'support',
      confidence: null,
    });
  });

  it('skips spans without an utterance', () => {
    expect(parseEvidenceSpan({ charStart: 1 })).toBeNull();
    expect(parseEvidenceSpan('utt_1')).toBeNull();
  });
});

describe('parseSessionFacts', () => {
  it('validates each section and reports skipped items', () => {
    const { facts, issues } = parseSessionFacts({
      mentions: [
        { text: ' Baba Yaga ', type: 'character', confidence: 1.7, evidence: [{ utteranceId: 'utt_1' }] },
        { name: 'Lantern', entity_type: 'gizmo' },
        { description: 'no name' },
      ],
      events: [{ summary: 'A fight breaks out', type: 'combat', start_ms: 1500.4, entities: ['Strahd', 3] }],
      threads: [
        {
          title: 'Rescue Ireena',
          kind: 'quest',
          status: 'ongoing',
          updates: [{ note: 'Ireena is safe', related_event_indexes: [0, -1, 1.5] }, { type: 'x' }],
        },
      ],
      quotes: [{ utteranceId: 'utt_1', charStart: 0, charEnd: 4, speaker: 'DM' }, 42],
    });

    expect(facts.mentions).toEqual([
      {
        text: 'Baba Yaga',
        entityType: 'character',
        description: null,
        evidence: [{ utteranceId: 'utt_1', charStart: null, charEnd: null, kind: 'support', confidence: null }],
        confidence: 1,
      },
      { text: 'Lantern', entityType: 'other', description: null, evidence: [], confidence: null },
    ]);
    expect(facts.events).toEqual([
      {
        eventType: 'combat',
        summary: 'A fight breaks out',
        startMs: 1500,
        endMs: null,
        entities: ['Strahd'],
        evidence: [],
        confidence: null,
      },
    ]);
    expect(facts.threads[0]?.status).toBe('proposed');
    expect(facts.threads[0]?.updates).toEqual([
      { updateType: 'note', note: 'Ireena is safe', evidence: [], relatedEventIndexes: [0], relatedEntities: [] },
    ]);
    expect(facts.quotes).toEqual([
      { utteranceId: 'utt_1', charStart: 0, charEnd: 4, text: null, speaker: 'DM', note: null },
    ]);
    expect(facts.scenes).toEqual([]);
    expect(issues).toEqual([
      'mentions[2] has no text',
      'threads[0].updates[1] has no note',
      'quotes[1] is not an object',
    ]);
  });

  it('parses a JSON string response', () => {
    const { facts } = parseSessionFacts('```json\n{"mentions": [{"text": "Strahd"}]}\n```');
    expect(facts.mentions.map((m) => m.text)).toEqual(['Strahd']);
  });

  it('rejects output that is not an object', () => {
    expect(() => parseSessionFacts([1, 2])).toThrow(ExtractionSchemaError);
    expect(() => parseSessionFacts('not json')).toThrow(ExtractionSchemaError);
  });
});

describe('parseSummaryPlan', () => {
  it('keeps beats with a title and summary', () => {
    expect(
      parseSummaryPlan({
        beats: [
          { title: 'Arrival', summary: 'The party reaches Barovia.', quote_ids: ['quo_1'] },
          { title: 'Untitled' },
        ],
      })
    ).toEqual({ beats: [{ title: 'Arrival', summary: 'The party reaches Barovia.', quoteIds: ['quo_1'] }] });
  });
});
