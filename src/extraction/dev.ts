// src/extraction/dev.ts
// Deterministic local collaborators so a run completes without an inference
// provider. Output follows the same untyped JSON contract as a real extractor.

import fs from 'node:fs/promises';
import path from 'node:path';
import type {
  Extractor,
  ExtractorInput,
  RenderedArtifact,
  Renderer,
  SessionBundle,
  Summarizer,
  SummaryPlan,
} from './types.js';

/* ============= Extractor ============= */

const NAME_PATTERN = /\b[A-Z][a-z'-]+(?:\s+[A-Z][a-z'-]+)*/g;
const QUEST_PATTERN = /\b(?:quest|mission|task)\s+(?:to|for)\s+(.+?)[.!?]*$/i;

// Capitalized words that start sentences rather than name things
const STOPWORDS = new Set([
  'A', 'An', 'And', 'But', 'I', 'If', 'In', 'It', 'No', 'Oh', 'Ok', 'Okay', 'On',
  'So', 'The', 'Then', 'There', 'We', 'What', 'When', 'Yes', 'You',
]);

export class DevExtractor implements Extractor {
  async extract(input: ExtractorInput): Promise<unknown> {
    const mentions: unknown[] = [];
    const events: unknown[] = [];
    const threads: unknown[] = [];
    const quotes: unknown[] = [];

    for (const line of input.lines) {
      const names: string[] = [];
      for (const match of line.text.matchAll(NAME_PATTERN)) {
        const words = match[0].split(/\s+/);
        const start = STOPWORDS.has(words[0] ?? '') ? 1 : 0;
        const name = words.slice(start).join(' ');
        if (!name || STOPWORDS.has(name)) continue;
        const offset = (match.index ?? 0) + match[0].length - name.length;
        names.push(name);
        mentions.push({
          text: name,
          entity_type: 'character',
          evidence: [
            { utterance_id: line.utteranceId, char_start: offset, char_end: offset + name.length, kind: 'mention' },
          ],
          confidence: 0.5,
        });
      }

      if (names.length > 0) {
        events.push({
          event_type: 'generic',
          summary: `${line.speaker}: ${line.text}`,
          start_ms: line.startMs,
          end_ms: line.startMs,
          entities: names,
          evidence: [{ utterance_id: line.utteranceId, kind: 'support' }],
        });
      }

      const quest = QUEST_PATTERN.exec(line.text);
      if (quest?.[1]) {
        threads.push({
          title: quest[1].trim(),
          kind: 'quest',
          status: 'active',
          updates: [
            {
              update_type: 'introduced',
              note: line.text,
              evidence: [{ utterance_id: line.utteranceId, kind: 'support' }],
              related_event_indexes: names.length > 0 ? [events.length - 1] : [],
            },
          ],
          evidence: [{ utterance_id: line.utteranceId, kind: 'support' }],
        });
      }

      if (line.text.trim().endsWith('!')) {
        quotes.push({ utterance_id: line.utteranceId, speaker: line.speaker });
      }
    }

    return { mentions, scenes: [], events, threads, quotes };
  }
}

/* ============= Summarizer ============= */

const EVENTS_PER_BEAT = 5;

export class DevSummarizer implements Summarizer {
  async plan(bundle: SessionBundle): Promise<SummaryPlan> {
    const beats: SummaryPlan['beats'] = [];
    for (let i = 0; i < bundle.events.length; i += EVENTS_PER_BEAT) {
      const chunk = bundle.events.slice(i, i + EVENTS_PER_BEAT);
      beats.push({
        title: `Part ${beats.length + 1}`,
        summary: chunk.map((e) => e.summary).join(' '),
        quoteIds: [],
      });
    }
    const first = beats[0];
    if (first) first.quoteIds = bundle.quotes.slice(0, 3).map((q) => q.id);
    return { beats };
  }

  async write(bundle: SessionBundle, plan: SummaryPlan): Promise<string> {
    const quotesById = new Map(bundle.quotes.map((q) => [q.id, q]));
    const out: string[] = [`# ${bundle.sessionTitle}`, ''];

    for (const beat of plan.beats) {
      out.push(`## ${beat.title}`, '', beat.summary, '');
      for (const id of beat.quoteIds) {
        const quote = quotesById.get(id);
        if (quote) out.push(`> ${quote.text}${quote.speaker ? ` (${quote.speaker})` : ''}`, '');
      }
    }

    if (bundle.entities.length > 0) {
      out.push('## Cast', '');
      for (const e of bundle.entities) out.push(`- ${e.name} (${e.entityType})`);
      out.push('');
    }
    if (bundle.threads.length > 0) {
      out.push('## Threads', '');
      for (const t of bundle.threads) out.push(`- ${t.title}: ${t.status}`);
      out.push('');
    }
    return out.join('\n');
  }
}

/* ============= Renderer ============= */

/** Writes the summary as Markdown under <root>/<campaignId>/<sessionId>/<runId>.md */
export class MarkdownFileRenderer implements Renderer {
  constructor(private readonly root: string) {}

  async render(bundle: SessionBundle, text: string): Promise<RenderedArtifact> {
    const dir = path.join(this.root, bundle.campaignId, bundle.sessionId);
    await fs.mkdir(dir, { recursive: true });
    const file = path.join(dir, `${bundle.runId}.md`);
    await fs.writeFile(file, text, 'utf-8');
    return { path: file, bytes: Buffer.byteLength(text, 'utf-8') };
  }
}
