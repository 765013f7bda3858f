// Shared test wiring: an in-memory database, transcripts held in memory, a
// scripted extractor and a renderer that can be told to fail.

import { createAppContext, type AppContext } from '../../context.js';
import { openDatabase, type SqliteAdapter } from '../../db/index.js';
import { DevSummarizer } from '../../extraction/dev.js';
import type {
  Extractor,
  RenderedArtifact,
  Renderer,
  SessionBundle,
  SummaryPlan,
} from '../../extraction/types.js';
import {
  TranscriptNotFoundError,
  loadTranscriptContent,
  type LoadedTranscript,
  type TranscriptSource,
} from '../../transcripts/source.js';

export const TRANSCRIPT = [
  'DM 00:00:01 Baba Yaga offers you tea.',
  'Ireena 00:00:05 Help us!',
].join('\n');

export class MemoryTranscripts implements TranscriptSource {
  private readonly files = new Map<string, string>();

  set(campaignSlug: string, sessionSlug: string, content: string): void {
    this.files.set(`${campaignSlug}/${sessionSlug}`, content);
  }

  async load(campaignSlug: string, sessionSlug: string): Promise<LoadedTranscript> {
    const content = this.files.get(`${campaignSlug}/${sessionSlug}`);
    if (content === undefined) throw new TranscriptNotFoundError(campaignSlug, sessionSlug);
    return loadTranscriptContent('txt', content, `memory:${campaignSlug}/${sessionSlug}`);
  }
}

/** Cites utterances by timecode key, the way a model reading the formatted transcript would. */
export class ScriptedExtractor implements Extractor {
  calls = 0;
  failWith: Error | null = null;
  beforeReturn: (() => Promise<void>) | null = null;
  updateEvidence: unknown[] = [];

  async extract(): Promise<unknown> {
    this.calls++;
    if (this.failWith) throw this.failWith;
    if (this.beforeReturn) await this.beforeReturn();
    return {
      mentions: [
        {
          text: 'Baba Yaga',
          entity_type: 'character',
          evidence: [{ utterance_id: '00:00:01', char_start: 0, char_end: 9, kind: 'mention' }],
          confidence: 0.9,
        },
        { text: 'Ireena', entity_type: 'character', evidence: [{ utterance_id: '00:00:05' }] },
      ],
      events: [
        {
          event_type: 'social',
          summary: 'Baba Yaga offers tea.',
          entities: ['Baba Yaga'],
          evidence: [{ utterance_id: '00:00:01' }],
        },
      ],
      threads: [
        {
          title: 'Protect Ireena',
          kind: 'quest',
          status: 'active',
          updates: [
            { note: 'Ireena asks for help.', related_event_indexes: [0], evidence: this.updateEvidence },
          ],
        },
      ],
      quotes: [{ utterance_id: '00:00:05', speaker: 'Ireena' }],
    };
  }
}

export class FlakySummarizer extends DevSummarizer {
  writeFailuresLeft = 0;

  override async write(bundle: SessionBundle, plan: SummaryPlan): Promise<string> {
    if (this.writeFailuresLeft > 0) {
      this.writeFailuresLeft--;
      throw new Error('summarizer timed out');
    }
    return super.write(bundle, plan);
  }
}

export class FlakyRenderer implements Renderer {
  failuresLeft = 0;
  readonly rendered: string[] = [];

  async render(bundle: SessionBundle, text: string): Promise<RenderedArtifact> {
    if (this.failuresLeft > 0) {
      this.failuresLeft--;
      throw new Error('render offline');
    }
    this.rendered.push(text);
    return { path: `memory://${bundle.runId}.md`, bytes: Buffer.byteLength(text, 'utf-8') };
  }
}

export interface TestHarness {
  db: SqliteAdapter;
  ctx: AppContext;
  transcripts: MemoryTranscripts;
  extractor: ScriptedExtractor;
  summarizer: FlakySummarizer;
  renderer: FlakyRenderer;
  sleeps: number[];
}

export async function createHarness(): Promise<TestHarness> {
  const db = await openDatabase(':memory:');
  const transcripts = new MemoryTranscripts();
  transcripts.set('barovia', 'session-01', TRANSCRIPT);
  const extractor = new ScriptedExtractor();
  const summarizer = new FlakySummarizer();
  const renderer = new FlakyRenderer();
  const sleeps: number[] = [];

  const ctx = createAppContext(db, {
    transcripts,
    extractor,
    summarizer,
    renderer,
    retry: { maxAttempts: 2, baseDelayMs: 10, maxDelayMs: 100 },
    pipeline: { promptVersion: 'v1', model: 'dev' },
    sleep: async (ms) => {
      sleeps.push(ms);
    },
  });
  return { db, ctx, transcripts, extractor, summarizer, renderer, sleeps };
}
