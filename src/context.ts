// src/context.ts
// Composition root: wires stores, the canonical map builder, the ledger,
// pipeline stages, the run controller and the job queue over one database.

import { CorrectionLedger } from './canon/ledger.js';
import { CanonicalMapBuilder } from './canon/mapBuilder.js';
import { KeyedMutex } from './concurrency/keyedMutex.js';
import { config } from './config.js';
import type { DbAdapter } from './db/types.js';
import { DevExtractor, DevSummarizer, MarkdownFileRenderer } from './extraction/dev.js';
import type { Extractor, Renderer, Summarizer } from './extraction/types.js';
import { createJobQueue, type SQLiteJobQueue } from './jobs/queue.js';
import { registerAllWorkers } from './jobs/workers/index.js';
import { RunController, type PipelineIdentity } from './runs/controller.js';
import type { RetryPolicy } from './runs/retry.js';
import { createStages } from './runs/stages.js';
import { canonicalSource, createStores, type Stores } from './store/index.js';
import { FileTranscriptSource, type TranscriptSource } from './transcripts/source.js';

export interface AppContext {
  db: DbAdapter;
  stores: Stores;
  maps: CanonicalMapBuilder;
  ledger: CorrectionLedger;
  runs: RunController;
  queue: SQLiteJobQueue;
}

/** Collaborators and policies; anything left out comes from config. */
export interface ContextOverrides {
  transcripts?: TranscriptSource;
  extractor?: Extractor;
  summarizer?: Summarizer;
  renderer?: Renderer;
  retry?: RetryPolicy;
  pipeline?: PipelineIdentity;
  sleep?: (ms: number) => Promise<void>;
}

export function createAppContext(db: DbAdapter, overrides: ContextOverrides = {}): AppContext {
  const stores = createStores(db);
  const maps = new CanonicalMapBuilder(canonicalSource(stores));
  // Ledger writes and the resolve stage share campaign locks
  const locks = new KeyedMutex();
  const transcripts = overrides.transcripts ?? new FileTranscriptSource(config.storage.transcripts);

  const ledger = new CorrectionLedger({ corrections: stores.corrections, maps, locks });
  const stages = createStages({
    db,
    stores,
    maps,
    transcripts,
    extractor: overrides.extractor ?? new DevExtractor(),
    summarizer: overrides.summarizer ?? new DevSummarizer(),
    renderer: overrides.renderer ?? new MarkdownFileRenderer(config.storage.artifacts),
    locks,
  });
  const runs = new RunController({
    stores,
    transcripts,
    stages,
    retry: overrides.retry,
    pipeline: overrides.pipeline,
    sleep: overrides.sleep,
  });

  const queue = createJobQueue(db);
  registerAllWorkers(queue, runs);

  return { db, stores, maps, ledger, runs, queue };
}
