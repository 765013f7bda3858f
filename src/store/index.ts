// src/store/index.ts
// Store bundle over one DbAdapter.

import type { CanonicalSource } from '../canon/mapBuilder.js';
import type { DbAdapter } from '../db/types.js';
import { createCampaignStore, type CampaignStore } from './campaigns.js';
import { createCorrectionStore, type CorrectionStore } from './corrections.js';
import { createEntityStore, type EntityStore } from './entities.js';
import { createRunStore, type RunStore } from './runs.js';
import { createSessionFactsStore, type SessionFactsStore } from './sessionFacts.js';
import { createThreadStore, type ThreadStore } from './threads.js';
import { createUtteranceStore, type UtteranceStore } from './utterances.js';

export interface Stores {
  campaigns: CampaignStore;
  corrections: CorrectionStore;
  utterances: UtteranceStore;
  entities: EntityStore;
  threads: ThreadStore;
  facts: SessionFactsStore;
  runs: RunStore;
}

export function createStores(db: DbAdapter): Stores {
  return {
    campaigns: createCampaignStore(db),
    corrections: createCorrectionStore(db),
    utterances: createUtteranceStore(db),
    entities: createEntityStore(db),
    threads: createThreadStore(db),
    facts: createSessionFactsStore(db),
    runs: createRunStore(db),
  };
}

/** Base records and approved corrections, as the map builder reads them. */
export function canonicalSource(stores: Pick<Stores, 'entities' | 'threads' | 'corrections'>): CanonicalSource {
  return {
    listBaseEntities: (campaignId) => stores.entities.listBase(campaignId),
    listBaseThreads: (campaignId) => stores.threads.listBase(campaignId),
    listApprovedCorrections: (campaignId) => stores.corrections.listApproved(campaignId),
  };
}
