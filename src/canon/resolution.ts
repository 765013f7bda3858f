// src/canon/resolution.ts
// Mention → entity and thread candidate → campaign thread resolution.
//
// Pure: the engine reads a CanonicalMap and returns a plan (records to
// create, links, learned aliases, counters). The resolve stage applies the
// plan in one transaction.

import { newId } from '../utils/ids.js';
import type { CanonicalMap } from './canonicalMap.js';
import { cleanName, normalizeKey } from './normalize.js';
import type { EntityType, ThreadKind, ThreadStatus } from './types.js';

export interface ResolveOptions {
  /** Id factory for records created by the plan. */
  newId?: () => string;
}

function assertCampaign(map: CanonicalMap, campaignId: string): void {
  if (map.campaignId !== campaignId) {
    throw new Error(`Canonical map belongs to ${map.campaignId}, not ${campaignId}`);
  }
}

/* ============= Mentions ============= */

export interface MentionInput {
  text: string;
  entityType: EntityType;
  description: string | null;
}

export type MentionOutcome =
  | { kind: 'linked'; entityId: string; created: boolean }
  | { kind: 'dropped_empty' }
  | { kind: 'dropped_hidden'; entityId: string }
  | { kind: 'collision'; ownerIds: string[] };

export interface PlannedEntity {
  id: string;
  entityType: EntityType;
  name: string;
  description: string | null;
}

export interface LearnedAlias {
  entityId: string;
  alias: string;
}

export interface AliasCollision {
  text: string;
  /** Entities that explicitly had this name removed. */
  entityIds: string[];
}

export interface MentionCounters {
  mentions_total: number;
  mentions_resolved: number;
  entities_created: number;
  aliases_learned: number;
  mentions_dropped_empty: number;
  mentions_dropped_hidden: number;
  alias_collisions: number;
}

export interface MentionResolution<T extends MentionInput> {
  newEntities: PlannedEntity[];
  outcomes: Array<{ mention: T; outcome: MentionOutcome }>;
  learnedAliases: LearnedAlias[];
  collisions: AliasCollision[];
  counters: MentionCounters;
}

export function resolveMentions<T extends MentionInput>(
  campaignId: string,
  mentions: readonly T[],
  map: CanonicalMap,
  options: ResolveOptions = {}
): MentionResolution<T> {
  assertCampaign(map, campaignId);
  const makeId = options.newId ?? (() => newId('ent'));

  const newEntities: PlannedEntity[] = [];
  const outcomes: MentionResolution<T>['outcomes'] = [];
  const learnedAliases: LearnedAlias[] = [];
  const collisions: AliasCollision[] = [];
  const createdByKey = new Map<string, string>();
  const learnedKeys = new Set<string>();
  const counters: MentionCounters = {
    mentions_total: mentions.length,
    mentions_resolved: 0,
    entities_created: 0,
    aliases_learned: 0,
    mentions_dropped_empty: 0,
    mentions_dropped_hidden: 0,
    alias_collisions: 0,
  };

  const collide = (text: string, entityIds: string[]) => {
    counters.alias_collisions++;
    collisions.push({ text, entityIds });
  };

  for (const mention of mentions) {
    const name = cleanName(mention.text);
    const key = normalizeKey(name);

    if (!key) {
      counters.mentions_dropped_empty++;
      outcomes.push({ mention, outcome: { kind: 'dropped_empty' } });
      continue;
    }

    const batchId = createdByKey.get(key);
    if (batchId !== undefined) {
      counters.mentions_resolved++;
      outcomes.push({ mention, outcome: { kind: 'linked', entityId: batchId, created: false } });
      continue;
    }

    const resolution = map.resolveEntityName(name);

    if (resolution.status === 'hidden') {
      counters.mentions_dropped_hidden++;
      outcomes.push({ mention, outcome: { kind: 'dropped_hidden', entityId: resolution.id } });
      continue;
    }

    if (resolution.status === 'live') {
      const entityId = resolution.id;
      // A new spelling is recorded on the record that owns the key, so a
      // merged record's names never become aliases of its merge target
      const owner = map.entities.ownerOf(name) ?? entityId;
      const learnKey = `${owner}\u0000${name}`;
      if (!map.entities.surfaceForms(owner).includes(name) && !learnedKeys.has(learnKey)) {
        const removedBy = map.entities.removedAliasOwners(name).filter((id) => id !== owner);
        if (removedBy.length > 0) {
          collide(name, removedBy);
        } else {
          learnedKeys.add(learnKey);
          learnedAliases.push({ entityId: owner, alias: name });
          counters.aliases_learned++;
        }
      }
      counters.mentions_resolved++;
      outcomes.push({ mention, outcome: { kind: 'linked', entityId, created: false } });
      continue;
    }

    // Unknown name: never re-create one a correction explicitly removed
    const removedBy = map.entities.removedAliasOwners(name);
    if (removedBy.length > 0) {
      collide(name, removedBy);
      outcomes.push({ mention, outcome: { kind: 'collision', ownerIds: removedBy } });
      continue;
    }

    const id = makeId();
    createdByKey.set(key, id);
    newEntities.push({
      id,
      entityType: mention.entityType,
      name,
      description: mention.description,
    });
    counters.entities_created++;
    counters.mentions_resolved++;
    outcomes.push({ mention, outcome: { kind: 'linked', entityId: id, created: true } });
  }

  return { newEntities, outcomes, learnedAliases, collisions, counters };
}

/**
 * Rewrite free-text entity names (event entities, scene participants) to
 * their canonical names. Hidden names are removed, unknown names kept as
 * written; the result is de-duplicated by key.
 */
export function canonicalizeNames(names: readonly string[], map: CanonicalMap): string[] {
  const out: string[] = [];
  const seen = new Set<string>();
  for (const raw of names) {
    const name = cleanName(raw);
    if (!name) continue;
    const resolution = map.resolveEntityName(name);
    if (resolution.status === 'hidden') continue;
    const canonical = resolution.status === 'live' ? resolution.canonicalName : name;
    const key = normalizeKey(canonical);
    if (seen.has(key)) continue;
    seen.add(key);
    out.push(canonical);
  }
  return out;
}

/* ============= Threads ============= */

export interface ThreadCandidateInput {
  title: string;
  kind: ThreadKind;
  status: ThreadStatus;
  summary: string | null;
  updates: readonly unknown[];
}

export type ThreadOutcome =
  | { kind: 'linked'; threadId: string; created: boolean }
  | { kind: 'dropped_empty' }
  | { kind: 'dropped_hidden'; threadId: string };

export interface PlannedThread {
  id: string;
  title: string;
  kind: ThreadKind;
  status: ThreadStatus;
  summary: string | null;
}

export interface ThreadCounters {
  threads_total: number;
  threads_resolved: number;
  threads_created: number;
  threads_dropped_hidden: number;
  thread_updates_dropped: number;
}

export interface ThreadResolution<T extends ThreadCandidateInput> {
  newThreads: PlannedThread[];
  outcomes: Array<{ candidate: T; outcome: ThreadOutcome }>;
  counters: ThreadCounters;
}

export function resolveThreads<T extends ThreadCandidateInput>(
  campaignId: string,
  candidates: readonly T[],
  map: CanonicalMap,
  options: ResolveOptions = {}
): ThreadResolution<T> {
  assertCampaign(map, campaignId);
  const makeId = options.newId ?? (() => newId('thr'));

  const newThreads: PlannedThread[] = [];
  const outcomes: ThreadResolution<T>['outcomes'] = [];
  const createdByKey = new Map<string, string>();
  const counters: ThreadCounters = {
    threads_total: candidates.length,
    threads_resolved: 0,
    threads_created: 0,
    threads_dropped_hidden: 0,
    thread_updates_dropped: 0,
  };

  for (const candidate of candidates) {
    const title = cleanName(candidate.title);
    const key = normalizeKey(title);
    if (!key) {
      counters.thread_updates_dropped += candidate.updates.length;
      outcomes.push({ candidate, outcome: { kind: 'dropped_empty' } });
      continue;
    }

    const batchId = createdByKey.get(key);
    if (batchId !== undefined) {
      counters.threads_resolved++;
      outcomes.push({ candidate, outcome: { kind: 'linked', threadId: batchId, created: false } });
      continue;
    }

    const resolution = map.threads.resolveTitle(title);
    if (resolution.status === 'hidden') {
      counters.threads_dropped_hidden++;
      counters.thread_updates_dropped += candidate.updates.length;
      outcomes.push({ candidate, outcome: { kind: 'dropped_hidden', threadId: resolution.id } });
      continue;
    }
    if (resolution.status === 'live') {
      counters.threads_resolved++;
      outcomes.push({
        candidate,
        outcome: { kind: 'linked', threadId: resolution.id, created: false },
      });
      continue;
    }

    const id = makeId();
    createdByKey.set(key, id);
    newThreads.push({
      id,
      title,
      kind: candidate.kind,
      status: candidate.status,
      summary: candidate.summary,
    });
    counters.threads_created++;
    counters.threads_resolved++;
    outcomes.push({ candidate, outcome: { kind: 'linked', threadId: id, created: true } });
  }

  return { newThreads, outcomes, counters };
}
