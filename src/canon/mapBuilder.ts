// src/canon/mapBuilder.ts
// Folds approved corrections, in (createdAt, id) order, over the stored base
// records into a CanonicalMap. The fold is pure; CanonicalMapBuilder adds
// loading and a per-campaign cache.

import { createLogger } from '../observability/index.js';
import { CanonicalMap, EntityView, ThreadView, type ThreadFields } from './canonicalMap.js';
import { IdentityGraph, compareStrings } from './identityGraph.js';
import { normalizeKey } from './normalize.js';
import type {
  BaseEntity,
  BaseThread,
  Correction,
  FoldViolation,
  FoldViolationReason,
} from './types.js';

const log = createLogger('canon/mapBuilder');

/* ---------- Ordering ---------- */

export function compareCorrections(
  a: Pick<Correction, 'createdAt' | 'id'>,
  b: Pick<Correction, 'createdAt' | 'id'>
): number {
  return a.createdAt - b.createdAt || compareStrings(a.id, b.id);
}

function compareRecords(
  a: { createdAt: number; id: string },
  b: { createdAt: number; id: string }
): number {
  return a.createdAt - b.createdAt || compareStrings(a.id, b.id);
}

/* ---------- Fold ---------- */

export interface FoldInput {
  campaignId: string;
  entities: readonly BaseEntity[];
  threads: readonly BaseThread[];
  /** Corrections to apply; callers pass the approved subset. */
  corrections: readonly Correction[];
}

export interface FoldResult {
  map: CanonicalMap;
  violations: FoldViolation[];
}

export function foldCorrections(input: FoldInput): FoldResult {
  const entities = [...input.entities].sort(compareRecords);
  const threads = [...input.threads].sort(compareRecords);
  const corrections = [...input.corrections].sort(compareCorrections);

  const entityGraph = new IdentityGraph(
    entities.map((e) => ({
      id: e.id,
      name: e.originalName,
      aliases: [...e.aliases].sort(compareStrings),
    }))
  );
  const threadGraph = new IdentityGraph(
    threads.map((t) => ({ id: t.id, name: t.title, aliases: [] }))
  );
  const threadFields = new Map<string, ThreadFields>(
    threads.map((t) => [t.id, { status: t.status, summary: t.summary }])
  );

  const violations: FoldViolation[] = [];
  const violate = (c: Correction, reason: FoldViolationReason, message: string) => {
    violations.push({ correctionId: c.id, reason, message });
  };

  for (const c of corrections) {
    const graph = c.targetType === 'entity' ? entityGraph : threadGraph;
    if (!graph.has(c.targetId)) {
      violate(c, 'unknown_target', `Unknown ${c.targetType} ${c.targetId}`);
      continue;
    }

    // Identity actions shared by both record kinds
    if (c.action === 'merge') {
      if (!graph.has(c.payload.intoId)) {
        violate(c, 'unknown_target', `Unknown merge target ${c.payload.intoId}`);
      } else if (!graph.merge(c.targetId, c.payload.intoId)) {
        violate(c, 'cycle', `Merging ${c.targetId} into ${c.payload.intoId} creates a cycle`);
      }
      continue;
    }
    if (c.action === 'unmerge') {
      graph.unmerge(c.targetId);
      continue;
    }
    if (c.action === 'hide' || c.action === 'unhide') {
      graph.setHidden(c.targetId, c.action === 'hide');
      continue;
    }

    if (c.targetType === 'entity') {
      switch (c.action) {
        case 'rename':
          if (!entityGraph.rename(c.targetId, c.payload.name)) {
            violate(c, 'name_conflict', nameConflict(entityGraph, c.payload.name, c.targetId));
          }
          break;
        case 'alias_add':
          if (!entityGraph.addAlias(c.targetId, c.payload.alias)) {
            violate(c, 'name_conflict', nameConflict(entityGraph, c.payload.alias, c.targetId));
          }
          break;
        case 'alias_remove':
          if (!entityGraph.removeAlias(c.targetId, c.payload.alias)) {
            violate(
              c,
              'invalid_alias_removal',
              `"${c.payload.alias}" is the current canonical name of ${c.targetId}`
            );
          }
          break;
      }
      continue;
    }

    const fields = threadFields.get(c.targetId);
    switch (c.action) {
      case 'title':
        if (!threadGraph.rename(c.targetId, c.payload.title)) {
          violate(c, 'name_conflict', nameConflict(threadGraph, c.payload.title, c.targetId));
        }
        break;
      case 'status':
        if (fields) fields.status = c.payload.status;
        break;
      case 'summary':
        if (fields) fields.summary = c.payload.summary;
        break;
    }
  }

  const map = new CanonicalMap(
    input.campaignId,
    new EntityView(entityGraph, entities),
    new ThreadView(threadGraph, threads, threadFields),
    violations
  );
  return { map, violations };
}

function nameConflict(graph: IdentityGraph, name: string, claimant: string): string {
  const owner = graph.nameOwner(normalizeKey(name), claimant);
  return `"${name}" is the canonical name of ${owner ?? 'another record'}`;
}

/* ---------- Builder ---------- */

export interface CanonicalSource {
  listBaseEntities(campaignId: string): Promise<BaseEntity[]>;
  listBaseThreads(campaignId: string): Promise<BaseThread[]>;
  listApprovedCorrections(campaignId: string): Promise<Correction[]>;
}

export class CanonicalMapBuilder {
  private readonly cache = new Map<string, CanonicalMap>();
  private readonly generations = new Map<string, number>();

  constructor(private readonly source: CanonicalSource) {}

  async build(campaignId: string): Promise<CanonicalMap> {
    const cached = this.cache.get(campaignId);
    if (cached) return cached;

    const generation = this.generations.get(campaignId) ?? 0;
    const input = await this.load(campaignId);
    const { map, violations } = foldCorrections(input);

    if (violations.length > 0) {
      log.warn({ campaignId, violations }, 'Skipped corrections that could not be applied');
    }
    // A build that raced an invalidation is returned but not cached
    if ((this.generations.get(campaignId) ?? 0) === generation) {
      this.cache.set(campaignId, map);
    }
    return map;
  }

  /** Fold the approved ledger plus extra candidate corrections, uncached. */
  async preview(campaignId: string, extra: readonly Correction[]): Promise<FoldResult> {
    const input = await this.load(campaignId);
    return foldCorrections({ ...input, corrections: [...input.corrections, ...extra] });
  }

  invalidate(campaignId: string): void {
    this.cache.delete(campaignId);
    this.generations.set(campaignId, (this.generations.get(campaignId) ?? 0) + 1);
  }

  private async load(campaignId: string): Promise<FoldInput> {
    const [entities, threads, corrections] = await Promise.all([
      this.source.listBaseEntities(campaignId),
      this.source.listBaseThreads(campaignId),
      this.source.listApprovedCorrections(campaignId),
    ]);
    return { campaignId, entities, threads, corrections };
  }
}
