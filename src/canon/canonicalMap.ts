// src/canon/canonicalMap.ts
// Read-only canonical views produced by the fold. Never stored; rebuilt from
// base records plus approved corrections.

import { compareStrings, type IdentityGraph } from './identityGraph.js';
import { normalizeKey } from './normalize.js';
import type {
  BaseEntity,
  BaseThread,
  EntityType,
  FoldViolation,
  NameResolution,
  ThreadKind,
  ThreadStatus,
} from './types.js';

/* ---------- View Records ---------- */

export interface CanonicalEntity {
  id: string;
  entityType: EntityType;
  originalName: string;
  canonicalName: string;
  description: string | null;
  aliases: string[];
  removedAliases: string[];
  hidden: boolean;
  mergedInto: string | null;
  /** Canonical value differs from the originally extracted one. */
  corrected: boolean;
}

export interface CanonicalThread {
  id: string;
  kind: ThreadKind;
  originalTitle: string;
  title: string;
  /** Earlier titles that still resolve to this thread. */
  aliases: string[];
  status: ThreadStatus;
  summary: string | null;
  hidden: boolean;
  mergedInto: string | null;
  corrected: boolean;
}

export interface ListOptions {
  includeHidden?: boolean;
}

export interface ExtractorSnapshot {
  /** Normalized key → canonical name, for every live name. */
  names: Record<string, string>;
  /** Names (keys) that must not be reintroduced. */
  hidden: string[];
}

/* ---------- Entity View ---------- */

export class EntityView {
  constructor(
    private readonly graph: IdentityGraph,
    private readonly base: readonly BaseEntity[]
  ) {}

  resolveName(name: string): NameResolution {
    return this.graph.resolveName(name);
  }

  resolveId(id: string): string {
    return this.graph.resolveId(id);
  }

  get(id: string): CanonicalEntity | undefined {
    const record = this.base.find((b) => b.id === id);
    return record ? this.toCanonical(record) : undefined;
  }

  /** Entities in creation order; hidden and merged ones only when asked. */
  list(options: ListOptions = {}): CanonicalEntity[] {
    const all = this.base.map((b) => this.toCanonical(b));
    if (options.includeHidden) return all;
    return all.filter((e) => !e.hidden && !e.mergedInto);
  }

  aliasesOf(id: string): string[] {
    return [...(this.graph.node(id)?.aliases ?? [])];
  }

  /** The entity that holds the name's key, without following merges. */
  ownerOf(name: string): string | undefined {
    return this.graph.owner(normalizeKey(name));
  }

  /** Every spelling on record for the entity: name, aliases, stored variants. */
  surfaceForms(id: string): string[] {
    const node = this.graph.node(id);
    const stored = this.base.find((b) => b.id === id)?.aliases ?? [];
    return node ? [node.name, ...node.aliases, ...stored] : [...stored];
  }

  mergeTarget(id: string): string | null {
    const node = this.graph.node(id);
    return node?.mergedInto ? this.graph.resolveId(id) : null;
  }

  /** Explicitly hidden ids, sorted. */
  hiddenIds(): string[] {
    return this.graph
      .ids()
      .filter((id) => this.graph.node(id)?.hidden)
      .sort(compareStrings);
  }

  /** Entities that explicitly had `name` removed as an alias. */
  removedAliasOwners(name: string): string[] {
    return this.graph.removedAliasOwners(normalizeKey(name));
  }

  snapshot(): ExtractorSnapshot {
    return snapshotOf(this.graph);
  }

  toJSON(): unknown[] {
    return this.base.map((b) => {
      const e = this.toCanonical(b);
      return {
        id: e.id,
        entityType: e.entityType,
        canonicalName: e.canonicalName,
        aliases: e.aliases,
        removedAliases: e.removedAliases,
        hidden: e.hidden,
        mergedInto: e.mergedInto,
      };
    });
  }

  indexJSON(): Record<string, string> {
    return Object.fromEntries(this.graph.indexEntries());
  }

  private toCanonical(record: BaseEntity): CanonicalEntity {
    const node = this.graph.node(record.id);
    const name = node?.name ?? record.originalName;
    const aliases = node ? [...node.aliases] : [...record.aliases];
    const hidden = node ? this.graph.resolveOwner(record.id).status === 'hidden' : false;
    const mergedInto = this.mergeTarget(record.id);
    const baseAliasKeys = record.aliases.map(normalizeKey).sort(compareStrings);
    const aliasKeys = aliases.map(normalizeKey).sort(compareStrings);

    return {
      id: record.id,
      entityType: record.entityType,
      originalName: record.originalName,
      canonicalName: name,
      description: record.description,
      aliases,
      removedAliases: node ? [...node.removedAliases].sort(compareStrings) : [],
      hidden,
      mergedInto,
      corrected:
        name !== record.originalName ||
        hidden ||
        mergedInto !== null ||
        aliasKeys.join('\n') !== baseAliasKeys.join('\n'),
    };
  }
}

/* ---------- Thread View ---------- */

export interface ThreadFields {
  status: ThreadStatus;
  summary: string | null;
}

export class ThreadView {
  constructor(
    private readonly graph: IdentityGraph,
    private readonly base: readonly BaseThread[],
    private readonly fields: ReadonlyMap<string, ThreadFields>
  ) {}

  /** Canonical id for a thread id: merge target, hidden, or unknown. */
  resolveId(id: string): NameResolution {
    return this.graph.resolveOwner(id);
  }

  resolveTitle(title: string): NameResolution {
    return this.graph.resolveName(title);
  }

  get(id: string): CanonicalThread | undefined {
    const record = this.base.find((b) => b.id === id);
    return record ? this.toCanonical(record) : undefined;
  }

  list(options: ListOptions = {}): CanonicalThread[] {
    const all = this.base.map((b) => this.toCanonical(b));
    if (options.includeHidden) return all;
    return all.filter((t) => !t.hidden && !t.mergedInto);
  }

  hiddenIds(): string[] {
    return this.graph
      .ids()
      .filter((id) => this.graph.node(id)?.hidden)
      .sort(compareStrings);
  }

  mergeTarget(id: string): string | null {
    const node = this.graph.node(id);
    return node?.mergedInto ? this.graph.resolveId(id) : null;
  }

  snapshot(): ExtractorSnapshot {
    return snapshotOf(this.graph);
  }

  toJSON(): unknown[] {
    return this.base.map((b) => {
      const t = this.toCanonical(b);
      return {
        id: t.id,
        title: t.title,
        aliases: t.aliases,
        status: t.status,
        summary: t.summary,
        hidden: t.hidden,
        mergedInto: t.mergedInto,
      };
    });
  }

  indexJSON(): Record<string, string> {
    return Object.fromEntries(this.graph.indexEntries());
  }

  private toCanonical(record: BaseThread): CanonicalThread {
    const node = this.graph.node(record.id);
    const title = node?.name ?? record.title;
    const fields = this.fields.get(record.id) ?? {
      status: record.status,
      summary: record.summary,
    };
    const hidden = node ? this.graph.resolveOwner(record.id).status === 'hidden' : false;
    const mergedInto = this.mergeTarget(record.id);

    return {
      id: record.id,
      kind: record.kind,
      originalTitle: record.title,
      title,
      aliases: node ? [...node.aliases] : [],
      status: fields.status,
      summary: fields.summary,
      hidden,
      mergedInto,
      corrected:
        title !== record.title ||
        fields.status !== record.status ||
        fields.summary !== record.summary ||
        hidden ||
        mergedInto !== null,
    };
  }
}

/* ---------- Canonical Map ---------- */

export class CanonicalMap {
  constructor(
    readonly campaignId: string,
    readonly entities: EntityView,
    readonly threads: ThreadView,
    readonly violations: readonly FoldViolation[]
  ) {}

  resolveEntityName(name: string): NameResolution {
    return this.entities.resolveName(name);
  }

  resolveThreadId(id: string): NameResolution {
    return this.threads.resolveId(id);
  }

  /** Canonical names and suppressed names handed to the extractor. */
  snapshotForExtractor(): { entities: ExtractorSnapshot; threads: ExtractorSnapshot } {
    return { entities: this.entities.snapshot(), threads: this.threads.snapshot() };
  }

  toJSON(): unknown {
    return {
      campaignId: this.campaignId,
      entities: this.entities.toJSON(),
      entityNames: this.entities.indexJSON(),
      threads: this.threads.toJSON(),
      threadTitles: this.threads.indexJSON(),
      violations: this.violations.map((v) => ({ ...v })),
    };
  }
}

function snapshotOf(graph: IdentityGraph): ExtractorSnapshot {
  const names: Record<string, string> = {};
  const hidden: string[] = [];
  for (const [key, owner] of graph.indexEntries()) {
    const resolution = graph.resolveOwner(owner);
    if (resolution.status === 'live') names[key] = resolution.canonicalName;
    else hidden.push(key);
  }
  return { names, hidden };
}
