// src/canon/identityGraph.ts
// Name index plus merge/hide state for one kind of canonical record.
// Entities and threads each fold their corrections into their own graph.

import { cleanName, normalizeKey } from './normalize.js';
import type { NameResolution } from './types.js';

export interface GraphSeed {
  id: string;
  name: string;
  aliases: string[];
}

export interface GraphNode {
  id: string;
  /** Current canonical name (entity name or thread title). */
  name: string;
  /** Display forms, unique by key, in the order they were claimed. */
  aliases: string[];
  /** Keys removed from this record by an alias_remove. */
  removedAliases: Set<string>;
  hidden: boolean;
  /** Direct merge pointer; follow with resolveId() for the final record. */
  mergedInto: string | null;
}

export class IdentityGraph {
  private readonly nodes = new Map<string, GraphNode>();
  private readonly index = new Map<string, string>();

  /**
   * Seeds must already be in their stable order. Canonical names claim
   * keys first, then aliases; the first claimant of a key keeps it.
   */
  constructor(seeds: readonly GraphSeed[]) {
    for (const seed of seeds) {
      this.nodes.set(seed.id, {
        id: seed.id,
        name: seed.name,
        aliases: [],
        removedAliases: new Set(),
        hidden: false,
        mergedInto: null,
      });
      const key = normalizeKey(seed.name);
      if (!this.index.has(key)) this.index.set(key, seed.id);
    }
    for (const seed of seeds) {
      const node = this.nodes.get(seed.id);
      if (!node) continue;
      const nameKey = normalizeKey(node.name);
      for (const alias of seed.aliases) {
        const key = normalizeKey(alias);
        if (!key || key === nameKey || hasAliasKey(node, key)) continue;
        node.aliases.push(cleanName(alias));
        if (!this.index.has(key)) this.index.set(key, seed.id);
      }
    }
  }

  has(id: string): boolean {
    return this.nodes.has(id);
  }

  node(id: string): GraphNode | undefined {
    return this.nodes.get(id);
  }

  ids(): string[] {
    return [...this.nodes.keys()];
  }

  /* ---------- Mutations (fold steps) ---------- */

  /**
   * Returns false, leaving the graph unchanged, when the new name is the
   * canonical name of another record.
   */
  rename(id: string, newName: string): boolean {
    const node = this.require(id);
    const name = cleanName(newName);
    const oldKey = normalizeKey(node.name);
    const newKey = normalizeKey(name);
    if (this.nameOwner(newKey, id) !== null) return false;

    if (oldKey !== newKey && !hasAliasKey(node, oldKey)) {
      node.aliases.push(node.name);
    }
    node.aliases = node.aliases.filter((a) => normalizeKey(a) !== newKey);
    node.removedAliases.delete(newKey);
    node.name = name;

    this.claim(oldKey, id);
    this.claim(newKey, id);
    return true;
  }

  /** Returns false when the alias is the canonical name of another record. */
  addAlias(id: string, alias: string): boolean {
    const node = this.require(id);
    const display = cleanName(alias);
    const key = normalizeKey(display);
    if (key === normalizeKey(node.name)) return true;
    if (this.nameOwner(key, id) !== null) return false;

    if (!hasAliasKey(node, key)) node.aliases.push(display);
    node.removedAliases.delete(key);
    this.claim(key, id);
    return true;
  }

  /**
   * The record other than `id` whose canonical name holds `key`, or null.
   * A record already merged into `id` does not count.
   */
  nameOwner(key: string, id: string): string | null {
    const owner = this.index.get(key);
    if (owner === undefined || owner === id) return null;
    const ownerNode = this.nodes.get(owner);
    if (!ownerNode || normalizeKey(ownerNode.name) !== key) return null;
    if (this.resolveId(owner) === this.resolveId(id)) return null;
    return owner;
  }

  /** Returns false when the alias is the record's current canonical name. */
  removeAlias(id: string, alias: string): boolean {
    const node = this.require(id);
    const key = normalizeKey(alias);
    if (key === normalizeKey(node.name)) return false;

    node.aliases = node.aliases.filter((a) => normalizeKey(a) !== key);
    node.removedAliases.add(key);
    if (this.index.get(key) === id) this.index.delete(key);
    return true;
  }

  /**
   * Point `id` at the final record of `intoId`. Returns false, leaving the
   * graph unchanged, when the target's merge path reaches `id`.
   */
  merge(id: string, intoId: string): boolean {
    this.require(id);
    if (this.pathFrom(intoId).includes(id)) return false;
    this.require(id).mergedInto = this.resolveId(intoId);
    return true;
  }

  unmerge(id: string): void {
    this.require(id).mergedInto = null;
  }

  setHidden(id: string, hidden: boolean): void {
    this.require(id).hidden = hidden;
  }

  /* ---------- Lookups ---------- */

  /** Follow merge pointers to a fixed point. */
  resolveId(id: string): string {
    const path = this.pathFrom(id);
    return path[path.length - 1] ?? id;
  }

  /** The record that holds `key` in the name index, before merges. */
  owner(key: string): string | undefined {
    return this.index.get(key);
  }

  resolveName(name: string): NameResolution {
    const owner = this.index.get(normalizeKey(name));
    if (owner === undefined) return { status: 'unknown' };
    return this.resolveOwner(owner);
  }

  resolveOwner(owner: string): NameResolution {
    const ownerNode = this.nodes.get(owner);
    if (!ownerNode) return { status: 'unknown' };
    if (ownerNode.hidden) return { status: 'hidden', id: owner };

    const finalId = this.resolveId(owner);
    const finalNode = this.nodes.get(finalId);
    if (!finalNode || finalNode.hidden) return { status: 'hidden', id: finalId };
    return { status: 'live', id: finalId, canonicalName: finalNode.name };
  }

  /** Key → owner entries, sorted by key. */
  indexEntries(): Array<[string, string]> {
    return [...this.index.entries()].sort(([a], [b]) => compareStrings(a, b));
  }

  /** Records whose alias_remove history contains `key`. */
  removedAliasOwners(key: string): string[] {
    const owners: string[] = [];
    for (const node of this.nodes.values()) {
      if (node.removedAliases.has(key)) owners.push(node.id);
    }
    return owners;
  }

  /* ---------- Internals ---------- */

  private require(id: string): GraphNode {
    const node = this.nodes.get(id);
    if (!node) throw new Error(`Unknown record ${id}`);
    return node;
  }

  private pathFrom(id: string): string[] {
    const path: string[] = [];
    const seen = new Set<string>();
    let current: string | null = id;
    while (current !== null && !seen.has(current)) {
      seen.add(current);
      path.push(current);
      current = this.nodes.get(current)?.mergedInto ?? null;
    }
    return path;
  }

  /** Give `key` to `id`, dropping it from the previous owner's aliases. */
  private claim(key: string, id: string): void {
    const previous = this.index.get(key);
    if (previous !== undefined && previous !== id) {
      const prevNode = this.nodes.get(previous);
      if (prevNode) {
        prevNode.aliases = prevNode.aliases.filter((a) => normalizeKey(a) !== key);
      }
    }
    this.index.set(key, id);
  }
}

function hasAliasKey(node: GraphNode, key: string): boolean {
  return node.aliases.some((a) => normalizeKey(a) === key);
}

/** Code-unit comparison; independent of locale. */
export function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
