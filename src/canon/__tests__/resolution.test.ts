import { describe, it, expect } from 'vitest';
import { foldCorrections } from '../mapBuilder.js';
import { canonicalizeNames, resolveMentions, resolveThreads, type MentionInput } from '../resolution.js';
import type { BaseEntity, BaseThread, Correction, CorrectionChange } from '../types.js';

const CAMPAIGN = 'cmp_test';

function entity(id: string, name: string, createdAt: number, aliases: string[] = []): BaseEntity {
  return { id, entityType: 'character', originalName: name, description: null, aliases, createdAt };
}

function approved(id: string, targetId: string, createdAt: number, change: CorrectionChange): Correction {
  return {
    id,
    campaignId: CAMPAIGN,
    targetId,
    createdBy: 'dm-1',
    createdAt,
    state: 'approved',
    decidedBy: 'dm-1',
    decidedAt: createdAt,
    ...change,
  };
}

function mapOf(entities: BaseEntity[], corrections: Correction[] = [], threads: BaseThread[] = []) {
  return foldCorrections({ campaignId: CAMPAIGN, entities, threads, corrections }).map;
}

function mention(text: string): MentionInput {
  return { text, entityType: 'character', description: null };
}

function sequentialIds(prefix: string) {
  let n = 0;
  return () => `${prefix}_new${++n}`;
}

describe('resolveMentions', () => {
  const base = () => [
    entity('ent_1', 'Baba Yaga', 1),
    entity('ent_2', 'The Count', 2),
    entity('ent_3', 'Goblin', 3),
  ];
  const corrections = () => [
    approved('cor_1', 'ent_1', 10, { targetType: 'entity', action: 'rename', payload: { name: 'The Crone' } }),
    approved('cor_2', 'ent_2', 20, { targetType: 'entity', action: 'merge', payload: { intoId: 'ent_1' } }),
    approved('cor_3', 'ent_3', 30, { targetType: 'entity', action: 'hide', payload: {} }),
  ];

  it('resolves a renamed entity through its old name', () => {
    const map = mapOf(base(), corrections());
    const result = resolveMentions(CAMPAIGN, [mention('Baba Yaga')], map);

    expect(result.outcomes[0]?.outcome).toEqual({ kind: 'linked', entityId: 'ent_1', created: false });
    expect(result.learnedAliases).toEqual([]);
    expect(result.newEntities).toEqual([]);
  });

  it('records a new spelling on the merged record that owns it, once per batch', () => {
    const map = mapOf(base(), corrections());
    const result = resolveMentions(
      CAMPAIGN,
      [mention('The Count'), mention('the count'), mention('the count')],
      map
    );

    expect(result.outcomes.map((o) => o.outcome)).toEqual([
      { kind: 'linked', entityId: 'ent_1', created: false },
      { kind: 'linked', entityId: 'ent_1', created: false },
      { kind: 'linked', entityId: 'ent_1', created: false },
    ]);
    expect(result.learnedAliases).toEqual([{ entityId: 'ent_2', alias: 'the count' }]);
    expect(result.counters.aliases_learned).toBe(1);
  });

  it('leaves the merge target untouched once the merge is undone', () => {
    const learned = [
      entity('ent_1', 'Baba Yaga', 1),
      entity('ent_2', 'The Count', 2, ['the count']),
      entity('ent_3', 'Goblin', 3),
    ];
    const map = mapOf(learned, [
      ...corrections(),
      approved('cor_4', 'ent_2', 40, { targetType: 'entity', action: 'unmerge', payload: {} }),
    ]);

    expect(map.entities.get('ent_1')?.aliases).toEqual(['Baba Yaga']);
    expect(map.entities.get('ent_2')?.aliases).toEqual([]);
    expect(map.resolveEntityName('THE COUNT')).toEqual({
      status: 'live',
      id: 'ent_2',
      canonicalName: 'The Count',
    });
  });

  it('does not learn a spelling whose key was removed from another entity', () => {
    const map = mapOf(
      [entity('ent_1', 'Baba Yaga', 1, ['Granny']), entity('ent_2', 'Old Woman', 2)],
      [
        approved('cor_1', 'ent_1', 10, { targetType: 'entity', action: 'alias_remove', payload: { alias: 'Granny' } }),
        approved('cor_2', 'ent_2', 20, { targetType: 'entity', action: 'alias_add', payload: { alias: 'Granny' } }),
      ]
    );
    const result = resolveMentions(CAMPAIGN, [mention('GRANNY')], map);

    expect(result.outcomes[0]?.outcome).toEqual({ kind: 'linked', entityId: 'ent_2', created: false });
    expect(result.learnedAliases).toEqual([]);
    expect(result.collisions).toEqual([{ text: 'GRANNY', entityIds: ['ent_1'] }]);
  });

  it('drops mentions of hidden entities and empty mentions', () => {
    const map = mapOf(base(), corrections());
    const result = resolveMentions(CAMPAIGN, [mention('goblin'), mention('   ')], map);

    expect(result.outcomes.map((o) => o.outcome)).toEqual([
      { kind: 'dropped_hidden', entityId: 'ent_3' },
      { kind: 'dropped_empty' },
    ]);
    expect(result.counters).toEqual({
      mentions_total: 2,
      mentions_resolved: 0,
      entities_created: 0,
      aliases_learned: 0,
      mentions_dropped_empty: 1,
      mentions_dropped_hidden: 1,
      alias_collisions: 0,
    });
  });

  it('creates one entity for repeated unseen names', () => {
    const map = mapOf(base(), corrections());
    const result = resolveMentions(
      CAMPAIGN,
      [mention(' Ireena  Kolyana '), mention('IREENA KOLYANA')],
      map,
      { newId: sequentialIds('ent') }
    );

    expect(result.newEntities).toEqual([
      { id: 'ent_new1', entityType: 'character', name: 'Ireena Kolyana', description: null },
    ]);
    expect(result.outcomes.map((o) => o.outcome)).toEqual([
      { kind: 'linked', entityId: 'ent_new1', created: true },
      { kind: 'linked', entityId: 'ent_new1', created: false },
    ]);
    expect(result.counters.entities_created).toBe(1);
    expect(result.counters.mentions_resolved).toBe(2);
  });

  it('never recreates a name a correction removed', () => {
    const map = mapOf(
      [entity('ent_1', 'Baba Yaga', 1, ['Granny'])],
      [
        approved('cor_1', 'ent_1', 10, {
          targetType: 'entity',
          action: 'alias_remove',
          payload: { alias: 'Granny' },
        }),
      ]
    );
    const result = resolveMentions(CAMPAIGN, [mention('Granny')], map);

    expect(result.outcomes[0]?.outcome).toEqual({ kind: 'collision', ownerIds: ['ent_1'] });
    expect(result.collisions).toEqual([{ text: 'Granny', entityIds: ['ent_1'] }]);
    expect(result.newEntities).toEqual([]);
    expect(result.counters.alias_collisions).toBe(1);
  });

  it('rejects a map from another campaign', () => {
    const map = mapOf(base());
    expect(() => resolveMentions('cmp_other', [mention('Baba Yaga')], map)).toThrow(
      'Canonical map belongs to cmp_test, not cmp_other'
    );
  });
});

describe('canonicalizeNames', () => {
  it('rewrites to canonical names, removes hidden ones and de-duplicates', () => {
    const map = mapOf(
      [entity('ent_1', 'Baba Yaga', 1), entity('ent_2', 'Goblin', 2)],
      [
        approved('cor_1', 'ent_1', 10, { targetType: 'entity', action: 'rename', payload: { name: 'The Crone' } }),
        approved('cor_2', 'ent_2', 20, { targetType: 'entity', action: 'hide', payload: {} }),
      ]
    );
    expect(canonicalizeNames(['Baba Yaga', 'the crone', 'Goblin', ' Ireena ', ''], map)).toEqual([
      'The Crone',
      'Ireena',
    ]);
  });
});

describe('resolveThreads', () => {
  const threads: BaseThread[] = [
    { id: 'thr_1', title: 'Rescue Ireena', kind: 'quest', status: 'active', summary: null, createdAt: 1 },
    { id: 'thr_2', title: 'The Cult', kind: 'mystery', status: 'active', summary: null, createdAt: 2 },
  ];
  const hideCult = approved('cor_1', 'thr_2', 10, { targetType: 'thread', action: 'hide', payload: {} });

  const candidate = (title: string, updates: unknown[] = []) => ({
    title,
    kind: 'quest' as const,
    status: 'active' as const,
    summary: null,
    updates,
  });

  it('links, drops and creates threads by title', () => {
    const map = mapOf([], [hideCult], threads);
    const result = resolveThreads(
      CAMPAIGN,
      [
        candidate('rescue ireena', ['u1']),
        candidate('The Cult', ['u2', 'u3']),
        candidate('Find the Sunsword'),
        candidate('find the sunsword'),
      ],
      map,
      { newId: sequentialIds('thr') }
    );

    expect(result.outcomes.map((o) => o.outcome)).toEqual([
      { kind: 'linked', threadId: 'thr_1', created: false },
      { kind: 'dropped_hidden', threadId: 'thr_2' },
      { kind: 'linked', threadId: 'thr_new1', created: true },
      { kind: 'linked', threadId: 'thr_new1', created: false },
    ]);
    expect(result.newThreads).toEqual([
      { id: 'thr_new1', title: 'Find the Sunsword', kind: 'quest', status: 'active', summary: null },
    ]);
    expect(result.counters).toEqual({
      threads_total: 4,
      threads_resolved: 3,
      threads_created: 1,
      threads_dropped_hidden: 1,
      thread_updates_dropped: 2,
    });
  });
});
