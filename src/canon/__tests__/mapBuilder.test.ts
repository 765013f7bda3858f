import { describe, it, expect } from 'vitest';
import { CanonicalMapBuilder, compareCorrections, foldCorrections } from '../mapBuilder.js';
import type { BaseEntity, BaseThread, Correction, CorrectionChange } from '../types.js';

const CAMPAIGN = 'cmp_test';

function entity(id: string, name: string, createdAt: number, aliases: string[] = []): BaseEntity {
  return { id, entityType: 'character', originalName: name, description: null, aliases, createdAt };
}

function thread(id: string, title: string, createdAt: number): BaseThread {
  return { id, title, kind: 'quest', status: 'active', summary: null, createdAt };
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

const rename = (name: string): CorrectionChange => ({
  targetType: 'entity',
  action: 'rename',
  payload: { name },
});
const merge = (intoId: string): CorrectionChange => ({
  targetType: 'entity',
  action: 'merge',
  payload: { intoId },
});
const hide: CorrectionChange = { targetType: 'entity', action: 'hide', payload: {} };
const unhide: CorrectionChange = { targetType: 'entity', action: 'unhide', payload: {} };

function fold(entities: BaseEntity[], corrections: Correction[], threads: BaseThread[] = []) {
  return foldCorrections({ campaignId: CAMPAIGN, entities, threads, corrections });
}

describe('foldCorrections', () => {
  describe('rename', () => {
    it('keeps the old name as an alias that still resolves', () => {
      const { map, violations } = fold(
        [entity('ent_1', 'Baba Yaga', 1)],
        [approved('cor_1', 'ent_1', 10, rename('The Crone'))]
      );

      expect(violations).toEqual([]);
      expect(map.resolveEntityName('Baba Yaga')).toEqual({
        status: 'live',
        id: 'ent_1',
        canonicalName: 'The Crone',
      });
      expect(map.resolveEntityName('the crone')).toEqual({
        status: 'live',
        id: 'ent_1',
        canonicalName: 'The Crone',
      });

      const crone = map.entities.get('ent_1');
      expect(crone?.canonicalName).toBe('The Crone');
      expect(crone?.originalName).toBe('Baba Yaga');
      expect(crone?.aliases).toEqual(['Baba Yaga']);
      expect(crone?.corrected).toBe(true);
    });

    it('drops the new name from the alias set', () => {
      const { map } = fold(
        [entity('ent_1', 'Baba Yaga', 1, ['Granny'])],
        [approved('cor_1', 'ent_1', 10, rename('Granny'))]
      );
      expect(map.entities.get('ent_1')?.aliases).toEqual(['Baba Yaga']);
    });

    it('lets the latest rename win', () => {
      const { map } = fold(
        [entity('ent_1', 'Baba Yaga', 1)],
        [
          approved('cor_2', 'ent_1', 20, rename('Grandmother')),
          approved('cor_1', 'ent_1', 10, rename('The Crone')),
        ]
      );
      expect(map.entities.get('ent_1')?.canonicalName).toBe('Grandmother');
      expect(map.entities.get('ent_1')?.aliases).toEqual(['Baba Yaga', 'The Crone']);
    });
  });

  describe('aliases', () => {
    it('moves an alias key from its previous owner', () => {
      const { map } = fold(
        [entity('ent_1', 'Baba Yaga', 1), entity('ent_2', 'Old Woman', 2, ['Granny'])],
        [
          approved('cor_1', 'ent_1', 10, {
            targetType: 'entity',
            action: 'alias_add',
            payload: { alias: 'Granny' },
          }),
        ]
      );

      expect(map.resolveEntityName('granny')).toEqual({
        status: 'live',
        id: 'ent_1',
        canonicalName: 'Baba Yaga',
      });
      expect(map.entities.get('ent_1')?.aliases).toEqual(['Granny']);
      expect(map.entities.get('ent_2')?.aliases).toEqual([]);
      expect(map.entities.get('ent_2')?.corrected).toBe(true);
    });

    it('records removed aliases and releases the key', () => {
      const { map } = fold(
        [entity('ent_1', 'Baba Yaga', 1, ['Granny'])],
        [
          approved('cor_1', 'ent_1', 10, {
            targetType: 'entity',
            action: 'alias_remove',
            payload: { alias: 'Granny' },
          }),
        ]
      );

      expect(map.resolveEntityName('Granny')).toEqual({ status: 'unknown' });
      expect(map.entities.get('ent_1')?.removedAliases).toEqual(['granny']);
      expect(map.entities.removedAliasOwners('GRANNY')).toEqual(['ent_1']);
    });

    it('refuses to remove the current canonical name', () => {
      const { map, violations } = fold(
        [entity('ent_1', 'Baba Yaga', 1)],
        [
          approved('cor_1', 'ent_1', 10, {
            targetType: 'entity',
            action: 'alias_remove',
            payload: { alias: 'BABA YAGA' },
          }),
        ]
      );

      expect(violations).toEqual([
        {
          correctionId: 'cor_1',
          reason: 'invalid_alias_removal',
          message: '"BABA YAGA" is the current canonical name of ent_1',
        },
      ]);
      expect(map.resolveEntityName('Baba Yaga').status).toBe('live');
    });
  });

  describe('name conflicts', () => {
    const aliasAdd = (alias: string): CorrectionChange => ({
      targetType: 'entity',
      action: 'alias_add',
      payload: { alias },
    });

    it('keeps another entity\'s name away from a hidden entity', () => {
      const { map, violations } = fold(
        [entity('ent_1', 'Strahd', 1), entity('ent_2', 'Ireena', 2)],
        [approved('cor_1', 'ent_1', 10, hide), approved('cor_2', 'ent_1', 20, aliasAdd('Ireena'))]
      );

      expect(violations).toEqual([
        {
          correctionId: 'cor_2',
          reason: 'name_conflict',
          message: '"Ireena" is the canonical name of ent_2',
        },
      ]);
      expect(map.resolveEntityName('Ireena')).toEqual({
        status: 'live',
        id: 'ent_2',
        canonicalName: 'Ireena',
      });
      expect(map.entities.get('ent_1')?.aliases).toEqual([]);
    });

    it('refuses a rename onto another entity\'s name', () => {
      const { map, violations } = fold(
        [entity('ent_1', 'Strahd', 1), entity('ent_2', 'Ireena', 2)],
        [approved('cor_1', 'ent_1', 10, rename('ireena'))]
      );

      expect(violations.map((v) => [v.correctionId, v.reason])).toEqual([['cor_1', 'name_conflict']]);
      expect(map.entities.get('ent_1')?.canonicalName).toBe('Strahd');
      expect(map.resolveEntityName('Ireena')).toMatchObject({ status: 'live', id: 'ent_2' });
    });

    it('allows taking the name of a record merged into the claimant', () => {
      const { map, violations } = fold(
        [entity('ent_1', 'Strahd', 1), entity('ent_2', 'The Count', 2)],
        [approved('cor_1', 'ent_1', 10, merge('ent_2')), approved('cor_2', 'ent_2', 20, rename('Strahd'))]
      );

      expect(violations).toEqual([]);
      expect(map.resolveEntityName('Strahd')).toEqual({
        status: 'live',
        id: 'ent_2',
        canonicalName: 'Strahd',
      });
    });
  });

  describe('merge', () => {
    const three = () => [
      entity('ent_1', 'Strahd', 1),
      entity('ent_2', 'The Count', 2),
      entity('ent_3', 'Vampire Lord', 3),
    ];

    it('collapses merge chains to the final record', () => {
      const { map } = fold(three(), [
        approved('cor_1', 'ent_1', 10, merge('ent_2')),
        approved('cor_2', 'ent_2', 20, merge('ent_3')),
      ]);

      expect(map.entities.resolveId('ent_1')).toBe('ent_3');
      expect(map.resolveEntityName('Strahd')).toEqual({
        status: 'live',
        id: 'ent_3',
        canonicalName: 'Vampire Lord',
      });
      expect(map.entities.get('ent_1')?.mergedInto).toBe('ent_3');
      expect(map.entities.list().map((e) => e.id)).toEqual(['ent_3']);
      expect(map.entities.list({ includeHidden: true })).toHaveLength(3);
    });

    it('reports a merge back along the chain as a cycle', () => {
      const { map, violations } = fold(three(), [
        approved('cor_1', 'ent_2', 10, merge('ent_1')),
        approved('cor_2', 'ent_1', 20, merge('ent_2')),
      ]);

      expect(violations).toEqual([
        { correctionId: 'cor_2', reason: 'cycle', message: 'Merging ent_1 into ent_2 creates a cycle' },
      ]);
      expect(map.entities.resolveId('ent_2')).toBe('ent_1');
      expect(map.entities.resolveId('ent_1')).toBe('ent_1');
    });

    it('reports a self-merge as a cycle', () => {
      const { violations } = fold(three(), [approved('cor_1', 'ent_1', 10, merge('ent_1'))]);
      expect(violations.map((v) => v.reason)).toEqual(['cycle']);
    });

    it('restores the record on unmerge', () => {
      const { map } = fold(three(), [
        approved('cor_1', 'ent_1', 10, merge('ent_2')),
        approved('cor_2', 'ent_1', 20, { targetType: 'entity', action: 'unmerge', payload: {} }),
      ]);
      expect(map.resolveEntityName('Strahd')).toEqual({
        status: 'live',
        id: 'ent_1',
        canonicalName: 'Strahd',
      });
      expect(map.entities.get('ent_1')?.mergedInto).toBeNull();
    });
  });

  describe('hide', () => {
    it('suppresses every name of a hidden entity', () => {
      const { map } = fold(
        [entity('ent_1', 'Goblin', 1, ['Gob']), entity('ent_2', 'Baba Yaga', 2)],
        [approved('cor_1', 'ent_1', 10, hide)]
      );

      expect(map.resolveEntityName('goblin')).toEqual({ status: 'hidden', id: 'ent_1' });
      expect(map.resolveEntityName('Gob')).toEqual({ status: 'hidden', id: 'ent_1' });
      expect(map.entities.list().map((e) => e.id)).toEqual(['ent_2']);
      expect(map.entities.hiddenIds()).toEqual(['ent_1']);
    });

    it('beats a later rename until unhidden', () => {
      const hiddenThenRenamed = fold(
        [entity('ent_1', 'Goblin', 1)],
        [approved('cor_1', 'ent_1', 10, hide), approved('cor_2', 'ent_1', 20, rename('Hobgoblin'))]
      );
      expect(hiddenThenRenamed.map.resolveEntityName('Hobgoblin')).toEqual({
        status: 'hidden',
        id: 'ent_1',
      });

      const unhidden = fold(
        [entity('ent_1', 'Goblin', 1)],
        [
          approved('cor_1', 'ent_1', 10, hide),
          approved('cor_2', 'ent_1', 20, rename('Hobgoblin')),
          approved('cor_3', 'ent_1', 30, unhide),
        ]
      );
      expect(unhidden.map.resolveEntityName('Hobgoblin')).toEqual({
        status: 'live',
        id: 'ent_1',
        canonicalName: 'Hobgoblin',
      });
    });

    it('hides names merged into a hidden record', () => {
      const { map } = fold(
        [entity('ent_1', 'Strahd', 1), entity('ent_2', 'The Count', 2)],
        [approved('cor_1', 'ent_1', 10, merge('ent_2')), approved('cor_2', 'ent_2', 20, hide)]
      );
      expect(map.resolveEntityName('Strahd')).toEqual({ status: 'hidden', id: 'ent_2' });
    });
  });

  describe('threads', () => {
    it('applies title, status and summary corrections', () => {
      const { map } = fold(
        [],
        [
          approved('cor_1', 'thr_1', 10, {
            targetType: 'thread',
            action: 'title',
            payload: { title: 'Find the Sunsword' },
          }),
          approved('cor_2', 'thr_1', 20, {
            targetType: 'thread',
            action: 'status',
            payload: { status: 'completed' },
          }),
          approved('cor_3', 'thr_1', 30, {
            targetType: 'thread',
            action: 'summary',
            payload: { summary: 'Recovered in the crypt.' },
          }),
        ],
        [thread('thr_1', 'Find the sword', 1)]
      );

      const t = map.threads.get('thr_1');
      expect(t?.title).toBe('Find the Sunsword');
      expect(t?.originalTitle).toBe('Find the sword');
      expect(t?.aliases).toEqual(['Find the sword']);
      expect(t?.status).toBe('completed');
      expect(t?.summary).toBe('Recovered in the crypt.');
      expect(t?.corrected).toBe(true);
      expect(map.threads.resolveTitle('find the sword')).toEqual({
        status: 'live',
        id: 'thr_1',
        canonicalName: 'Find the Sunsword',
      });
    });

    it('redirects a merged thread and leaves it out of lists', () => {
      const { map } = fold(
        [],
        [approved('cor_1', 'thr_2', 10, { targetType: 'thread', action: 'merge', payload: { intoId: 'thr_1' } })],
        [thread('thr_1', 'Rescue Ireena', 1), thread('thr_2', 'Protect Ireena', 2)]
      );

      expect(map.resolveThreadId('thr_2')).toEqual({
        status: 'live',
        id: 'thr_1',
        canonicalName: 'Rescue Ireena',
      });
      expect(map.threads.list().map((t) => t.id)).toEqual(['thr_1']);
    });
  });

  it('reports corrections that target unknown records', () => {
    const { violations } = fold([entity('ent_1', 'Strahd', 1)], [
      approved('cor_1', 'ent_9', 10, hide),
    ]);
    expect(violations).toEqual([
      { correctionId: 'cor_1', reason: 'unknown_target', message: 'Unknown entity ent_9' },
    ]);
  });

  it('is independent of input order', () => {
    const entities = [
      entity('ent_1', 'Baba Yaga', 1, ['Granny']),
      entity('ent_2', 'Old Woman', 1),
      entity('ent_3', 'Strahd', 2),
    ];
    const corrections = [
      approved('cor_b', 'ent_1', 10, rename('The Crone')),
      approved('cor_a', 'ent_2', 10, {
        targetType: 'entity',
        action: 'alias_add',
        payload: { alias: 'Granny' },
      }),
      approved('cor_c', 'ent_3', 30, merge('ent_1')),
    ];

    const forward = fold(entities, corrections);
    const backward = fold([...entities].reverse(), [...corrections].reverse());

    expect(JSON.stringify(backward.map.toJSON())).toBe(JSON.stringify(forward.map.toJSON()));
    // cor_a sorts before cor_b at the same timestamp
    expect(forward.map.resolveEntityName('Granny')).toEqual({
      status: 'live',
      id: 'ent_2',
      canonicalName: 'Old Woman',
    });
  });

  it('hands the extractor live names and suppressed keys', () => {
    const { map } = fold(
      [entity('ent_1', 'Baba Yaga', 1), entity('ent_2', 'Goblin', 2)],
      [approved('cor_1', 'ent_2', 10, hide)]
    );
    expect(map.snapshotForExtractor().entities).toEqual({
      names: { 'baba yaga': 'Baba Yaga' },
      hidden: ['goblin'],
    });
  });
});

describe('compareCorrections', () => {
  it('orders by timestamp, then id', () => {
    const list = [
      { id: 'b', createdAt: 5 },
      { id: 'a', createdAt: 5 },
      { id: 'c', createdAt: 1 },
    ];
    expect(list.sort(compareCorrections).map((c) => c.id)).toEqual(['c', 'a', 'b']);
  });
});

describe('CanonicalMapBuilder', () => {
  function builderWith(corrections: Correction[]) {
    let loads = 0;
    const builder = new CanonicalMapBuilder({
      listBaseEntities: async () => {
        loads++;
        return [entity('ent_1', 'Baba Yaga', 1)];
      },
      listBaseThreads: async () => [],
      listApprovedCorrections: async () => corrections,
    });
    return { builder, loads: () => loads };
  }

  it('caches builds until invalidated', async () => {
    const corrections: Correction[] = [];
    const { builder, loads } = builderWith(corrections);

    const first = await builder.build(CAMPAIGN);
    expect(await builder.build(CAMPAIGN)).toBe(first);
    expect(loads()).toBe(1);

    corrections.push(approved('cor_1', 'ent_1', 10, rename('The Crone')));
    builder.invalidate(CAMPAIGN);
    const second = await builder.build(CAMPAIGN);

    expect(second).not.toBe(first);
    expect(second.entities.get('ent_1')?.canonicalName).toBe('The Crone');
    expect(loads()).toBe(2);
  });

  it('previews extra corrections without touching the cache', async () => {
    const { builder } = builderWith([]);
    const cached = await builder.build(CAMPAIGN);

    const { map } = await builder.preview(CAMPAIGN, [approved('cor_1', 'ent_1', 10, hide)]);

    expect(map.resolveEntityName('Baba Yaga').status).toBe('hidden');
    expect(await builder.build(CAMPAIGN)).toBe(cached);
    expect(cached.resolveEntityName('Baba Yaga').status).toBe('live');
  });
});
