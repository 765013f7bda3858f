// src/store/entities.ts
// Canonical entities, their learned aliases, and the mentions that resolve
// to them. Entities are never deleted; corrections overlay them.
//
// Tables: entities, entity_aliases, mentions, entity_mentions

import type { DbAdapter } from '../db/types.js';
import { normalizeKey } from '../canon/normalize.js';
import { ENTITY_TYPES, type BaseEntity, type EntityType } from '../canon/types.js';
import type { EvidenceSpan } from '../evidence/types.js';
import { parseEvidenceList } from '../extraction/parse.js';
import { fromFlag, oneOf, parseJsonColumn, toFlag } from './rows.js';

/* ---------- Types ---------- */

export interface EntityRecord {
  id: string;
  campaignId: string;
  entityType: EntityType;
  originalName: string;
  description: string | null;
  createdByRunId: string | null;
  createdAt: number;
}

export interface CreateEntityInput {
  id: string;
  campaignId: string;
  entityType: EntityType;
  name: string;
  description: string | null;
  runId: string | null;
}

export interface MentionRecord {
  id: string;
  runId: string;
  sessionId: string;
  text: string;
  entityType: EntityType;
  description: string | null;
  evidence: EvidenceSpan[];
  confidence: number | null;
  evidenceComplete: boolean;
  resolvedEntityId: string | null;
  createdAt: number;
}

export interface EntityStore {
  create(input: CreateEntityInput): Promise<EntityRecord>;
  getById(id: string): Promise<EntityRecord | null>;
  count(campaignId: string): Promise<number>;
  /** Stored records with learned aliases, in (createdAt, id) order. */
  listBase(campaignId: string): Promise<BaseEntity[]>;
  /** Returns false when the entity already had this exact spelling. */
  addAlias(entityId: string, alias: string, runId: string | null): Promise<boolean>;

  insertMentions(mentions: readonly MentionRecord[]): Promise<void>;
  listMentionsByRun(runId: string): Promise<MentionRecord[]>;
  /** Removes a run's mentions and their links (stage retry). */
  deleteMentionsByRun(runId: string): Promise<void>;
  resolveMention(mention: MentionRecord, entityId: string | null): Promise<void>;
  /** Mention counts per entity for a run. */
  countLinksByRun(runId: string): Promise<Map<string, number>>;
}

/* ---------- Rows ---------- */

interface EntityRow {
  id: string;
  campaign_id: string;
  entity_type: string;
  original_name: string;
  description: string | null;
  created_by_run_id: string | null;
  created_at: number;
}

interface MentionRow {
  id: string;
  run_id: string;
  session_id: string;
  text: string;
  entity_type: string;
  description: string | null;
  evidence: string;
  confidence: number | null;
  evidence_complete: number;
  resolved_entity_id: string | null;
  created_at: number;
}

function rowToEntity(row: EntityRow): EntityRecord {
  return {
    id: row.id,
    campaignId: row.campaign_id,
    entityType: oneOf(ENTITY_TYPES, row.entity_type, 'other'),
    originalName: row.original_name,
    description: row.description,
    createdByRunId: row.created_by_run_id,
    createdAt: row.created_at,
  };
}

function rowToMention(row: MentionRow): MentionRecord {
  return {
    id: row.id,
    runId: row.run_id,
    sessionId: row.session_id,
    text: row.text,
    entityType: oneOf(ENTITY_TYPES, row.entity_type, 'other'),
    description: row.description,
    evidence: parseEvidenceList(parseJsonColumn(row.evidence, [])),
    confidence: row.confidence,
    evidenceComplete: fromFlag(row.evidence_complete),
    resolvedEntityId: row.resolved_entity_id,
    createdAt: row.created_at,
  };
}

/* ---------- Store ---------- */

export function createEntityStore(db: DbAdapter): EntityStore {
  return {
    async create(input) {
      const now = Date.now();
      await db.run(
        `INSERT INTO entities (id, campaign_id, entity_type, original_name, description, created_by_run_id, created_at)
         VALUES (?, ?, ?, ?, ?, ?, ?)`,
        [input.id, input.campaignId, input.entityType, input.name, input.description, input.runId, now]
      );
      return {
        id: input.id,
        campaignId: input.campaignId,
        entityType: input.entityType,
        originalName: input.name,
        description: input.description,
        createdByRunId: input.runId,
        createdAt: now,
      };
    },

    async getById(id) {
      const row = await db.queryOne<EntityRow>(`SELECT * FROM entities WHERE id = ?`, [id]);
      return row ? rowToEntity(row) : null;
    },

    async count(campaignId) {
      const row = await db.queryOne<{ count: number }>(
        `SELECT COUNT(*) AS count FROM entities WHERE campaign_id = ?`,
        [campaignId]
      );
      return row?.count ?? 0;
    },

    async listBase(campaignId) {
      const rows = await db.queryAll<EntityRow>(
        `SELECT * FROM entities WHERE campaign_id = ? ORDER BY created_at ASC, id ASC`,
        [campaignId]
      );
      const aliasRows = await db.queryAll<{ entity_id: string; alias: string }>(
        `SELECT a.entity_id, a.alias FROM entity_aliases a
         JOIN entities e ON e.id = a.entity_id
         WHERE e.campaign_id = ?
         ORDER BY a.created_at ASC, a.alias ASC`,
        [campaignId]
      );
      const aliases = new Map<string, string[]>();
      for (const a of aliasRows) {
        const list = aliases.get(a.entity_id) ?? [];
        list.push(a.alias);
        aliases.set(a.entity_id, list);
      }
      return rows.map((row) => {
        const e = rowToEntity(row);
        return {
          id: e.id,
          entityType: e.entityType,
          originalName: e.originalName,
          description: e.description,
          aliases: aliases.get(e.id) ?? [],
          createdAt: e.createdAt,
        };
      });
    },

    async addAlias(entityId, alias, runId) {
      const result = await db.run(
        `INSERT OR IGNORE INTO entity_aliases (entity_id, alias, alias_key, run_id, created_at)
         VALUES (?, ?, ?, ?, ?)`,
        [entityId, alias, normalizeKey(alias), runId, Date.now()]
      );
      return result.changes > 0;
    },

    async insertMentions(mentions) {
      await db.transaction(async (tx) => {
        for (const m of mentions) {
          await tx.run(
            `INSERT INTO mentions (
               id, run_id, session_id, text, entity_type, description, evidence,
               confidence, evidence_complete, resolved_entity_id, created_at
             ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
            [
              m.id,
              m.runId,
              m.sessionId,
              m.text,
              m.entityType,
              m.description,
              JSON.stringify(m.evidence),
              m.confidence,
              toFlag(m.evidenceComplete),
              m.resolvedEntityId,
              m.createdAt,
            ]
          );
        }
      });
    },

    async listMentionsByRun(runId) {
      const rows = await db.queryAll<MentionRow>(
        `SELECT * FROM mentions WHERE run_id = ? ORDER BY created_at ASC, rowid ASC`,
        [runId]
      );
      return rows.map(rowToMention);
    },

    async deleteMentionsByRun(runId) {
      await db.run(`DELETE FROM entity_mentions WHERE run_id = ?`, [runId]);
      await db.run(`DELETE FROM mentions WHERE run_id = ?`, [runId]);
    },

    async resolveMention(mention, entityId) {
      await db.run(`UPDATE mentions SET resolved_entity_id = ? WHERE id = ?`, [
        entityId,
        mention.id,
      ]);
      await db.run(`DELETE FROM entity_mentions WHERE mention_id = ?`, [mention.id]);
      if (entityId !== null) {
        await db.run(
          `INSERT INTO entity_mentions (entity_id, mention_id, run_id, session_id) VALUES (?, ?, ?, ?)`,
          [entityId, mention.id, mention.runId, mention.sessionId]
        );
      }
    },

    async countLinksByRun(runId) {
      const rows = await db.queryAll<{ entity_id: string; count: number }>(
        `SELECT entity_id, COUNT(*) AS count FROM entity_mentions WHERE run_id = ? GROUP BY entity_id`,
        [runId]
      );
      return new Map(rows.map((r) => [r.entity_id, r.count]));
    },
  };
}
