// src/store/threads.ts
// Campaign threads keep a stable identity across sessions; each session
// appends thread updates.
//
// Tables: campaign_threads, thread_updates

import type { DbAdapter } from '../db/types.js';
import {
  THREAD_KINDS,
  THREAD_STATUSES,
  type BaseThread,
  type ThreadKind,
  type ThreadStatus,
} from '../canon/types.js';
import type { EvidenceSpan } from '../evidence/types.js';
import { parseEvidenceList } from '../extraction/parse.js';
import { fromFlag, oneOf, parseJsonColumn, stringArray, toFlag } from './rows.js';

export interface ThreadRecord {
  id: string;
  campaignId: string;
  title: string;
  kind: ThreadKind;
  status: ThreadStatus;
  summary: string | null;
  createdByRunId: string | null;
  createdAt: number;
}

export interface ThreadUpdateRecord {
  id: string;
  runId: string;
  sessionId: string;
  threadId: string;
  updateType: string;
  note: string;
  evidence: EvidenceSpan[];
  /** False when some cited spans failed validation and were dropped. */
  evidenceComplete: boolean;
  relatedEventIds: string[];
  relatedEntityIds: string[];
  createdAt: number;
}

export interface CreateThreadInput {
  id: string;
  campaignId: string;
  title: string;
  kind: ThreadKind;
  status: ThreadStatus;
  summary: string | null;
  runId: string | null;
}

export interface ThreadStore {
  create(input: CreateThreadInput): Promise<ThreadRecord>;
  getById(id: string): Promise<ThreadRecord | null>;
  count(campaignId: string): Promise<number>;
  listBase(campaignId: string): Promise<BaseThread[]>;

  insertUpdates(updates: readonly ThreadUpdateRecord[]): Promise<void>;
  listUpdatesByRun(runId: string): Promise<ThreadUpdateRecord[]>;
  deleteUpdatesByRun(runId: string): Promise<void>;
}

interface ThreadRow {
  id: string;
  campaign_id: string;
  title: string;
  kind: string;
  status: string;
  summary: string | null;
  created_by_run_id: string | null;
  created_at: number;
}

interface ThreadUpdateRow {
  id: string;
  run_id: string;
  session_id: string;
  thread_id: string;
  update_type: string;
  note: string;
  evidence: string;
  evidence_complete: number;
  related_event_ids: string;
  related_entity_ids: string;
  created_at: number;
}

function rowToThread(row: ThreadRow): ThreadRecord {
  return {
    id: row.id,
    campaignId: row.campaign_id,
    title: row.title,
    kind: oneOf(THREAD_KINDS, row.kind, 'other'),
    status: oneOf(THREAD_STATUSES, row.status, 'proposed'),
    summary: row.summary,
    createdByRunId: row.created_by_run_id,
    createdAt: row.created_at,
  };
}

function rowToUpdate(row: ThreadUpdateRow): ThreadUpdateRecord {
  return {
    id: row.id,
    runId: row.run_id,
    sessionId: row.session_id,
    threadId: row.thread_id,
    updateType: row.update_type,
    note: row.note,
    evidence: parseEvidenceList(parseJsonColumn(row.evidence, [])),
    evidenceComplete: fromFlag(row.evidence_complete),
    relatedEventIds: stringArray(parseJsonColumn(row.related_event_ids, [])),
    relatedEntityIds: stringArray(parseJsonColumn(row.related_entity_ids, [])),
    createdAt: row.created_at,
  };
}

export function createThreadStore(db: DbAdapter): ThreadStore {
  return {
    async create(input) {
      const now = Date.now();
      await db.run(
        `INSERT INTO campaign_threads (id, campaign_id, title, kind, status, summary, created_by_run_id, created_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
        [
          input.id,
          input.campaignId,
          input.title,
          input.kind,
          input.status,
          input.summary,
          input.runId,
          now,
        ]
      );
      return {
        id: input.id,
        campaignId: input.campaignId,
        title: input.title,
        kind: input.kind,
        status: input.status,
        summary: input.summary,
        createdByRunId: input.runId,
        createdAt: now,
      };
    },

    async getById(id) {
      const row = await db.queryOne<ThreadRow>(`SELECT * FROM campaign_threads WHERE id = ?`, [id]);
      return row ? rowToThread(row) : null;
    },

    async count(campaignId) {
      const row = await db.queryOne<{ count: number }>(
        `SELECT COUNT(*) AS count FROM campaign_threads WHERE campaign_id = ?`,
        [campaignId]
      );
      return row?.count ?? 0;
    },

    async listBase(campaignId) {
      const rows = await db.queryAll<ThreadRow>(
        `SELECT * FROM campaign_threads WHERE campaign_id = ? ORDER BY created_at ASC, id ASC`,
        [campaignId]
      );
      return rows.map((row) => {
        const t = rowToThread(row);
        return {
          id: t.id,
          title: t.title,
          kind: t.kind,
          status: t.status,
          summary: t.summary,
          createdAt: t.createdAt,
        };
      });
    },

    async insertUpdates(updates) {
      await db.transaction(async (tx) => {
        for (const u of updates) {
          await tx.run(
            `INSERT INTO thread_updates (
               id, run_id, session_id, thread_id, update_type, note, evidence,
               evidence_complete, related_event_ids, related_entity_ids, created_at
             ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
            [
              u.id,
              u.runId,
              u.sessionId,
              u.threadId,
              u.updateType,
              u.note,
              JSON.stringify(u.evidence),
              toFlag(u.evidenceComplete),
              JSON.stringify(u.relatedEventIds),
              JSON.stringify(u.relatedEntityIds),
              u.createdAt,
            ]
          );
        }
      });
    },

    async listUpdatesByRun(runId) {
      const rows = await db.queryAll<ThreadUpdateRow>(
        `SELECT * FROM thread_updates WHERE run_id = ? ORDER BY created_at ASC, rowid ASC`,
        [runId]
      );
      return rows.map(rowToUpdate);
    },

    async deleteUpdatesByRun(runId) {
      await db.run(`DELETE FROM thread_updates WHERE run_id = ?`, [runId]);
    },
  };
}
