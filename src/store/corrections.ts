// src/store/corrections.ts
// Append-only correction ledger table. Rows are never updated except for the
// single pending → approved|rejected decision.

import type { DbAdapter } from '../db/types.js';
import { parseCorrectionChange } from '../canon/correctionInput.js';
import type { Correction, CorrectionState, TargetType } from '../canon/types.js';
import { oneOf, parseJsonColumn } from './rows.js';

export interface CorrectionFilter {
  state?: CorrectionState;
  targetType?: TargetType;
  targetId?: string;
}

export interface CorrectionStore {
  insert(correction: Correction): Promise<void>;
  getById(id: string): Promise<Correction | null>;
  /** Ordered by (createdAt, id). */
  list(campaignId: string, filter?: CorrectionFilter): Promise<Correction[]>;
  listApproved(campaignId: string): Promise<Correction[]>;
  /**
   * Move a pending correction to its decided state. Returns false when the
   * row was no longer pending.
   */
  decide(
    id: string,
    state: 'approved' | 'rejected',
    decidedBy: string,
    decidedAt: number
  ): Promise<boolean>;
}

interface CorrectionRow {
  id: string;
  campaign_id: string;
  target_type: string;
  target_id: string;
  action: string;
  payload: string;
  created_by: string;
  created_at: number;
  state: string;
  decided_by: string | null;
  decided_at: number | null;
}

const STATES: readonly CorrectionState[] = ['pending', 'approved', 'rejected'];

function rowToCorrection(row: CorrectionRow): Correction {
  return {
    id: row.id,
    campaignId: row.campaign_id,
    targetId: row.target_id,
    createdBy: row.created_by,
    createdAt: row.created_at,
    state: oneOf(STATES, row.state, 'pending'),
    decidedBy: row.decided_by,
    decidedAt: row.decided_at,
    ...parseCorrectionChange(row.target_type, row.action, parseJsonColumn(row.payload, {})),
  };
}

export function createCorrectionStore(db: DbAdapter): CorrectionStore {
  return {
    async insert(c) {
      await db.run(
        `INSERT INTO corrections (
           id, campaign_id, target_type, target_id, action, payload,
           created_by, created_at, state, decided_by, decided_at
         ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
        [
          c.id,
          c.campaignId,
          c.targetType,
          c.targetId,
          c.action,
          JSON.stringify(c.payload),
          c.createdBy,
          c.createdAt,
          c.state,
          c.decidedBy,
          c.decidedAt,
        ]
      );
    },

    async getById(id) {
      const row = await db.queryOne<CorrectionRow>(`SELECT * FROM corrections WHERE id = ?`, [id]);
      return row ? rowToCorrection(row) : null;
    },

    async list(campaignId, filter = {}) {
      let sql = `SELECT * FROM corrections WHERE campaign_id = ?`;
      const params: unknown[] = [campaignId];

      if (filter.state) {
        sql += ` AND state = ?`;
        params.push(filter.state);
      }
      if (filter.targetType) {
        sql += ` AND target_type = ?`;
        params.push(filter.targetType);
      }
      if (filter.targetId) {
        sql += ` AND target_id = ?`;
        params.push(filter.targetId);
      }
      sql += ` ORDER BY created_at ASC, id ASC`;

      const rows = await db.queryAll<CorrectionRow>(sql, params);
      return rows.map(rowToCorrection);
    },

    async listApproved(campaignId) {
      const rows = await db.queryAll<CorrectionRow>(
        `SELECT * FROM corrections WHERE campaign_id = ? AND state = 'approved'
         ORDER BY created_at ASC, id ASC`,
        [campaignId]
      );
      return rows.map(rowToCorrection);
    },

    async decide(id, state, decidedBy, decidedAt) {
      const result = await db.run(
        `UPDATE corrections SET state = ?, decided_by = ?, decided_at = ?
         WHERE id = ? AND state = 'pending'`,
        [state, decidedBy, decidedAt, id]
      );
      return result.changes > 0;
    },
  };
}
