// src/store/campaigns.ts
// Campaigns, their members and sessions. Campaigns and sessions are
// addressed by slug in the API.

import type { DbAdapter } from '../db/types.js';
import type { MemberRole } from '../canon/types.js';
import { newId } from '../utils/ids.js';
import { oneOf } from './rows.js';

/* ---------- Types ---------- */

export interface Campaign {
  id: string;
  slug: string;
  name: string;
  createdBy: string;
  createdAt: number;
}

export interface CampaignMember {
  campaignId: string;
  userId: string;
  role: MemberRole;
  createdAt: number;
}

export interface Session {
  id: string;
  campaignId: string;
  slug: string;
  title: string;
  createdAt: number;
}

export const MEMBER_ROLES: readonly MemberRole[] = ['dm', 'player'];

export interface CampaignStore {
  // Campaigns
  create(input: { slug: string; name?: string }, createdBy: string): Promise<Campaign>;
  getById(id: string): Promise<Campaign | null>;
  getBySlug(slug: string): Promise<Campaign | null>;
  /** Existing campaign for `slug`, or a new one whose creator becomes DM. */
  getOrCreate(slug: string, createdBy: string): Promise<Campaign>;

  // Membership
  setMember(campaignId: string, userId: string, role: MemberRole): Promise<CampaignMember>;
  getRole(campaignId: string, userId: string): Promise<MemberRole | null>;

  // Sessions
  getSession(campaignId: string, slug: string): Promise<Session | null>;
  getSessionById(id: string): Promise<Session | null>;
  getOrCreateSession(campaignId: string, slug: string): Promise<Session>;
  listSessions(campaignId: string): Promise<Session[]>;
}

/* ---------- Rows ---------- */

interface CampaignRow {
  id: string;
  slug: string;
  name: string;
  created_by: string;
  created_at: number;
}

interface MemberRow {
  campaign_id: string;
  user_id: string;
  role: string;
  created_at: number;
}

interface SessionRow {
  id: string;
  campaign_id: string;
  slug: string;
  title: string;
  created_at: number;
}

function rowToCampaign(row: CampaignRow): Campaign {
  return {
    id: row.id,
    slug: row.slug,
    name: row.name,
    createdBy: row.created_by,
    createdAt: row.created_at,
  };
}

function rowToMember(row: MemberRow): CampaignMember {
  return {
    campaignId: row.campaign_id,
    userId: row.user_id,
    role: oneOf(MEMBER_ROLES, row.role, 'player'),
    createdAt: row.created_at,
  };
}

function rowToSession(row: SessionRow): Session {
  return {
    id: row.id,
    campaignId: row.campaign_id,
    slug: row.slug,
    title: row.title,
    createdAt: row.created_at,
  };
}

/* ---------- Store ---------- */

export function createCampaignStore(db: DbAdapter): CampaignStore {
  const store: CampaignStore = {
    async create(input, createdBy) {
      const id = newId('cmp');
      const now = Date.now();
      const slug = input.slug.trim();
      const name = input.name?.trim() || slug;

      await db.transaction(async (tx) => {
        await tx.run(
          `INSERT INTO campaigns (id, slug, name, created_by, created_at)
           VALUES (?, ?, ?, ?, ?)`,
          [id, slug, name, createdBy, now]
        );
        // Creator becomes DM
        await tx.run(
          `INSERT INTO campaign_members (campaign_id, user_id, role, created_at)
           VALUES (?, ?, 'dm', ?)`,
          [id, createdBy, now]
        );
      });

      return { id, slug, name, createdBy, createdAt: now };
    },

    async getById(id) {
      const row = await db.queryOne<CampaignRow>(`SELECT * FROM campaigns WHERE id = ?`, [id]);
      return row ? rowToCampaign(row) : null;
    },

    async getBySlug(slug) {
      const row = await db.queryOne<CampaignRow>(`SELECT * FROM campaigns WHERE slug = ?`, [
        slug.trim(),
      ]);
      return row ? rowToCampaign(row) : null;
    },

    async getOrCreate(slug, createdBy) {
      const existing = await store.getBySlug(slug);
      return existing ?? store.create({ slug }, createdBy);
    },

    async setMember(campaignId, userId, role) {
      const now = Date.now();
      await db.run(
        `INSERT INTO campaign_members (campaign_id, user_id, role, created_at)
         VALUES (?, ?, ?, ?)
         ON CONFLICT (campaign_id, user_id) DO UPDATE SET role = excluded.role`,
        [campaignId, userId, role, now]
      );
      const row = await db.queryOne<MemberRow>(
        `SELECT * FROM campaign_members WHERE campaign_id = ? AND user_id = ?`,
        [campaignId, userId]
      );
      return row ? rowToMember(row) : { campaignId, userId, role, createdAt: now };
    },

    async getRole(campaignId, userId) {
      const row = await db.queryOne<MemberRow>(
        `SELECT * FROM campaign_members WHERE campaign_id = ? AND user_id = ?`,
        [campaignId, userId]
      );
      return row ? rowToMember(row).role : null;
    },

    async getSession(campaignId, slug) {
      const row = await db.queryOne<SessionRow>(
        `SELECT * FROM sessions WHERE campaign_id = ? AND slug = ?`,
        [campaignId, slug.trim()]
      );
      return row ? rowToSession(row) : null;
    },

    async getSessionById(id) {
      const row = await db.queryOne<SessionRow>(`SELECT * FROM sessions WHERE id = ?`, [id]);
      return row ? rowToSession(row) : null;
    },

    async getOrCreateSession(campaignId, slug) {
      const existing = await store.getSession(campaignId, slug);
      if (existing) return existing;

      const id = newId('ses');
      const now = Date.now();
      const title = slug.trim();
      await db.run(
        `INSERT INTO sessions (id, campaign_id, slug, title, created_at) VALUES (?, ?, ?, ?, ?)`,
        [id, campaignId, title, title, now]
      );
      return { id, campaignId, slug: title, title, createdAt: now };
    },

    async listSessions(campaignId) {
      const rows = await db.queryAll<SessionRow>(
        `SELECT * FROM sessions WHERE campaign_id = ? ORDER BY created_at ASC, slug ASC`,
        [campaignId]
      );
      return rows.map(rowToSession);
    },
  };
  return store;
}
