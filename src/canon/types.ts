// src/canon/types.ts
// Correction ledger and canonical record types.

/* ---------- Vocabularies ---------- */

export const ENTITY_TYPES = [
  'character',
  'location',
  'item',
  'faction',
  'monster',
  'deity',
  'organization',
  'other',
] as const;
export type EntityType = (typeof ENTITY_TYPES)[number];

export const THREAD_KINDS = ['quest', 'mystery', 'personal_arc', 'faction_arc', 'other'] as const;
export type ThreadKind = (typeof THREAD_KINDS)[number];

export const THREAD_STATUSES = [
  'proposed',
  'active',
  'blocked',
  'completed',
  'failed',
  'abandoned',
] as const;
export type ThreadStatus = (typeof THREAD_STATUSES)[number];

export type TargetType = 'entity' | 'thread';
export type CorrectionState = 'pending' | 'approved' | 'rejected';
export type MemberRole = 'dm' | 'player';

/* ---------- Correction Actions ---------- */

export type EmptyPayload = Record<string, never>;

/** Actions shared by entities and threads. */
export type IdentityAction =
  | { action: 'merge'; payload: { intoId: string } }
  | { action: 'unmerge'; payload: EmptyPayload }
  | { action: 'hide'; payload: EmptyPayload }
  | { action: 'unhide'; payload: EmptyPayload };

export type EntityAction =
  | { action: 'rename'; payload: { name: string } }
  | { action: 'alias_add'; payload: { alias: string } }
  | { action: 'alias_remove'; payload: { alias: string } }
  | IdentityAction;

export type ThreadAction =
  | { action: 'status'; payload: { status: ThreadStatus } }
  | { action: 'title'; payload: { title: string } }
  | { action: 'summary'; payload: { summary: string | null } }
  | IdentityAction;

export type CorrectionChange =
  | ({ targetType: 'entity' } & EntityAction)
  | ({ targetType: 'thread' } & ThreadAction);

export type CorrectionActionName = CorrectionChange['action'];

export const ENTITY_ACTIONS = [
  'rename',
  'alias_add',
  'alias_remove',
  'merge',
  'unmerge',
  'hide',
  'unhide',
] as const satisfies readonly EntityAction['action'][];

export const THREAD_ACTIONS = [
  'status',
  'title',
  'summary',
  'merge',
  'unmerge',
  'hide',
  'unhide',
] as const satisfies readonly ThreadAction['action'][];

/* ---------- Correction ---------- */

export interface CorrectionRecord {
  id: string;
  campaignId: string;
  targetId: string;
  createdBy: string;
  createdAt: number;
  state: CorrectionState;
  /** Approver for approvals (the author, for DM-authored corrections); reviewer for rejections. */
  decidedBy: string | null;
  decidedAt: number | null;
}

export type Correction = CorrectionRecord & CorrectionChange;

export interface Actor {
  userId: string;
  role: MemberRole;
}

/* ---------- Base Records (stored, pre-correction) ---------- */

export interface BaseEntity {
  id: string;
  entityType: EntityType;
  originalName: string;
  description: string | null;
  /** Surface aliases learned during resolution. */
  aliases: string[];
  createdAt: number;
}

export interface BaseThread {
  id: string;
  title: string;
  kind: ThreadKind;
  status: ThreadStatus;
  summary: string | null;
  createdAt: number;
}

/* ---------- Resolution Results ---------- */

export type NameResolution =
  | { status: 'live'; id: string; canonicalName: string }
  | { status: 'hidden'; id: string }
  | { status: 'unknown' };

export type FoldViolationReason =
  | 'unknown_target'
  | 'cycle'
  | 'invalid_alias_removal'
  | 'name_conflict';

export interface FoldViolation {
  correctionId: string;
  reason: FoldViolationReason;
  message: string;
}
