// src/canon/correctionInput.ts
// Shape validation for correction requests. Every correction, whether from
// the API or read back from storage, passes through parseCorrectionChange.

import { InvalidCorrection } from './errors.js';
import { cleanName } from './normalize.js';
import {
  ENTITY_ACTIONS,
  THREAD_ACTIONS,
  THREAD_STATUSES,
  type CorrectionChange,
  type EntityAction,
  type IdentityAction,
  type ThreadAction,
  type ThreadStatus,
} from './types.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isOneOf<T extends string>(values: readonly T[], value: unknown): value is T {
  return typeof value === 'string' && values.some((v) => v === value);
}

function requireName(payload: Record<string, unknown>, field: string, action: string): string {
  const value = payload[field];
  if (typeof value !== 'string' || cleanName(value) === '') {
    throw new InvalidCorrection(`${action} requires a non-empty "${field}"`);
  }
  return cleanName(value);
}

function parseIdentityAction(
  action: 'merge' | 'unmerge' | 'hide' | 'unhide',
  payload: Record<string, unknown>
): IdentityAction {
  switch (action) {
    case 'merge': {
      const intoId = payload.intoId;
      if (typeof intoId !== 'string' || intoId.trim() === '') {
        throw new InvalidCorrection('merge requires "intoId"');
      }
      return { action, payload: { intoId: intoId.trim() } };
    }
    case 'unmerge':
    case 'hide':
    case 'unhide':
      return { action, payload: {} };
  }
}

function parseEntityAction(action: string, payload: Record<string, unknown>): EntityAction {
  if (!isOneOf(ENTITY_ACTIONS, action)) {
    throw new InvalidCorrection(`Unknown entity action "${action}"`);
  }
  switch (action) {
    case 'rename':
      return { action, payload: { name: requireName(payload, 'name', action) } };
    case 'alias_add':
    case 'alias_remove':
      return { action, payload: { alias: requireName(payload, 'alias', action) } };
    default:
      return parseIdentityAction(action, payload);
  }
}

function parseThreadAction(action: string, payload: Record<string, unknown>): ThreadAction {
  if (!isOneOf(THREAD_ACTIONS, action)) {
    throw new InvalidCorrection(`Unknown thread action "${action}"`);
  }
  switch (action) {
    case 'title':
      return { action, payload: { title: requireName(payload, 'title', action) } };
    case 'status': {
      const status: unknown = payload.status;
      if (!isOneOf<ThreadStatus>(THREAD_STATUSES, status)) {
        throw new InvalidCorrection(`status must be one of: ${THREAD_STATUSES.join(', ')}`);
      }
      return { action, payload: { status } };
    }
    case 'summary': {
      const summary = payload.summary;
      if (summary !== null && typeof summary !== 'string') {
        throw new InvalidCorrection('summary must be a string or null');
      }
      const trimmed = summary === null ? '' : summary.trim();
      return { action, payload: { summary: trimmed === '' ? null : trimmed } };
    }
    default:
      return parseIdentityAction(action, payload);
  }
}

/**
 * Validate a correction's target type, action and payload.
 * Throws InvalidCorrection on any shape problem.
 */
export function parseCorrectionChange(
  targetType: unknown,
  action: unknown,
  payload: unknown
): CorrectionChange {
  if (typeof action !== 'string' || action === '') {
    throw new InvalidCorrection('action is required');
  }
  const body = payload === undefined || payload === null ? {} : payload;
  if (!isRecord(body)) {
    throw new InvalidCorrection('payload must be an object');
  }

  if (targetType === 'entity') {
    return { targetType, ...parseEntityAction(action, body) };
  }
  if (targetType === 'thread') {
    return { targetType, ...parseThreadAction(action, body) };
  }
  throw new InvalidCorrection('targetType must be "entity" or "thread"');
}
