// src/canon/ledger.ts
// Correction ledger: append-only, attributed, approval-gated.
//
// DM-authored corrections are approved on submission; player corrections wait
// for a DM decision. Nothing reaches the ledger in an approved state unless
// it folds cleanly against the corrections already approved.

import { KeyedMutex } from '../concurrency/keyedMutex.js';
import { createLogger } from '../observability/index.js';
import { recordCorrection } from '../observability/metrics.js';
import type { CorrectionFilter, CorrectionStore } from '../store/corrections.js';
import { newId } from '../utils/ids.js';
import { parseCorrectionChange } from './correctionInput.js';
import {
  AlreadyDecided,
  CorrectionNotFound,
  CycleDetected,
  InvalidCorrection,
  NotAuthorized,
} from './errors.js';
import type { CanonicalMapBuilder } from './mapBuilder.js';
import type { Actor, Correction, CorrectionChange } from './types.js';

const log = createLogger('canon/ledger');

export interface SubmitCorrectionInput {
  campaignId: string;
  targetType: unknown;
  targetId: unknown;
  action: unknown;
  payload: unknown;
}

export interface CorrectionLedgerDeps {
  corrections: CorrectionStore;
  maps: CanonicalMapBuilder;
  /** Shared with anything else that writes canonical state for a campaign. */
  locks?: KeyedMutex;
  now?: () => number;
  newId?: () => string;
}

export class CorrectionLedger {
  private readonly corrections: CorrectionStore;
  private readonly maps: CanonicalMapBuilder;
  private readonly locks: KeyedMutex;
  private readonly now: () => number;
  private readonly makeId: () => string;

  constructor(deps: CorrectionLedgerDeps) {
    this.corrections = deps.corrections;
    this.maps = deps.maps;
    this.locks = deps.locks ?? new KeyedMutex();
    this.now = deps.now ?? Date.now;
    this.makeId = deps.newId ?? (() => newId('cor'));
  }

  /* ---------- Writes ---------- */

  async submit(input: SubmitCorrectionInput, actor: Actor): Promise<Correction> {
    const change = parseCorrectionChange(input.targetType, input.action, input.payload);
    if (typeof input.targetId !== 'string' || input.targetId.trim() === '') {
      throw new InvalidCorrection('targetId is required');
    }
    const targetId = input.targetId.trim();

    return this.locks.runExclusive(campaignLockKey(input.campaignId), async () => {
      await this.assertTargetsExist(input.campaignId, targetId, change);

      const createdAt = this.now();
      const approved = actor.role === 'dm';
      const correction: Correction = {
        id: this.makeId(),
        campaignId: input.campaignId,
        targetId,
        createdBy: actor.userId,
        createdAt,
        state: approved ? 'approved' : 'pending',
        decidedBy: approved ? actor.userId : null,
        decidedAt: approved ? createdAt : null,
        ...change,
      };

      await this.assertFoldsCleanly(correction);
      await this.corrections.insert(correction);
      if (approved) this.maps.invalidate(input.campaignId);

      recordCorrection(correction.targetType, correction.action, correction.state);
      log.info(
        {
          correctionId: correction.id,
          campaignId: correction.campaignId,
          targetType: correction.targetType,
          targetId,
          action: correction.action,
          state: correction.state,
          createdBy: actor.userId,
        },
        'Correction submitted'
      );
      return correction;
    });
  }

  async approve(id: string, reviewer: Actor): Promise<Correction> {
    return this.decide(id, reviewer, 'approved');
  }

  async reject(id: string, reviewer: Actor): Promise<Correction> {
    return this.decide(id, reviewer, 'rejected');
  }

  /* ---------- Reads ---------- */

  async get(id: string): Promise<Correction> {
    const correction = await this.corrections.getById(id);
    if (!correction) throw new CorrectionNotFound(id);
    return correction;
  }

  list(campaignId: string, filter: CorrectionFilter = {}): Promise<Correction[]> {
    return this.corrections.list(campaignId, filter);
  }

  /* ---------- Internals ---------- */

  private async decide(
    id: string,
    reviewer: Actor,
    state: 'approved' | 'rejected'
  ): Promise<Correction> {
    const found = await this.get(id);

    return this.locks.runExclusive(campaignLockKey(found.campaignId), async () => {
      if (reviewer.role !== 'dm') {
        throw new NotAuthorized('Only the DM can decide on corrections');
      }
      // Re-read under the lock; a concurrent decision may have landed
      const current = await this.get(id);
      if (current.state !== 'pending') throw new AlreadyDecided(id, current.state);

      if (state === 'approved') {
        await this.assertFoldsCleanly(current);
      }

      const decidedAt = this.now();
      const changed = await this.corrections.decide(id, state, reviewer.userId, decidedAt);
      if (!changed) {
        const latest = await this.get(id);
        throw new AlreadyDecided(id, latest.state);
      }
      if (state === 'approved') this.maps.invalidate(current.campaignId);

      recordCorrection(current.targetType, current.action, state);
      log.info(
        { correctionId: id, campaignId: current.campaignId, state, decidedBy: reviewer.userId },
        'Correction decided'
      );
      return { ...current, state, decidedBy: reviewer.userId, decidedAt };
    });
  }

  private async assertTargetsExist(
    campaignId: string,
    targetId: string,
    change: CorrectionChange
  ): Promise<void> {
    const map = await this.maps.build(campaignId);
    const exists =
      change.targetType === 'entity'
        ? (id: string) => map.entities.get(id) !== undefined
        : (id: string) => map.threads.get(id) !== undefined;

    if (!exists(targetId)) {
      throw new InvalidCorrection(`Unknown ${change.targetType} ${targetId}`);
    }
    if (change.action === 'merge' && !exists(change.payload.intoId)) {
      throw new InvalidCorrection(`Unknown merge target ${change.payload.intoId}`);
    }
  }

  /**
   * Fold the approved ledger with `candidate` included. Any violation that
   * the approved ledger alone does not produce blocks the candidate.
   */
  private async assertFoldsCleanly(correction: Correction): Promise<void> {
    const candidate: Correction = { ...correction, state: 'approved' };
    const baseline = await this.maps.build(candidate.campaignId);
    const known = new Set(baseline.violations.map((v) => `${v.correctionId}:${v.reason}`));
    const { violations } = await this.maps.preview(candidate.campaignId, [candidate]);
    const introduced = violations.find((v) => !known.has(`${v.correctionId}:${v.reason}`));
    if (!introduced) return;

    log.warn(
      { correctionId: candidate.id, violation: introduced },
      'Correction rejected: it does not fold cleanly'
    );
    if (introduced.reason === 'cycle') throw new CycleDetected(introduced.message);
    throw new InvalidCorrection(introduced.message);
  }
}

export function campaignLockKey(campaignId: string): string {
  return `campaign:${campaignId}`;
}
