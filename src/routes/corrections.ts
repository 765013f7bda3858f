// src/routes/corrections.ts
// Correction API. Anyone in the campaign may submit; only the DM decides.
// Shape validation happens in the ledger so stored and submitted
// corrections go through the same parser.

import type { FastifyInstance } from 'fastify';
import { CorrectionNotFound } from '../canon/errors.js';
import type { CorrectionState, TargetType } from '../canon/types.js';
import type { AppContext } from '../context.js';
import type { CorrectionFilter } from '../store/corrections.js';
import { isOneOf } from '../store/rows.js';
import { requireActor, requireCampaign, requireUserId } from './http.js';

const CORRECTION_STATES: readonly CorrectionState[] = ['pending', 'approved', 'rejected'];
const TARGET_TYPES: readonly TargetType[] = ['entity', 'thread'];
const DECISIONS = ['approve', 'reject'] as const;

interface SubmitBody {
  targetType?: unknown;
  targetId?: unknown;
  action?: unknown;
  payload?: unknown;
}

interface ListQuery {
  state?: string;
  targetType?: string;
  targetId?: string;
}

export function createCorrectionRoutes(ctx: AppContext) {
  const { campaigns } = ctx.stores;

  return async function correctionRoutes(app: FastifyInstance) {
    // -------------------------------------------
    // POST /campaigns/:slug/corrections
    // DM submissions are approved at once; player submissions wait
    // -------------------------------------------
    app.post<{ Params: { slug: string }; Body: SubmitBody | undefined }>(
      '/campaigns/:slug/corrections',
      async (req, reply) => {
        const campaign = await requireCampaign(campaigns, req.params.slug);
        const actor = await requireActor(campaigns, campaign.id, req);
        const body = req.body ?? {};

        const correction = await ctx.ledger.submit(
          {
            campaignId: campaign.id,
            targetType: body.targetType,
            targetId: body.targetId,
            action: body.action,
            payload: body.payload,
          },
          actor
        );
        return reply.code(201).send(correction);
      }
    );

    // -------------------------------------------
    // POST /corrections/:id/decision  { decision: approve | reject }
    // -------------------------------------------
    app.post<{ Params: { id: string }; Body: { decision?: unknown } | undefined }>(
      '/corrections/:id/decision',
      async (req, reply) => {
        const decision = req.body?.decision;
        if (!isOneOf(DECISIONS, decision)) {
          return reply
            .code(400)
            .send({ error: 'bad_request', message: 'decision must be "approve" or "reject"' });
        }

        // Outsiders see a missing correction, whether or not the id exists
        const userId = requireUserId(req);
        const existing = await ctx.stores.corrections.getById(req.params.id);
        const role = existing ? await campaigns.getRole(existing.campaignId, userId) : null;
        if (!existing || !role) throw new CorrectionNotFound(req.params.id);
        const reviewer = { userId, role };
        const correction =
          decision === 'approve'
            ? await ctx.ledger.approve(existing.id, reviewer)
            : await ctx.ledger.reject(existing.id, reviewer);
        return correction;
      }
    );

    // -------------------------------------------
    // GET /campaigns/:slug/corrections?state=&targetType=&targetId=
    // -------------------------------------------
    app.get<{ Params: { slug: string }; Querystring: ListQuery }>(
      '/campaigns/:slug/corrections',
      async (req, reply) => {
        const campaign = await requireCampaign(campaigns, req.params.slug);
        await requireActor(campaigns, campaign.id, req);

        const { state, targetType, targetId } = req.query;
        const filter: CorrectionFilter = {};
        if (state !== undefined) {
          if (!isOneOf(CORRECTION_STATES, state)) {
            return reply.code(400).send({ error: 'bad_request', message: `Invalid state "${state}"` });
          }
          filter.state = state;
        }
        if (targetType !== undefined) {
          if (!isOneOf(TARGET_TYPES, targetType)) {
            return reply
              .code(400)
              .send({ error: 'bad_request', message: `Invalid targetType "${targetType}"` });
          }
          filter.targetType = targetType;
        }
        if (targetId) filter.targetId = targetId;

        const corrections = await ctx.ledger.list(campaign.id, filter);
        return { corrections, count: corrections.length };
      }
    );
  };
}
