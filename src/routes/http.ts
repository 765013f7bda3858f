// src/routes/http.ts
// Shared route helpers: actor resolution from the trusted x-user-id header
// and the DomainError → HTTP mapping.

import type { FastifyError, FastifyInstance, FastifyRequest } from 'fastify';
import { CampaignNotFound, NotAuthorized, isDomainError } from '../canon/errors.js';
import type { Actor } from '../canon/types.js';
import { createLogger } from '../observability/index.js';
import type { Campaign, CampaignStore } from '../store/campaigns.js';
import { TranscriptNotFoundError } from '../transcripts/source.js';

const log = createLogger('http/errors');

export const USER_HEADER = 'x-user-id';

export function getUserId(req: FastifyRequest): string | null {
  const value = req.headers[USER_HEADER];
  return typeof value === 'string' && value.trim() ? value.trim() : null;
}

export function requireUserId(req: FastifyRequest): string {
  const userId = getUserId(req);
  if (!userId) throw new NotAuthorized(`The ${USER_HEADER} header is required`);
  return userId;
}

export async function requireCampaign(campaigns: CampaignStore, slug: string): Promise<Campaign> {
  const campaign = await campaigns.getBySlug(slug);
  if (!campaign) throw new CampaignNotFound(slug);
  return campaign;
}

/** The caller's role in the campaign; non-members are refused. */
export async function requireActor(
  campaigns: CampaignStore,
  campaignId: string,
  req: FastifyRequest
): Promise<Actor> {
  const userId = requireUserId(req);
  const role = await campaigns.getRole(campaignId, userId);
  if (!role) throw new NotAuthorized(`${userId} is not a member of this campaign`);
  return { userId, role };
}

export async function requireDm(
  campaigns: CampaignStore,
  campaignId: string,
  req: FastifyRequest
): Promise<Actor> {
  const actor = await requireActor(campaigns, campaignId, req);
  if (actor.role !== 'dm') throw new NotAuthorized('Only the DM can do this');
  return actor;
}

/** `{ error: code, message }` with the error's status. */
export function registerErrorHandler(app: FastifyInstance): void {
  app.setErrorHandler((err: FastifyError, req, reply) => {
    if (isDomainError(err)) {
      return reply.code(err.statusCode).send({ error: err.code, message: err.message });
    }
    if (err instanceof TranscriptNotFoundError) {
      return reply.code(404).send({ error: 'transcript_not_found', message: err.message });
    }
    if (err.statusCode !== undefined && err.statusCode < 500) {
      return reply.code(err.statusCode).send({ error: err.code ?? 'bad_request', message: err.message });
    }
    log.error({ err, requestId: req.id, url: req.url }, 'Unhandled error');
    return reply.code(500).send({ error: 'internal_error', message: 'Internal server error' });
  });
}
