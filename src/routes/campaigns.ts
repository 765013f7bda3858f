// src/routes/campaigns.ts
// Campaign admin and the canonical read paths.
//
// Endpoints:
// - POST /campaigns                       - Create a campaign (creator becomes DM)
// - POST /campaigns/:slug/members         - Add or change a member (DM only)
// - GET  /campaigns/:slug/sessions        - Sessions of a campaign
// - GET  /campaigns/:slug/entities        - Canonical entities with `corrected`
// - GET  /campaigns/:slug/threads         - Canonical threads with `corrected`
// - GET  /campaigns/:slug/canonical-map   - Deterministic map snapshot

import type { FastifyInstance } from 'fastify';
import type { AppContext } from '../context.js';
import { createLogger } from '../observability/index.js';
import { MEMBER_ROLES } from '../store/campaigns.js';
import { isOneOf } from '../store/rows.js';
import { requireActor, requireCampaign, requireDm, requireUserId } from './http.js';

const log = createLogger('routes/campaigns');

interface SlugParams {
  slug: string;
}

interface ListQuery {
  includeHidden?: string;
}

export function createCampaignRoutes(ctx: AppContext) {
  const { campaigns } = ctx.stores;

  return async function campaignRoutes(app: FastifyInstance) {
    // -------------------------------------------
    // POST /campaigns
    // -------------------------------------------
    app.post<{ Body: { slug?: unknown; name?: unknown } | undefined }>(
      '/campaigns',
      async (req, reply) => {
        const userId = requireUserId(req);
        const slug = typeof req.body?.slug === 'string' ? req.body.slug.trim() : '';
        const name = typeof req.body?.name === 'string' ? req.body.name : undefined;
        if (!slug) {
          return reply.code(400).send({ error: 'bad_request', message: 'slug is required' });
        }
        if (await campaigns.getBySlug(slug)) {
          return reply
            .code(409)
            .send({ error: 'campaign_exists', message: `Campaign ${slug} already exists` });
        }

        const campaign = await campaigns.create({ slug, name }, userId);
        log.info({ campaignId: campaign.id, slug, createdBy: userId }, 'Campaign created');
        return reply.code(201).send(campaign);
      }
    );

    // -------------------------------------------
    // POST /campaigns/:slug/members
    // -------------------------------------------
    app.post<{ Params: SlugParams; Body: { userId?: unknown; role?: unknown } | undefined }>(
      '/campaigns/:slug/members',
      async (req, reply) => {
        const campaign = await requireCampaign(campaigns, req.params.slug);
        const actor = await requireDm(campaigns, campaign.id, req);

        const memberId = typeof req.body?.userId === 'string' ? req.body.userId.trim() : '';
        const role: unknown = req.body?.role ?? 'player';
        if (!memberId) {
          return reply.code(400).send({ error: 'bad_request', message: 'userId is required' });
        }
        if (!isOneOf(MEMBER_ROLES, role)) {
          return reply
            .code(400)
            .send({ error: 'bad_request', message: `role must be one of: ${MEMBER_ROLES.join(', ')}` });
        }

        const member = await campaigns.setMember(campaign.id, memberId, role);
        log.info(
          { campaignId: campaign.id, userId: memberId, role, by: actor.userId },
          'Campaign member set'
        );
        return reply.code(201).send(member);
      }
    );

    // -------------------------------------------
    // GET /campaigns/:slug/sessions
    // -------------------------------------------
    app.get<{ Params: SlugParams }>('/campaigns/:slug/sessions', async (req) => {
      const campaign = await requireCampaign(campaigns, req.params.slug);
      await requireActor(campaigns, campaign.id, req);
      const sessions = await campaigns.listSessions(campaign.id);
      return { sessions, count: sessions.length };
    });

    // -------------------------------------------
    // GET /campaigns/:slug/entities?includeHidden=true
    // -------------------------------------------
    app.get<{ Params: SlugParams; Querystring: ListQuery }>(
      '/campaigns/:slug/entities',
      async (req) => {
        const campaign = await requireCampaign(campaigns, req.params.slug);
        await requireActor(campaigns, campaign.id, req);
        const map = await ctx.maps.build(campaign.id);
        const entities = map.entities.list({ includeHidden: req.query.includeHidden === 'true' });
        return { entities, count: entities.length };
      }
    );

    // -------------------------------------------
    // GET /campaigns/:slug/threads?includeHidden=true
    // -------------------------------------------
    app.get<{ Params: SlugParams; Querystring: ListQuery }>(
      '/campaigns/:slug/threads',
      async (req) => {
        const campaign = await requireCampaign(campaigns, req.params.slug);
        await requireActor(campaigns, campaign.id, req);
        const map = await ctx.maps.build(campaign.id);
        const threads = map.threads.list({ includeHidden: req.query.includeHidden === 'true' });
        return { threads, count: threads.length };
      }
    );

    // -------------------------------------------
    // GET /campaigns/:slug/canonical-map
    // -------------------------------------------
    app.get<{ Params: SlugParams }>('/campaigns/:slug/canonical-map', async (req) => {
      const campaign = await requireCampaign(campaigns, req.params.slug);
      await requireActor(campaigns, campaign.id, req);
      const map = await ctx.maps.build(campaign.id);
      return map.toJSON();
    });
  };
}
