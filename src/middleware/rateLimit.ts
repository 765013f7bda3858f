// src/middleware/rateLimit.ts
// Rate limiting for run control. Starting or resuming a run calls the
// inference collaborators, so these routes are limited per user.

import rateLimit from '@fastify/rate-limit';
import type { FastifyInstance, FastifyRequest } from 'fastify';

/**
 * Limits are per-user per hour.
 */
export const RUN_RATE_LIMITS = {
  start: { max: 30, timeWindow: '1 hour' },
  resume: { max: 30, timeWindow: '1 hour' },
};

/**
 * Rate limit key: x-user-id, falling back to the client IP.
 */
function getUserKey(request: FastifyRequest): string {
  const userId = request.headers['x-user-id'];
  if (userId && typeof userId === 'string') {
    return `user:${userId}`;
  }
  return `ip:${request.ip}`;
}

/**
 * Register the rate limit plugin. Not global; routes opt in through
 * `config.rateLimit`.
 */
export async function registerRateLimit(fastify: FastifyInstance): Promise<void> {
  await fastify.register(rateLimit, {
    global: false,
    max: 100,
    timeWindow: '1 hour',
    keyGenerator: getUserKey,
    errorResponseBuilder: (_request, context) => ({
      statusCode: 429,
      code: 'rate_limited',
      error: 'rate_limited',
      message: `Rate limit exceeded. Try again in ${Math.ceil(context.ttl / 1000)} seconds.`,
      retryAfter: Math.ceil(context.ttl / 1000),
    }),
    addHeadersOnExceeding: {
      'x-ratelimit-limit': true,
      'x-ratelimit-remaining': true,
      'x-ratelimit-reset': true,
    },
    addHeaders: {
      'x-ratelimit-limit': true,
      'x-ratelimit-remaining': true,
      'x-ratelimit-reset': true,
      'retry-after': true,
    },
  });
}
