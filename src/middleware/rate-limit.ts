import type { FastifyInstance, FastifyRequest } from 'fastify';
import rateLimit, { type RateLimitOptions } from '@fastify/rate-limit';
import { rateLimitConfig } from '../config/index.js';
import { AppError } from '../lib/errors.js';

/** User id when the caller authenticated, ip otherwise. */
export function rateLimitKey(request: FastifyRequest): string {
  const user = request.ctx.user;
  return user ? `user:${user.id}` : `ip:${request.ip}`;
}

function limitExceeded(retryAfterSeconds: number, limit: number): AppError {
  return new AppError('TOO_MANY_REQUESTS', 'Request was throttled, try again later', {
    limit,
    retryAfterSeconds,
  });
}

export async function setupRateLimit(app: FastifyInstance): Promise<void> {
  await app.register(rateLimit, {
    global: true,
    // route-level, so it runs after identifyCaller and before any auth guard
    hook: 'onRequest',
    timeWindow: rateLimitConfig.timeWindow,
    max: (_request, key) => (key.startsWith('user:') ? rateLimitConfig.userMax : rateLimitConfig.anonymousMax),
    keyGenerator: rateLimitKey,
    errorResponseBuilder: (_request, context) =>
      limitExceeded(Math.ceil(context.ttl / 1000), context.max),
  });
}

/** Stricter per-ip limit for credential endpoints. */
export const authRateLimit: RateLimitOptions = {
  max: rateLimitConfig.authMax,
  timeWindow: '1 minute',
  keyGenerator: (request) => `ip:${request.ip}`,
};
