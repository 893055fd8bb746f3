import type { FastifyInstance } from 'fastify';
import type { Viewer } from '../lib/cache.js';
import type { AppError } from '../lib/errors.js';
import type { AuthUser } from '../modules/auth/auth.service.js';

export interface RequestContext {
  requestId: string;
  ip: string;
  user: AuthUser | null;
  /** Set when an Authorization header was sent but could not be used. */
  authError: AppError | null;
}

declare module 'fastify' {
  interface FastifyRequest {
    ctx: RequestContext;
  }
}

export const REQUEST_ID_HEADER = 'x-request-id';

export function setupRequestContext(app: FastifyInstance): void {
  app.decorateRequest('ctx', null, []);

  app.addHook('onRequest', async (request, reply) => {
    request.ctx = { requestId: request.id, ip: request.ip, user: null, authError: null };
    reply.header(REQUEST_ID_HEADER, request.id);
  });
}

export function viewerOf(ctx: RequestContext): Viewer {
  return { userId: ctx.user?.id ?? null };
}
