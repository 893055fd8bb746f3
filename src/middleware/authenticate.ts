import type { FastifyRequest } from 'fastify';
import { AppError } from '../lib/errors.js';
import { authenticateToken, type AuthUser } from '../modules/auth/auth.service.js';

const BEARER_PREFIX = /^Bearer\s+/i;

function badHeader(): AppError {
  return new AppError('INVALID_TOKEN', 'Authorization header must contain a Bearer token', {
    reason: 'bad_authorization_header',
  });
}

async function resolveCaller(header: string): Promise<AuthUser> {
  if (!BEARER_PREFIX.test(header)) {
    throw badHeader();
  }

  const token = header.replace(BEARER_PREFIX, '').trim();
  if (!token) {
    throw badHeader();
  }

  return authenticateToken(token);
}

/**
 * Attaches the caller's identity when an Authorization header is present.
 * An unusable header is kept on `ctx.authError` and only thrown by the
 * preValidation guards below, after the rate limiter has counted the request.
 */
export async function identifyCaller(request: FastifyRequest): Promise<void> {
  const header = request.headers.authorization;
  if (!header) {
    return;
  }

  try {
    request.ctx.user = await resolveCaller(header);
  } catch (error) {
    if (!(error instanceof AppError)) {
      throw error;
    }
    request.ctx.authError = error;
  }
}

/** A header that is present but unusable fails the request even on public routes. */
export async function rejectInvalidCredentials(request: FastifyRequest): Promise<void> {
  if (request.ctx.authError) {
    throw request.ctx.authError;
  }
}

export async function requireAuth(request: FastifyRequest): Promise<void> {
  await rejectInvalidCredentials(request);
  if (!request.ctx.user) {
    throw new AppError('UNAUTHORIZED', 'Authentication credentials were not provided');
  }
}

/** For handlers behind requireAuth. */
export function currentUser(request: FastifyRequest): AuthUser {
  const { user } = request.ctx;
  if (!user) {
    throw new AppError('UNAUTHORIZED', 'Authentication credentials were not provided');
  }
  return user;
}
