import type { FastifyInstance } from 'fastify';
import { loginBodySchema, refreshBodySchema, registerBodySchema } from './auth.schemas.js';
import {
  getProfile,
  loginUser,
  logoutUser,
  refreshAccessToken,
  registerUser,
} from './auth.service.js';
import { currentUser, requireAuth } from '../../middleware/authenticate.js';
import { authRateLimit } from '../../middleware/rate-limit.js';
import { parseOrThrow } from '../../lib/validation.js';

export async function authRoutes(app: FastifyInstance) {
  app.post('/auth/register', { config: { rateLimit: authRateLimit } }, async (request, reply) => {
    const body = parseOrThrow(registerBodySchema, request.body);
    const result = await registerUser(body);
    return reply.status(201).send(result);
  });

  app.post('/auth/login', { config: { rateLimit: authRateLimit } }, async (request) => {
    const body = parseOrThrow(loginBodySchema, request.body);
    return loginUser(body);
  });

  app.post('/auth/refresh', { config: { rateLimit: authRateLimit } }, async (request) => {
    const body = parseOrThrow(refreshBodySchema, request.body);
    return refreshAccessToken(body.refresh);
  });

  // ═══════════════════════════════════════════════════════════════════════════
  // Authenticated endpoints
  // ═══════════════════════════════════════════════════════════════════════════

  app.post('/auth/logout', { preValidation: requireAuth }, async (request, reply) => {
    const body = parseOrThrow(refreshBodySchema, request.body);
    await logoutUser(currentUser(request), body.refresh);
    return reply.status(204).send();
  });

  app.get('/auth/me', { preValidation: requireAuth }, async (request) => {
    return getProfile(currentUser(request));
  });
}
