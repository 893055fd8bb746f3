import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { currentUser, requireAuth } from '../../middleware/authenticate.js';
import { parseOrThrow } from '../../lib/validation.js';
import type { ServiceRouteOptions } from '../../services.js';
import { DEFAULT_RECOMMENDATION_LIMIT, MAX_RECOMMENDATION_LIMIT } from './recommendation.service.js';

const recommendationQuerySchema = z.object({
  limit: z.coerce
    .number({ invalid_type_error: 'limit must be a number' })
    .int('limit must be an integer')
    .min(1, 'limit must be at least 1')
    .max(MAX_RECOMMENDATION_LIMIT, `limit must be at most ${MAX_RECOMMENDATION_LIMIT}`)
    .default(DEFAULT_RECOMMENDATION_LIMIT),
});

export async function recommendationRoutes(app: FastifyInstance, { services }: ServiceRouteOptions) {
  app.get('/recommendations', { preValidation: requireAuth }, async (request) => {
    const { limit } = parseOrThrow(recommendationQuerySchema, request.query, 'Invalid query parameters');
    const results = await services.recommendations.forUser(currentUser(request).id, limit);
    return { count: results.length, next: null, previous: null, results };
  });
}
