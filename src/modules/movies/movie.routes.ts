import type { FastifyInstance } from 'fastify';
import { rejectInvalidCredentials } from '../../middleware/authenticate.js';
import { viewerOf } from '../../middleware/request-context.js';
import { paginate } from '../../lib/pagination.js';
import { parseOrThrow } from '../../lib/validation.js';
import type { ServiceRouteOptions } from '../../services.js';
import {
  catalogQuerySchema,
  localListQuerySchema,
  searchQuerySchema,
  similarQuerySchema,
  tmdbIdParamsSchema,
  trendingQuerySchema,
} from './movie.schemas.js';

export async function movieRoutes(app: FastifyInstance, { services }: ServiceRouteOptions) {
  const { movies, recommendations } = services;

  app.addHook('preValidation', rejectInvalidCredentials);

  // ═══════════════════════════════════════════════════════════════════════════
  // Provider catalogs
  // ═══════════════════════════════════════════════════════════════════════════

  app.get('/trending', async (request) => {
    const query = parseOrThrow(trendingQuerySchema, request.query, 'Invalid query parameters');
    return paginate(request, await movies.trending(query, viewerOf(request.ctx)));
  });

  app.get('/popular', async (request) => {
    const query = parseOrThrow(catalogQuerySchema, request.query, 'Invalid query parameters');
    return paginate(request, await movies.popular(query, viewerOf(request.ctx)));
  });

  app.get('/search', async (request) => {
    const query = parseOrThrow(searchQuerySchema, request.query, 'Invalid query parameters');
    return paginate(request, await movies.search(query, viewerOf(request.ctx)));
  });

  app.get('/movies/top-rated', async (request) => {
    const query = parseOrThrow(catalogQuerySchema, request.query, 'Invalid query parameters');
    return paginate(request, await movies.topRated(query, viewerOf(request.ctx)));
  });

  app.get('/movies/upcoming', async (request) => {
    const query = parseOrThrow(catalogQuerySchema, request.query, 'Invalid query parameters');
    return paginate(request, await movies.upcoming(query, viewerOf(request.ctx)));
  });

  // ═══════════════════════════════════════════════════════════════════════════
  // Local store
  // ═══════════════════════════════════════════════════════════════════════════

  app.get('/movies', async (request) => {
    const query = parseOrThrow(localListQuerySchema, request.query, 'Invalid query parameters');
    return paginate(request, movies.listMovies(query, viewerOf(request.ctx)));
  });

  app.get('/movies/:tmdbId', async (request) => {
    const { tmdbId } = parseOrThrow(tmdbIdParamsSchema, request.params, 'Invalid movie id');
    return movies.getMovie(tmdbId, viewerOf(request.ctx));
  });

  app.get('/movies/:tmdbId/recommendations', async (request) => {
    const { tmdbId } = parseOrThrow(tmdbIdParamsSchema, request.params, 'Invalid movie id');
    const { page, language } = parseOrThrow(similarQuerySchema, request.query, 'Invalid query parameters');
    return paginate(
      request,
      await recommendations.similarTo(tmdbId, page, language, viewerOf(request.ctx))
    );
  });
}
