import type { FastifyInstance } from 'fastify';
import { currentUser, requireAuth } from '../../middleware/authenticate.js';
import { paginate } from '../../lib/pagination.js';
import { parseOrThrow } from '../../lib/validation.js';
import type { ServiceRouteOptions } from '../../services.js';
import { localListQuerySchema, tmdbIdParamsSchema } from '../movies/movie.schemas.js';
import { addFavoriteBodySchema, favoriteIdParamsSchema, updateFavoriteBodySchema } from './favorite.schemas.js';

export async function favoriteRoutes(app: FastifyInstance, { services }: ServiceRouteOptions) {
  const { favorites } = services;

  app.addHook('preValidation', requireAuth);

  app.get('/favorites', async (request) => {
    const { page, page_size } = parseOrThrow(localListQuerySchema, request.query, 'Invalid query parameters');
    return paginate(request, await favorites.listFavorites(currentUser(request).id, page, page_size));
  });

  app.get('/favorites/:favoriteId', async (request) => {
    const { favoriteId } = parseOrThrow(favoriteIdParamsSchema, request.params, 'Invalid favorite id');
    return favorites.getFavorite(currentUser(request).id, favoriteId);
  });

  app.delete('/favorites/:favoriteId', async (request, reply) => {
    const { favoriteId } = parseOrThrow(favoriteIdParamsSchema, request.params, 'Invalid favorite id');
    await favorites.removeFavoriteById(currentUser(request).id, favoriteId);
    return reply.status(204).send();
  });

  app.post('/movies/:tmdbId/favorite', async (request, reply) => {
    const { tmdbId } = parseOrThrow(tmdbIdParamsSchema, request.params, 'Invalid movie id');
    const { notes } = parseOrThrow(addFavoriteBodySchema, request.body);
    const favorite = await favorites.addFavorite(currentUser(request).id, tmdbId, notes);
    return reply.status(201).send(favorite);
  });

  app.patch('/movies/:tmdbId/favorite', async (request) => {
    const { tmdbId } = parseOrThrow(tmdbIdParamsSchema, request.params, 'Invalid movie id');
    const { notes } = parseOrThrow(updateFavoriteBodySchema, request.body);
    return favorites.updateNote(currentUser(request).id, tmdbId, notes);
  });

  app.delete('/movies/:tmdbId/favorite', async (request, reply) => {
    const { tmdbId } = parseOrThrow(tmdbIdParamsSchema, request.params, 'Invalid movie id');
    await favorites.removeFavorite(currentUser(request).id, tmdbId);
    return reply.status(204).send();
  });
}
