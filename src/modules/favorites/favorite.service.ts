import { isUniqueViolation } from '../../db/index.js';
import {
  countFavoritesByUser,
  deleteFavorite,
  deleteFavoriteById,
  findFavoriteById,
  insertFavorite,
  listFavoritesByUser,
  updateFavoriteNotes,
  type Favorite,
} from '../../db/repositories/favorite.repository.js';
import { findMovieByTmdbId, findMoviesByIds } from '../../db/repositories/movie.repository.js';
import { cachedView, type ResponseCache } from '../../lib/cache.js';
import { AppError } from '../../lib/errors.js';
import { createChildLogger } from '../../lib/logger.js';
import { assertLocalPage, hasNextLocalPage, offsetFor, type PageResult } from '../../lib/pagination.js';
import { toFavoriteView, type FavoriteView } from '../movies/movie.serializer.js';
import type { MovieService } from '../movies/movie.service.js';

const logger = createChildLogger('favorite-service');

export interface FavoriteService {
  addFavorite(userId: string, tmdbId: number, notes: string | null): Promise<FavoriteView>;
  removeFavorite(userId: string, tmdbId: number): Promise<void>;
  updateNote(userId: string, tmdbId: number, notes: string | null): Promise<FavoriteView>;
  listFavorites(userId: string, page: number, pageSize: number): Promise<PageResult<FavoriteView>>;
  getFavorite(userId: string, favoriteId: number): Promise<FavoriteView>;
  removeFavoriteById(userId: string, favoriteId: number): Promise<void>;
}

export interface FavoriteServiceDeps {
  movies: MovieService;
  cache: ResponseCache;
}

function favoriteNotFound(tmdbId: number): AppError {
  return new AppError('NOT_FOUND', 'Favorite not found', { tmdb_id: tmdbId });
}

function favoriteIdNotFound(favoriteId: number): AppError {
  return new AppError('NOT_FOUND', 'Favorite not found', { favorite_id: favoriteId });
}

/** The (user, movie) unique constraint decides duplicate adds, including concurrent ones. */
function insertOnce(userId: string, movieId: number, tmdbId: number, notes: string | null): Favorite {
  try {
    return insertFavorite(userId, movieId, notes);
  } catch (error) {
    if (isUniqueViolation(error)) {
      throw new AppError('CONFLICT', 'Movie is already in favorites', { tmdb_id: tmdbId });
    }
    throw error;
  }
}

export function createFavoriteService({ movies, cache }: FavoriteServiceDeps): FavoriteService {
  return {
    async addFavorite(userId, tmdbId, notes) {
      const movie = await movies.resolveMovie(tmdbId);

      const favorite = insertOnce(userId, movie.id, tmdbId, notes);

      logger.info({ userId, tmdbId, favoriteId: favorite.id }, 'Favorite added');
      await cache.invalidateUser(userId);

      return toFavoriteView(favorite, movie);
    },

    async removeFavorite(userId, tmdbId) {
      const movie = findMovieByTmdbId(tmdbId);
      if (!movie || !deleteFavorite(userId, movie.id)) {
        throw favoriteNotFound(tmdbId);
      }

      logger.info({ userId, tmdbId }, 'Favorite removed');
      await cache.invalidateUser(userId);
    },

    async updateNote(userId, tmdbId, notes) {
      const movie = findMovieByTmdbId(tmdbId);
      const favorite = movie ? updateFavoriteNotes(userId, movie.id, notes) : null;
      if (!movie || !favorite) {
        throw favoriteNotFound(tmdbId);
      }

      logger.info({ userId, tmdbId }, 'Favorite note updated');
      await cache.invalidateUser(userId);

      return toFavoriteView(favorite, movie);
    },

    listFavorites(userId, page, pageSize) {
      return cachedView(cache, 'favorites', { page, page_size: pageSize }, { userId }, async () => {
        const count = countFavoritesByUser(userId);
        assertLocalPage(page, pageSize, count);
        const favorites = listFavoritesByUser(userId, pageSize, offsetFor(page, pageSize));
        const moviesById = new Map(
          findMoviesByIds(favorites.map((favorite) => favorite.movie_id)).map((movie) => [movie.id, movie])
        );

        const results: FavoriteView[] = [];
        for (const favorite of favorites) {
          const movie = moviesById.get(favorite.movie_id);
          if (movie) {
            results.push(toFavoriteView(favorite, movie));
          }
        }

        return {
          count,
          page,
          hasNext: hasNextLocalPage(page, pageSize, count),
          results,
        };
      });
    },

    async getFavorite(userId, favoriteId) {
      const favorite = findFavoriteById(userId, favoriteId);
      const [movie] = favorite ? findMoviesByIds([favorite.movie_id]) : [];
      if (!favorite || !movie) {
        throw favoriteIdNotFound(favoriteId);
      }
      return toFavoriteView(favorite, movie);
    },

    async removeFavoriteById(userId, favoriteId) {
      if (!deleteFavoriteById(userId, favoriteId)) {
        throw favoriteIdNotFound(favoriteId);
      }

      logger.info({ userId, favoriteId }, 'Favorite removed');
      await cache.invalidateUser(userId);
    },
  };
}
