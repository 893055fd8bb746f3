import { listFavoriteMovieIds } from '../../db/repositories/favorite.repository.js';
import {
  findMovieByTmdbId,
  findMoviesByIds,
  findMoviesSharingGenres,
  listPopularMovies,
  movieGenreIds,
  type Movie,
} from '../../db/repositories/movie.repository.js';
import { cachedView, type ResponseCache, type Viewer } from '../../lib/cache.js';
import { isAppError } from '../../lib/errors.js';
import { createChildLogger } from '../../lib/logger.js';
import type { MovieSummary } from '../movies/movie.serializer.js';
import type { MoviePage, MovieService } from '../movies/movie.service.js';
import type { MovieGateway } from '../tmdb/tmdb.types.js';

const logger = createChildLogger('recommendation-service');

export const DEFAULT_RECOMMENDATION_LIMIT = 20;
export const MAX_RECOMMENDATION_LIMIT = 50;

/** Local fallback size when the provider has nothing similar. */
const SIMILAR_FALLBACK_LIMIT = 10;

export interface RecommendationService {
  forUser(userId: string, limit: number): Promise<MovieSummary[]>;
  similarTo(tmdbId: number, page: number, language: string | undefined, viewer: Viewer): Promise<MoviePage>;
}

export interface RecommendationServiceDeps {
  gateway: MovieGateway;
  movies: MovieService;
  cache: ResponseCache;
}

function collectGenres(movies: Movie[]): number[] {
  const genres = new Set<number>();
  for (const movie of movies) {
    for (const genreId of movieGenreIds(movie)) {
      genres.add(genreId);
    }
  }
  return [...genres];
}

export function createRecommendationService({
  gateway,
  movies,
  cache,
}: RecommendationServiceDeps): RecommendationService {
  /**
   * Genre overlap with the user's favorites, most popular first.
   * Users without favorites (or whose favorites carry no genres) get the
   * most popular stored movies instead.
   */
  function recommendFromFavorites(userId: string, limit: number): Movie[] {
    const favoriteIds = listFavoriteMovieIds(userId);
    const genres = collectGenres(findMoviesByIds(favoriteIds));

    if (genres.length === 0) {
      logger.debug({ userId }, 'No favorite genres, using popular fallback');
      return listPopularMovies(limit, favoriteIds);
    }

    return findMoviesSharingGenres(genres, favoriteIds, limit);
  }

  function localSimilar(tmdbId: number, page: number, viewer: Viewer): MoviePage {
    const movie = findMovieByTmdbId(tmdbId);
    const genres = movie ? movieGenreIds(movie) : [];
    const similar =
      movie && genres.length > 0 ? findMoviesSharingGenres(genres, [movie.id], SIMILAR_FALLBACK_LIMIT) : [];

    return {
      count: similar.length,
      page,
      hasNext: false,
      results: movies.summarize(similar, viewer),
    };
  }

  return {
    forUser(userId, limit) {
      const viewer = { userId };
      return cachedView(cache, 'recommendations', { limit }, viewer, async () =>
        movies.summarize(recommendFromFavorites(userId, limit), viewer)
      );
    },

    async similarTo(tmdbId, page, language, viewer) {
      try {
        return await cachedView(cache, 'similar', { tmdb_id: tmdbId, page, language }, viewer, async () => {
          const providerPage = await gateway.fetchRecommendations(tmdbId, page, language);
          return providerPage.results.length > 0 || page > 1
            ? movies.storeProviderPage(providerPage, viewer)
            : localSimilar(tmdbId, page, viewer);
        });
      } catch (error) {
        if (!isAppError(error, 'PROVIDER_UNAVAILABLE')) {
          throw error;
        }
        // not cached, so the next request asks the provider again
        logger.warn({ tmdbId }, 'Provider recommendations unavailable, using local genre match');
        return localSimilar(tmdbId, page, viewer);
      }
    },
  };
}
