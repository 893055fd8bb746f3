import { createLruStore, createResponseCache, type CacheStore, type ResponseCache } from './lib/cache.js';
import { createFavoriteService, type FavoriteService } from './modules/favorites/favorite.service.js';
import { createMovieService, type MovieService } from './modules/movies/movie.service.js';
import {
  createRecommendationService,
  type RecommendationService,
} from './modules/recommendations/recommendation.service.js';
import { createTmdbClient } from './modules/tmdb/tmdb.client.js';
import type { MovieGateway } from './modules/tmdb/tmdb.types.js';

export interface Services {
  cache: ResponseCache;
  movies: MovieService;
  favorites: FavoriteService;
  recommendations: RecommendationService;
}

export interface ServiceOverrides {
  gateway?: MovieGateway;
  cacheStore?: CacheStore;
}

export function createServices({ gateway, cacheStore }: ServiceOverrides = {}): Services {
  const movieGateway = gateway ?? createTmdbClient();
  const cache = createResponseCache(cacheStore ?? createLruStore());
  const movies = createMovieService({ gateway: movieGateway, cache });

  return {
    cache,
    movies,
    favorites: createFavoriteService({ movies, cache }),
    recommendations: createRecommendationService({ gateway: movieGateway, movies, cache }),
  };
}

/** Options passed to every route plugin that needs the services. */
export interface ServiceRouteOptions {
  services: Services;
}
