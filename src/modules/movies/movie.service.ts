import { cachedView, type ResponseCache, type Viewer } from '../../lib/cache.js';
import { AppError } from '../../lib/errors.js';
import { createChildLogger } from '../../lib/logger.js';
import {
  MAX_PROVIDER_PAGE,
  assertLocalPage,
  hasNextLocalPage,
  offsetFor,
  type PageResult,
} from '../../lib/pagination.js';
import {
  countMovies,
  findMovieByTmdbId,
  listMovies,
  upsertMovie,
  upsertMovies,
  type Movie,
} from '../../db/repositories/movie.repository.js';
import { findFavoritedMovieIds } from '../../db/repositories/favorite.repository.js';
import type { MovieGateway, ProviderPage } from '../tmdb/tmdb.types.js';
import { toMovieSummary, type MovieSummary } from './movie.serializer.js';
import type { CatalogQuery, LocalListQuery, SearchQuery, TrendingQuery } from './movie.schemas.js';

const logger = createChildLogger('movie-service');

export type MoviePage = PageResult<MovieSummary>;

export interface MovieService {
  /** Local row for a TMDb id, fetched and stored on first reference. */
  resolveMovie(tmdbId: number): Promise<Movie>;
  getMovie(tmdbId: number, viewer: Viewer): Promise<MovieSummary>;
  listMovies(query: LocalListQuery, viewer: Viewer): MoviePage;
  trending(query: TrendingQuery, viewer: Viewer): Promise<MoviePage>;
  popular(query: CatalogQuery, viewer: Viewer): Promise<MoviePage>;
  topRated(query: CatalogQuery, viewer: Viewer): Promise<MoviePage>;
  upcoming(query: CatalogQuery, viewer: Viewer): Promise<MoviePage>;
  search(query: SearchQuery, viewer: Viewer): Promise<MoviePage>;
  /** Upserts a provider page and shapes it for the viewer. */
  storeProviderPage(page: ProviderPage, viewer: Viewer): MoviePage;
  summarize(movies: Movie[], viewer: Viewer): MovieSummary[];
}

export interface MovieServiceDeps {
  gateway: MovieGateway;
  cache: ResponseCache;
}

export function createMovieService({ gateway, cache }: MovieServiceDeps): MovieService {
  function summarize(movies: Movie[], viewer: Viewer): MovieSummary[] {
    if (!viewer.userId) {
      return movies.map((movie) => toMovieSummary(movie));
    }
    const favoriteIds = findFavoritedMovieIds(
      viewer.userId,
      movies.map((movie) => movie.id)
    );
    return movies.map((movie) => toMovieSummary(movie, favoriteIds));
  }

  function storeProviderPage(page: ProviderPage, viewer: Viewer): MoviePage {
    const movies = upsertMovies(page.results);
    const lastPage = Math.min(page.totalPages, MAX_PROVIDER_PAGE);

    logger.debug({ page: page.page, stored: movies.length }, 'Stored provider page');

    return {
      count: page.totalResults,
      page: page.page,
      hasNext: page.page < lastPage,
      results: summarize(movies, viewer),
    };
  }

  async function resolveMovie(tmdbId: number): Promise<Movie> {
    const existing = findMovieByTmdbId(tmdbId);
    if (existing) {
      return existing;
    }

    const fetched = await gateway.fetchMovie(tmdbId);
    logger.info({ tmdbId }, 'Movie fetched from provider');
    return upsertMovie(fetched);
  }

  return {
    resolveMovie,
    storeProviderPage,
    summarize,

    getMovie(tmdbId, viewer) {
      return cachedView(cache, 'movie', { tmdb_id: tmdbId }, viewer, async () => {
        const movie = await resolveMovie(tmdbId);
        const favoriteIds = viewer.userId
          ? findFavoritedMovieIds(viewer.userId, [movie.id])
          : undefined;
        return toMovieSummary(movie, favoriteIds);
      });
    },

    listMovies({ page, page_size }, viewer) {
      const count = countMovies();
      assertLocalPage(page, page_size, count);

      const movies = listMovies(page_size, offsetFor(page, page_size));
      return {
        count,
        page,
        hasNext: hasNextLocalPage(page, page_size, count),
        results: summarize(movies, viewer),
      };
    },

    trending({ time_window, page, language }, viewer) {
      return cachedView(cache, 'trending', { time_window, page, language }, viewer, async () =>
        storeProviderPage(await gateway.fetchTrending(time_window, page, language), viewer)
      );
    },

    popular({ page, language, region }, viewer) {
      return cachedView(cache, 'popular', { page, language, region }, viewer, async () =>
        storeProviderPage(await gateway.fetchPopular(page, language, region), viewer)
      );
    },

    topRated({ page, language, region }, viewer) {
      return cachedView(cache, 'top-rated', { page, language, region }, viewer, async () =>
        storeProviderPage(await gateway.fetchTopRated(page, language, region), viewer)
      );
    },

    upcoming({ page, language, region }, viewer) {
      return cachedView(cache, 'upcoming', { page, language, region }, viewer, async () =>
        storeProviderPage(await gateway.fetchUpcoming(page, language, region), viewer)
      );
    },

    async search({ query, page, include_adult, year, language }, viewer) {
      if (query === '') {
        return { count: 0, page, hasNext: false, results: [] };
      }

      return cachedView(
        cache,
        'search',
        { query, page, include_adult, year, language },
        viewer,
        async () =>
          storeProviderPage(
            await gateway.search(query, page, { includeAdult: include_adult, year, language }),
            viewer
          )
      );
    },
  };
}
