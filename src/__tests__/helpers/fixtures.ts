import { vi } from 'vitest';
import type { CacheStore } from '../../lib/cache.js';
import type { MovieGateway, ProviderMovie, ProviderPage } from '../../modules/tmdb/tmdb.types.js';
import { AppError } from '../../lib/errors.js';

export function providerMovie(tmdbId: number, overrides: Partial<ProviderMovie> = {}): ProviderMovie {
  return {
    tmdbId,
    title: `Movie ${tmdbId}`,
    overview: `Overview of movie ${tmdbId}`,
    releaseDate: '2010-07-16',
    posterPath: `/poster-${tmdbId}.jpg`,
    backdropPath: null,
    voteAverage: 7.5,
    voteCount: 100,
    popularity: 50,
    genreIds: [18],
    originalLanguage: 'en',
    ...overrides,
  };
}

export function providerPage(results: ProviderMovie[], overrides: Partial<ProviderPage> = {}): ProviderPage {
  return {
    page: 1,
    totalPages: 1,
    totalResults: results.length,
    results,
    ...overrides,
  };
}

export const INCEPTION = providerMovie(27205, {
  title: 'Inception',
  popularity: 90,
  genreIds: [28, 878],
});

export const INTERSTELLAR = providerMovie(157336, {
  title: 'Interstellar',
  popularity: 80,
  genreIds: [12, 18, 878],
});

export const AMELIE = providerMovie(194, {
  title: 'Amelie',
  popularity: 30,
  genreIds: [35, 10749],
});

/**
 * In-process gateway. Single-movie lookups resolve against `catalog`;
 * every list call answers with a page of the whole catalog.
 */
export function createFakeGateway(catalog: ProviderMovie[] = [INCEPTION, INTERSTELLAR, AMELIE]) {
  const page = (pageNumber: number) =>
    providerPage(catalog, { page: pageNumber, totalPages: 3, totalResults: catalog.length * 3 });

  const gateway = {
    fetchTrending: vi.fn(async (_window: string, pageNumber: number) => page(pageNumber)),
    fetchPopular: vi.fn(async (pageNumber: number) => page(pageNumber)),
    fetchTopRated: vi.fn(async (pageNumber: number) => page(pageNumber)),
    fetchUpcoming: vi.fn(async (pageNumber: number) => page(pageNumber)),
    search: vi.fn(async (query: string, pageNumber: number) =>
      providerPage(
        catalog.filter((movie) => movie.title.toLowerCase().includes(query.toLowerCase())),
        { page: pageNumber }
      )
    ),
    fetchMovie: vi.fn(async (tmdbId: number) => {
      const movie = catalog.find((candidate) => candidate.tmdbId === tmdbId);
      if (!movie) {
        throw new AppError('NOT_FOUND', 'Movie not found', { provider: 'tmdb', status: 404 });
      }
      return movie;
    }),
    fetchRecommendations: vi.fn(async (tmdbId: number, pageNumber: number) =>
      providerPage(
        catalog.filter((movie) => movie.tmdbId !== tmdbId),
        { page: pageNumber }
      )
    ),
  } satisfies MovieGateway;

  return gateway;
}

export type FakeGateway = ReturnType<typeof createFakeGateway>;

/** A store whose every operation rejects, like an unreachable Redis. */
export function createBrokenStore(): CacheStore {
  const fail = async (): Promise<never> => {
    throw new Error('connection refused');
  };
  return {
    name: 'broken',
    get: fail,
    set: fail,
    deleteByPrefix: fail,
    size: () => null,
  };
}

/** Resolves to the AppError a promise rejects with. */
export async function rejection(promise: Promise<unknown>): Promise<AppError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof AppError) {
      return error;
    }
    throw error;
  }
  throw new Error('Expected the promise to reject');
}
