import { setTimeout as sleep } from 'node:timers/promises';
import type { z } from 'zod';
import { tmdbConfig } from '../../config/index.js';
import { AppError } from '../../lib/errors.js';
import { createChildLogger } from '../../lib/logger.js';
import {
  tmdbErrorSchema,
  tmdbMovieDetailsSchema,
  tmdbPageSchema,
  type TmdbListItem,
  type TmdbMovieDetails,
  type TmdbPage,
} from './tmdb.schemas.js';
import type { MovieGateway, ProviderMovie, ProviderPage, SearchFilters, TimeWindow } from './tmdb.types.js';

const logger = createChildLogger('tmdb-client');

const PROVIDER = 'tmdb';

export interface TmdbClientOptions {
  apiKey: string;
  baseUrl: string;
  defaultLanguage: string;
  timeoutMs: number;
  maxRetries: number;
  retryBaseDelayMs: number;
  fetch: typeof fetch;
}

/** Status, headers and the fully read body of one provider response. */
interface ProviderResponse {
  status: number;
  headers: Headers;
  text: string;
}

type QueryParams = Record<string, string | number | boolean | undefined>;

interface RequestOptions {
  /** Treat a provider 404 as NOT_FOUND instead of INVALID_QUERY */
  notFoundAsMissing?: boolean;
}

// ============================================================================
// Normalization
// ============================================================================

function emptyToNull(value: string | null | undefined): string | null {
  return value ? value : null;
}

function normalizeListItem(item: TmdbListItem): ProviderMovie {
  return {
    tmdbId: item.id,
    title: item.title,
    overview: emptyToNull(item.overview),
    releaseDate: emptyToNull(item.release_date),
    posterPath: emptyToNull(item.poster_path),
    backdropPath: emptyToNull(item.backdrop_path),
    voteAverage: item.vote_average ?? null,
    voteCount: item.vote_count ?? 0,
    popularity: item.popularity ?? null,
    genreIds: item.genre_ids,
    originalLanguage: emptyToNull(item.original_language),
  };
}

function normalizeDetails(details: TmdbMovieDetails): ProviderMovie {
  return normalizeListItem({ ...details, genre_ids: details.genres.map((genre) => genre.id) });
}

function normalizePage(page: TmdbPage): ProviderPage {
  return {
    page: page.page,
    totalPages: page.total_pages,
    totalResults: page.total_results,
    results: page.results.map(normalizeListItem),
  };
}

function parseRetryAfter(value: string | null): number | null {
  if (!value) return null;
  const seconds = Number(value.trim());
  if (Number.isFinite(seconds)) return Math.max(0, Math.round(seconds));
  const date = Date.parse(value);
  return Number.isFinite(date) ? Math.max(0, Math.round((date - Date.now()) / 1000)) : null;
}

type ParsedBody = { ok: true; value: unknown } | { ok: false };

function parseBody(text: string): ParsedBody {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}

function readStatusMessage(text: string): string | undefined {
  const body = parseBody(text);
  if (!body.ok) return undefined;
  const parsed = tmdbErrorSchema.safeParse(body.value);
  return parsed.success ? parsed.data.status_message : undefined;
}

function isAbortError(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'name' in error && error.name === 'AbortError';
}

/** Rejects with the signal's reason once it aborts, even if `promise` never settles. */
function abortable<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    if (signal.aborted) {
      onAbort();
      return;
    }
    signal.addEventListener('abort', onAbort, { once: true });
    void promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

function invalidPayload(path: string, issues: unknown): AppError {
  logger.error({ path, issues }, 'Unexpected TMDb payload');
  return new AppError('PROVIDER_UNAVAILABLE', 'Movie provider returned an unexpected response', {
    provider: PROVIDER,
    reason: 'invalid_payload',
  });
}

// ============================================================================
// Client
// ============================================================================

export function createTmdbClient(overrides: Partial<TmdbClientOptions> = {}): MovieGateway {
  const options: TmdbClientOptions = {
    apiKey: tmdbConfig.apiKey,
    baseUrl: tmdbConfig.baseUrl,
    defaultLanguage: tmdbConfig.defaultLanguage,
    timeoutMs: tmdbConfig.timeoutMs,
    maxRetries: tmdbConfig.maxRetries,
    retryBaseDelayMs: tmdbConfig.retryBaseDelayMs,
    fetch: globalThis.fetch,
    ...overrides,
  };

  function buildUrl(path: string, params: QueryParams): string {
    const url = new URL(`${options.baseUrl}/${path.replace(/^\/+/, '')}`);
    url.searchParams.set('api_key', options.apiKey);
    for (const [name, value] of Object.entries(params)) {
      if (value !== undefined) {
        url.searchParams.set(name, String(value));
      }
    }
    return url.toString();
  }

  // The deadline covers the body as well as the headers.
  async function fetchOnce(url: string): Promise<ProviderResponse> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), options.timeoutMs);
    try {
      const response = await abortable(
        options.fetch(url, {
          headers: { Accept: 'application/json' },
          signal: controller.signal,
        }),
        controller.signal
      );
      const text = await abortable(response.text(), controller.signal);
      return { status: response.status, headers: response.headers, text };
    } finally {
      clearTimeout(timeout);
    }
  }

  /**
   * One provider call. Network failures, timeouts and 5xx are retried with
   * exponential backoff up to `maxRetries` times; 429 and other 4xx are not.
   */
  async function request<T>(
    path: string,
    params: QueryParams,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    requestOptions: RequestOptions = {}
  ): Promise<T> {
    const url = buildUrl(path, params);
    const attempts = options.maxRetries + 1;
    let lastFailure: Record<string, unknown> = {};

    for (let attempt = 0; attempt < attempts; attempt++) {
      if (attempt > 0) {
        const delay = options.retryBaseDelayMs * 2 ** (attempt - 1);
        logger.warn({ path, attempt, delay, ...lastFailure }, 'Retrying TMDb request');
        await sleep(delay);
      }

      let response: ProviderResponse;
      try {
        response = await fetchOnce(url);
      } catch (error) {
        lastFailure = {
          reason: isAbortError(error) ? 'timeout' : 'network',
          message: error instanceof Error ? error.message : String(error),
        };
        continue;
      }

      if (response.status >= 500) {
        lastFailure = { reason: 'upstream_error', status: response.status };
        continue;
      }

      if (response.status === 429) {
        const retryAfterSeconds = parseRetryAfter(response.headers.get('retry-after'));
        logger.warn({ path, retryAfterSeconds }, 'TMDb rate limit reached');
        throw new AppError('TOO_MANY_REQUESTS', 'Movie provider rate limit reached, try again later', {
          provider: PROVIDER,
          status: 429,
          retryAfterSeconds,
        });
      }

      if (response.status === 404 && requestOptions.notFoundAsMissing) {
        throw new AppError('NOT_FOUND', 'Movie not found', { provider: PROVIDER, status: 404 });
      }

      if (response.status < 200 || response.status >= 300) {
        const providerMessage = readStatusMessage(response.text);
        logger.info({ path, status: response.status, providerMessage }, 'TMDb rejected request');
        throw new AppError('INVALID_QUERY', 'Movie provider rejected the request', {
          provider: PROVIDER,
          status: response.status,
          providerMessage: providerMessage ?? null,
        });
      }

      const body = parseBody(response.text);
      if (!body.ok) {
        throw invalidPayload(path, 'body is not JSON');
      }
      const parsed = schema.safeParse(body.value);
      if (!parsed.success) {
        throw invalidPayload(path, parsed.error.issues.slice(0, 5));
      }

      return parsed.data;
    }

    logger.error({ path, attempts, ...lastFailure }, 'TMDb request failed');
    throw new AppError('PROVIDER_UNAVAILABLE', 'Movie provider is unavailable', {
      provider: PROVIDER,
      attempts,
      ...lastFailure,
    });
  }

  async function fetchPage(path: string, params: QueryParams): Promise<ProviderPage> {
    return normalizePage(await request(path, params, tmdbPageSchema));
  }

  return {
    fetchTrending(timeWindow: TimeWindow, page: number, language?: string) {
      return fetchPage(`trending/movie/${timeWindow}`, {
        page,
        language: language ?? options.defaultLanguage,
      });
    },

    fetchPopular(page: number, language?: string, region?: string) {
      return fetchPage('movie/popular', { page, language: language ?? options.defaultLanguage, region });
    },

    fetchTopRated(page: number, language?: string, region?: string) {
      return fetchPage('movie/top_rated', { page, language: language ?? options.defaultLanguage, region });
    },

    fetchUpcoming(page: number, language?: string, region?: string) {
      return fetchPage('movie/upcoming', { page, language: language ?? options.defaultLanguage, region });
    },

    search(query: string, page: number, filters: SearchFilters = {}) {
      return fetchPage('search/movie', {
        query,
        page,
        include_adult: filters.includeAdult,
        year: filters.year,
        language: filters.language ?? options.defaultLanguage,
      });
    },

    async fetchMovie(tmdbId: number, language?: string) {
      const details = await request(
        `movie/${tmdbId}`,
        { language: language ?? options.defaultLanguage },
        tmdbMovieDetailsSchema,
        { notFoundAsMissing: true }
      );
      return normalizeDetails(details);
    },

    fetchRecommendations(tmdbId: number, page: number, language?: string) {
      return fetchPage(`movie/${tmdbId}/recommendations`, {
        page,
        language: language ?? options.defaultLanguage,
      });
    },
  };
}
