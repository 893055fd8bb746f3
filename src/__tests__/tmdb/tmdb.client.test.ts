import { describe, it, expect, vi, type Mock } from 'vitest';
import { createTmdbClient } from '../../modules/tmdb/tmdb.client.js';
import { rejection } from '../helpers/fixtures.js';

const BASE_URL = 'https://tmdb.test/3';

function json(body: unknown, status = 200, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json', ...headers },
  });
}

const inceptionDetails = {
  id: 27205,
  title: 'Inception',
  overview: 'A thief who steals corporate secrets.',
  release_date: '',
  poster_path: '/inception.jpg',
  backdrop_path: null,
  vote_average: 8.4,
  vote_count: 35000,
  popularity: 90.5,
  original_language: 'en',
};

const searchPayload = {
  page: 1,
  total_pages: 1,
  total_results: 1,
  results: [{ ...inceptionDetails, genre_ids: [28, 878] }],
};

function clientWith(fetch: typeof globalThis.fetch, overrides: { maxRetries?: number; timeoutMs?: number } = {}) {
  return createTmdbClient({
    fetch,
    baseUrl: BASE_URL,
    apiKey: 'test-key',
    retryBaseDelayMs: 0,
    ...overrides,
  });
}

function calledUrl(fetch: Mock<typeof globalThis.fetch>, call = 0): URL {
  const input = fetch.mock.calls[call]?.[0];
  return new URL(String(input));
}

// ---------------------------------------------------------------------------
// Requests and normalization
// ---------------------------------------------------------------------------

describe('createTmdbClient', () => {
  it('sends the api key and query params and normalizes results', async () => {
    const fetch = vi.fn<typeof globalThis.fetch>(async () => json(searchPayload));
    const client = clientWith(fetch);

    const page = await client.search('inception', 1, { year: 2010 });

    const url = calledUrl(fetch);
    expect(url.origin + url.pathname).toBe('https://tmdb.test/3/search/movie');
    expect(url.searchParams.get('api_key')).toBe('test-key');
    expect(url.searchParams.get('query')).toBe('inception');
    expect(url.searchParams.get('page')).toBe('1');
    expect(url.searchParams.get('year')).toBe('2010');
    expect(url.searchParams.get('language')).toBe('en-US');
    expect(url.searchParams.has('include_adult')).toBe(false);

    expect(page).toEqual({
      page: 1,
      totalPages: 1,
      totalResults: 1,
      results: [
        {
          tmdbId: 27205,
          title: 'Inception',
          overview: 'A thief who steals corporate secrets.',
          releaseDate: null,
          posterPath: '/inception.jpg',
          backdropPath: null,
          voteAverage: 8.4,
          voteCount: 35000,
          popularity: 90.5,
          genreIds: [28, 878],
          originalLanguage: 'en',
        },
      ],
    });
  });

  it('builds the trending path from the time window', async () => {
    const fetch = vi.fn<typeof globalThis.fetch>(async () => json({ ...searchPayload, results: [] }));
    await clientWith(fetch).fetchTrending('week', 2, 'fr-FR');

    const url = calledUrl(fetch);
    expect(url.pathname).toBe('/3/trending/movie/week');
    expect(url.searchParams.get('page')).toBe('2');
    expect(url.searchParams.get('language')).toBe('fr-FR');
  });

  it('maps movie details genres to genre ids', async () => {
    const fetch = vi.fn<typeof globalThis.fetch>(async () =>
      json({ ...inceptionDetails, genres: [{ id: 28, name: 'Action' }, { id: 878, name: 'Science Fiction' }] })
    );

    const movie = await clientWith(fetch).fetchMovie(27205);

    expect(calledUrl(fetch).pathname).toBe('/3/movie/27205');
    expect(movie.genreIds).toEqual([28, 878]);
    expect(movie.title).toBe('Inception');
  });

  // ---------------------------------------------------------------------------
  // Failure modes
  // ---------------------------------------------------------------------------

  it('retries 5xx responses and succeeds', async () => {
    const fetch = vi
      .fn<typeof globalThis.fetch>()
      .mockResolvedValueOnce(json({ status_message: 'down' }, 503))
      .mockResolvedValueOnce(json({ status_message: 'down' }, 502))
      .mockResolvedValueOnce(json(searchPayload));

    const page = await clientWith(fetch).fetchPopular(1);

    expect(page.results).toHaveLength(1);
    expect(fetch).toHaveBeenCalledTimes(3);
  });

  it('gives up after the retry budget on network errors', async () => {
    const fetch = vi.fn<typeof globalThis.fetch>(async () => {
      throw new TypeError('fetch failed');
    });

    const error = await rejection(clientWith(fetch).fetchPopular(1));

    expect(error.code).toBe('PROVIDER_UNAVAILABLE');
    expect(error.statusCode).toBe(502);
    expect(error.details).toMatchObject({ provider: 'tmdb', attempts: 3, reason: 'network' });
    expect(fetch).toHaveBeenCalledTimes(3);
  });

  it('aborts attempts that exceed the timeout', async () => {
    const fetch = vi.fn<typeof globalThis.fetch>(
      (_input, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener('abort', () => {
            reject(Object.assign(new Error('The operation was aborted'), { name: 'AbortError' }));
          });
        })
    );

    const error = await rejection(clientWith(fetch, { maxRetries: 0, timeoutMs: 5 }).fetchUpcoming(1));

    expect(error.code).toBe('PROVIDER_UNAVAILABLE');
    expect(error.details).toMatchObject({ attempts: 1, reason: 'timeout' });
  });

  it('maps 429 to TOO_MANY_REQUESTS without retrying', async () => {
    const fetch = vi.fn<typeof globalThis.fetch>(async () =>
      json({ status_message: 'Too many requests' }, 429, { 'retry-after': '30' })
    );

    const error = await rejection(clientWith(fetch).fetchTopRated(1));

    expect(error.code).toBe('TOO_MANY_REQUESTS');
    expect(error.statusCode).toBe(429);
    expect(error.details).toEqual({ provider: 'tmdb', status: 429, retryAfterSeconds: 30 });
    expect(fetch).toHaveBeenCalledTimes(1);
  });

  it('maps a missing movie to NOT_FOUND', async () => {
    const fetch = vi.fn<typeof globalThis.fetch>(async () =>
      json({ status_code: 34, status_message: 'The resource you requested could not be found.' }, 404)
    );

    const error = await rejection(clientWith(fetch).fetchMovie(999999));

    expect(error.code).toBe('NOT_FOUND');
    expect(fetch).toHaveBeenCalledTimes(1);
  });

  it('maps other 4xx responses to INVALID_QUERY', async () => {
    const fetch = vi.fn<typeof globalThis.fetch>(async () =>
      json({ status_code: 7, status_message: 'Invalid API key' }, 401)
    );

    const error = await rejection(clientWith(fetch).search('inception', 1));

    expect(error.code).toBe('INVALID_QUERY');
    expect(error.statusCode).toBe(400);
    expect(error.details).toEqual({ provider: 'tmdb', status: 401, providerMessage: 'Invalid API key' });
    expect(fetch).toHaveBeenCalledTimes(1);
  });

  it('rejects payloads that do not match the expected shape', async () => {
    const fetch = vi.fn<typeof globalThis.fetch>(async () => json({ page: 'one', results: null }));

    const error = await rejection(clientWith(fetch).fetchPopular(1));

    expect(error.code).toBe('PROVIDER_UNAVAILABLE');
    expect(error.details).toEqual({ provider: 'tmdb', reason: 'invalid_payload' });
  });

  it('rejects a body that is not JSON', async () => {
    const fetch = vi.fn<typeof globalThis.fetch>(
      async () => new Response('<html>gateway</html>', { status: 200, headers: { 'content-type': 'text/html' } })
    );

    const error = await rejection(clientWith(fetch).fetchPopular(1));

    expect(error.code).toBe('PROVIDER_UNAVAILABLE');
    expect(error.statusCode).toBe(502);
    expect(error.details).toEqual({ provider: 'tmdb', reason: 'invalid_payload' });
    expect(fetch).toHaveBeenCalledTimes(1);
  });

  it('times out a body that stops arriving after the headers', async () => {
    const fetch = vi.fn<typeof globalThis.fetch>(async () => {
      const body = new ReadableStream<Uint8Array>({
        start(controller) {
          controller.enqueue(new TextEncoder().encode('{"page":1,'));
        },
      });
      return new Response(body, { status: 200, headers: { 'content-type': 'application/json' } });
    });

    const error = await rejection(clientWith(fetch, { maxRetries: 1, timeoutMs: 20 }).fetchPopular(1));

    expect(error.code).toBe('PROVIDER_UNAVAILABLE');
    expect(error.details).toMatchObject({ provider: 'tmdb', attempts: 2, reason: 'timeout' });
    expect(fetch).toHaveBeenCalledTimes(2);
  });
});
