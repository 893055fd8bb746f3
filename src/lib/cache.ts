import { LRUCache } from 'lru-cache';
import type { createClient } from 'redis';
import { cacheConfig } from '../config/index.js';
import { createChildLogger } from './logger.js';

const logger = createChildLogger('cache');

// ── Stores ──────────────────────────────────────────────────────────────────

/** Key-value backend for serialized response payloads. TTLs are in seconds. */
export interface CacheStore {
  readonly name: string;
  get(key: string): Promise<string | undefined>;
  set(key: string, value: string, ttlSeconds: number): Promise<void>;
  deleteByPrefix(prefix: string): Promise<number>;
  size(): number | null;
}

export function createLruStore(maxSize: number = cacheConfig.maxSize): CacheStore {
  const lru = new LRUCache<string, string>({ max: maxSize });

  return {
    name: 'lru',
    async get(key) {
      return lru.get(key);
    },
    async set(key, value, ttlSeconds) {
      lru.set(key, value, { ttl: ttlSeconds * 1000 });
    },
    async deleteByPrefix(prefix) {
      const matches = [...lru.keys()].filter((key) => key.startsWith(prefix));
      for (const key of matches) {
        lru.delete(key);
      }
      return matches.length;
    },
    size() {
      return lru.size;
    },
  };
}

export type RedisClient = ReturnType<typeof createClient>;

export const REDIS_CONNECT_TIMEOUT_MS = 2000;
const REDIS_STARTUP_ATTEMPTS = 3;
const REDIS_MAX_RECONNECT_DELAY_MS = 5000;

/**
 * Backoff for node-redis reconnects. Before the first successful connection it
 * gives up after a few attempts, so startup can fall back to the LRU store.
 */
export function redisReconnectStrategy(hasConnected: () => boolean) {
  return (retries: number, cause: Error): number | Error => {
    if (!hasConnected() && retries >= REDIS_STARTUP_ATTEMPTS) {
      return cause;
    }
    return Math.min(100 * 2 ** retries, REDIS_MAX_RECONNECT_DELAY_MS);
  };
}

export function createRedisStore(client: RedisClient): CacheStore {
  return {
    name: 'redis',
    async get(key) {
      return (await client.get(key)) ?? undefined;
    },
    async set(key, value, ttlSeconds) {
      await client.set(key, value, { EX: ttlSeconds });
    },
    async deleteByPrefix(prefix) {
      const keys: string[] = [];
      for await (const key of client.scanIterator({ MATCH: `${prefix}*`, COUNT: 100 })) {
        keys.push(key);
      }
      if (keys.length > 0) {
        await client.del(keys);
      }
      return keys.length;
    },
    size() {
      return null;
    },
  };
}

// ── Keys ────────────────────────────────────────────────────────────────────

const KEY_NAMESPACE = 'movies';

export type CacheParams = Record<string, string | number | boolean | null | undefined>;

/** Who is asking. `userId` is null for anonymous callers. */
export interface Viewer {
  userId: string | null;
}

export function userKeyPrefix(userId: string): string {
  return `${KEY_NAMESPACE}:user:${userId}:`;
}

/**
 * endpoint + sorted, non-empty query params + auth state.
 * Authenticated keys live under the user's prefix so a favorite change can drop them in one sweep.
 */
export function buildCacheKey(endpoint: string, params: CacheParams, viewer: Viewer): string {
  const query = Object.keys(params)
    .filter((name) => params[name] !== undefined && params[name] !== null)
    .sort()
    .map((name) => `${encodeURIComponent(name)}=${encodeURIComponent(String(params[name]))}`)
    .join('&');

  const scope = viewer.userId ? userKeyPrefix(viewer.userId) : `${KEY_NAMESPACE}:anon:`;
  return `${scope}${endpoint}:${query}`;
}

export function ttlFor(viewer: Viewer): number {
  return viewer.userId ? cacheConfig.personalizedTtl : cacheConfig.anonymousTtl;
}

/** getOrCompute with the key and TTL picked from the viewer's auth state. */
export function cachedView<T>(
  cache: ResponseCache,
  endpoint: string,
  params: CacheParams,
  viewer: Viewer,
  compute: () => Promise<T>
): Promise<T> {
  return cache.getOrCompute(buildCacheKey(endpoint, params, viewer), ttlFor(viewer), compute);
}

// ── Response cache ──────────────────────────────────────────────────────────

export interface CacheStats {
  backend: string;
  size: number | null;
  hits: number;
  misses: number;
  errors: number;
  inflight: number;
}

export interface ResponseCache {
  getOrCompute<T>(key: string, ttlSeconds: number, compute: () => Promise<T>): Promise<T>;
  invalidateUser(userId: string): Promise<void>;
  getStats(): CacheStats;
}

interface InflightEntry {
  state: { stale: boolean };
  promise: Promise<string>;
}

export function createResponseCache(store: CacheStore): ResponseCache {
  const inflight = new Map<string, InflightEntry>();
  const metrics = { hits: 0, misses: 0, errors: 0 };

  async function safeGet(key: string): Promise<string | undefined> {
    try {
      return await store.get(key);
    } catch (err) {
      metrics.errors++;
      logger.warn({ err, key, backend: store.name }, 'Cache read failed, computing directly');
      return undefined;
    }
  }

  async function safeSet(key: string, value: string, ttlSeconds: number): Promise<void> {
    try {
      await store.set(key, value, ttlSeconds);
    } catch (err) {
      metrics.errors++;
      logger.warn({ err, key, backend: store.name }, 'Cache write failed');
    }
  }

  function startComputation<T>(key: string, ttlSeconds: number, compute: () => Promise<T>): InflightEntry {
    const state = { stale: false };
    const promise = compute().then(async (value) => {
      const serialized = JSON.stringify(value);
      if (!state.stale) {
        await safeSet(key, serialized, ttlSeconds);
      }
      return serialized;
    });
    return { state, promise };
  }

  return {
    async getOrCompute<T>(key: string, ttlSeconds: number, compute: () => Promise<T>): Promise<T> {
      if (ttlSeconds <= 0) {
        return compute();
      }

      const cached = await safeGet(key);
      if (cached !== undefined) {
        metrics.hits++;
        logger.debug({ key }, 'Cache hit');
        return JSON.parse(cached);
      }

      const pending = inflight.get(key);
      if (pending) {
        logger.debug({ key }, 'Joining in-flight computation');
        return JSON.parse(await pending.promise);
      }

      metrics.misses++;
      logger.debug({ key }, 'Cache miss');

      const entry = startComputation(key, ttlSeconds, compute);
      inflight.set(key, entry);
      try {
        return JSON.parse(await entry.promise);
      } finally {
        if (inflight.get(key) === entry) {
          inflight.delete(key);
        }
      }
    },

    async invalidateUser(userId) {
      const prefix = userKeyPrefix(userId);

      for (const [key, entry] of inflight) {
        if (key.startsWith(prefix)) {
          entry.state.stale = true;
          inflight.delete(key);
        }
      }

      try {
        const removed = await store.deleteByPrefix(prefix);
        logger.debug({ userId, removed }, 'Invalidated personalized cache entries');
      } catch (err) {
        metrics.errors++;
        logger.error({ err, userId, backend: store.name }, 'Cache invalidation failed');
      }
    },

    getStats() {
      return {
        backend: store.name,
        size: store.size(),
        ...metrics,
        inflight: inflight.size,
      };
    },
  };
}
