import 'dotenv/config';
import { readFileSync } from 'node:fs';
import { createClient } from 'redis';
import { buildApp } from './app.js';
import { initDb, closeDb } from './db/index.js';
import { cleanupRevokedTokens } from './db/repositories/user.repository.js';
import { cacheConfig, config } from './config/index.js';
import {
  REDIS_CONNECT_TIMEOUT_MS,
  createLruStore,
  createRedisStore,
  redisReconnectStrategy,
  type CacheStore,
  type RedisClient,
} from './lib/cache.js';
import { logger, createChildLogger } from './lib/logger.js';

async function connectCacheStore(): Promise<{ store: CacheStore; redis: RedisClient | null }> {
  if (!cacheConfig.redisUrl) {
    logger.info({ maxSize: cacheConfig.maxSize }, 'Using in-process LRU cache');
    return { store: createLruStore(), redis: null };
  }

  const redisLogger = createChildLogger('redis');
  let connected = false;
  // Without the offline queue, commands fail fast while reconnecting and the cache degrades.
  const redis = createClient({
    url: cacheConfig.redisUrl,
    disableOfflineQueue: true,
    socket: {
      connectTimeout: REDIS_CONNECT_TIMEOUT_MS,
      reconnectStrategy: redisReconnectStrategy(() => connected),
    },
  });
  redis.on('error', (err) => redisLogger.error({ err }, 'Redis client error'));

  try {
    await redis.connect();
  } catch (err) {
    redisLogger.warn({ err }, 'Redis unreachable, falling back to in-process LRU cache');
    return { store: createLruStore(), redis: null };
  }
  connected = true;
  redisLogger.info('Connected to Redis cache');

  return { store: createRedisStore(redis), redis };
}

async function main() {
  logger.info('Starting movie favorites API...');

  initDb();

  const deletedCount = cleanupRevokedTokens();
  if (deletedCount > 0) {
    logger.info({ deletedCount }, 'Cleaned up expired revoked tokens');
  }

  const { store, redis } = await connectCacheStore();

  let app: Awaited<ReturnType<typeof buildApp>>;

  if (config.ENABLE_HTTPS) {
    try {
      const https = {
        key: readFileSync(config.HTTPS_KEY_PATH),
        cert: readFileSync(config.HTTPS_CERT_PATH),
      };
      app = await buildApp({ https, cacheStore: store });
      logger.info('HTTPS enabled with certificates');
    } catch (error) {
      logger.fatal(
        { err: error instanceof Error ? { message: error.message, stack: error.stack } : error },
        'Failed to load SSL certificates'
      );
      process.exit(1);
    }
  } else {
    app = await buildApp({ cacheStore: store });
    logger.info('HTTP mode (no HTTPS)');
  }

  const shutdown = async (signal: string) => {
    logger.info({ signal }, 'Received shutdown signal');
    await app.close();
    if (redis) {
      await redis.quit();
    }
    closeDb();
    process.exit(0);
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));

  try {
    await app.listen({ port: config.PORT, host: '0.0.0.0' });
    logger.info(
      { port: config.PORT, url: config.PUBLIC_URL, https: config.ENABLE_HTTPS },
      'Server started'
    );
  } catch (error) {
    logger.fatal({ err: error }, 'Failed to start server');
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  logger.fatal({ err: error }, 'Startup failed');
  process.exit(1);
});
