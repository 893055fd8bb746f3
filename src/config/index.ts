import 'dotenv/config';
import { envSchema, type Env } from './env.schema.js';

function loadConfig(): Env {
  const result = envSchema.safeParse(process.env);

  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `  ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    throw new Error(`Invalid environment configuration:\n${issues}`);
  }

  return result.data;
}

export const config = loadConfig();

export const serverConfig = {
  publicUrl: config.PUBLIC_URL,
  isDevelopment: config.NODE_ENV === 'development',
};

export const jwtConfig = {
  secret: config.JWT_SECRET,
  accessTtl: config.JWT_ACCESS_TTL,
  refreshTtl: config.JWT_REFRESH_TTL,
};

export const tmdbConfig = {
  apiKey: config.TMDB_API_KEY,
  baseUrl: config.TMDB_BASE_URL.replace(/\/+$/, ''),
  imageBaseUrl: config.TMDB_IMAGE_BASE_URL.replace(/\/+$/, ''),
  defaultLanguage: config.TMDB_DEFAULT_LANGUAGE,
  timeoutMs: config.TMDB_TIMEOUT_MS,
  maxRetries: config.TMDB_MAX_RETRIES,
  retryBaseDelayMs: config.TMDB_RETRY_BASE_DELAY_MS,
};

// TTLs in seconds
export const cacheConfig = {
  maxSize: config.CACHE_MAX_SIZE,
  anonymousTtl: config.CACHE_ANON_TTL,
  personalizedTtl: config.CACHE_PERSONALIZED_TTL,
  redisUrl: config.REDIS_URL,
};

export const rateLimitConfig = {
  timeWindow: config.RATE_LIMIT_WINDOW,
  anonymousMax: config.RATE_LIMIT_ANON_MAX,
  userMax: config.RATE_LIMIT_USER_MAX,
  authMax: config.RATE_LIMIT_AUTH_MAX,
};
