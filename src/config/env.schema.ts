import { z } from 'zod';

const ttlString = z
  .string()
  .regex(/^\d+[smhd]$/, 'TTL must look like 30s, 5m, 12h or 7d');

export const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().default(3001),
  PUBLIC_URL: z.string().url().default('http://localhost:3001'),

  ENABLE_HTTPS: z
    .string()
    .transform((val) => val === 'true')
    .default('false'),
  HTTPS_CERT_PATH: z.string().default('./certs/localhost-cert.pem'),
  HTTPS_KEY_PATH: z.string().default('./certs/localhost-key.pem'),

  TMDB_API_KEY: z.string().min(1),
  TMDB_BASE_URL: z.string().url().default('https://api.themoviedb.org/3'),
  TMDB_IMAGE_BASE_URL: z.string().url().default('https://image.tmdb.org/t/p'),
  TMDB_DEFAULT_LANGUAGE: z.string().default('en-US'),
  TMDB_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
  TMDB_MAX_RETRIES: z.coerce.number().int().min(0).max(2).default(2),
  TMDB_RETRY_BASE_DELAY_MS: z.coerce.number().int().min(0).default(250),

  JWT_SECRET: z.string().min(32, 'JWT_SECRET must be at least 32 characters'),
  JWT_ACCESS_TTL: ttlString.default('5m'),
  JWT_REFRESH_TTL: ttlString.default('1d'),

  DATABASE_PATH: z.string().default('./data/movies.db'),

  REDIS_URL: z
    .string()
    .optional()
    .transform((val) => (val ? val : undefined)),
  CACHE_MAX_SIZE: z.coerce.number().int().positive().default(1000),
  CACHE_ANON_TTL: z.coerce.number().int().min(0).default(900),
  CACHE_PERSONALIZED_TTL: z.coerce.number().int().min(0).default(300),

  RATE_LIMIT_WINDOW: z.string().default('1 hour'),
  RATE_LIMIT_ANON_MAX: z.coerce.number().int().positive().default(100),
  RATE_LIMIT_USER_MAX: z.coerce.number().int().positive().default(1000),
  RATE_LIMIT_AUTH_MAX: z.coerce.number().int().positive().default(10),

  CORS_ORIGIN: z.string().default('http://localhost:3000'),
  LOG_LEVEL: z
    .enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'])
    .default('info'),
});

export type Env = z.infer<typeof envSchema>;
