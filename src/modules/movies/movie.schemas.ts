import { z } from 'zod';
import { DEFAULT_PAGE_SIZE, MAX_PAGE_SIZE, MAX_PROVIDER_PAGE } from '../../lib/pagination.js';

const providerPage = z.coerce
  .number({ invalid_type_error: 'page must be a number' })
  .int('page must be an integer')
  .min(1, 'page must be at least 1')
  .max(MAX_PROVIDER_PAGE, `page must be at most ${MAX_PROVIDER_PAGE}`)
  .default(1);

const localPage = z.coerce
  .number({ invalid_type_error: 'page must be a number' })
  .int('page must be an integer')
  .min(1, 'page must be at least 1')
  .default(1);

const pageSize = z.coerce
  .number({ invalid_type_error: 'page_size must be a number' })
  .int('page_size must be an integer')
  .min(1, 'page_size must be at least 1')
  .max(MAX_PAGE_SIZE, `page_size must be at most ${MAX_PAGE_SIZE}`)
  .default(DEFAULT_PAGE_SIZE);

const language = z
  .string()
  .regex(/^[a-z]{2}(-[A-Z]{2})?$/, 'language must look like en or en-US')
  .optional();

const region = z
  .string()
  .regex(/^[A-Z]{2}$/, 'region must be an ISO 3166-1 code such as US')
  .optional();

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

export const tmdbIdParamsSchema = z.object({
  tmdbId: z.coerce
    .number({ invalid_type_error: 'tmdbId must be a number' })
    .int('tmdbId must be an integer')
    .positive('tmdbId must be positive'),
});

export const localListQuerySchema = z.object({
  page: localPage,
  page_size: pageSize,
});

export const trendingQuerySchema = z.object({
  time_window: z.enum(['day', 'week']).default('day'),
  page: providerPage,
  language,
});

export const catalogQuerySchema = z.object({
  page: providerPage,
  language,
  region,
});

export const searchQuerySchema = z.object({
  query: z.string().trim().max(200, 'query must be at most 200 characters').default(''),
  page: providerPage,
  include_adult: booleanFlag.optional(),
  year: z.coerce.number().int().min(1870).max(2100).optional(),
  language,
});

export const similarQuerySchema = z.object({
  page: providerPage,
  language,
});

export type LocalListQuery = z.infer<typeof localListQuerySchema>;
export type TrendingQuery = z.infer<typeof trendingQuerySchema>;
export type CatalogQuery = z.infer<typeof catalogQuerySchema>;
export type SearchQuery = z.infer<typeof searchQuerySchema>;
export type SimilarQuery = z.infer<typeof similarQuerySchema>;
