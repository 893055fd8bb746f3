import { z } from 'zod';

const tmdbMovieBaseSchema = z.object({
  id: z.number().int(),
  title: z.string(),
  overview: z.string().nullish(),
  release_date: z.string().nullish(),
  poster_path: z.string().nullish(),
  backdrop_path: z.string().nullish(),
  vote_average: z.number().nullish(),
  vote_count: z.number().nullish(),
  popularity: z.number().nullish(),
  original_language: z.string().nullish(),
});

export const tmdbListItemSchema = tmdbMovieBaseSchema.extend({
  genre_ids: z.array(z.number().int()).default([]),
});

export const tmdbMovieDetailsSchema = tmdbMovieBaseSchema.extend({
  genres: z.array(z.object({ id: z.number().int(), name: z.string() })).default([]),
});

export const tmdbPageSchema = z.object({
  page: z.number().int(),
  results: z.array(tmdbListItemSchema),
  total_pages: z.number().int(),
  total_results: z.number().int(),
});

export const tmdbErrorSchema = z.object({
  status_code: z.number().optional(),
  status_message: z.string().optional(),
});

export type TmdbListItem = z.infer<typeof tmdbListItemSchema>;
export type TmdbMovieDetails = z.infer<typeof tmdbMovieDetailsSchema>;
export type TmdbPage = z.infer<typeof tmdbPageSchema>;
