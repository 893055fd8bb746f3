import { z } from 'zod';

const MAX_NOTES_LENGTH = 1000;

const notes = z
  .string()
  .trim()
  .max(MAX_NOTES_LENGTH, `notes must be at most ${MAX_NOTES_LENGTH} characters`)
  .nullable()
  .transform((value) => (value ? value : null));

export const addFavoriteBodySchema = z
  .object({ notes: notes.optional() })
  .default({})
  .transform(({ notes: value }) => ({ notes: value ?? null }));

export const updateFavoriteBodySchema = z.object({ notes });

export const favoriteIdParamsSchema = z.object({
  favoriteId: z.coerce
    .number({ invalid_type_error: 'favoriteId must be a number' })
    .int('favoriteId must be an integer')
    .positive('favoriteId must be positive'),
});

export type AddFavoriteBody = z.infer<typeof addFavoriteBodySchema>;
export type UpdateFavoriteBody = z.infer<typeof updateFavoriteBodySchema>;
