import type { z } from 'zod';
import { AppError } from './errors.js';

export function parseOrThrow<T extends z.ZodTypeAny>(
  schema: T,
  data: unknown,
  message = 'Invalid input data'
): z.output<T> {
  const result = schema.safeParse(data);

  if (!result.success) {
    throw new AppError(
      'VALIDATION_ERROR',
      message,
      result.error.issues.map((issue) => ({
        field: issue.path.join('.'),
        message: issue.message,
      }))
    );
  }

  return result.data;
}
