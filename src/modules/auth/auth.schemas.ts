import { z } from 'zod';

export const registerBodySchema = z.object({
  username: z
    .string()
    .trim()
    .min(3, 'Username must be at least 3 characters')
    .max(150, 'Username must be at most 150 characters')
    .regex(/^[\w.@+-]+$/, 'Username may contain only letters, digits and @/./+/-/_'),
  email: z.string().trim().email('Enter a valid email address').max(254),
  password: z
    .string()
    .min(8, 'Password must be at least 8 characters')
    .max(128, 'Password must be at most 128 characters'),
});

export type RegisterBody = z.infer<typeof registerBodySchema>;

export const loginBodySchema = z.object({
  username: z.string().min(1, 'Username is required'),
  password: z.string().min(1, 'Password is required'),
});

export type LoginBody = z.infer<typeof loginBodySchema>;

export const refreshBodySchema = z.object({
  refresh: z.string().min(1, 'Refresh token is required'),
});

export type RefreshBody = z.infer<typeof refreshBodySchema>;
