import { z } from 'zod';

export const objectIdSchema = (message: string) => z.string().regex(/^[a-f\d]{24}$/i, message);

// bcrypt only hashes the first 72 bytes.
export const PASSWORD_MAX_BYTES = 72;

export const passwordSchema = z
  .string()
  .min(1, 'Password is required')
  .refine((value) => Buffer.byteLength(value, 'utf8') <= PASSWORD_MAX_BYTES, 'Password is too long');

export const paginationQuerySchema = z
  .object({
    skip: z.coerce.number().int().min(0, 'skip must be >= 0').default(0),
    limit: z.coerce.number().int().min(1, 'limit must be >= 1').max(100, 'limit must be <= 100').default(100),
  })
  .passthrough();

export const readPagination = (query: unknown): { skip: number; limit: number } => {
  const { skip, limit } = paginationQuerySchema.parse(query ?? {});
  return { skip, limit };
};
