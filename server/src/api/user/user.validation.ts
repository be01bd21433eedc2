import { z } from 'zod';
import { objectIdSchema, paginationQuerySchema, passwordSchema } from '../../utils/validation';

export const listUsersSchema = z.object({
  query: paginationQuerySchema,
});

export const updateUserSchema = z.object({
  params: z.object({
    userId: objectIdSchema('Invalid user id'),
  }),
  body: z
    .object({
      email: z.string().trim().toLowerCase().email('Invalid email address').optional(),
      password: passwordSchema.optional(),
      is_active: z.boolean().optional(),
      is_superuser: z.boolean().optional(),
    })
    .default({}),
});
