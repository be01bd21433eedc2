import { z } from 'zod';
import { objectIdSchema, paginationQuerySchema } from '../../utils/validation';

export const createApiKeySchema = z.object({
  body: z.object({
    name: z.string().trim().min(1, 'Name is required').max(100, 'Name is too long'),
    is_active: z.boolean().optional(),
    expires_at: z.coerce.date({ invalid_type_error: 'expires_at must be a date' }).nullable().optional(),
  }),
});

export const listApiKeysSchema = z.object({
  query: paginationQuerySchema,
});

export const apiKeyIdParamsSchema = z.object({
  params: z.object({
    apiKeyId: objectIdSchema('Invalid API key id'),
  }),
});

export const checkApiKeySchema = z.object({
  params: z.object({
    apiKey: z.string().min(1, 'API key is required'),
  }),
});
