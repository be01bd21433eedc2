import { z } from 'zod';
import { objectIdSchema, paginationQuerySchema } from '../../utils/validation';
import { VOICE_LANGUAGES } from './voice.model';

// Multipart fields; checked in the controller once multer has stored the file.
export const createVoiceBodySchema = z.object({
  name: z.string().trim().min(1, 'Name is required').max(100, 'Name is too long'),
  language: z.enum(VOICE_LANGUAGES, { errorMap: () => ({ message: `language must be one of: ${VOICE_LANGUAGES.join(', ')}` }) }),
  description: z
    .string()
    .trim()
    .max(1000, 'Description is too long')
    .optional()
    .transform((v) => (v ? v : null)),
  sample_text: z.string().trim().min(1, 'sample_text is required').max(5000, 'sample_text is too long'),
});

export type CreateVoiceBody = z.infer<typeof createVoiceBodySchema>;

export const listVoicesSchema = z.object({
  query: paginationQuerySchema,
});

export const voiceIdParamsSchema = z.object({
  params: z.object({
    voiceId: objectIdSchema('Invalid voice id'),
  }),
});
