import { z } from 'zod';
import config from '../../config';
import { objectIdSchema } from '../../utils/validation';

export const generateSpeechSchema = z.object({
  body: z.object({
    text: z
      .string({ required_error: 'text is required' })
      .trim()
      .min(1, 'text is required')
      .max(config.tts.maxTextLength, 'text is too long'),
    voice_id: objectIdSchema('Invalid voice id').optional(),
    stream: z.boolean().default(false),
  }),
});

export const downloadAudioSchema = z.object({
  params: z.object({
    filename: z.string().min(1),
  }),
});
