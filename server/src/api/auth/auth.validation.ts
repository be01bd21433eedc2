import { z } from 'zod';
import { passwordSchema } from '../../utils/validation';

export const registerSchema = z.object({
  body: z.object({
    email: z.string().trim().toLowerCase().email('Invalid email address'),
    password: passwordSchema,
  }),
});

// OAuth2 password grant: `username` carries the email.
export const loginSchema = z.object({
  body: z.object({
    grant_type: z.literal('password').optional(),
    username: z.string().trim().toLowerCase().min(1, 'Username is required'),
    password: z.string().min(1, 'Password is required'),
    scope: z.string().optional(),
  }),
});
