import { z } from 'zod';
import { fitsPasswordLimit, PASSWORD_MAX_BYTES } from '../../shared/auth/password-hasher.service';
import { emailSchema, passwordSchema } from '../users/users.schemas';

export const registerSchema = z.object({
  orgName: z.string().trim().min(2).max(200),
  email: emailSchema,
  password: passwordSchema
});

export type RegisterInput = z.infer<typeof registerSchema>;

export const loginSchema = z.object({
  email: z.string().trim().toLowerCase().min(1),
  password: z
    .string()
    .min(1)
    .refine(fitsPasswordLimit, { message: `Password must be at most ${PASSWORD_MAX_BYTES} bytes` })
});

export type LoginInput = z.infer<typeof loginSchema>;

export const refreshSchema = z.object({
  refreshToken: z.string().min(1)
});

export type RefreshInput = z.infer<typeof refreshSchema>;
