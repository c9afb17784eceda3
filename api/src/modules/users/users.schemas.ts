import { z } from 'zod';
import { USER_ROLES } from '../../shared/auth/auth.types';
import { PASSWORD_MAX_BYTES, fitsPasswordLimit } from '../../shared/auth/password-hasher.service';

export const emailSchema = z.string().trim().toLowerCase().email().max(255);

export const passwordSchema = z
  .string()
  .min(8)
  .refine(fitsPasswordLimit, { message: `Password must be at most ${PASSWORD_MAX_BYTES} bytes` });

export const createUserSchema = z.object({
  email: emailSchema,
  password: passwordSchema,
  role: z.enum(USER_ROLES)
});

export type CreateUserInput = z.infer<typeof createUserSchema>;

export const updateUserRoleSchema = z.object({
  role: z.enum(USER_ROLES)
});

export type UpdateUserRoleInput = z.infer<typeof updateUserRoleSchema>;
