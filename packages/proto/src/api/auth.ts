import { z } from 'zod';

/** Usernames are case-sensitive and stored exactly as sent. */
export const UsernameSchema = z
  .string({ required_error: 'Username is required' })
  .min(1, 'Username is required')
  .max(50, 'Username must be at most 50 characters');

export const PasswordSchema = z
  .string({ required_error: 'Password is required' })
  .min(1, 'Password is required')
  .max(128, 'Password must be at most 128 characters');

export const CreateAccountRequestSchema = z.object({
  username: UsernameSchema,
  password: PasswordSchema,
});

export const LoginRequestSchema = z.object({
  username: UsernameSchema,
  password: PasswordSchema,
});

export const UpdatePasswordRequestSchema = z.object({
  username: UsernameSchema,
  current_password: PasswordSchema,
  new_password: PasswordSchema,
});

export const MessageResponseSchema = z.object({
  message: z.string(),
});

export type CreateAccountRequest = z.infer<typeof CreateAccountRequestSchema>;
export type LoginRequest = z.infer<typeof LoginRequestSchema>;
export type UpdatePasswordRequest = z.infer<typeof UpdatePasswordRequestSchema>;
export type MessageResponse = z.infer<typeof MessageResponseSchema>;
