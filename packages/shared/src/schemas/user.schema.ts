import { z } from 'zod';
import { IMAGE_DATA_URL_PATTERN, USERNAME_PATTERN } from '../constants.js';

export const imageDataUrlSchema = z
  .string()
  .regex(IMAGE_DATA_URL_PATTERN, 'Image must be a base64-encoded data:image URL');

export const createUserSchema = z.object({
  email: z.string().trim().email().max(254),
  username: z
    .string()
    .trim()
    .min(1)
    .max(150)
    .regex(USERNAME_PATTERN, 'Username may only contain letters, digits and . @ + - _'),
  first_name: z.string().trim().min(1).max(150),
  last_name: z.string().trim().min(1).max(150),
  password: z.string().min(8).max(128),
});

export const loginSchema = z.object({
  email: z.string().trim().email(),
  password: z.string().min(1),
});

export const setPasswordSchema = z.object({
  current_password: z.string().min(1),
  new_password: z.string().min(8).max(128),
});

export const avatarSchema = z.object({
  avatar: imageDataUrlSchema,
});

export type CreateUserInput = z.infer<typeof createUserSchema>;
export type LoginInput = z.infer<typeof loginSchema>;
export type SetPasswordInput = z.infer<typeof setPasswordSchema>;
export type AvatarInput = z.infer<typeof avatarSchema>;

export type CreateUserDTO = CreateUserInput;
