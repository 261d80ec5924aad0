import { z } from 'zod';
import { Role } from '../types/user.types';
import { MIN_PASSWORD_LENGTH } from '../models/user.model';
import { breaksRecord } from '../codecs/fields';
import { recordText } from './common.validator';

/**
 * User validation schemas
 */

const credentials = {
  username: recordText('Username'),
  // Not trimmed: compared byte for byte on every request
  password: z
    .string({ required_error: 'Password is required' })
    .min(MIN_PASSWORD_LENGTH, `Password must be at least ${MIN_PASSWORD_LENGTH} characters long`)
    .max(255, 'Password must be at most 255 characters')
    .refine((value) => !breaksRecord(value), 'Password must not contain commas or line breaks'),
};

// Public sign-up
export const registerUserSchema = z.object({
  body: z.object(credentials),
});

// Admin account creation
export const createUserSchema = z.object({
  body: z.object({
    ...credentials,
    role: z.nativeEnum(Role, {
      errorMap: () => ({ message: 'Role must be ADMIN or REGULAR_USER' }),
    }),
  }),
});

export const deleteUserSchema = z.object({
  params: z.object({
    username: recordText('Username'),
  }),
});
