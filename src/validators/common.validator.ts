import { z } from 'zod';
import { breaksRecord } from '../codecs/fields';

/**
 * Building blocks shared by the request schemas
 */

export const recordText = (label: string) =>
  z
    .string({
      required_error: `${label} is required`,
      invalid_type_error: `${label} must be a string`,
    })
    .trim()
    .min(1, `${label} is required`)
    .max(255, `${label} must be at most 255 characters`)
    .refine((value) => !breaksRecord(value), `${label} must not contain commas or line breaks`);

export const idParam = (label: string) =>
  z
    .string()
    .regex(/^[1-9]\d*$/, `Invalid ${label} format`)
    .transform(Number)
    .pipe(z.number().refine(Number.isSafeInteger, `Invalid ${label} format`));

export const positiveInteger = (label: string) =>
  z
    .number({
      required_error: `${label} is required`,
      invalid_type_error: `${label} must be a number`,
    })
    .int(`${label} must be an integer`)
    .positive(`${label} must be positive`)
    .max(Number.MAX_SAFE_INTEGER, `${label} is too large`);
