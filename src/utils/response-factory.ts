import { ZodError } from 'zod';
import { ApiSuccessResponse, ApiErrorResponse } from '../types/api.types';
import { AppError, ErrorCode } from '../types/error.types';

export interface FieldError {
  field: string;
  message: string;
}

/**
 * `{ data, message? }` envelope for every 2xx body
 */
export function createSuccessResponse<T>(data: T, message?: string): ApiSuccessResponse<T> {
  return message === undefined ? { data } : { data, message };
}

/**
 * `{ error: { code, message, details? } }` envelope; `details` is left out
 * rather than sent as null when there are none
 */
export function createErrorResponse(
  code: ErrorCode | string,
  message: string,
  details?: Record<string, unknown>
): ApiErrorResponse {
  return details === undefined
    ? { error: { code, message } }
    : { error: { code, message, details } };
}

export function appErrorResponse(error: AppError): ApiErrorResponse {
  return createErrorResponse(error.code, error.message, error.details);
}

/**
 * One entry per zod issue, keyed by the dotted path into the request
 * (`body.totalQuantity`, `params.id`)
 */
function describeZodError(error: ZodError): FieldError[] {
  return error.issues.map((issue) => ({
    field: issue.path.join('.'),
    message: issue.message,
  }));
}

export function validationErrorResponse(error: ZodError): ApiErrorResponse {
  return createErrorResponse(ErrorCode.VALIDATION_ERROR, 'Validation failed', {
    errors: describeZodError(error),
  });
}
