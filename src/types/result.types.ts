import { AppError, ErrorCode, statusForCode } from './error.types';

/**
 * Outcome of a core operation.
 *
 * Expected business conditions (not enough stock, unknown id, closed event)
 * come back as a failed result instead of an exception, so callers can chain
 * several attempts without unwinding.
 */
export type Result<T> = Success<T> | Failure;

export interface Success<T> {
  ok: true;
  value: T;
}

export interface Failure {
  ok: false;
  code: ErrorCode;
  message: string;
  details?: Record<string, unknown>;
}

export function succeed<T>(value: T): Success<T> {
  return { ok: true, value };
}

export function fail(
  code: ErrorCode,
  message: string,
  details?: Record<string, unknown>
): Failure {
  return details ? { ok: false, code, message, details } : { ok: false, code, message };
}

/**
 * Unwrap a result at the HTTP boundary, turning a failure into an AppError
 */
export function unwrap<T>(result: Result<T>): T {
  if (!result.ok) {
    throw new AppError(result.code, result.message, statusForCode(result.code), result.details);
  }
  return result.value;
}
