/**
 * Error types and codes
 */

// Standard error codes
export enum ErrorCode {
  // Validation errors (400)
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  INVALID_QUANTITY = 'INVALID_QUANTITY',
  NEGATIVE_QUANTITY = 'NEGATIVE_QUANTITY',
  INVALID_DATE = 'INVALID_DATE',
  INVALID_TIME = 'INVALID_TIME',
  PASSWORD_TOO_SHORT = 'PASSWORD_TOO_SHORT',

  // Auth errors (401/403)
  UNAUTHORIZED = 'UNAUTHORIZED',
  FORBIDDEN = 'FORBIDDEN',

  // Not found errors (404)
  EVENT_NOT_FOUND = 'EVENT_NOT_FOUND',
  ITEM_NOT_FOUND = 'ITEM_NOT_FOUND',
  ATTENDEE_NOT_FOUND = 'ATTENDEE_NOT_FOUND',
  USER_NOT_FOUND = 'USER_NOT_FOUND',
  NOT_REGISTERED = 'NOT_REGISTERED',
  NOT_ALLOCATED = 'NOT_ALLOCATED',

  // Capacity / conflict errors (409)
  INSUFFICIENT_AVAILABLE = 'INSUFFICIENT_AVAILABLE',
  OVER_DEALLOCATION = 'OVER_DEALLOCATION',
  BELOW_ALLOCATED = 'BELOW_ALLOCATED',
  REGISTRATION_CLOSED = 'REGISTRATION_CLOSED',
  USERNAME_TAKEN = 'USERNAME_TAKEN',
  SELF_DELETION = 'SELF_DELETION',

  // Load-time diagnostics
  MALFORMED_RECORD = 'MALFORMED_RECORD',

  // Server errors (500)
  STORAGE_ERROR = 'STORAGE_ERROR',
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

const STATUS_BY_CODE: Record<ErrorCode, number> = {
  [ErrorCode.VALIDATION_ERROR]: 400,
  [ErrorCode.INVALID_QUANTITY]: 400,
  [ErrorCode.NEGATIVE_QUANTITY]: 400,
  [ErrorCode.INVALID_DATE]: 400,
  [ErrorCode.INVALID_TIME]: 400,
  [ErrorCode.PASSWORD_TOO_SHORT]: 400,
  [ErrorCode.UNAUTHORIZED]: 401,
  [ErrorCode.FORBIDDEN]: 403,
  [ErrorCode.EVENT_NOT_FOUND]: 404,
  [ErrorCode.ITEM_NOT_FOUND]: 404,
  [ErrorCode.ATTENDEE_NOT_FOUND]: 404,
  [ErrorCode.USER_NOT_FOUND]: 404,
  [ErrorCode.NOT_REGISTERED]: 404,
  [ErrorCode.NOT_ALLOCATED]: 404,
  [ErrorCode.INSUFFICIENT_AVAILABLE]: 409,
  [ErrorCode.OVER_DEALLOCATION]: 409,
  [ErrorCode.BELOW_ALLOCATED]: 409,
  [ErrorCode.REGISTRATION_CLOSED]: 409,
  [ErrorCode.USERNAME_TAKEN]: 409,
  [ErrorCode.SELF_DELETION]: 409,
  [ErrorCode.MALFORMED_RECORD]: 422,
  [ErrorCode.STORAGE_ERROR]: 500,
  [ErrorCode.INTERNAL_ERROR]: 500,
};

/**
 * HTTP status for an error code
 */
export function statusForCode(code: ErrorCode): number {
  return STATUS_BY_CODE[code];
}

// Custom application error class
export class AppError extends Error {
  constructor(
    public code: ErrorCode | string,
    message: string,
    public statusCode: number = 500,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AppError';
    Error.captureStackTrace(this, this.constructor);
  }
}
