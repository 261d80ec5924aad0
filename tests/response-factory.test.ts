import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import {
  appErrorResponse,
  createErrorResponse,
  createSuccessResponse,
  validationErrorResponse,
} from '../src/utils/response-factory';
import { AppError, ErrorCode } from '../src/types/error.types';

describe('response factory', () => {
  it('adds a message only when one is given', () => {
    expect(createSuccessResponse({ id: 1 })).toEqual({ data: { id: 1 } });
    expect(Object.keys(createSuccessResponse([]))).toEqual(['data']);
    expect(createSuccessResponse([], 'Event created')).toEqual({ data: [], message: 'Event created' });
  });

  it('leaves details out of an error without any', () => {
    expect(createErrorResponse('NOT_FOUND', 'Route GET /nowhere not found')).toEqual({
      error: { code: 'NOT_FOUND', message: 'Route GET /nowhere not found' },
    });
    expect(Object.keys(createErrorResponse(ErrorCode.INTERNAL_ERROR, 'Boom').error)).toEqual([
      'code',
      'message',
    ]);
  });

  it('carries an application error with its details', () => {
    const error = new AppError(ErrorCode.INSUFFICIENT_AVAILABLE, 'Not enough stock', 409, {
      requested: 6,
      available: 5,
    });

    expect(appErrorResponse(error)).toEqual({
      error: {
        code: 'INSUFFICIENT_AVAILABLE',
        message: 'Not enough stock',
        details: { requested: 6, available: 5 },
      },
    });
  });

  it('lists each failed field by its request path', () => {
    const schema = z.object({
      body: z.object({ totalQuantity: z.number({ invalid_type_error: 'Total quantity must be a number' }) }),
    });
    const parsed = schema.safeParse({ body: { totalQuantity: 'ten' } });

    expect(parsed.success).toBe(false);
    if (parsed.success) return;
    expect(validationErrorResponse(parsed.error)).toEqual({
      error: {
        code: 'VALIDATION_ERROR',
        message: 'Validation failed',
        details: {
          errors: [{ field: 'body.totalQuantity', message: 'Total quantity must be a number' }],
        },
      },
    });
  });
});
