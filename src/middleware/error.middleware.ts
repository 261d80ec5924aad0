import { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { AppError, ErrorCode } from '../types/error.types';
import {
  appErrorResponse,
  createErrorResponse,
  validationErrorResponse,
} from '../utils/response-factory';
import { redactBody } from '../utils/redact';
import { logger } from '../config/logger';

/**
 * Global error handling middleware
 *
 * Catches all errors and returns consistent error responses
 */
export const errorHandler = (err: Error, req: Request, res: Response, _next: NextFunction) => {
  // AppError (known application errors)
  if (err instanceof AppError) {
    const meta = { code: err.code, error: err.message, path: req.path, method: req.method };
    if (err.statusCode >= 500) {
      logger.error('Request failed', meta);
    } else {
      logger.warn('Request failed', meta);
    }
    return res.status(err.statusCode).json(appErrorResponse(err));
  }

  // Zod validation errors
  if (err instanceof ZodError) {
    return res.status(400).json(validationErrorResponse(err));
  }

  // Body parser rejects malformed JSON with a SyntaxError
  if (err instanceof SyntaxError) {
    return res
      .status(400)
      .json(createErrorResponse(ErrorCode.VALIDATION_ERROR, 'Malformed JSON body'));
  }

  logger.error('Unhandled error', {
    error: err.message,
    stack: err.stack,
    path: req.path,
    method: req.method,
    body: redactBody(req.body),
  });

  // Unknown errors - don't expose internals
  return res
    .status(500)
    .json(createErrorResponse(ErrorCode.INTERNAL_ERROR, 'An unexpected error occurred'));
};

/**
 * 404 Not Found handler
 */
export const notFoundHandler = (req: Request, res: Response) => {
  res
    .status(404)
    .json(createErrorResponse('NOT_FOUND', `Route ${req.method} ${req.path} not found`));
};
