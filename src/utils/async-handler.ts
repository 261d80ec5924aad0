import { Request, Response, NextFunction, RequestHandler } from 'express';

type Handler = (req: Request, res: Response, next: NextFunction) => void | Promise<void>;

/**
 * Handler wrapper
 *
 * Wraps route handlers and passes thrown errors and rejected promises to the
 * Express error middleware
 *
 * Usage:
 * ```typescript
 * router.post('/events', asyncHandler((req, res) => {
 *   const event = eventService.createEvent(req.body);
 *   res.status(201).json(createSuccessResponse(event));
 * }));
 * ```
 */
export const asyncHandler = (fn: Handler): RequestHandler => {
  return (req: Request, res: Response, next: NextFunction) => {
    try {
      Promise.resolve(fn(req, res, next)).catch(next);
    } catch (error) {
      next(error);
    }
  };
};
