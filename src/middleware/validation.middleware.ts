import { Request, Response, NextFunction } from 'express';
import { AnyZodObject, z } from 'zod';
import { validationErrorResponse } from '../utils/response-factory';

/**
 * Validation middleware factory
 *
 * Validates request data (body, params, query) against a Zod schema
 *
 * Usage:
 * ```typescript
 * router.post('/events', validate(createEventSchema), eventController.createEvent);
 * ```
 */
export const validate = (schema: AnyZodObject) => {
  return (req: Request, res: Response, next: NextFunction): void => {
    const result = schema.safeParse({
      body: req.body,
      params: req.params,
      query: req.query,
    });

    if (result.success) {
      next();
      return;
    }

    res.status(400).json(validationErrorResponse(result.error));
  };
};

/**
 * Parse the request against the same schema its route validated, for typed
 * access inside a controller
 */
export function parseRequest<S extends AnyZodObject>(schema: S, req: Request): z.infer<S> {
  return schema.parse({
    body: req.body,
    params: req.params,
    query: req.query,
  });
}
