/**
 * Request Validation Middleware Factory
 * Layer: Interfaces (HTTP)
 *
 * `validate(schema, source)` returns a middleware that checks one part of the
 * request against a Zod schema before the controller runs:
 *
 *   router.get('/:swiftCode', validate(swiftCodeParamsSchema, 'params'), controller.getByCode);
 *   router.post('/', validate(createSwiftCodeBodySchema, 'body'), controller.create);
 *
 * On failure the issue messages are joined with "; " into a ValidationError
 * (400) for the global error handler. On success a validated body replaces
 * `req.body`, so defaults and trimming reach the controller. Params are only
 * checked: Express 5 exposes them read-only per route match, and the schemas
 * for them do not transform.
 */
import { ValidationError } from '@shared/errors/AppError';
import type { NextFunction, Request, Response } from 'express';
import type { z } from 'zod/v4';

export function validate<T extends z.ZodType>(schema: T, source: 'body' | 'params') {
  return (req: Request, _res: Response, next: NextFunction): void => {
    const result = schema.safeParse(req[source]);

    if (!result.success) {
      const messages = result.error.issues.map((issue) => issue.message).join('; ');
      throw new ValidationError(messages);
    }

    if (source === 'body') {
      req.body = result.data;
    }
    next();
  };
}
