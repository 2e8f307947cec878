import type { NextFunction, Request, Response } from 'express';
import { ZodError, type ZodTypeAny } from 'zod';
import { InvalidInputError } from '../errors.js';

/**
 * Parses `req.body` with the schema; failures reach the error handler as
 * InvalidInputError.
 */
export function validate(schema: ZodTypeAny) {
  return (req: Request, _res: Response, next: NextFunction) => {
    try {
      req.body = schema.parse(req.body);
      next();
    } catch (error) {
      if (error instanceof ZodError) {
        const details = error.issues
          .map(issue => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
          .join('; ');
        next(new InvalidInputError(details, 'request'));
      } else {
        next(error);
      }
    }
  };
}
