// =============================================================================
// COURSEWORK — Body Validation for fixed-shape JSON
//
// Form payloads go through the validation pipeline; bodies with a fixed
// machine shape (login) are checked here, at the HTTP edge.
// =============================================================================

import { Request, Response, NextFunction, RequestHandler } from 'express';
import { ZodSchema } from 'zod';
import { ValidationFailed } from '../errors';
import { RECORD_KEY } from '../types/pipeline';

export function validateBody(schema: ZodSchema): RequestHandler {
  return (req: Request, _res: Response, next: NextFunction) => {
    const result = schema.safeParse(req.body);
    if (!result.success) {
      const errors: Record<string, string> = {};
      for (const issue of result.error.issues) {
        const head = issue.path[0];
        const key = typeof head === 'string' ? head : RECORD_KEY;
        if (!(key in errors)) errors[key] = issue.message;
      }
      next(new ValidationFailed(errors));
      return;
    }
    req.body = result.data;
    next();
  };
}
