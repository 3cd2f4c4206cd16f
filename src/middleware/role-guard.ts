// =============================================================================
// COURSEWORK — Role Guard Middleware
//
// Route-level use of the authorization guard: requireOperation('assignment.create').
// Must be mounted AFTER authenticate. Services check again with the same
// guard, so this only rejects early.
// =============================================================================

import { Request, Response, NextFunction, RequestHandler } from 'express';
import { Operation, requireOperation as guardOperation } from '../authorization/guard';
import { currentPrincipal } from './authenticate';

export function requireOperation(operation: Operation): RequestHandler {
  return (req: Request, _res: Response, next: NextFunction) => {
    try {
      guardOperation(currentPrincipal(req), operation);
      next();
    } catch (err) {
      next(err);
    }
  };
}
