// =============================================================================
// COURSEWORK — Authentication Middleware
//
// Verifies the bearer JWT and attaches the principal, freshly read from
// the registry, to the request. A deleted account or a changed role takes
// effect on the next request.
// =============================================================================

import { Request, Response, NextFunction, RequestHandler } from 'express';
import { AuthenticationRequired } from '../errors';
import { PrincipalRegistry, verifyToken } from '../services/registry';
import { Principal } from '../types/records';
import '../types/express';

export function authenticate(registry: PrincipalRegistry, secret: string): RequestHandler {
  return (req: Request, _res: Response, next: NextFunction) => {
    const authHeader = req.headers.authorization;
    if (!authHeader?.startsWith('Bearer ')) {
      next(new AuthenticationRequired());
      return;
    }

    let principalId: string;
    try {
      principalId = verifyToken(authHeader.slice(7), secret);
    } catch (err) {
      next(err);
      return;
    }

    registry
      .findById(principalId)
      .then((principal) => {
        if (!principal) {
          next(new AuthenticationRequired('Account no longer exists'));
          return;
        }
        req.principal = principal;
        next();
      })
      .catch(next);
  };
}

/**
 * The authenticated principal. Throws when a route forgot to mount
 * authenticate in front of the handler.
 */
export function currentPrincipal(req: Request): Principal {
  if (!req.principal) {
    throw new AuthenticationRequired();
  }
  return req.principal;
}
