// =============================================================================
// COURSEWORK — Bearer Tokens
//
// Stateless JWTs carrying only the principal id. The principal itself is
// re-read from the registry on every request, so a role change takes
// effect on the next call.
// =============================================================================

import jwt from 'jsonwebtoken';
import { AuthenticationRequired } from '../../errors';
import { Principal } from '../../types/records';

export interface TokenSettings {
  secret: string;
  expirySeconds: number;
}

export function issueToken(principal: Principal, settings: TokenSettings): string {
  return jwt.sign({ sub: principal.id, role: principal.role }, settings.secret, {
    expiresIn: settings.expirySeconds,
  });
}

/** Returns the principal id the token was issued to. */
export function verifyToken(token: string, secret: string): string {
  try {
    const payload = jwt.verify(token, secret);
    if (typeof payload === 'string' || typeof payload.sub !== 'string') {
      throw new AuthenticationRequired('Invalid token');
    }
    return payload.sub;
  } catch (err) {
    if (err instanceof jwt.TokenExpiredError) {
      throw new AuthenticationRequired('Token expired');
    }
    if (err instanceof jwt.JsonWebTokenError) {
      throw new AuthenticationRequired('Invalid token');
    }
    throw err;
  }
}
