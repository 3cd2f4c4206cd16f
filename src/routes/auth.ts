// =============================================================================
// COURSEWORK — Authentication Routes
//
// Registration, login and the current session. Tokens are stateless
// JWTs; there is nothing to log out of server-side.
// User administration (list, role change) is admin-only.
// =============================================================================

import { Router, Request, Response, NextFunction, RequestHandler } from 'express';
import { z } from 'zod';
import { currentPrincipal } from '../middleware/authenticate';
import { requireOperation } from '../middleware/role-guard';
import { validateBody } from '../middleware/validate-body';
import { PrincipalRegistry, TokenSettings, issueToken } from '../services/registry';
import { bodyFields, param } from './helpers';

export interface AuthRouterDeps {
  registry: PrincipalRegistry;
  tokens: TokenSettings;
  authenticate: RequestHandler;
}

const loginSchema = z.object({
  username: z.string({ required_error: 'This field is required.' }).trim().min(1, 'This field is required.'),
  password: z.string({ required_error: 'This field is required.' }).min(1, 'This field is required.'),
});

export function createAuthRouter(deps: AuthRouterDeps): Router {
  const { registry, tokens, authenticate } = deps;
  const router = Router();

  /**
   * POST /api/auth/register
   * Self-service sign-up as teacher or student. Signs the new user in.
   */
  router.post('/register', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const user = await registry.register(bodyFields(req));
      console.log(`[Auth] Registered ${user.credentialRef} (${user.role})`);
      res.status(201).json({ token: issueToken(user, tokens), user });
    } catch (err) {
      next(err);
    }
  });

  /**
   * POST /api/auth/login
   * Username and password. Returns a bearer token.
   */
  router.post('/login', validateBody(loginSchema), async (req: Request, res: Response, next: NextFunction) => {
    try {
      const credentials = loginSchema.parse(req.body);
      const user = await registry.authenticate(credentials);
      res.json({ token: issueToken(user, tokens), user });
    } catch (err) {
      next(err);
    }
  });

  /**
   * GET /api/auth/session
   * The principal behind the bearer token.
   */
  router.get('/session', authenticate, (req: Request, res: Response, next: NextFunction) => {
    try {
      res.json({ user: currentPrincipal(req), sessionActive: true });
    } catch (err) {
      next(err);
    }
  });

  // ── User administration ─────────────────────────────────────────────

  router.get(
    '/users',
    authenticate,
    requireOperation('principal.list'),
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const users = await registry.list(currentPrincipal(req));
        res.json({ users });
      } catch (err) {
        next(err);
      }
    },
  );

  router.patch(
    '/users/:id/role',
    authenticate,
    requireOperation('principal.assignRole'),
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const user = await registry.assignRole(currentPrincipal(req), param(req, 'id'), bodyFields(req));
        res.json({ user });
      } catch (err) {
        next(err);
      }
    },
  );

  return router;
}
