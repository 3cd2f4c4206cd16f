// =============================================================================
// COURSEWORK — Audit Routes
//
// Read-only access to the audit trail for admins. Each event is returned
// with the result of re-checking its hash.
// =============================================================================

import { Router, Request, Response, NextFunction, RequestHandler } from 'express';
import { requireOperation } from '../middleware/role-guard';
import { AuditTrail } from '../services/audit';

export interface AuditRouterDeps {
  audit: AuditTrail;
  authenticate: RequestHandler;
}

const DEFAULT_LIMIT = 50;
const MAX_LIMIT = 200;

function limitFrom(req: Request): number {
  const raw: unknown = req.query.limit;
  const parsed = typeof raw === 'string' ? parseInt(raw, 10) : NaN;
  if (!Number.isFinite(parsed) || parsed < 1) return DEFAULT_LIMIT;
  return Math.min(parsed, MAX_LIMIT);
}

export function createAuditRouter(deps: AuditRouterDeps): Router {
  const { audit } = deps;
  const router = Router();

  router.use(deps.authenticate);

  /**
   * GET /api/audit/events
   * Most recent first. `limit` defaults to 50, at most 200.
   */
  router.get(
    '/events',
    requireOperation('audit.read'),
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const events = await audit.recent(limitFrom(req));
        res.json({
          events: events.map((event) => ({ ...event, verified: AuditTrail.verify(event) })),
        });
      } catch (err) {
        next(err);
      }
    },
  );

  return router;
}
