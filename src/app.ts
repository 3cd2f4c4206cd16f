// =============================================================================
// COURSEWORK — HTTP Application
//
//   /api/health            — Health check (unauthenticated)
//   /api/auth/*            — Registration, login, session, user admin
//   /api/assignments/*     — Assignments, bulk import, submissions
//   /api/contact           — Contact form
//   /api/audit/events      — Audit trail (admin)
//
// createApp has no side effects: every collaborator and limit comes in
// through its arguments, so tests build isolated instances.
// =============================================================================

import express, { Express } from 'express';
import helmet from 'helmet';
import cors from 'cors';
import rateLimit from 'express-rate-limit';
import { authenticate } from './middleware/authenticate';
import { errorHandler, notFound, requestId, requestSanitization } from './middleware/security';
import { createAssignmentRouter } from './routes/assignments';
import { createAuditRouter } from './routes/audit';
import { createAuthRouter } from './routes/auth';
import { createContactRouter } from './routes/contact';
import { Services } from './services';

export interface AppOptions {
  jwtSecret: string;
  jwtExpirySeconds: number;
  importMaxBytes: number;
  submissionMaxBytes: number;
  rateLimitAuthMax: number;
  rateLimitApiMax: number;
  /** `*` or a list of allowed origins */
  corsOrigin: string | string[];
  version: string;
  /** Database check for the health endpoint; omitted means no database */
  ping?: () => Promise<void>;
}

export function createApp(services: Services, options: AppOptions): Express {
  const app = express();

  // ── Security Middleware ──────────────────────────────────────────────

  app.disable('x-powered-by');
  app.use(helmet());
  app.use(cors({ origin: options.corsOrigin, credentials: options.corsOrigin !== '*' }));
  app.use(express.json({ limit: '1mb' }));
  app.use(express.urlencoded({ extended: false, limit: '1mb' }));
  app.use(requestId());
  app.use(requestSanitization());

  const authLimiter = rateLimit({
    windowMs: 15 * 60 * 1000, // 15 minutes
    limit: options.rateLimitAuthMax,
    message: { error: 'Too many attempts. Try again later.', code: 'RATE_LIMITED' },
    standardHeaders: true,
    legacyHeaders: false,
  });

  const apiLimiter = rateLimit({
    windowMs: 1 * 60 * 1000, // 1 minute
    limit: options.rateLimitApiMax,
    message: { error: 'Too many requests', code: 'RATE_LIMITED' },
    standardHeaders: true,
    legacyHeaders: false,
  });

  const requireAuth = authenticate(services.registry, options.jwtSecret);

  // ── Routes ───────────────────────────────────────────────────────────

  const startTime = Date.now();

  app.get('/api/health', async (_req, res) => {
    const checks: Record<string, { status: string; latencyMs?: number }> = {};

    if (options.ping) {
      const dbStart = Date.now();
      try {
        await options.ping();
        checks.database = { status: 'healthy', latencyMs: Date.now() - dbStart };
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        console.error('[Server] Health check failed:', message);
        checks.database = { status: 'unhealthy', latencyMs: Date.now() - dbStart };
      }
    } else {
      checks.database = { status: 'not_configured' };
    }

    const healthy = checks.database.status !== 'unhealthy';
    res.status(healthy ? 200 : 503).json({
      status: healthy ? 'healthy' : 'degraded',
      service: 'coursework',
      version: options.version,
      uptime: Math.floor((Date.now() - startTime) / 1000),
      checks,
      timestamp: new Date().toISOString(),
    });
  });

  app.use(
    '/api/auth',
    authLimiter,
    createAuthRouter({
      registry: services.registry,
      tokens: { secret: options.jwtSecret, expirySeconds: options.jwtExpirySeconds },
      authenticate: requireAuth,
    }),
  );

  app.use(
    '/api/assignments',
    apiLimiter,
    createAssignmentRouter({
      assignments: services.assignments,
      importer: services.importer,
      submissions: services.submissions,
      registry: services.registry,
      authenticate: requireAuth,
      importMaxBytes: options.importMaxBytes,
      submissionMaxBytes: options.submissionMaxBytes,
    }),
  );

  app.use('/api/contact', authLimiter, createContactRouter(services.contact));

  app.use('/api/audit', apiLimiter, createAuditRouter({ audit: services.audit, authenticate: requireAuth }));

  app.use(notFound());
  app.use(errorHandler());

  return app;
}
