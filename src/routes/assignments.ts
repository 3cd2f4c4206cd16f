// =============================================================================
// COURSEWORK — Assignment Routes
//
//   GET    /                          list (any signed-in user)
//   GET    /mine                      the caller's own
//   POST   /                          create (teacher/admin)
//   POST   /import                    bulk CSV import (teacher/admin)
//   GET    /:id                       read, with the caller's permissions
//   PATCH  /:id                       update (owner/admin)
//   DELETE /:id                       delete (owner/admin)
//   POST   /:id/submissions           submit a file (any signed-in user)
//   GET    /:id/submissions           list (owner/admin)
//   POST   /:id/submissions/notify    resend pending notifications (owner/admin)
//   GET    /:id/submissions/:submissionId/file   download (owner/admin)
// =============================================================================

import { Router, Request, Response, NextFunction, RequestHandler } from 'express';
import multer from 'multer';
import { NotFound } from '../errors';
import { currentPrincipal } from '../middleware/authenticate';
import { requireOperation } from '../middleware/role-guard';
import { AssignmentService } from '../services/assignments';
import { AssignmentImporter } from '../services/ingestion';
import { bulkUploadForm } from '../services/pipeline/forms';
import { validateOrThrow } from '../services/pipeline/validate';
import { PrincipalRegistry } from '../services/registry';
import { SubmissionService } from '../services/submissions';
import { bodyFields, param, uploadedFile } from './helpers';

export interface AssignmentRouterDeps {
  assignments: AssignmentService;
  importer: AssignmentImporter;
  submissions: SubmissionService;
  registry: PrincipalRegistry;
  authenticate: RequestHandler;
  importMaxBytes: number;
  submissionMaxBytes: number;
}

/** Multer's hard cap sits above the form limit so the form reports size. */
function memoryUpload(maxBytes: number): multer.Multer {
  return multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: maxBytes * 2, files: 1 },
  });
}

export function createAssignmentRouter(deps: AssignmentRouterDeps): Router {
  const { assignments, importer, submissions, registry } = deps;
  const router = Router();
  const csvUpload = memoryUpload(deps.importMaxBytes);
  const submissionUpload = memoryUpload(deps.submissionMaxBytes);

  router.use(deps.authenticate);

  router.get('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      res.json({ assignments: await assignments.list(currentPrincipal(req)) });
    } catch (err) {
      next(err);
    }
  });

  router.get('/mine', async (req: Request, res: Response, next: NextFunction) => {
    try {
      res.json({ assignments: await assignments.listMine(currentPrincipal(req)) });
    } catch (err) {
      next(err);
    }
  });

  router.post(
    '/',
    requireOperation('assignment.create'),
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const assignment = await assignments.create(currentPrincipal(req), bodyFields(req));
        res.status(201).json({ assignment });
      } catch (err) {
        next(err);
      }
    },
  );

  /**
   * POST /api/assignments/import
   * multipart/form-data: csv_file, optional ownerId (admins importing for
   * a teacher). Answers with the import report; row failures do not make
   * the request fail.
   */
  router.post(
    '/import',
    requireOperation('assignment.import'),
    csvUpload.single('csv_file'),
    async (req: Request, res: Response, next: NextFunction) => {
      // Stop scheduling rows once the client has gone away
      const controller = new AbortController();
      res.on('close', () => {
        if (!res.writableFinished) controller.abort();
      });

      try {
        const actor = currentPrincipal(req);
        const { csv_file: file } = await validateOrThrow(bulkUploadForm(deps.importMaxBytes), {
          csv_file: uploadedFile(req),
        });

        const fields = bodyFields(req);
        const ownerId =
          typeof fields.ownerId === 'string' && fields.ownerId.trim() !== ''
            ? fields.ownerId.trim()
            : undefined;
        if (ownerId !== undefined && ownerId !== actor.id && !(await registry.findById(ownerId))) {
          throw new NotFound('Owner');
        }

        const report = await importer.importSource(file.buffer, actor, {
          ownerId,
          signal: controller.signal,
        });
        res.json({ report });
      } catch (err) {
        next(err);
      }
    },
  );

  router.get('/:id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const actor = currentPrincipal(req);
      const assignment = await assignments.get(actor, param(req, 'id'));
      res.json({ assignment, permissions: assignments.permissions(actor, assignment) });
    } catch (err) {
      next(err);
    }
  });

  router.patch(
    '/:id',
    requireOperation('assignment.update'),
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const assignment = await assignments.update(currentPrincipal(req), param(req, 'id'), bodyFields(req));
        res.json({ assignment });
      } catch (err) {
        next(err);
      }
    },
  );

  router.delete(
    '/:id',
    requireOperation('assignment.delete'),
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        await assignments.remove(currentPrincipal(req), param(req, 'id'));
        res.status(204).end();
      } catch (err) {
        next(err);
      }
    },
  );

  // ── Submissions ─────────────────────────────────────────────────────

  router.post(
    '/:id/submissions',
    submissionUpload.single('file'),
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const submission = await submissions.submit(currentPrincipal(req), param(req, 'id'), {
          ...bodyFields(req),
          file: uploadedFile(req),
        });
        res.status(201).json({ submission });
      } catch (err) {
        next(err);
      }
    },
  );

  router.get(
    '/:id/submissions',
    requireOperation('submission.list'),
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const list = await submissions.listForAssignment(currentPrincipal(req), param(req, 'id'));
        res.json({ submissions: list });
      } catch (err) {
        next(err);
      }
    },
  );

  router.post(
    '/:id/submissions/notify',
    requireOperation('submission.notify'),
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const result = await submissions.resendPending(currentPrincipal(req), param(req, 'id'));
        res.json(result);
      } catch (err) {
        next(err);
      }
    },
  );

  router.get(
    '/:id/submissions/:submissionId/file',
    requireOperation('submission.list'),
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const { file, content } = await submissions.downloadFile(
          currentPrincipal(req),
          param(req, 'id'),
          param(req, 'submissionId'),
        );
        res.attachment(file.originalName);
        res.type(file.mimeType);
        res.send(content);
      } catch (err) {
        next(err);
      }
    },
  );

  return router;
}
