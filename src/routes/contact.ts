// =============================================================================
// COURSEWORK — Contact Route
// =============================================================================

import { Router, Request, Response, NextFunction } from 'express';
import { ContactService } from '../services/notifications';
import { bodyFields } from './helpers';

export function createContactRouter(contact: ContactService): Router {
  const router = Router();

  /**
   * POST /api/contact
   * name, email, message. Sent to the staff recipient.
   */
  router.post('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      await contact.send(bodyFields(req));
      res.json({ message: 'Your message has been sent.' });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
