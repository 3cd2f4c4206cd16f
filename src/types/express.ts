// =============================================================================
// COURSEWORK — Express Request Augmentation
// =============================================================================

import { Principal } from './records';

declare global {
  namespace Express {
    interface Request {
      /** Set by authenticate; re-read from the registry on every request */
      principal?: Principal;
      requestId?: string;
    }
  }
}

export {};
