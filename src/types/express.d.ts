// src/types/express.d.ts

import type { Session } from "../middleware/session";

/**
 * Express request augmentation used by the built-in layers.
 * - session: set by sessionMiddleware when sessions are configured
 * - csrfToken: set by csrfMiddleware (current valid token)
 */
declare global {
  namespace Express {
    interface Request {
      session?: Session;
      csrfToken?: string;
    }
  }
}

export {};
