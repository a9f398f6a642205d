/**
 * Express request extensions used by the middleware.
 */

import type { HttpError } from '../shared/errors/httpError';

/**
 * The authenticated caller, as far as request logs are concerned
 */
export interface UserContext {
  email?: string;
  company?: string;
  companyCategory?: string;
  permissions?: readonly string[];
}

declare global {
  namespace Express {
    interface Request {
      user?: UserContext;
      /** The error response chosen by errorHandler for this request */
      resolvedError?: HttpError;
      /** Route params captured when a handler failed, before Express resets them */
      routeParams?: Record<string, string>;
    }
  }
}
