/**
 * User Context Middleware
 *
 * Attaches the caller's identity to `req.user` so request logs can report
 * who made each request. The extractor decides where the identity comes
 * from (a verified token, a gateway header, a session); when it throws, the
 * error goes to the error handler.
 */

import type { Request, RequestHandler } from 'express';
import { asyncHandler } from './errorHandler';
import type { UserContext } from '../types';

export type UserExtractor = (req: Request) => UserContext | undefined | Promise<UserContext | undefined>;

export function userContext(extract: UserExtractor): RequestHandler {
  return asyncHandler(async (req, _res, next) => {
    const user = await extract(req);
    if (user !== undefined) {
      req.user = user;
    }
    next();
  });
}

function headerValue(req: Request, name: string): string | undefined {
  const value = req.get(name);
  return value === undefined || value === '' ? undefined : value;
}

/**
 * Read the identity forwarded by an authenticating gateway:
 * X-User-Email, X-User-Company, X-User-Company-Category and
 * X-User-Permissions (comma separated)
 */
export function userFromHeaders(req: Request): UserContext | undefined {
  const email = headerValue(req, 'x-user-email');
  if (email === undefined) {
    return undefined;
  }

  const permissions = headerValue(req, 'x-user-permissions');
  return {
    email,
    company: headerValue(req, 'x-user-company'),
    companyCategory: headerValue(req, 'x-user-company-category'),
    permissions: permissions
      ?.split(',')
      .map((permission) => permission.trim())
      .filter(Boolean),
  };
}
