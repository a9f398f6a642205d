/**
 * Error handling middleware - the single place where errors become responses.
 * Resolves whatever a route handler raised to an HttpError, records it on the
 * request for the request logger, and writes the JSON error envelope.
 */

import type { ErrorRequestHandler, NextFunction, Request, RequestHandler, Response } from 'express';
import { coerceError } from '../../shared/errors/coerce';
import { HttpError } from '../../shared/errors/httpError';
import { ErrorCode } from '../../shared/errors/types';
import '../types';

export interface ErrorHandlerOptions {
  /**
   * Maps an error to its response. Defaults to `coerceError`; pass
   * `(err) => registry.resolve(err)` to use a ResponseErrorRegistry.
   */
  resolve?: (err: unknown) => HttpError;
}

/**
 * Centralized error handler middleware. Register it after every route.
 */
export function errorHandler(options: ErrorHandlerOptions = {}): ErrorRequestHandler {
  const resolve = options.resolve ?? coerceError;

  return (err: unknown, req: Request, res: Response, next: NextFunction): void => {
    // Too late to send an error body; let Express close the connection
    if (res.headersSent) {
      next(err);
      return;
    }

    const httpError = resolve(err);
    req.resolvedError = httpError;
    res.status(httpError.statusCode).json(httpError.toEnvelope());
  };
}

/**
 * Forward unmatched routes to the error handler as 404 NOT_FOUND
 */
export function notFoundHandler(): RequestHandler {
  return (req: Request, _res: Response, next: NextFunction): void => {
    next(
      new HttpError({
        statusCode: 404,
        code: ErrorCode.NOT_FOUND,
        message: 'Recurso não encontrado.',
        cause: `${req.method} ${req.originalUrl}`,
      })
    );
  };
}

/**
 * Async handler wrapper to catch errors in async route handlers
 * Forwards errors to the error handling middleware, keeping the matched
 * route params for the request log
 */
export const asyncHandler = (
  fn: (req: Request, res: Response, next: NextFunction) => void | Promise<void>
): RequestHandler => {
  return (req: Request, res: Response, next: NextFunction) => {
    const fail = (err: unknown): void => {
      req.routeParams = { ...req.params };
      next(err);
    };

    try {
      Promise.resolve(fn(req, res, next)).catch(fail);
    } catch (err) {
      fail(err);
    }
  };
};
