/**
 * Request Logging Middleware
 *
 * Emits exactly one structured record per request, when the response
 * finishes (or the connection closes first). pino-http assigns the request
 * id and attaches the request-scoped `req.log` for handlers.
 *
 * Record layout:
 * - request_id: from X-Request-Id / X-Correlation-Id, else a fresh UUID
 * - duration_ms
 * - request: start_time, method, path, route, params, query (+ headers, user_agent)
 *   Params of failed requests are only known for handlers wrapped in asyncHandler.
 * - response: end_time, status, length
 * - user: email, company, company_category, permissions ("unknown" when absent)
 * - error: code, category, message, cause, details (only when errorHandler resolved one)
 *
 * Level: info below 400, warn for 4xx, error for 5xx.
 */

import pinoHttp from 'pino-http';
import { randomUUID } from 'crypto';
import type { NextFunction, Request, RequestHandler, Response } from 'express';
import type { IncomingMessage, ServerResponse } from 'http';
import type { Logger } from 'pino';
import { errorCategory } from '../../shared/errors/registry';
import type { HttpError } from '../../shared/errors/httpError';
import '../types';

export interface RequestLoggerOptions {
  logger: Logger;
  /** Include request headers and the user agent in each record */
  logHeaders?: boolean;
  /** Skip the record for matching requests (e.g. health probes) */
  ignore?: (req: Request) => boolean;
}

export const REQUEST_ID_HEADER = 'X-Request-ID';

const UNKNOWN = 'unknown';

type RecordLevel = 'info' | 'warn' | 'error';

/**
 * Reuse the caller's request id when present, otherwise generate one.
 * The id is echoed back on the response.
 */
function genReqId(req: IncomingMessage, res: ServerResponse): string {
  const existingId = req.headers['x-request-id'] ?? req.headers['x-correlation-id'];
  const id = typeof existingId === 'string' && existingId !== '' ? existingId : randomUUID();
  res.setHeader(REQUEST_ID_HEADER, id);
  return id;
}

/**
 * Determine log level based on status code
 */
export function levelForStatus(status: number): RecordLevel {
  if (status >= 500) {
    return 'error';
  }
  if (status >= 400) {
    return 'warn';
  }
  return 'info';
}

function routeOf(req: Request): string {
  const routePath: unknown = req.route?.path;
  return typeof routePath === 'string' ? `${req.baseUrl}${routePath}` : '';
}

function requestGroup(req: Request, start: Date, logHeaders: boolean): Record<string, unknown> {
  return {
    start_time: start.toISOString(),
    method: req.method,
    path: req.originalUrl.split('?')[0],
    route: routeOf(req),
    params: { ...(req.routeParams ?? req.params) },
    query: req.query,
    ...(logHeaders && {
      headers: { ...req.headers },
      user_agent: req.get('user-agent') ?? '',
    }),
  };
}

function responseGroup(res: Response, end: Date): Record<string, unknown> {
  const contentLength = Number(res.getHeader('content-length') ?? 0);
  return {
    end_time: end.toISOString(),
    status: res.statusCode,
    length: Number.isNaN(contentLength) ? 0 : contentLength,
  };
}

function userGroup(req: Request): Record<string, unknown> {
  const user = req.user;
  return {
    email: user?.email ?? UNKNOWN,
    company: user?.company ?? UNKNOWN,
    company_category: user?.companyCategory ?? UNKNOWN,
    permissions: user?.permissions ?? UNKNOWN,
  };
}

function errorGroup(error: HttpError): Record<string, unknown> {
  return {
    code: error.code,
    category: errorCategory(error.code),
    message: error.message,
    cause: error.causeText ?? '',
    details: [...error.details],
  };
}

/**
 * Request logging middleware. Register it first so every request, including
 * those rejected by body parsing, is recorded.
 */
export function requestLogger(options: RequestLoggerOptions): RequestHandler {
  const logHeaders = options.logHeaders ?? false;
  const httpLogger = pinoHttp({
    logger: options.logger,
    genReqId,
    autoLogging: false,
    quietReqLogger: true,
    customAttributeKeys: { reqId: 'request_id' },
  });

  return (req: Request, res: Response, next: NextFunction): void => {
    httpLogger(req, res);

    if (options.ignore?.(req)) {
      next();
      return;
    }

    const start = new Date();
    const log = options.logger.child({ request_id: req.id });
    let logged = false;

    const emit = (): void => {
      if (logged) return;
      logged = true;
      res.removeListener('finish', emit);
      res.removeListener('close', emit);

      const end = new Date();
      const error = req.resolvedError;
      const level = levelForStatus(res.statusCode);
      const message = error === undefined ? 'request completed' : `[${error.code}] ${error.message}`;

      log[level](
        {
          duration_ms: end.getTime() - start.getTime(),
          request: requestGroup(req, start, logHeaders),
          response: responseGroup(res, end),
          user: userGroup(req),
          ...(error !== undefined && { error: errorGroup(error) }),
        },
        message
      );
    };

    res.on('finish', emit);
    res.on('close', emit);
    next();
  };
}
