/**
 * HTTP Error
 *
 * Presentation-layer error carrying an HTTP status, a stable code, a
 * client-facing message and optional validation details. Derived from a
 * ValidationErrors, a DomainError or any other error at the HTTP boundary.
 *
 * Wire format:
 *   { "error": { "code": "VALIDATION", "message": "validation failed",
 *                "details": ["Email é um campo obrigatório"], "status_code": 422 } }
 */

import { z } from 'zod';
import { findInChain, messageOf } from './chain';
import { assertNever, ErrorCode, isStructuredError, UNKNOWN_ERROR_MESSAGE } from './types';

// =============================================================================
// Wire Schemas
// =============================================================================

export const HttpErrorBodySchema = z.object({
  code: z.string().min(1),
  message: z.string(),
  details: z.array(z.string()).optional(),
  status_code: z.number().int().min(100).max(599),
  cause: z.string().optional(),
});

export const HttpErrorEnvelopeSchema = z.object({
  error: HttpErrorBodySchema,
});

export type HttpErrorBody = z.infer<typeof HttpErrorBodySchema>;
export type HttpErrorEnvelope = z.infer<typeof HttpErrorEnvelopeSchema>;

// =============================================================================
// HttpError
// =============================================================================

export interface HttpErrorInit {
  statusCode: number;
  code: string;
  message: string;
  details?: readonly string[];
  /** Operator-facing description of the underlying failure */
  cause?: string;
}

const DEFAULT_STATUS = 500;

export class HttpError extends Error {
  public readonly kind = 'http' as const;
  public readonly statusCode: number;
  public readonly code: string;
  public readonly details: readonly string[];
  public readonly causeText?: string;

  /**
   * @param source - the error this response was derived from, kept as `cause`
   */
  constructor(init: HttpErrorInit, source?: unknown) {
    super(init.message, source === undefined ? undefined : { cause: source });
    this.name = 'HttpError';
    this.statusCode = init.statusCode > 0 ? init.statusCode : DEFAULT_STATUS;
    this.code = init.code;
    this.details = [...(init.details ?? [])];
    this.causeText = init.cause;
  }

  /**
   * Build the response for `err` with the given status. The code, message and
   * details come from the first structured error in the chain; anything else
   * becomes an UNKNOWN error whose text is only kept as the cause.
   */
  static from(status: number | undefined, err: unknown): HttpError {
    const statusCode = status === undefined || status === 0 ? DEFAULT_STATUS : status;
    const source = findInChain(err, isStructuredError);

    if (source !== undefined) {
      switch (source.kind) {
        case 'validation':
          return new HttpError(
            {
              statusCode,
              code: ErrorCode.VALIDATION,
              message: source.message,
              details: source.validations,
            },
            err
          );
        case 'domain':
          if (source.code !== '') {
            return new HttpError(
              {
                statusCode,
                code: source.code,
                message: source.text,
                details: source.details,
                cause: source.causeMessage === '' ? undefined : source.causeMessage,
              },
              err
            );
          }
          break;
        default:
          return assertNever(source);
      }
    }

    return new HttpError(
      {
        statusCode,
        code: ErrorCode.UNKNOWN,
        message: UNKNOWN_ERROR_MESSAGE,
        cause: err === undefined ? 'unknown error' : messageOf(err),
      },
      err
    );
  }

  /**
   * Rebuild an HttpError from its JSON envelope
   * @throws ZodError when the payload does not match the envelope
   */
  static fromEnvelope(payload: unknown): HttpError {
    const { error } = HttpErrorEnvelopeSchema.parse(payload);
    return new HttpError({
      statusCode: error.status_code,
      code: error.code,
      message: error.message,
      details: error.details,
      cause: error.cause,
    });
  }

  withStatus(statusCode: number): HttpError {
    return new HttpError(
      {
        statusCode,
        code: this.code,
        message: this.message,
        details: this.details,
        cause: this.causeText,
      },
      this.cause
    );
  }

  isClientError(): boolean {
    return this.statusCode >= 400 && this.statusCode < 500;
  }

  isServerError(): boolean {
    return this.statusCode >= 500;
  }

  toJSON(): HttpErrorBody {
    return {
      code: this.code,
      message: this.message,
      ...(this.details.length > 0 && { details: [...this.details] }),
      status_code: this.statusCode,
      ...(this.causeText !== undefined && { cause: this.causeText }),
    };
  }

  toEnvelope(): HttpErrorEnvelope {
    return { error: this.toJSON() };
  }

  toString(): string {
    if (this.details.length > 0) {
      return `[${this.code}] ${this.message} (${this.details.join(',')})`;
    }
    return `[${this.code}] ${this.message}`;
  }
}

export function isHttpError(err: unknown): err is HttpError {
  return err instanceof HttpError;
}

// =============================================================================
// Factories
// =============================================================================
//
// Each factory takes an optional code. Without it, the code and message come
// from the error as in `HttpError.from`. With it, the caller's code replaces
// the derived one and an unstructured error keeps its own message:
//
//   httpNotFound(new Error('user with ID 7 not found'), 'user-not-found')
//   // [user-not-found] user with ID 7 not found

function fromWithCode(statusCode: number, err: unknown, code?: string): HttpError {
  const derived = HttpError.from(statusCode, err);
  if (code === undefined || code === '') {
    return derived;
  }

  if (derived.code === ErrorCode.UNKNOWN) {
    return new HttpError(
      { statusCode, code, message: err === undefined ? 'unknown error' : messageOf(err) },
      err
    );
  }
  return new HttpError(
    { statusCode, code, message: derived.message, details: derived.details, cause: derived.causeText },
    err
  );
}

export function httpBadRequest(err: unknown, code?: string): HttpError {
  return fromWithCode(400, err, code);
}

export function httpUnauthorized(err: unknown, code?: string): HttpError {
  return fromWithCode(401, err, code);
}

export function httpForbidden(err: unknown, code?: string): HttpError {
  return fromWithCode(403, err, code);
}

export function httpNotFound(err: unknown, code?: string): HttpError {
  return fromWithCode(404, err, code);
}

export function httpConflict(err: unknown, code?: string): HttpError {
  return fromWithCode(409, err, code);
}

export function httpUnprocessableEntity(err: unknown, code?: string): HttpError {
  return fromWithCode(422, err, code);
}

export function httpInternalServerError(err: unknown, code?: string): HttpError {
  return fromWithCode(500, err, code);
}
