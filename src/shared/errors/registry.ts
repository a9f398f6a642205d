/**
 * Response Error Registry
 *
 * Maps sentinel errors to canonical HTTP responses so a service can declare,
 * in one place, which code and status each of its known failures produces.
 *
 *   const registry = new ResponseErrorRegistry()
 *     .register(ErrUserNotFound, 'ERR-N001', 404)
 *     .register(ErrEmailTaken, 'ERR-B002', 409);
 *
 *   app.use(errorHandler({ resolve: (err) => registry.resolve(err) }));
 *
 * Build it once at startup; it is read-only afterwards.
 */

import { findInChain, messageOf, unwrapChain } from './chain';
import { coerceError } from './coerce';
import { DomainError } from './domainError';
import { HttpError, isHttpError } from './httpError';
import { ErrorCode } from './types';
import { isValidationErrors } from './validationErrors';

interface RegistryEntry {
  code: string;
  statusCode: number;
}

export type ErrorCategory =
  | 'validation'
  | 'business'
  | 'notfound'
  | 'badrequest'
  | 'permission'
  | 'authentication'
  | 'internal'
  | 'external'
  | 'unknown';

const CATEGORY_BY_LETTER: Record<string, ErrorCategory> = {
  V: 'validation',
  B: 'business',
  N: 'notfound',
  R: 'badrequest',
  P: 'permission',
  A: 'authentication',
  I: 'internal',
  E: 'external',
};

/**
 * Category encoded in the fifth character of codes like `ERR-V001`
 */
export function errorCategory(code: string): ErrorCategory {
  if (code.length < 5) {
    return 'unknown';
  }
  return CATEGORY_BY_LETTER[code.charAt(4)] ?? 'unknown';
}

const UNPROCESSABLE_STATUS = 422;

export class ResponseErrorRegistry {
  private readonly entries = new Map<Error, RegistryEntry>();

  /**
   * Associate a sentinel with a response code and status (default 500).
   * A derived DomainError registers its sentinel. An empty code is ignored.
   */
  register(sentinel: Error, code: string, statusCode = 500): this {
    if (code === '') {
      return this;
    }
    const key = sentinel instanceof DomainError ? sentinel.origin : sentinel;
    this.entries.set(key, { code, statusCode });
    return this;
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Resolve an error to its canonical response. The first registered
   * sentinel found in the chain wins; unmatched errors fall back to a
   * validation response when details exist, else to `coerceError`.
   */
  resolve(err: unknown): HttpError {
    const passthrough = findInChain(err, isHttpError);
    if (passthrough !== undefined) {
      return passthrough;
    }

    const validationErrors = findInChain(err, isValidationErrors);
    const details = validationErrors?.validations ?? [];

    for (const candidate of unwrapChain(err)) {
      const entry = this.lookup(candidate);
      if (entry === undefined) {
        continue;
      }
      return new HttpError(
        {
          statusCode: entry.statusCode,
          code: entry.code,
          message: candidate instanceof DomainError ? candidate.text : messageOf(candidate),
          details,
          cause: describeCause(err, candidate),
        },
        err
      );
    }

    if (validationErrors !== undefined && details.length > 0) {
      return new HttpError(
        {
          statusCode: UNPROCESSABLE_STATUS,
          code: ErrorCode.VALIDATION,
          message: validationErrors.message,
          details,
        },
        err
      );
    }

    return coerceError(err);
  }

  private lookup(candidate: unknown): RegistryEntry | undefined {
    if (candidate instanceof DomainError) {
      return this.entries.get(candidate.origin);
    }
    if (candidate instanceof Error) {
      return this.entries.get(candidate);
    }
    return undefined;
  }
}

/**
 * Operator-facing cause: the outer message when the sentinel was found
 * deeper in the chain, the sentinel's own cause otherwise
 */
function describeCause(err: unknown, match: unknown): string | undefined {
  if (match !== err) {
    return messageOf(err);
  }
  if (match instanceof DomainError && match.causeMessage !== '') {
    return match.causeMessage;
  }
  return undefined;
}
