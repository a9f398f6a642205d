/**
 * Error Coercion
 *
 * Maps any thrown value to the HttpError sent to the client. Pure: writing
 * the status and body is left to the HTTP boundary.
 */

import { findInChain } from './chain';
import { HttpError, isHttpError } from './httpError';
import { ErrBadInput } from './sentinels';
import { assertNever, isStructuredError } from './types';

const VALIDATION_STATUS = 422;
const DOMAIN_STATUS = 400;
const UNKNOWN_STATUS = 500;

/**
 * Status of a framework error such as the 400 raised by `express.json()`
 * for a malformed body. Only client errors are taken over.
 */
function frameworkClientStatus(err: unknown): number | undefined {
  if (!(err instanceof Error) || !('status' in err)) {
    return undefined;
  }
  const status = err.status;
  if (typeof status === 'number' && status >= 400 && status < 500) {
    return status;
  }
  return undefined;
}

/**
 * Classify an error, in priority order:
 * 1. an HttpError anywhere in the chain is returned unchanged
 * 2. the first validation or domain error in the chain decides code and message
 * 3. framework client errors become BAD_INPUT with their own status
 * 4. anything else is a 500 UNKNOWN error
 */
export function coerceError(err: unknown): HttpError {
  const httpError = findInChain(err, isHttpError);
  if (httpError !== undefined) {
    return httpError;
  }

  const structured = findInChain(err, isStructuredError);
  if (structured !== undefined) {
    switch (structured.kind) {
      case 'validation':
        return HttpError.from(VALIDATION_STATUS, err);
      case 'domain':
        return HttpError.from(structured.code === '' ? UNKNOWN_STATUS : DOMAIN_STATUS, err);
      default:
        return assertNever(structured);
    }
  }

  const status = frameworkClientStatus(err);
  if (status !== undefined) {
    return HttpError.from(status, ErrBadInput.wrapCause(err));
  }

  return HttpError.from(UNKNOWN_STATUS, err);
}
