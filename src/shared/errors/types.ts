/**
 * Error Types
 *
 * The closed set of structured error variants. Classification code switches
 * on `kind`, so adding a variant is a compile-time decision everywhere.
 */

import { DomainError } from './domainError';
import { ValidationErrors } from './validationErrors';

/**
 * Errors raised by business logic before they reach the HTTP boundary
 */
export type StructuredError = ValidationErrors | DomainError;

export type StructuredErrorKind = StructuredError['kind'];

/**
 * Stable codes emitted by the kit itself
 */
export const ErrorCode = {
  VALIDATION: 'VALIDATION',
  UNKNOWN: 'UNKNOWN',
  NOT_FOUND: 'NOT_FOUND',
} as const;

/**
 * Public message for errors whose details must not reach the client
 */
export const UNKNOWN_ERROR_MESSAGE =
  'Ocorreu um erro inesperado. Tente novamente mais tarde ou contate o administrador.';

export function isStructuredError(err: unknown): err is StructuredError {
  return err instanceof ValidationErrors || err instanceof DomainError;
}

export function assertNever(value: never): never {
  throw new Error(`Unhandled error variant: ${JSON.stringify(value)}`);
}
