/**
 * Domain Errors
 *
 * Code-tagged errors for known business-rule violations. A DomainError is
 * usually declared once as a module-level sentinel and specialized per call:
 *
 *   export const ErrUserNotFound = DomainError.create('USER_NOT_FOUND', 'Usuário %d não encontrado');
 *   throw ErrUserNotFound.withArgs(7).wrapCause(dbError);
 *
 * Every builder returns a new instance; the sentinel itself never changes.
 */

import { format } from 'util';
import { findInChain, messageOf } from './chain';
import { isValidationErrors } from './validationErrors';

interface DomainErrorInit {
  code: string;
  messageFormat: string;
  formatArgs: readonly unknown[];
  details: readonly string[];
  cause?: unknown;
  origin?: DomainError;
}

export class DomainError extends Error {
  public readonly kind = 'domain' as const;
  public readonly code: string;
  public readonly messageFormat: string;
  public readonly formatArgs: readonly unknown[];
  public readonly details: readonly string[];
  /** The sentinel this error was derived from (itself for a sentinel) */
  public readonly origin: DomainError;

  private constructor(init: DomainErrorInit) {
    const text = format(init.messageFormat, ...init.formatArgs);
    const message = init.cause === undefined ? text : `${text}: ${messageOf(init.cause)}`;
    super(message, init.cause === undefined ? undefined : { cause: init.cause });

    this.name = 'DomainError';
    this.code = init.code;
    this.messageFormat = init.messageFormat;
    this.formatArgs = [...init.formatArgs];
    this.details = [...init.details];
    this.origin = init.origin ?? this;
  }

  /**
   * Create a new domain error (typically a sentinel)
   */
  static create(code: string, messageFormat: string, ...formatArgs: unknown[]): DomainError {
    return new DomainError({ code, messageFormat, formatArgs, details: [] });
  }

  /**
   * Formatted message without the cause
   */
  get text(): string {
    return format(this.messageFormat, ...this.formatArgs);
  }

  /**
   * Message of the wrapped cause, or an empty string
   */
  get causeMessage(): string {
    return this.cause === undefined ? '' : messageOf(this.cause);
  }

  withArgs(...args: unknown[]): DomainError {
    return this.derive({ formatArgs: [...this.formatArgs, ...args] });
  }

  withDetails(details: readonly string[]): DomainError {
    return this.derive({ details });
  }

  /**
   * Attach the underlying cause. Validation messages found in the cause's
   * chain become this error's details.
   */
  wrapCause(err: unknown): DomainError {
    const validationErrors = findInChain(err, isValidationErrors);
    return this.derive({
      cause: err,
      details: validationErrors === undefined ? this.details : validationErrors.validations,
    });
  }

  /**
   * Whether `err` (or anything it wraps) derives from the same sentinel
   */
  is(err: unknown): boolean {
    const match = findInChain(err, (candidate): candidate is DomainError =>
      candidate instanceof DomainError && candidate.origin === this.origin
    );
    return match !== undefined;
  }

  private derive(overrides: Partial<DomainErrorInit>): DomainError {
    return new DomainError({
      code: this.code,
      messageFormat: this.messageFormat,
      formatArgs: this.formatArgs,
      details: this.details,
      cause: this.cause,
      ...overrides,
      origin: this.origin,
    });
  }
}

export function isDomainError(err: unknown): err is DomainError {
  return err instanceof DomainError;
}
