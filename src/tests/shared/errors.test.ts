/**
 * Tests for the structured error types and their HTTP mapping
 */

import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { ZodError } from 'zod';
import {
  coerceError,
  DomainError,
  ErrBadInput,
  ErrRequestValidation,
  ErrorCode,
  HttpError,
  httpConflict,
  httpNotFound,
  messageOf,
  UNKNOWN_ERROR_MESSAGE,
  unwrapChain,
  ValidationErrors,
} from '../../shared/errors';

const ErrUserNotFound = DomainError.create('user-not-found', 'user with ID %d not found');
const ErrEmailTaken = DomainError.create('email-taken', 'e-mail %s já cadastrado');

describe('Error chain', () => {
  it('should walk causes and joined errors outermost first', () => {
    const innermost = new Error('c');
    const wrapped = new Error('b', { cause: innermost });
    const joined = new AggregateError([wrapped, new Error('d')], 'joined');

    expect([...unwrapChain(joined)].map(messageOf)).toEqual(['joined', 'b', 'c', 'd']);
  });

  it('should visit each error once in a cyclic chain', () => {
    const first = new Error('a');
    const second = new Error('b', { cause: first });
    first.cause = second;

    expect([...unwrapChain(second)]).toHaveLength(2);
  });

  it('should yield nothing for undefined', () => {
    expect([...unwrapChain(undefined)]).toEqual([]);
  });
});

describe('ValidationErrors', () => {
  it('should start empty and collect validations in order', () => {
    const errors = new ValidationErrors('validation failed');

    expect(errors.hasNoValidations()).toBe(true);
    expect(errors.errorOrUndefined()).toBeUndefined();

    expect(errors.add('nome é obrigatório').add('idade inválida', 'e-mail inválido')).toBe(errors);
    expect(errors.validations).toEqual(['nome é obrigatório', 'idade inválida', 'e-mail inválido']);
    expect(errors.errorOrUndefined()).toBe(errors);
  });

  it('should not expose its internal list', () => {
    const errors = new ValidationErrors('validation failed', 'a');
    const snapshot = [...errors.validations];
    errors.add('b');

    expect(snapshot).toEqual(['a']);
    expect(errors.validations).toEqual(['a', 'b']);
  });

  it('should report validations exactly when the list is non-empty', () => {
    fc.assert(
      fc.property(fc.array(fc.string()), (items) => {
        const errors = new ValidationErrors('validation failed', ...items);
        expect(errors.hasValidations()).toBe(items.length > 0);
        expect(errors.hasNoValidations()).toBe(items.length === 0);
      }),
      { numRuns: 100 }
    );
  });
});

describe('DomainError', () => {
  it('should format the message with its arguments', () => {
    const err = ErrUserNotFound.withArgs(7);

    expect(err.message).toBe('user with ID 7 not found');
    expect(err.code).toBe('user-not-found');
    expect(err.formatArgs).toEqual([7]);
  });

  it('should leave the sentinel unchanged', () => {
    ErrUserNotFound.withArgs(7).withDetails(['x']).wrapCause(new Error('db down'));

    expect(ErrUserNotFound.formatArgs).toEqual([]);
    expect(ErrUserNotFound.details).toEqual([]);
    expect(ErrUserNotFound.cause).toBeUndefined();
  });

  it('should append the cause message', () => {
    const cause = new Error('db down');
    const err = ErrUserNotFound.withArgs(7).wrapCause(cause);

    expect(err.message).toBe('user with ID 7 not found: db down');
    expect(err.text).toBe('user with ID 7 not found');
    expect(err.causeMessage).toBe('db down');
    expect(err.cause).toBe(cause);
  });

  it('should take details from wrapped validation errors', () => {
    const err = ErrRequestValidation.wrapCause(
      new ValidationErrors('validation failed', 'email deve ser um endereço de e-mail válido')
    );

    expect(err.details).toEqual(['email deve ser um endereço de e-mail válido']);
  });

  it('should match errors derived from the same sentinel', () => {
    const derived = ErrUserNotFound.withArgs(7).wrapCause(new Error('db down'));

    expect(ErrUserNotFound.is(derived)).toBe(true);
    expect(ErrUserNotFound.is(new Error('handler failed', { cause: derived }))).toBe(true);
    expect(ErrEmailTaken.is(derived)).toBe(false);
    expect(ErrUserNotFound.is(new Error('user with ID 7 not found'))).toBe(false);
  });
});

describe('HttpError', () => {
  it('should take code and message from a domain error', () => {
    const httpError = HttpError.from(404, ErrUserNotFound.withArgs(7));

    expect(httpError.statusCode).toBe(404);
    expect(httpError.code).toBe('user-not-found');
    expect(httpError.message).toBe('user with ID 7 not found');
    expect(httpError.causeText).toBeUndefined();
    expect(httpError.toEnvelope()).toEqual({
      error: { code: 'user-not-found', message: 'user with ID 7 not found', status_code: 404 },
    });
  });

  it('should keep the domain cause for operators', () => {
    const httpError = HttpError.from(409, ErrEmailTaken.withArgs('ana@example.com').wrapCause(new Error('unique violation')));

    expect(httpError.message).toBe('e-mail ana@example.com já cadastrado');
    expect(httpError.toJSON()).toEqual({
      code: 'email-taken',
      message: 'e-mail ana@example.com já cadastrado',
      status_code: 409,
      cause: 'unique violation',
    });
  });

  it('should list validation errors as details', () => {
    const httpError = HttpError.from(422, new ValidationErrors('validation failed', 'a', 'b'));

    expect(httpError.code).toBe(ErrorCode.VALIDATION);
    expect(httpError.details).toEqual(['a', 'b']);
    expect(httpError.toString()).toBe('[VALIDATION] validation failed (a,b)');
  });

  it('should hide the message of unknown errors', () => {
    const httpError = HttpError.from(undefined, new Error('connection refused'));

    expect(httpError.statusCode).toBe(500);
    expect(httpError.code).toBe(ErrorCode.UNKNOWN);
    expect(httpError.message).toBe(UNKNOWN_ERROR_MESSAGE);
    expect(httpError.causeText).toBe('connection refused');
    expect(httpError.toString()).toBe(`[UNKNOWN] ${UNKNOWN_ERROR_MESSAGE}`);
  });

  it('should default a zero status and a missing error', () => {
    const httpError = HttpError.from(0, undefined);

    expect(httpError.statusCode).toBe(500);
    expect(httpError.causeText).toBe('unknown error');
  });

  it('should treat a domain error without code as unknown', () => {
    const httpError = HttpError.from(400, DomainError.create('', 'sem código'));

    expect(httpError.statusCode).toBe(400);
    expect(httpError.code).toBe(ErrorCode.UNKNOWN);
    expect(httpError.causeText).toBe('sem código');
  });

  it('should survive a JSON round trip of its envelope', () => {
    const original = httpNotFound(ErrUserNotFound.withArgs(7));
    const decoded = HttpError.fromEnvelope(JSON.parse(JSON.stringify(original.toEnvelope())));

    expect(decoded.statusCode).toBe(404);
    expect(decoded.code).toBe('user-not-found');
    expect(decoded.message).toBe('user with ID 7 not found');
    expect(decoded.details).toEqual([]);
  });

  it('should reject a malformed envelope', () => {
    expect(() => HttpError.fromEnvelope({ error: { code: '', message: 'x', status_code: 400 } })).toThrow(ZodError);
    expect(() => HttpError.fromEnvelope({ code: 'X', message: 'x', status_code: 400 })).toThrow(ZodError);
  });

  it('should change only the status', () => {
    const original = HttpError.from(400, ErrUserNotFound.withArgs(1));
    const moved = original.withStatus(404);

    expect(moved.statusCode).toBe(404);
    expect(moved.code).toBe(original.code);
    expect(moved.message).toBe(original.message);
    expect(moved.isClientError()).toBe(true);
    expect(moved.isServerError()).toBe(false);
  });

  it('should use the code given to a factory', () => {
    const httpError = httpNotFound(new Error('user with ID 7 not found'), 'user-not-found');

    expect(httpError.toJSON()).toEqual({
      code: 'user-not-found',
      message: 'user with ID 7 not found',
      status_code: 404,
    });
  });

  it('should keep the domain message when a factory gets a code', () => {
    const httpError = httpConflict(
      ErrEmailTaken.withArgs('ana@example.com').wrapCause(new Error('unique violation')),
      'ERR-B002'
    );

    expect(httpError.toJSON()).toEqual({
      code: 'ERR-B002',
      message: 'e-mail ana@example.com já cadastrado',
      status_code: 409,
      cause: 'unique violation',
    });
  });

  it('should derive the code when a factory gets none', () => {
    expect(httpNotFound(new Error('missing')).code).toBe(ErrorCode.UNKNOWN);
  });

  it('should fall back to 500 for a non-positive status', () => {
    const httpError = new HttpError({ statusCode: -1, code: 'X', message: 'x' });

    expect(httpError.statusCode).toBe(500);
    expect(httpError.isServerError()).toBe(true);
  });
});

describe('coerceError', () => {
  it('should pass an HttpError through unchanged', () => {
    const httpError = httpNotFound(ErrUserNotFound.withArgs(7));

    expect(coerceError(httpError)).toBe(httpError);
    expect(coerceError(new Error('handler failed', { cause: httpError }))).toBe(httpError);
  });

  it('should map validation errors to 422', () => {
    const httpError = coerceError(new ValidationErrors('validation failed', 'idade inválida'));

    expect(httpError.statusCode).toBe(422);
    expect(httpError.code).toBe(ErrorCode.VALIDATION);
    expect(httpError.details).toEqual(['idade inválida']);
  });

  it('should map domain errors to 400', () => {
    const httpError = coerceError(ErrUserNotFound.withArgs(3));

    expect(httpError.statusCode).toBe(400);
    expect(httpError.code).toBe('user-not-found');
  });

  it('should map a domain error without code to 500 UNKNOWN', () => {
    const httpError = coerceError(DomainError.create('', 'sem código'));

    expect(httpError.statusCode).toBe(500);
    expect(httpError.code).toBe(ErrorCode.UNKNOWN);
    expect(httpError.message).toBe(UNKNOWN_ERROR_MESSAGE);
  });

  it('should let the outermost structured error decide', () => {
    const httpError = coerceError(
      ErrRequestValidation.wrapCause(new ValidationErrors('validation failed', 'nome é obrigatório'))
    );

    expect(httpError.statusCode).toBe(400);
    expect(httpError.code).toBe('REQUEST_VALIDATION');
    expect(httpError.details).toEqual(['nome é obrigatório']);
    expect(httpError.causeText).toBe('validation failed');
  });

  it('should find a domain error among joined errors', () => {
    const httpError = coerceError(new AggregateError([new Error('a'), ErrUserNotFound.withArgs(1)]));

    expect(httpError.statusCode).toBe(400);
    expect(httpError.message).toBe('user with ID 1 not found');
  });

  it('should turn framework client errors into BAD_INPUT', () => {
    const parseFailure = Object.assign(new Error('Unexpected token } in JSON'), { status: 400 });
    const httpError = coerceError(parseFailure);

    expect(httpError.statusCode).toBe(400);
    expect(httpError.code).toBe('BAD_INPUT');
    expect(httpError.message).toBe(ErrBadInput.text);
    expect(httpError.causeText).toBe('Unexpected token } in JSON');
  });

  it('should not take over server error statuses', () => {
    const httpError = coerceError(Object.assign(new Error('upstream'), { status: 503 }));

    expect(httpError.statusCode).toBe(500);
    expect(httpError.code).toBe(ErrorCode.UNKNOWN);
  });

  it('should map anything else to 500 UNKNOWN', () => {
    const httpError = coerceError('oops');

    expect(httpError.statusCode).toBe(500);
    expect(httpError.causeText).toBe('oops');
  });
});
