/**
 * Request body parsing for route handlers.
 *
 *   router.post('/users', asyncHandler(async (req, res) => {
 *     const input = parseRequestBody(req, CreateUserSchema, validator);
 *     res.status(201).json(await users.create(input));
 *   }));
 *
 * Failures are thrown as 400 HttpErrors and reach the error handler.
 */

import type { Request } from 'express';
import type { z, ZodTypeAny } from 'zod';
import { HttpError } from '../shared/errors/httpError';
import { ErrBadInput, ErrRequestValidation } from '../shared/errors/sentinels';
import { Validator } from '../shared/validation/validator';

const defaultValidator = new Validator();

function isJsonObject(body: unknown): body is Record<string, unknown> {
  return typeof body === 'object' && body !== null && !Array.isArray(body);
}

/**
 * Validate the JSON body of `req` against `schema` and return the parsed value.
 *
 * @throws HttpError 400 BAD_INPUT when the body is not a JSON object
 * @throws HttpError 400 REQUEST_VALIDATION, with one detail per failing rule
 */
export function parseRequestBody<T extends ZodTypeAny>(
  req: Request,
  schema: T,
  validator: Validator = defaultValidator
): z.output<T> {
  const body: unknown = req.body;
  if (!isJsonObject(body)) {
    throw HttpError.from(400, ErrBadInput.wrapCause(new Error('request body must be a JSON object')));
  }

  const result = validator.parse(schema, body);
  if (!result.success) {
    throw HttpError.from(400, ErrRequestValidation.wrapCause(result.error));
  }
  return result.data;
}
