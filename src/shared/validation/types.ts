/**
 * Validation Types
 */

import type { ValidationErrors } from '../errors/validationErrors';

/**
 * Message table of a locale. Templates use positional placeholders:
 * `{0}` is the field's display name, `{1}` the rule parameter.
 */
export interface LocaleTable {
  /** Summary message of a failed validation */
  summary: string;
  /** Display name used when the failing value has no field name */
  rootField: string;
  messages: Record<string, string>;
}

/**
 * Result of parsing input against a schema
 */
export type ParseResult<T> =
  | { success: true; data: T }
  | { success: false; error: ValidationErrors };
