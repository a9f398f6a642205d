/**
 * Validator
 *
 * Validates input against zod schemas and reports failures as a
 * ValidationErrors with one translated message per failing rule.
 *
 *   const CreateUserSchema = z.object({
 *     name: z.string().min(1).describe('Nome'),
 *     email: z.string().email(),
 *   });
 *
 *   const errors = validator.validate(CreateUserSchema, { name: '', email: 'x' });
 *   // errors.validations: ['Nome é um campo obrigatório',
 *   //                     'email deve ser um endereço de e-mail válido']
 *
 * Messages given explicitly in the schema (`.min(3, 'muito curto')`) are kept as-is.
 */

import type { z, ZodErrorMap, ZodTypeAny } from 'zod';
import { ValidationErrors } from '../errors/validationErrors';
import { fieldDisplayName } from './fieldNames';
import { Translator } from './translator';
import type { ParseResult } from './types';
import ptBR from './locales/pt-BR.json';

export class Validator {
  private readonly translator: Translator;

  constructor(translator: Translator = new Translator(ptBR)) {
    this.translator = translator;
  }

  /**
   * Parse `input`, returning the typed data or the translated failures
   */
  parse<T extends ZodTypeAny>(schema: T, input: unknown): ParseResult<z.output<T>> {
    const result = schema.safeParse(input, { errorMap: this.errorMapFor(schema) });
    if (result.success) {
      return { success: true, data: result.data };
    }

    const messages = result.error.issues.map((issue) => issue.message);
    return { success: false, error: new ValidationErrors(this.translator.summary, ...messages) };
  }

  /**
   * Validate `input`; undefined when it satisfies the schema
   */
  validate(schema: ZodTypeAny, input: unknown): ValidationErrors | undefined {
    const result = this.parse(schema, input);
    return result.success ? undefined : result.error;
  }

  private errorMapFor(schema: ZodTypeAny): ZodErrorMap {
    return (issue) => {
      const field = fieldDisplayName(schema, issue.path, this.translator.rootField);
      return { message: this.translator.translate(issue, field) };
    };
  }
}
