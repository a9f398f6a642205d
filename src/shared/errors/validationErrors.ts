/**
 * Validation Errors
 *
 * A summary message plus the ordered list of human-readable validation
 * failures. Produced by business-rule checks and by the schema validator.
 */

export class ValidationErrors extends Error {
  public readonly kind = 'validation' as const;
  private readonly items: string[];

  constructor(message: string, ...validations: string[]) {
    super(message);
    this.name = 'ValidationErrors';
    this.items = [...validations];
  }

  /**
   * Append one or more validation messages
   */
  add(...validations: string[]): this {
    this.items.push(...validations);
    return this;
  }

  get validations(): readonly string[] {
    return [...this.items];
  }

  hasValidations(): boolean {
    return this.items.length > 0;
  }

  hasNoValidations(): boolean {
    return this.items.length === 0;
  }

  /**
   * The instance itself when it holds validations, otherwise undefined.
   * Lets callers collect checks and return the result unconditionally.
   */
  errorOrUndefined(): ValidationErrors | undefined {
    return this.hasValidations() ? this : undefined;
  }
}

export function isValidationErrors(err: unknown): err is ValidationErrors {
  return err instanceof ValidationErrors;
}
