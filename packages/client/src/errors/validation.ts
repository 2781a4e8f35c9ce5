import type { ZodError } from 'zod';
import { TfeError } from './base.js';

/**
 * A value failed schema validation
 */
export class ValidationError extends TfeError {
  /**
   * Zod validation errors
   */
  public readonly validationErrors?: ZodError;

  constructor(
    message: string,
    validationErrors?: ZodError,
    cause?: Error,
  ) {
    super(message, { cause });
    this.validationErrors = validationErrors;
  }

  /**
   * Get a formatted string of validation errors
   */
  public getValidationDetails(): string {
    if (!this.validationErrors) {
      return this.message;
    }

    const errors = this.validationErrors.issues
      .map((err) => `${err.path.map(String).join('.')}: ${err.message}`)
      .join(', ');

    return `${this.message} - ${errors}`;
  }
}

/**
 * Response body is not valid JSON, not a JSON:API document, or does not
 * match the model it is decoded into
 */
export class DecodeError extends ValidationError {}

/**
 * Input value does not match the model it is encoded with
 */
export class EncodeError extends ValidationError {}
