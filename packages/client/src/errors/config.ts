import type { ZodError } from 'zod';
import { ValidationError } from './validation.js';

/**
 * Missing or invalid client configuration. No client is produced.
 */
export class ConfigError extends ValidationError {
  constructor(message: string, validationErrors?: ZodError) {
    super(message, validationErrors);
  }
}
