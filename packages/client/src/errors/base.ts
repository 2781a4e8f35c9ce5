/**
 * Base error class for all client errors
 */
export class TfeError extends Error {
  /**
   * HTTP status code if applicable
   */
  public readonly statusCode?: number;

  constructor(
    message: string,
    options?: {
      statusCode?: number;
      cause?: Error;
    },
  ) {
    super(message, { cause: options?.cause });
    this.name = this.constructor.name;
    this.statusCode = options?.statusCode;

    // Maintains proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}
