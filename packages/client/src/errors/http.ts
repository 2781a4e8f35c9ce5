import type { ApiError } from '../types/index.js';
import { TfeError } from './base.js';

/**
 * Transport failure (DNS, refused connection, timeout, abort).
 * The request may or may not have reached the server.
 */
export class TransportError extends TfeError {
  constructor(message: string, cause?: Error) {
    super(message, { cause });
  }
}

/**
 * Not found error (404 Not Found)
 */
export class NotFoundError extends TfeError {
  constructor(resource: string) {
    super(`Resource not found: ${resource}`, { statusCode: 404 });
  }
}

/**
 * Any other status outside the 2xx range.
 *
 * The response body has already been read into {@link body}; the response
 * itself is not available to the caller.
 */
export class UnexpectedStatusError extends TfeError {
  /**
   * Raw response body text
   */
  public readonly body: string;

  /**
   * Error objects, when the body is a JSON:API error document
   */
  public readonly errors: ApiError[];

  constructor(statusCode: number, body: string, errors: ApiError[] = []) {
    super(`Unexpected status code: ${statusCode}\n\nBody:\n${body}`, {
      statusCode,
    });
    this.body = body;
    this.errors = errors;
  }
}
