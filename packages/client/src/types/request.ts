import type { Payload } from '../codec/payload.js';
import type { OutputSink } from '../sinks.js';

/**
 * HTTP methods accepted by {@link RequestDescriptor}
 */
export type HttpMethod =
  | 'GET'
  | 'HEAD'
  | 'POST'
  | 'PUT'
  | 'PATCH'
  | 'DELETE'
  | 'OPTIONS';

/**
 * Single query parameter value. Lists are sent as repeated keys,
 * `undefined` values are skipped.
 */
export type QueryValue =
  | string
  | number
  | boolean
  | Array<string | number | boolean>
  | undefined;

/**
 * Query parameters of a request
 */
export type QueryParams = URLSearchParams | Record<string, QueryValue>;

/**
 * Description of a single API call
 */
export interface RequestDescriptor {
  method: HttpMethod;

  /**
   * Absolute path on the API host, e.g. `/api/v2/organizations`
   */
  path: string;

  query?: QueryParams;

  /**
   * Replaces the default header set. `Authorization` is always overwritten
   * with the client's bearer token.
   */
  headers?: HeadersInit;

  /**
   * Raw request body, ignored when {@link input} is set
   */
  body?: BodyInit;

  /**
   * Structured body, encoded as a JSON:API document
   */
  input?: Payload;

  /**
   * Destination for the decoded response. When set, the response body is
   * consumed and no response object is returned.
   */
  output?: OutputSink<unknown>;
}
