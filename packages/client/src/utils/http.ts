import ky, { type KyInstance, TimeoutError } from 'ky';
import { DEFAULT_TIMEOUT } from '../config.js';
import {
  NotFoundError,
  TransportError,
  UnexpectedStatusError,
} from '../errors/index.js';
import { errorDocumentSchema } from '../schemas/index.js';
import type { ApiError, HttpMethod, QueryParams } from '../types/index.js';

/**
 * Media type of JSON:API documents
 */
export const JSONAPI_MEDIA_TYPE = 'application/vnd.api+json';

/**
 * Create the default transport: a ky instance that neither retries nor
 * throws on HTTP error statuses. Connections are pooled and kept alive by
 * the platform fetch.
 */
export function createTransport(options: { timeout?: number } = {}): KyInstance {
  return ky.create({
    timeout: options.timeout ?? DEFAULT_TIMEOUT,
    retry: 0,
    throwHttpErrors: false,
  });
}

function encodeQuery(query?: QueryParams): string {
  const params = new URLSearchParams();

  if (query instanceof URLSearchParams) {
    for (const [key, value] of query) {
      params.append(key, value);
    }
  } else if (query) {
    for (const [key, value] of Object.entries(query)) {
      if (value === undefined) {
        continue;
      }
      if (Array.isArray(value)) {
        for (const item of value) {
          params.append(key, String(item));
        }
      } else {
        params.append(key, String(value));
      }
    }
  }

  params.sort();
  return params.toString();
}

/**
 * Build the full request URL. The path replaces any path of the address.
 */
export function constructUrl(
  address: string,
  path: string,
  query?: QueryParams,
): string {
  const url = new URL(address);
  url.pathname = path.startsWith('/') ? path : `/${path}`;
  url.search = encodeQuery(query);
  return url.toString();
}

/**
 * Build request headers. Caller headers replace the defaults; the bearer
 * token always wins over a caller `Authorization` header.
 */
export function buildHeaders(
  init: HeadersInit | undefined,
  token: string,
): Headers {
  const headers = new Headers(init);
  headers.set('Authorization', `Bearer ${token}`);
  if (!headers.has('Content-Type')) {
    headers.set('Content-Type', JSONAPI_MEDIA_TYPE);
  }
  return headers;
}

/**
 * Send one request through the transport
 *
 * @throws {TransportError} if no response was received
 */
export async function sendRequest(
  http: KyInstance,
  url: string,
  init: { method: HttpMethod; headers: Headers; body?: BodyInit },
): Promise<Response> {
  try {
    return await http(url, {
      method: init.method,
      headers: init.headers,
      body: init.body,
      retry: 0,
      throwHttpErrors: false,
    });
  } catch (error) {
    if (error instanceof TimeoutError) {
      throw new TransportError('Request timed out', error);
    }
    if (error instanceof Error) {
      throw new TransportError(error.message, error);
    }
    throw new TransportError(String(error));
  }
}

function parseErrors(body: string): ApiError[] {
  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch {
    // Not JSON, the raw body is all there is
    return [];
  }
  const result = errorDocumentSchema.safeParse(json);
  return result.success ? result.data.errors : [];
}

/**
 * Read the whole response body as text
 *
 * @throws {TransportError} if the body stream fails
 */
export async function readBody(response: Response): Promise<string> {
  try {
    return await response.text();
  } catch (error) {
    if (error instanceof Error) {
      throw new TransportError(error.message, error);
    }
    throw new TransportError(String(error));
  }
}

async function drainBody(response: Response): Promise<string> {
  try {
    return await response.text();
  } catch {
    // A body that fails mid-read still counts as an error response
    return '';
  }
}

/**
 * Check the status code of a response. On failure the body is consumed
 * before the error is thrown.
 *
 * @throws {NotFoundError} on 404
 * @throws {UnexpectedStatusError} on any other status outside 2xx
 */
export async function checkResponseCode(
  response: Response,
  resource: string,
): Promise<void> {
  if (response.status === 404) {
    await drainBody(response);
    throw new NotFoundError(resource);
  }

  if (response.status < 200 || response.status > 299) {
    const body = await drainBody(response);
    throw new UnexpectedStatusError(response.status, body, parseErrors(body));
  }
}
