import type { KyInstance } from 'ky';
import { parseDocument, unmarshalMany, unmarshalOne } from './codec/index.js';
import { type ClientConfig, resolveConfig } from './config.js';
import type { OutputSink } from './sinks.js';
import type { RequestDescriptor } from './types/index.js';
import {
  buildHeaders,
  checkResponseCode,
  constructUrl,
  createTransport,
  readBody,
  sendRequest,
} from './utils/index.js';

/**
 * JSON:API client with bearer-token authentication
 *
 * @example
 * ```typescript
 * const client = new TfeClient({ token: 'your-api-token' });
 *
 * // Decode a list of workspaces
 * const sink = intoMany(workspaces);
 * await client.request({
 *   method: 'GET',
 *   path: '/api/v2/organizations/acme/workspaces',
 *   output: sink,
 * });
 * console.log(sink.items);
 *
 * // Create a workspace and read the raw response
 * const response = await client.request({
 *   method: 'POST',
 *   path: '/api/v2/organizations/acme/workspaces',
 *   input: payload(workspaces, { name: 'networking' }),
 * });
 * ```
 */
export class TfeClient {
  /**
   * Effective API address
   */
  public readonly address: string;

  private readonly token: string;

  private readonly http: KyInstance;

  /**
   * Create a new API client
   *
   * @param config - Client configuration
   * @throws {ConfigError} if the configuration is missing or invalid
   */
  constructor(config?: ClientConfig) {
    const resolved = resolveConfig(config);

    this.address = resolved.address;
    this.token = resolved.token;
    this.http =
      config?.transport ?? createTransport({ timeout: resolved.timeout });
  }

  /**
   * Perform one HTTP round trip. Requests are never retried.
   *
   * With an `output` sink the body is decoded into it and the promise
   * resolves to `undefined`. Without one the unread response is returned
   * and the caller must consume it.
   *
   * @throws {EncodeError} if the input payload does not match its model
   * @throws {TransportError} if no response was received or its body
   * could not be read
   * @throws {NotFoundError} on 404
   * @throws {UnexpectedStatusError} on any other non-2xx status
   * @throws {DecodeError} if the body cannot be decoded into the sink
   */
  request(
    descriptor: RequestDescriptor & { output: OutputSink<unknown> },
  ): Promise<undefined>;
  request(
    descriptor: RequestDescriptor & { output?: undefined },
  ): Promise<Response>;
  request(descriptor: RequestDescriptor): Promise<Response | undefined>;
  async request(descriptor: RequestDescriptor): Promise<Response | undefined> {
    const url = constructUrl(this.address, descriptor.path, descriptor.query);

    // Prefer the structured input over a raw body
    const body = descriptor.input
      ? descriptor.input.serialize()
      : descriptor.body;

    const response = await sendRequest(this.http, url, {
      method: descriptor.method,
      headers: buildHeaders(descriptor.headers, this.token),
      body,
    });

    await checkResponseCode(response, descriptor.path);

    const { output } = descriptor;
    if (!output) {
      return response;
    }

    const document = parseDocument(await readBody(response));
    switch (output.kind) {
      case 'single':
        output.value = unmarshalOne(output.model, document);
        break;
      case 'collection':
        output.items = unmarshalMany(output.model, document);
        break;
    }
    output.meta = document.meta;
    output.links = document.links;

    return undefined;
  }
}
