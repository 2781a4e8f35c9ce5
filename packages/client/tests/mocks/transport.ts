import ky, { type KyInstance } from 'ky';

/**
 * Request as seen by the transport
 */
export interface CapturedRequest {
  method: string;
  url: string;
  headers: Headers;
  body: string;
}

/**
 * In-process transport that records every request and answers it with
 * `respond`
 */
export function captureTransport(
  respond: (request: CapturedRequest) => Response = () =>
    new Response(null, { status: 204 }),
): { transport: KyInstance; requests: CapturedRequest[] } {
  const requests: CapturedRequest[] = [];

  const transport = ky.create({
    retry: 0,
    throwHttpErrors: false,
    fetch: async (input: RequestInfo | URL, init?: RequestInit) => {
      const request = new Request(input, init);
      const captured: CapturedRequest = {
        method: request.method,
        url: request.url,
        headers: request.headers,
        body: await request.text(),
      };
      requests.push(captured);
      return respond(captured);
    },
  });

  return { transport, requests };
}

/**
 * Response body stream that fails on first read
 */
export function failingBody(error: Error): ReadableStream<Uint8Array> {
  return new ReadableStream({
    start(controller) {
      controller.error(error);
    },
  });
}
