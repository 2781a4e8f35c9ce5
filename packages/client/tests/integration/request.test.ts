import { HttpResponse, http } from 'msw';
import { beforeEach, describe, expect, it } from 'vitest';
import { TfeClient } from '../../src/client.js';
import { payload } from '../../src/codec/index.js';
import { intoMany, intoOne } from '../../src/sinks.js';
import { jsonApi, mockWorkspaceListDocument } from '../mocks/handlers.js';
import { organizations, workspaces } from '../mocks/models.js';
import { captureTransport } from '../mocks/transport.js';
import { server } from '../setup.js';

describe('Request dispatch', () => {
  let client: TfeClient;

  beforeEach(() => {
    client = new TfeClient({
      address: 'http://localhost:8080',
      token: 'test-token',
    });
  });

  describe('Single output', () => {
    it('should decode a resource into the sink', async () => {
      const sink = intoOne(workspaces);

      const result = await client.request({
        method: 'GET',
        path: '/api/v2/workspaces/ws-1',
        output: sink,
      });

      expect(result).toBeUndefined();
      expect(sink.value).toEqual({
        id: 'ws-1',
        name: 'networking',
        'auto-apply': false,
        'terraform-version': '1.6.0',
        organization: {
          type: 'organizations',
          id: 'acme',
          attributes: { name: 'acme', email: 'ops@example.com' },
        },
        tags: [{ type: 'tags', id: 'tag-1' }],
      });
    });

    it('should copy document meta and links onto the sink', async () => {
      server.use(
        http.get('http://localhost:8080/api/v2/organizations/acme', () =>
          jsonApi({
            data: {
              type: 'organizations',
              id: 'acme',
              attributes: { name: 'acme', email: 'ops@example.com' },
            },
            meta: { permissions: { 'can-update': true } },
            links: { self: '/api/v2/organizations/acme' },
          }),
        ),
      );
      const sink = intoOne(organizations);

      await client.request({
        method: 'GET',
        path: '/api/v2/organizations/acme',
        output: sink,
      });

      expect(sink.meta).toEqual({ permissions: { 'can-update': true } });
      expect(sink.links).toEqual({ self: '/api/v2/organizations/acme' });
    });
  });

  describe('Collection output', () => {
    it('should decode every resource in response order', async () => {
      const sink = intoMany(workspaces);

      const result = await client.request({
        method: 'GET',
        path: '/api/v2/organizations/acme/workspaces',
        output: sink,
      });

      expect(result).toBeUndefined();
      expect(sink.items).toHaveLength(3);
      expect(sink.items.map((workspace) => workspace.name)).toEqual([
        'networking',
        'storage',
        'compute',
      ]);
      expect(sink.meta).toEqual(mockWorkspaceListDocument.meta);
      expect(sink.links).toEqual(mockWorkspaceListDocument.links);
    });

    it('should replace items left from an earlier request', async () => {
      server.use(
        http.get(
          'http://localhost:8080/api/v2/organizations/empty/workspaces',
          () => jsonApi({ data: [] }),
        ),
      );
      const sink = intoMany(workspaces);

      await client.request({
        method: 'GET',
        path: '/api/v2/organizations/acme/workspaces',
        output: sink,
      });
      await client.request({
        method: 'GET',
        path: '/api/v2/organizations/empty/workspaces',
        output: sink,
      });

      expect(sink.items).toEqual([]);
      expect(sink.meta).toBeUndefined();
    });
  });

  describe('Raw response', () => {
    it('should return the unread response without an output sink', async () => {
      const response = await client.request({
        method: 'GET',
        path: '/api/v2/organizations/acme/workspaces',
      });

      expect(response.status).toBe(200);
      expect(response.bodyUsed).toBe(false);
      expect(await response.json()).toEqual(mockWorkspaceListDocument);
    });

    it('should send a raw body', async () => {
      server.use(
        http.put(
          'http://localhost:8080/api/v2/state-versions/sv-1/content',
          async ({ request }) =>
            HttpResponse.text(
              `${request.headers.get('Content-Type')}:${await request.text()}`,
            ),
        ),
      );

      const response = await client.request({
        method: 'PUT',
        path: '/api/v2/state-versions/sv-1/content',
        headers: { 'Content-Type': 'application/octet-stream' },
        body: 'raw-bytes',
      });

      expect(await response.text()).toBe('application/octet-stream:raw-bytes');
    });
  });

  describe('Structured input', () => {
    it('should send the input as a JSON:API document', async () => {
      const response = await client.request({
        method: 'POST',
        path: '/api/v2/organizations/acme/workspaces',
        input: payload(workspaces, {
          name: 'networking',
          organization: { type: 'organizations', id: 'acme' },
        }),
      });

      expect(response.status).toBe(201);
      expect(await response.json()).toEqual({
        data: {
          type: 'workspaces',
          attributes: { name: 'networking' },
          relationships: {
            organization: { data: { type: 'organizations', id: 'acme' } },
          },
        },
      });
    });

    it('should prefer the input over a raw body', async () => {
      const { transport, requests } = captureTransport();
      const captured = new TfeClient({
        address: 'http://localhost:8080',
        token: 'test-token',
        transport,
      });

      await captured.request({
        method: 'POST',
        path: '/api/v2/organizations',
        body: 'ignored',
        input: payload(organizations, {
          name: 'acme',
          email: 'ops@example.com',
        }),
      });

      expect(JSON.parse(requests[0].body)).toEqual({
        data: {
          type: 'organizations',
          attributes: { name: 'acme', email: 'ops@example.com' },
        },
      });
    });

    it('should decode an echoed input back to the same value', async () => {
      const { transport } = captureTransport(
        (request) =>
          new Response(request.body, {
            status: 201,
            headers: { 'Content-Type': 'application/vnd.api+json' },
          }),
      );
      const echo = new TfeClient({
        address: 'http://localhost:8080',
        token: 'test-token',
        transport,
      });
      const value = {
        id: 'ws-9',
        name: 'echo',
        'auto-apply': true,
        organization: { type: 'organizations', id: 'acme' },
        tags: [{ type: 'tags', id: 'tag-1' }],
      };
      const sink = intoOne(workspaces);

      await echo.request({
        method: 'POST',
        path: '/api/v2/organizations/acme/workspaces',
        input: payload(workspaces, value),
        output: sink,
      });

      expect(sink.value).toEqual(value);
    });

    it('should send an empty body when there is no input', async () => {
      const { transport, requests } = captureTransport();
      const captured = new TfeClient({
        address: 'http://localhost:8080',
        token: 'test-token',
        transport,
      });

      await captured.request({ method: 'GET', path: '/api/v2/ping' });

      expect(requests[0].body).toBe('');
    });
  });

  describe('URL', () => {
    it('should encode query parameters', async () => {
      let seen = '';
      server.use(
        http.get(
          'http://localhost:8080/api/v2/organizations/acme/workspaces',
          ({ request }) => {
            seen = new URL(request.url).search;
            return jsonApi({ data: [] });
          },
        ),
      );

      await client.request({
        method: 'GET',
        path: '/api/v2/organizations/acme/workspaces',
        query: { 'page[size]': 20, 'search[name]': 'net' },
        output: intoMany(workspaces),
      });

      expect(seen).toBe('?page%5Bsize%5D=20&search%5Bname%5D=net');
    });
  });
});
