/**
 * Tests for the operation-id clients
 */

import { describe, it, expect, beforeAll, afterAll, afterEach, vi } from 'vitest';
import { ApiClient } from './api-client.js';
import { OperationCatalog } from './catalog.js';
import { HttpStatusError, MissingPathParameterError, UnknownOperationError } from './errors.js';
import type { PreparedRequest } from './http-request.js';
import type { Logger } from './logger.js';
import { BlockingIriClient, IriClient } from './operation-client.js';
import type { SyncTransport, TransportResponse } from './sync-transport.js';
import { ECHO_BASE_URL, resetMockServer, startMockServer, stopMockServer } from './testing/mock-iri-server.js';
import { mockJob, mockSite, mockSitesList } from './testing/fixtures.js';

function silentLogger(): Logger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe('IriClient', () => {
  beforeAll(() => {
    startMockServer();
  });

  afterEach(() => {
    resetMockServer();
  });

  afterAll(() => {
    stopMockServer();
  });

  it('should use the bundled server by default', () => {
    expect(IriClient.fromDefaultServer({ logger: silentLogger() }).baseUrl).toBe('https://api.iri.example.org/');
  });

  it('should list the bundled operations', () => {
    const ids = IriClient.operations().map((op) => op.operationId);

    expect(ids).toContain('getSite');
    expect(ids).toContain('launchJob');
  });

  it('should call an operation with path parameters', async () => {
    const client = IriClient.fromDefaultServer({ logger: silentLogger() });

    await expect(client.callOperation('getSite', { pathParams: [['site_id', 'site-1']] })).resolves.toEqual(mockSite);
    await expect(client.callOperation('getSites')).resolves.toEqual(mockSitesList);
  });

  it('should send query and body through callOperation', async () => {
    const client = IriClient.fromDefaultServer({ logger: silentLogger() });

    const job = await client.callOperation('launchJob', {
      pathParams: { resource_id: 'gpu' },
      body: { executable: '/bin/true' },
    });

    expect(job).toEqual({ ...mockJob, resource_id: 'gpu', spec: { executable: '/bin/true' } });
  });

  it('should return null for operations answering with no content', async () => {
    const client = IriClient.fromDefaultServer({ logger: silentLogger() });

    await expect(
      client.callOperation('cancelJob', { pathParams: { resource_id: 'cpu', job_id: 'job-42' } })
    ).resolves.toBeNull();
  });

  it('should fail before any request when a path parameter is missing', async () => {
    const fetchMock = vi.fn(async () => new Response('{}'));
    const client = new IriClient('https://api.iri.example.org', { fetch: fetchMock, logger: silentLogger() });

    await expect(client.callOperation('getSite')).rejects.toBeInstanceOf(MissingPathParameterError);
    await expect(client.callOperation('noSuchOperation')).rejects.toBeInstanceOf(UnknownOperationError);
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('should surface HTTP errors from operations', async () => {
    const client = IriClient.fromDefaultServer({ logger: silentLogger() });

    await expect(client.callOperation('getJob', { pathParams: { resource_id: 'cpu', job_id: 'other' } })).rejects.toThrow(
      'server returned status 404: {"detail":"job not found"}'
    );
  });

  it('should encode path values as single segments', async () => {
    const client = new IriClient(ECHO_BASE_URL, { logger: silentLogger() });

    const echoed = await client.callOperation('getSite', {
      pathParams: { site_id: 'a/b c' },
      query: [['verbose', 'true']],
    });

    expect(echoed).toMatchObject({
      method: 'GET',
      path: '/api/v1/facility/sites/a%2Fb%20c',
      query: [['verbose', 'true']],
    });
  });

  it('should keep the base URL path prefix', async () => {
    const client = new IriClient(`${ECHO_BASE_URL}/gateway`, { logger: silentLogger() });

    await expect(client.callOperation('getFacility')).resolves.toMatchObject({ path: '/gateway/api/v1/facility' });
  });

  it('should send raw requests and authorization', async () => {
    const client = new IriClient(ECHO_BASE_URL, { logger: silentLogger() }).withAuthorizationToken('test-secret');

    await expect(client.request('PATCH', '/custom', { body: { a: 1 } })).resolves.toMatchObject({
      method: 'PATCH',
      path: '/custom',
      authorization: 'Bearer test-secret',
      body: '{"a":1}',
    });
  });

  it('should wrap an existing ApiClient and a custom catalog', async () => {
    const catalog = OperationCatalog.fromDocument({
      openapi: '3.0.0',
      info: { title: 'Echo', version: '1' },
      paths: { '/things/{id}': { put: { operationId: 'putThing' } } },
    });
    const client = new IriClient(new ApiClient(ECHO_BASE_URL, { logger: silentLogger() }), { catalog });

    expect(client.operations().map((op) => op.operationId)).toEqual(['putThing']);
    await expect(client.callOperation('putThing', { pathParams: { id: '1' }, body: null })).resolves.toMatchObject({
      method: 'PUT',
      path: '/things/1',
      body: 'null',
    });
    await expect(client.callOperation('getSite', { pathParams: { site_id: 'x' } })).rejects.toBeInstanceOf(
      UnknownOperationError
    );
  });
});

describe('BlockingIriClient', () => {
  function recording(reply: TransportResponse) {
    const requests: PreparedRequest[] = [];
    const transport: SyncTransport = {
      send(request) {
        requests.push(request);
        return reply;
      },
      close: vi.fn(),
    };
    return { transport, requests };
  }

  it('should resolve and dispatch synchronously', () => {
    const { transport, requests } = recording({ status: 200, body: '{"id":"site-1"}' });
    const client = BlockingIriClient.fromDefaultServer({ transport, logger: silentLogger() });

    expect(client.callOperation('getSite', { pathParams: { site_id: 'site-1' } })).toEqual({ id: 'site-1' });
    expect(requests[0].url).toBe('https://api.iri.example.org/api/v1/facility/sites/site-1');
  });

  it('should carry the token to derived clients and share the transport', () => {
    const { transport, requests } = recording({ status: 200, body: '[]' });
    const client = new BlockingIriClient('https://example.com', { transport, logger: silentLogger() });
    const authed = client.withAuthorizationToken('test-secret');

    authed.request('GET', '/x');
    authed.close();

    expect(requests[0].headers.Authorization).toBe('Bearer test-secret');
    expect(transport.close).toHaveBeenCalledOnce();
  });

  it('should validate path parameters before sending', () => {
    const { transport, requests } = recording({ status: 200, body: '{}' });
    const client = new BlockingIriClient('https://example.com', { transport, logger: silentLogger() });

    expect(() => client.callOperation('getJob', { pathParams: { job_id: '1' } })).toThrow(MissingPathParameterError);
    expect(requests).toHaveLength(0);
  });

  it('should raise HTTP errors', () => {
    const { transport } = recording({ status: 401, body: 'unauthorized' });
    const client = new BlockingIriClient('https://example.com', { transport, logger: silentLogger() });

    expect(() => client.callOperation('getFacility')).toThrow(HttpStatusError);
  });
});
