/**
 * Tests for operation resolution and path rendering
 */

import { describe, it, expect } from 'vitest';
import { OperationCatalog, defaultCatalog } from './catalog.js';
import { MissingPathParameterError, UnknownOperationError, ValidationError } from './errors.js';
import { encodePathSegment, renderPath, requireHttpMethod, resolveOperation } from './path-resolver.js';

describe('resolveOperation', () => {
  const catalog = defaultCatalog();

  it('should render a single path parameter', () => {
    const resolved = resolveOperation(catalog, 'getSite', [['site_id', 'site-1']]);

    expect(resolved.method).toBe('GET');
    expect(resolved.path).toBe('/api/v1/facility/sites/site-1');
  });

  it('should render several parameters from a record', () => {
    const resolved = resolveOperation(catalog, 'cancelJob', { job_id: 'job-42', resource_id: 'cpu' });

    expect(resolved.method).toBe('DELETE');
    expect(resolved.path).toBe('/api/v1/compute/job/cpu/job-42');
  });

  it('should return templates without placeholders unchanged', () => {
    expect(resolveOperation(catalog, 'getSites').path).toBe('/api/v1/facility/sites');
  });

  it('should ignore parameters the template does not use', () => {
    const resolved = resolveOperation(catalog, 'getSite', [
      ['site_id', 'site-1'],
      ['unused', 'x'],
    ]);

    expect(resolved.path).toBe('/api/v1/facility/sites/site-1');
  });

  it('should use the first value when a key repeats', () => {
    const resolved = resolveOperation(catalog, 'getSite', [
      ['site_id', 'first'],
      ['site_id', 'second'],
    ]);

    expect(resolved.path).toBe('/api/v1/facility/sites/first');
  });

  it('should fail on an unknown operation id', () => {
    expect(() => resolveOperation(catalog, 'doesNotExist')).toThrow(UnknownOperationError);
    expect(() => resolveOperation(catalog, 'doesNotExist')).toThrow("unknown OpenAPI operation 'doesNotExist'");
  });

  it('should report the missing parameter and operation', () => {
    let caught: unknown;
    try {
      resolveOperation(catalog, 'getSite');
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(MissingPathParameterError);
    expect(caught).toMatchObject({ operationId: 'getSite', parameter: 'site_id' });
  });

  it('should report the first missing parameter in template order', () => {
    expect(() => resolveOperation(catalog, 'getJob', [['job_id', 'job-42']])).toThrow(
      "missing required path parameter 'resource_id' for operation 'getJob'"
    );
  });

  it('should reject catalog entries with an unsupported method', () => {
    const custom = new OperationCatalog([
      { operationId: 'connect', method: 'CONNECT', pathTemplate: '/tunnel', pathParams: [] },
    ]);

    expect(() => resolveOperation(custom, 'connect')).toThrow(UnknownOperationError);
  });
});

describe('renderPath', () => {
  it('should substitute every occurrence of a placeholder', () => {
    const path = renderPath(
      { operationId: 'mirror', method: 'GET', pathTemplate: '/{id}/copy/{id}', pathParams: ['id'] },
      { id: '7' }
    );

    expect(path).toBe('/7/copy/7');
  });
});

describe('encodePathSegment', () => {
  it('should keep a value inside one segment', () => {
    expect(encodePathSegment('a/b c')).toBe('a%2Fb%20c');
    expect(encodePathSegment('../etc')).toBe('..%2Fetc');
  });

  it('should leave unreserved characters alone', () => {
    expect(encodePathSegment('site-1_A.b~')).toBe('site-1_A.b~');
  });
});

describe('requireHttpMethod', () => {
  it('should accept any letter case', () => {
    expect(requireHttpMethod('get')).toBe('GET');
    expect(requireHttpMethod('Patch')).toBe('PATCH');
  });

  it('should reject unknown methods', () => {
    expect(() => requireHttpMethod('FETCH')).toThrow(ValidationError);
    expect(() => requireHttpMethod('FETCH')).toThrow("invalid HTTP method 'FETCH'");
  });
});
