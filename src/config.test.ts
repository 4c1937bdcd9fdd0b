/**
 * Tests for environment configuration
 */

import { describe, it, expect } from 'vitest';
import { loadConfig } from './config.js';

describe('loadConfig', () => {
  it('should read base URL and token', () => {
    expect(
      loadConfig({ IRI_BASE_URL: 'https://iri.test', IRI_ACCESS_TOKEN: 'test-secret', LOG_FORMAT: 'json' })
    ).toEqual({ baseUrl: 'https://iri.test', accessToken: 'test-secret', logFormat: 'json' });
  });

  it('should treat empty values as unset', () => {
    expect(loadConfig({ IRI_BASE_URL: '', IRI_ACCESS_TOKEN: '' })).toEqual({
      baseUrl: undefined,
      accessToken: undefined,
      logFormat: 'console',
    });
  });

  it('should fall back to console logging for unknown formats', () => {
    expect(loadConfig({ LOG_FORMAT: 'xml' }).logFormat).toBe('console');
  });
});
