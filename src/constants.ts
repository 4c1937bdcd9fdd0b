/**
 * Application constants
 */

/**
 * HTTP methods an operation may declare, in canonical uppercase form
 */
export const HTTP_METHODS = ['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'HEAD', 'OPTIONS', 'TRACE'] as const;

export type HttpMethod = (typeof HTTP_METHODS)[number];

/**
 * Methods that never carry a request body
 */
export const BODYLESS_METHODS: readonly HttpMethod[] = ['GET', 'HEAD'];

export const HTTP_STATUS = {
  OK: 200,
  MULTIPLE_CHOICES: 300,
} as const;

export const MEDIA_TYPE_JSON = 'application/json';

export const DEFAULT_AUTH_SCHEME = 'Bearer';

/**
 * Environment variables read by the CLI and the JSON bindings
 */
export const ENV = {
  BASE_URL: 'IRI_BASE_URL',
  ACCESS_TOKEN: 'IRI_ACCESS_TOKEN',
  LOG_FORMAT: 'LOG_FORMAT',
  LOG_LEVEL: 'LOG_LEVEL',
} as const;

export const TIME = {
  MS_PER_SECOND: 1000,
} as const;
