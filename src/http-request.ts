/**
 * Request preparation and response decoding shared by the async and the
 * blocking clients. Nothing here touches the network.
 */

import { BODYLESS_METHODS, HTTP_STATUS, MEDIA_TYPE_JSON, type HttpMethod } from './constants.js';
import { HttpStatusError, InvalidBaseUrlError, InvalidPathError, JsonError } from './errors.js';
import type { Logger } from './logger.js';
import { toPairs, type JsonValue, type RequestOptions } from './types/catalog.js';

export interface PreparedRequest {
  method: HttpMethod;
  url: string;
  headers: Record<string, string>;
  body?: string;
}

/**
 * Parse an absolute URL and make its path end in `/`
 *
 * Relative joins then append to the last segment instead of replacing it:
 * `items` against `https://example.com/api/v1` gives `.../api/v1/items`.
 */
export function normalizeBaseUrl(raw: string): URL {
  let url: URL;
  try {
    url = new URL(raw);
  } catch {
    throw new InvalidBaseUrlError(raw);
  }

  if (!url.pathname.endsWith('/')) {
    url.pathname = `${url.pathname}/`;
  }
  return url;
}

/**
 * Join a request path onto a normalized base URL
 */
export function joinPath(baseUrl: URL, path: string): URL {
  const relative = path.replace(/^\/+/, '');
  try {
    return new URL(relative, baseUrl);
  } catch {
    throw new InvalidPathError(path);
  }
}

export function prepareRequest(
  baseUrl: URL,
  method: HttpMethod,
  path: string,
  options: RequestOptions,
  authorization?: string,
  logger?: Logger
): PreparedRequest {
  const url = joinPath(baseUrl, path);

  // Only the new pairs are form-encoded; a query already in `path` is kept as written
  const pairs = toPairs(options.query).map(([key, value]): [string, string] => [key, value]);
  if (pairs.length > 0) {
    const extra = new URLSearchParams(pairs).toString();
    url.search = url.search ? `${url.search}&${extra}` : extra;
  }

  const headers: Record<string, string> = {
    Accept: MEDIA_TYPE_JSON,
  };

  if (authorization) {
    headers['Authorization'] = authorization;
  }

  const request: PreparedRequest = { method, url: url.toString(), headers };

  if (options.body !== undefined) {
    if (BODYLESS_METHODS.includes(method)) {
      logger?.warn('Dropping request body: method does not allow one', { method, path });
    } else {
      headers['Content-Type'] = MEDIA_TYPE_JSON;
      request.body = JSON.stringify(options.body);
    }
  }

  return request;
}

/**
 * Map a status and raw body text to a JSON value or a structured error
 *
 * Empty or whitespace-only success bodies decode to `null`.
 */
export function decodeJsonResponse(status: number, text: string): JsonValue {
  if (status < HTTP_STATUS.OK || status >= HTTP_STATUS.MULTIPLE_CHOICES) {
    throw new HttpStatusError(status, text);
  }

  if (text.trim() === '') {
    return null;
  }

  try {
    return JSON.parse(text);
  } catch (error) {
    throw new JsonError(error);
  }
}

/**
 * `Authorization` header value for a token; an empty scheme sends the raw token
 */
export function authorizationValue(token: string, scheme: string): string {
  return scheme ? `${scheme} ${token}` : token;
}
