/**
 * Generic async JSON REST client
 *
 * Transport-focused: no operation catalog involved. For operation-id based
 * calls use IriClient.
 */

import { DEFAULT_AUTH_SCHEME, TIME, type HttpMethod } from './constants.js';
import { isClientError, RequestError } from './errors.js';
import { authorizationValue, decodeJsonResponse, normalizeBaseUrl, prepareRequest } from './http-request.js';
import { ConsoleLogger, type Logger } from './logger.js';
import { RAW_REQUEST_LABEL, type MetricsCollector } from './metrics.js';
import type { JsonValue, ParamInput, RequestOptions } from './types/catalog.js';

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export interface ApiClientOptions {
  /**
   * Transport shared by this client and every client derived from it.
   * Defaults to the global `fetch`, whose connection pool handles keep-alive.
   */
  fetch?: FetchLike;
  logger?: Logger;
  metrics?: MetricsCollector;
  authorizationToken?: string;
  /** Prefix of the `Authorization` value; empty sends the raw token */
  authorizationScheme?: string;
}

export interface AuthorizationOptions {
  scheme?: string;
}

export interface DispatchOptions extends RequestOptions {
  /** Metrics and log label */
  operationId?: string;
}

// Resolved per call so a fetch patched after construction (test interceptors) still applies
const globalFetch: FetchLike = (url, init) => fetch(url, init);

export class ApiClient {
  private readonly base: URL;
  private readonly send: FetchLike;
  private readonly logger: Logger;
  private readonly metrics?: MetricsCollector;
  private readonly authorization?: string;

  /**
   * The URL is validated and normalized to end with `/` once, here.
   */
  constructor(baseUrl: string, private readonly options: ApiClientOptions = {}) {
    this.base = normalizeBaseUrl(baseUrl);
    this.send = options.fetch ?? globalFetch;
    this.logger = options.logger ?? new ConsoleLogger();
    this.metrics = options.metrics;
    if (options.authorizationToken !== undefined) {
      this.authorization = authorizationValue(
        options.authorizationToken,
        options.authorizationScheme ?? DEFAULT_AUTH_SCHEME
      );
    }
  }

  get baseUrl(): string {
    return this.base.href;
  }

  /**
   * New client with `Authorization: Bearer <token>` on every request
   *
   * The transport, logger and metrics are shared; this client is unchanged.
   */
  withAuthorizationToken(token: string, { scheme = DEFAULT_AUTH_SCHEME }: AuthorizationOptions = {}): ApiClient {
    return new ApiClient(this.base.href, {
      ...this.options,
      fetch: this.send,
      logger: this.logger,
      authorizationToken: token,
      authorizationScheme: scheme,
    });
  }

  async getJson(path: string): Promise<JsonValue> {
    return this.requestJson('GET', path);
  }

  async getJsonWithQuery(path: string, query: ParamInput): Promise<JsonValue> {
    return this.requestJson('GET', path, { query });
  }

  async postJson(path: string, body: JsonValue): Promise<JsonValue> {
    return this.requestJson('POST', path, { body });
  }

  async putJson(path: string, body: JsonValue): Promise<JsonValue> {
    return this.requestJson('PUT', path, { body });
  }

  async deleteJson(path: string): Promise<JsonValue> {
    return this.requestJson('DELETE', path);
  }

  /**
   * Send one request and decode the response as JSON
   *
   * Resolves to `null` for successful responses with an empty body.
   */
  async requestJson(method: HttpMethod, path: string, options: DispatchOptions = {}): Promise<JsonValue> {
    const label = options.operationId ?? RAW_REQUEST_LABEL;
    const started = Date.now();

    try {
      const request = prepareRequest(this.base, method, path, options, this.authorization, this.logger);
      this.logger.debug('HTTP request', {
        operationId: options.operationId,
        method,
        url: request.url,
        headers: request.headers,
      });

      let status: number;
      let text: string;
      try {
        const response = await this.send(request.url, {
          method: request.method,
          headers: request.headers,
          body: request.body,
        });
        status = response.status;
        text = await response.text();
      } catch (error) {
        throw new RequestError(error);
      }

      const durationMs = Date.now() - started;
      this.metrics?.recordApiCall(label, method, status, durationMs / TIME.MS_PER_SECOND);
      this.logger.debug('HTTP response', { operationId: options.operationId, status, durationMs });

      return decodeJsonResponse(status, text);
    } catch (error) {
      if (isClientError(error)) {
        this.metrics?.recordApiCallError(label, error.code);
      }
      throw error;
    }
  }
}
