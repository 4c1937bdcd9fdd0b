/**
 * Generic blocking JSON REST client
 *
 * Synchronous counterpart of ApiClient: every call blocks the calling thread
 * for the full round trip. Calls on one instance are naturally serialized;
 * the transport handles one request at a time.
 */

import { DEFAULT_AUTH_SCHEME, TIME, type HttpMethod } from './constants.js';
import { isClientError, RequestError } from './errors.js';
import { authorizationValue, decodeJsonResponse, normalizeBaseUrl, prepareRequest } from './http-request.js';
import { ConsoleLogger, type Logger } from './logger.js';
import { RAW_REQUEST_LABEL, type MetricsCollector } from './metrics.js';
import { WorkerSyncTransport, type SyncTransport, type TransportResponse } from './sync-transport.js';
import type { AuthorizationOptions, DispatchOptions } from './api-client.js';
import type { JsonValue, ParamInput } from './types/catalog.js';

export interface BlockingApiClientOptions {
  /** Shared by this client and every client derived from it */
  transport?: SyncTransport;
  logger?: Logger;
  metrics?: MetricsCollector;
  authorizationToken?: string;
  authorizationScheme?: string;
}

export class BlockingApiClient {
  private readonly base: URL;
  private readonly transport: SyncTransport;
  private readonly logger: Logger;
  private readonly metrics?: MetricsCollector;
  private readonly authorization?: string;

  constructor(baseUrl: string, private readonly options: BlockingApiClientOptions = {}) {
    this.base = normalizeBaseUrl(baseUrl);
    this.transport = options.transport ?? new WorkerSyncTransport();
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

  withAuthorizationToken(
    token: string,
    { scheme = DEFAULT_AUTH_SCHEME }: AuthorizationOptions = {}
  ): BlockingApiClient {
    return new BlockingApiClient(this.base.href, {
      ...this.options,
      transport: this.transport,
      logger: this.logger,
      authorizationToken: token,
      authorizationScheme: scheme,
    });
  }

  getJson(path: string): JsonValue {
    return this.requestJson('GET', path);
  }

  getJsonWithQuery(path: string, query: ParamInput): JsonValue {
    return this.requestJson('GET', path, { query });
  }

  postJson(path: string, body: JsonValue): JsonValue {
    return this.requestJson('POST', path, { body });
  }

  putJson(path: string, body: JsonValue): JsonValue {
    return this.requestJson('PUT', path, { body });
  }

  deleteJson(path: string): JsonValue {
    return this.requestJson('DELETE', path);
  }

  /**
   * Returns `null` for successful responses with an empty body.
   */
  requestJson(method: HttpMethod, path: string, options: DispatchOptions = {}): JsonValue {
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

      let response: TransportResponse;
      try {
        response = this.transport.send(request);
      } catch (error) {
        throw new RequestError(error);
      }

      const durationMs = Date.now() - started;
      this.metrics?.recordApiCall(label, method, response.status, durationMs / TIME.MS_PER_SECOND);
      this.logger.debug('HTTP response', { operationId: options.operationId, status: response.status, durationMs });

      return decodeJsonResponse(response.status, response.body);
    } catch (error) {
      if (isClientError(error)) {
        this.metrics?.recordApiCallError(label, error.code);
      }
      throw error;
    }
  }

  /**
   * Release the transport. Clients derived from this one share it.
   */
  close(): void {
    this.transport.close();
  }
}
