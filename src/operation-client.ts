/**
 * OpenAPI-driven IRI clients
 *
 * Call endpoints by operation id instead of hard-coded paths. Each call looks
 * the operation up, renders its path and dispatches; nothing is cached
 * between calls.
 */

import { ApiClient, type ApiClientOptions, type AuthorizationOptions } from './api-client.js';
import { BlockingApiClient, type BlockingApiClientOptions } from './blocking-api-client.js';
import { defaultCatalog, type OperationCatalog } from './catalog.js';
import type { HttpMethod } from './constants.js';
import { resolveOperation } from './path-resolver.js';
import type { CallOperationOptions, JsonValue, OperationDefinition, RequestOptions } from './types/catalog.js';

export interface IriClientOptions extends ApiClientOptions {
  /** Defaults to the bundled IRI catalog */
  catalog?: OperationCatalog;
}

export interface BlockingIriClientOptions extends BlockingApiClientOptions {
  catalog?: OperationCatalog;
}

/**
 * Async IRI API client
 */
export class IriClient {
  private readonly inner: ApiClient;
  private readonly catalog: OperationCatalog;

  /**
   * @param target - base URL, or a configured ApiClient to dispatch through
   *   (its own settings then apply and only `catalog` is read from `options`)
   */
  constructor(target: string | ApiClient, options: IriClientOptions = {}) {
    const { catalog, ...clientOptions } = options;
    this.inner = target instanceof ApiClient ? target : new ApiClient(target, clientOptions);
    this.catalog = catalog ?? defaultCatalog();
  }

  /**
   * Client for the first server declared by the catalog's document
   */
  static fromDefaultServer(options: IriClientOptions = {}): IriClient {
    const catalog = options.catalog ?? defaultCatalog();
    return new IriClient(catalog.defaultServerUrl, { ...options, catalog });
  }

  /**
   * Operations of the bundled catalog
   */
  static operations(): readonly OperationDefinition[] {
    return defaultCatalog().operations();
  }

  get baseUrl(): string {
    return this.inner.baseUrl;
  }

  /**
   * Operations this client resolves against
   */
  operations(): readonly OperationDefinition[] {
    return this.catalog.operations();
  }

  /**
   * New client sending `Authorization: Bearer <token>`; shares transport and catalog
   */
  withAuthorizationToken(token: string, options?: AuthorizationOptions): IriClient {
    return new IriClient(this.inner.withAuthorizationToken(token, options), { catalog: this.catalog });
  }

  /**
   * Send a request by raw method and path, bypassing the catalog
   */
  async request(method: HttpMethod, path: string, options: RequestOptions = {}): Promise<JsonValue> {
    return this.inner.requestJson(method, path, options);
  }

  /**
   * Call an endpoint by OpenAPI operation id
   *
   * `pathParams` fills the `{param}` segments of the path template; a missing
   * required one fails with MissingPathParameterError before any request.
   */
  async callOperation(operationId: string, options: CallOperationOptions = {}): Promise<JsonValue> {
    const { method, path } = resolveOperation(this.catalog, operationId, options.pathParams);
    return this.inner.requestJson(method, path, {
      query: options.query,
      body: options.body,
      operationId,
    });
  }
}

/**
 * Blocking IRI API client, the synchronous counterpart of IriClient
 */
export class BlockingIriClient {
  private readonly inner: BlockingApiClient;
  private readonly catalog: OperationCatalog;

  constructor(target: string | BlockingApiClient, options: BlockingIriClientOptions = {}) {
    const { catalog, ...clientOptions } = options;
    this.inner = target instanceof BlockingApiClient ? target : new BlockingApiClient(target, clientOptions);
    this.catalog = catalog ?? defaultCatalog();
  }

  static fromDefaultServer(options: BlockingIriClientOptions = {}): BlockingIriClient {
    const catalog = options.catalog ?? defaultCatalog();
    return new BlockingIriClient(catalog.defaultServerUrl, { ...options, catalog });
  }

  static operations(): readonly OperationDefinition[] {
    return defaultCatalog().operations();
  }

  get baseUrl(): string {
    return this.inner.baseUrl;
  }

  operations(): readonly OperationDefinition[] {
    return this.catalog.operations();
  }

  withAuthorizationToken(token: string, options?: AuthorizationOptions): BlockingIriClient {
    return new BlockingIriClient(this.inner.withAuthorizationToken(token, options), { catalog: this.catalog });
  }

  request(method: HttpMethod, path: string, options: RequestOptions = {}): JsonValue {
    return this.inner.requestJson(method, path, options);
  }

  callOperation(operationId: string, options: CallOperationOptions = {}): JsonValue {
    const { method, path } = resolveOperation(this.catalog, operationId, options.pathParams);
    return this.inner.requestJson(method, path, {
      query: options.query,
      body: options.body,
      operationId,
    });
  }

  /**
   * Stop the transport worker. Clients derived with withAuthorizationToken share it.
   */
  close(): void {
    this.inner.close();
  }
}
