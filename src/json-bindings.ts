/**
 * JSON-string bindings for embedding hosts
 *
 * Mirrors BlockingIriClient and IriClient with every argument and result
 * passed as JSON text.
 */

import { requireHttpMethod } from './path-resolver.js';
import { BlockingIriClient, IriClient, type BlockingIriClientOptions, type IriClientOptions } from './operation-client.js';
import { defaultCatalog } from './catalog.js';
import { ValidationError } from './errors.js';
import type { JsonValue } from './types/catalog.js';

export interface OperationRecord {
  operationId: string;
  method: string;
  pathTemplate: string;
  pathParams: string[];
}

/**
 * Synchronous binding over BlockingIriClient
 */
export class JsonClient {
  private readonly client: BlockingIriClient;

  /**
   * @param baseUrl - API base URL; omitted or null uses the catalog's default server, an empty string is invalid
   * @param accessToken - optional token sent as `Authorization: Bearer <token>`
   */
  constructor(baseUrl?: string | null, accessToken?: string | null, options: BlockingIriClientOptions = {}) {
    const client =
      baseUrl == null ? BlockingIriClient.fromDefaultServer(options) : new BlockingIriClient(baseUrl, options);
    this.client = accessToken ? client.withAuthorizationToken(accessToken) : client;
  }

  static operations(): OperationRecord[] {
    return operationRecords();
  }

  get(path: string): string {
    return this.request('GET', path);
  }

  /**
   * @param queryJson - JSON object of query parameters
   * @param bodyJson - JSON request body
   * @returns the response payload as compact JSON
   */
  request(method: string, path: string, queryJson?: string | null, bodyJson?: string | null): string {
    const value = this.client.request(requireHttpMethod(method), path, {
      query: parseMapArg(queryJson),
      body: parseBodyArg(bodyJson),
    });
    return JSON.stringify(value);
  }

  callOperation(
    operationId: string,
    pathParamsJson?: string | null,
    queryJson?: string | null,
    bodyJson?: string | null
  ): string {
    const value = this.client.callOperation(operationId, {
      pathParams: parseMapArg(pathParamsJson),
      query: parseMapArg(queryJson),
      body: parseBodyArg(bodyJson),
    });
    return JSON.stringify(value);
  }

  close(): void {
    this.client.close();
  }
}

/**
 * Promise-based binding over IriClient
 */
export class AsyncJsonClient {
  private readonly client: IriClient;

  constructor(baseUrl?: string | null, accessToken?: string | null, options: IriClientOptions = {}) {
    const client = baseUrl == null ? IriClient.fromDefaultServer(options) : new IriClient(baseUrl, options);
    this.client = accessToken ? client.withAuthorizationToken(accessToken) : client;
  }

  static operations(): OperationRecord[] {
    return operationRecords();
  }

  async get(path: string): Promise<string> {
    return this.request('GET', path);
  }

  async request(method: string, path: string, queryJson?: string | null, bodyJson?: string | null): Promise<string> {
    const value = await this.client.request(requireHttpMethod(method), path, {
      query: parseMapArg(queryJson),
      body: parseBodyArg(bodyJson),
    });
    return JSON.stringify(value);
  }

  async callOperation(
    operationId: string,
    pathParamsJson?: string | null,
    queryJson?: string | null,
    bodyJson?: string | null
  ): Promise<string> {
    const value = await this.client.callOperation(operationId, {
      pathParams: parseMapArg(pathParamsJson),
      query: parseMapArg(queryJson),
      body: parseBodyArg(bodyJson),
    });
    return JSON.stringify(value);
  }
}

function operationRecords(): OperationRecord[] {
  return defaultCatalog().operations().map((op) => ({
    operationId: op.operationId,
    method: op.method,
    pathTemplate: op.pathTemplate,
    pathParams: [...op.pathParams],
  }));
}

/**
 * JSON object to key/value pairs; non-string values are rendered as JSON text
 */
export function parseMapArg(raw?: string | null): Array<[string, string]> {
  if (raw === undefined || raw === null) return [];

  const value = parseJsonArg(raw);
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw new ValidationError('expected a JSON object', { value: raw });
  }

  return Object.entries(value).map(([key, entry]): [string, string] => [
    key,
    typeof entry === 'string' ? entry : JSON.stringify(entry),
  ]);
}

function parseBodyArg(raw?: string | null): JsonValue | undefined {
  if (raw === undefined || raw === null) return undefined;
  return parseJsonArg(raw);
}

function parseJsonArg(raw: string): JsonValue {
  try {
    return JSON.parse(raw);
  } catch (error) {
    throw new ValidationError(`invalid JSON argument: ${error instanceof Error ? error.message : String(error)}`);
  }
}
