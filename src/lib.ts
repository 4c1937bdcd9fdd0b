/**
 * Library exports for programmatic usage
 */
export { IriClient, BlockingIriClient } from './operation-client.js';
export type { IriClientOptions, BlockingIriClientOptions } from './operation-client.js';
export { ApiClient } from './api-client.js';
export type { ApiClientOptions, AuthorizationOptions, DispatchOptions, FetchLike } from './api-client.js';
export { BlockingApiClient } from './blocking-api-client.js';
export type { BlockingApiClientOptions } from './blocking-api-client.js';
export { WorkerSyncTransport } from './sync-transport.js';
export type { SyncTransport, TransportResponse, WorkerSyncTransportOptions } from './sync-transport.js';
export { OperationCatalog, defaultCatalog, loadCatalog, openapiDefaultServerUrl } from './catalog.js';
export { OpenAPIParser } from './openapi-parser.js';
export { resolveOperation, renderPath, encodePathSegment, requireHttpMethod } from './path-resolver.js';
export type { ResolvedOperation } from './path-resolver.js';
export { JsonClient, AsyncJsonClient } from './json-bindings.js';
export type { OperationRecord } from './json-bindings.js';
export { runCli } from './cli.js';
export { MetricsCollector } from './metrics.js';
export { ConsoleLogger, JsonLogger, LogLevel, createLogger } from './logger.js';
export type { Logger, LogFormat } from './logger.js';
export {
  ClientError,
  InvalidBaseUrlError,
  InvalidPathError,
  UnknownOperationError,
  MissingPathParameterError,
  RequestError,
  JsonError,
  HttpStatusError,
  ConfigurationError,
  ValidationError,
  isClientError,
} from './errors.js';
export type { ClientErrorCode } from './errors.js';
export { HTTP_METHODS } from './constants.js';
export type { HttpMethod } from './constants.js';
export type {
  JsonValue,
  OperationDefinition,
  ParamInput,
  RequestOptions,
  CallOperationOptions,
} from './types/catalog.js';
