/**
 * Operation resolution: catalog lookup, required-parameter checks and
 * path template rendering.
 */

import type { OperationCatalog } from './catalog.js';
import { HTTP_METHODS, type HttpMethod } from './constants.js';
import { MissingPathParameterError, UnknownOperationError, ValidationError } from './errors.js';
import { toPairs, type OperationDefinition, type ParamInput } from './types/catalog.js';

export interface ResolvedOperation {
  operation: OperationDefinition;
  method: HttpMethod;
  /** Rendered path with every placeholder substituted */
  path: string;
}

export function resolveOperation(
  catalog: OperationCatalog,
  operationId: string,
  pathParams?: ParamInput
): ResolvedOperation {
  const operation = catalog.find(operationId);
  if (!operation) {
    throw new UnknownOperationError(operationId);
  }

  const method = parseHttpMethod(operation.method);
  if (!method) {
    throw new UnknownOperationError(operation.operationId);
  }

  return { operation, method, path: renderPath(operation, pathParams) };
}

/**
 * Substitute `{name}` placeholders with percent-encoded values
 *
 * Required parameters are checked in `pathParams` order, so the reported
 * missing parameter is always the first one. Extra supplied pairs are ignored.
 */
export function renderPath(operation: OperationDefinition, pathParams?: ParamInput): string {
  const supplied = toPairs(pathParams);
  let rendered = operation.pathTemplate;

  for (const name of operation.pathParams) {
    const entry = supplied.find(([key]) => key === name);
    if (!entry) {
      throw new MissingPathParameterError(operation.operationId, name);
    }
    rendered = rendered.split(`{${name}}`).join(encodePathSegment(entry[1]));
  }

  return rendered;
}

/**
 * Encode a value as exactly one path segment (`/` becomes `%2F`)
 */
export function encodePathSegment(value: string): string {
  return encodeURIComponent(value);
}

export function parseHttpMethod(value: string): HttpMethod | undefined {
  return HTTP_METHODS.find((method) => method === value);
}

/**
 * Case-insensitive parse of a user-supplied method
 */
export function requireHttpMethod(input: string): HttpMethod {
  const method = parseHttpMethod(input.toUpperCase());
  if (!method) {
    throw new ValidationError(`invalid HTTP method '${input}'`, { method: input });
  }
  return method;
}
