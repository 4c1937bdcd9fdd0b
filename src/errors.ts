/**
 * Structured error types for the IRI client
 *
 * Every failure path surfaces as a distinct class with a machine-readable code.
 */

export type ClientErrorCode =
  | 'INVALID_BASE_URL'
  | 'INVALID_PATH'
  | 'UNKNOWN_OPERATION'
  | 'MISSING_PATH_PARAMETER'
  | 'REQUEST_FAILED'
  | 'INVALID_JSON'
  | 'HTTP_STATUS'
  | 'CONFIGURATION_ERROR'
  | 'VALIDATION_ERROR';

export class ClientError extends Error {
  constructor(
    message: string,
    public readonly code: ClientErrorCode,
    public readonly details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ClientError';
  }
}

export class InvalidBaseUrlError extends ClientError {
  constructor(public readonly baseUrl: string) {
    super(`invalid base URL '${baseUrl}'`, 'INVALID_BASE_URL', { baseUrl });
    this.name = 'InvalidBaseUrlError';
  }
}

export class InvalidPathError extends ClientError {
  constructor(public readonly path: string) {
    super(`invalid endpoint path '${path}'`, 'INVALID_PATH', { path });
    this.name = 'InvalidPathError';
  }
}

export class UnknownOperationError extends ClientError {
  constructor(public readonly operationId: string) {
    super(`unknown OpenAPI operation '${operationId}'`, 'UNKNOWN_OPERATION', { operationId });
    this.name = 'UnknownOperationError';
  }
}

export class MissingPathParameterError extends ClientError {
  constructor(
    public readonly operationId: string,
    public readonly parameter: string
  ) {
    super(
      `missing required path parameter '${parameter}' for operation '${operationId}'`,
      'MISSING_PATH_PARAMETER',
      { operationId, parameter }
    );
    this.name = 'MissingPathParameterError';
  }
}

/**
 * Transport-level failure: connection refused, DNS, TLS, aborted request.
 */
export class RequestError extends ClientError {
  constructor(cause: unknown) {
    super(`request failed: ${describeCause(cause)}`, 'REQUEST_FAILED', undefined, { cause });
    this.name = 'RequestError';
  }
}

/**
 * Successful status but the body is not valid JSON
 */
export class JsonError extends ClientError {
  constructor(cause: unknown) {
    super(`failed to parse JSON: ${describeCause(cause)}`, 'INVALID_JSON', undefined, { cause });
    this.name = 'JsonError';
  }
}

export class HttpStatusError extends ClientError {
  constructor(
    public readonly status: number,
    public readonly body: string
  ) {
    super(`server returned status ${status}: ${body}`, 'HTTP_STATUS', { status, body });
    this.name = 'HttpStatusError';
  }
}

export class ConfigurationError extends ClientError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_ERROR', details);
    this.name = 'ConfigurationError';
  }
}

export class ValidationError extends ClientError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'VALIDATION_ERROR', details);
    this.name = 'ValidationError';
  }
}

function describeCause(cause: unknown): string {
  if (cause instanceof Error) {
    // undici reports the network reason (ECONNREFUSED, ENOTFOUND) on the nested cause
    const nested = cause.cause instanceof Error ? `: ${cause.cause.message}` : '';
    return `${cause.message}${nested}`;
  }
  return String(cause);
}

/**
 * Helper function to check if an error is a ClientError
 */
export function isClientError(error: unknown): error is ClientError {
  return error instanceof ClientError;
}

/**
 * Helper function to get error details for logging
 */
export function getErrorDetails(error: unknown): Record<string, unknown> {
  if (isClientError(error)) {
    return {
      name: error.name,
      code: error.code,
      message: error.message,
      details: error.details,
      stack: error.stack,
    };
  }

  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
  }

  return { message: String(error) };
}
