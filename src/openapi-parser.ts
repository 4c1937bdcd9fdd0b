/**
 * OpenAPI document parser
 *
 * Turns an OpenAPI 3.x document into the ordered operation table the clients
 * call through. Only the outer document shape is checked; request and
 * response schemas are not interpreted.
 */

import fs from 'fs';
import { parse as parseYaml } from 'yaml';
import Ajv from 'ajv';
import type { OpenAPIV3 } from 'openapi-types';
import { ConfigurationError } from './errors.js';
import type { OperationDefinition } from './types/catalog.js';

/**
 * The subset of an OpenAPI document the catalog is built from
 */
export interface OpenAPISource {
  openapi: string;
  info: OpenAPIV3.InfoObject;
  servers?: OpenAPIV3.ServerObject[];
  paths: Record<string, Record<string, unknown>>;
}

const OPERATION_KEYS = ['get', 'put', 'post', 'delete', 'options', 'head', 'patch', 'trace'];

const documentSchema = {
  type: 'object',
  required: ['openapi', 'info', 'paths'],
  properties: {
    openapi: { type: 'string', pattern: '^3\\.' },
    info: {
      type: 'object',
      required: ['title', 'version'],
      properties: {
        title: { type: 'string' },
        version: { type: 'string' },
      },
    },
    servers: {
      type: 'array',
      items: {
        type: 'object',
        required: ['url'],
        properties: { url: { type: 'string' } },
      },
    },
    paths: {
      type: 'object',
      additionalProperties: { type: 'object' },
    },
  },
};

const ajv = new Ajv.default({ allErrors: true });
const validateDocument = ajv.compile<OpenAPISource>(documentSchema);

export class OpenAPIParser {
  private source?: OpenAPISource;

  /**
   * Read and parse a `.json`, `.yaml` or `.yml` file
   *
   * Synchronous: the default catalog is initialised on first access from
   * blocking call sites as well.
   */
  loadSync(specPath: string): void {
    let content: string;
    try {
      content = fs.readFileSync(specPath, 'utf-8');
    } catch (error) {
      throw new ConfigurationError(`Cannot read OpenAPI document: ${specPath}`, {
        specPath,
        reason: error instanceof Error ? error.message : String(error),
      });
    }
    this.parse(content, specPath);
  }

  /**
   * Parse document text; YAML unless the name ends in `.json`
   */
  parse(content: string, fileName = 'openapi.yaml'): void {
    let raw: unknown;
    try {
      raw = fileName.endsWith('.json') ? JSON.parse(content) : parseYaml(content);
    } catch (error) {
      throw new ConfigurationError(`OpenAPI document is not valid ${fileName.endsWith('.json') ? 'JSON' : 'YAML'}: ${fileName}`, {
        fileName,
        reason: error instanceof Error ? error.message : String(error),
      });
    }
    this.use(raw);
  }

  /**
   * Use an already-parsed document
   */
  use(document: unknown): void {
    if (!validateDocument(document)) {
      const problems = (validateDocument.errors ?? []).map(
        (e) => `${e.instancePath || '/'} ${e.message ?? 'is invalid'}`
      );
      throw new ConfigurationError(`Invalid OpenAPI document: ${problems.join('; ')}`, { problems });
    }
    this.source = document;
  }

  /**
   * First declared server URL, or empty string when the document has none
   */
  getBaseUrl(): string {
    return this.requireSource().servers?.[0]?.url ?? '';
  }

  /**
   * Operations in document order: paths as declared, methods as they appear
   * within each path item.
   */
  getOperations(): OperationDefinition[] {
    const operations: OperationDefinition[] = [];

    for (const [path, pathItem] of Object.entries(this.requireSource().paths)) {
      for (const key of Object.keys(pathItem)) {
        if (!OPERATION_KEYS.includes(key)) continue;

        const operation = pathItem[key];
        if (!isRecord(operation)) continue;

        const method = key.toUpperCase();
        operations.push({
          operationId: typeof operation.operationId === 'string' ? operation.operationId : `${key}_${path}`,
          method,
          pathTemplate: path,
          pathParams: extractPathParams(path),
        });
      }
    }

    return operations;
  }

  private requireSource(): OpenAPISource {
    if (!this.source) {
      throw new ConfigurationError('OpenAPI document not loaded. Call loadSync() or parse() first.');
    }
    return this.source;
  }
}

/**
 * `{name}` placeholders of a path template, first occurrence order, no duplicates
 */
export function extractPathParams(pathTemplate: string): string[] {
  const names: string[] = [];
  for (const match of pathTemplate.matchAll(/\{([^{}]+)\}/g)) {
    const name = match[1];
    if (!names.includes(name)) names.push(name);
  }
  return names;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
