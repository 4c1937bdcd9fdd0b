/**
 * Operation catalog
 *
 * Immutable, ordered table of operations plus the document's default server.
 * The bundled catalog is built once, on first access, and shared by every
 * client in the process.
 */

import { fileURLToPath } from 'url';
import { OpenAPIParser } from './openapi-parser.js';
import type { OperationDefinition } from './types/catalog.js';

const BUNDLED_DOCUMENT = fileURLToPath(new URL('../openapi/openapi.yaml', import.meta.url));

export class OperationCatalog {
  private readonly entries: readonly OperationDefinition[];
  private readonly byId = new Map<string, OperationDefinition>();

  constructor(operations: readonly OperationDefinition[], readonly defaultServerUrl: string = '') {
    this.entries = Object.freeze(
      operations.map((op) =>
        Object.freeze({
          operationId: op.operationId,
          method: op.method,
          pathTemplate: op.pathTemplate,
          pathParams: Object.freeze([...op.pathParams]),
        })
      )
    );

    for (const op of this.entries) {
      // Ids are expected to be unique; when they are not, the first one wins
      if (!this.byId.has(op.operationId)) {
        this.byId.set(op.operationId, op);
      }
    }
  }

  static fromDocument(document: unknown): OperationCatalog {
    const parser = new OpenAPIParser();
    parser.use(document);
    return new OperationCatalog(parser.getOperations(), parser.getBaseUrl());
  }

  /**
   * The complete table, in document order
   */
  operations(): readonly OperationDefinition[] {
    return this.entries;
  }

  find(operationId: string): OperationDefinition | undefined {
    return this.byId.get(operationId);
  }

  get size(): number {
    return this.entries.length;
  }
}

/**
 * Build a catalog from an OpenAPI file (`.json`, `.yaml` or `.yml`)
 */
export function loadCatalog(specPath: string): OperationCatalog {
  const parser = new OpenAPIParser();
  parser.loadSync(specPath);
  return new OperationCatalog(parser.getOperations(), parser.getBaseUrl());
}

let bundled: OperationCatalog | undefined;

/**
 * Catalog of the bundled IRI API document
 */
export function defaultCatalog(): OperationCatalog {
  if (!bundled) {
    bundled = loadCatalog(BUNDLED_DOCUMENT);
  }
  return bundled;
}

/**
 * First server URL declared by the bundled document
 */
export function openapiDefaultServerUrl(): string {
  return defaultCatalog().defaultServerUrl;
}
