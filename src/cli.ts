/**
 * iri-cli: query the IRI API from the shell
 *
 * Argument grammar is handled by yargs; parsing only records what to do, and
 * the command runs afterwards so every failure maps to one exit code.
 */

import fs from 'fs';
import yargs from 'yargs';
import { defaultCatalog } from './catalog.js';
import { loadConfig } from './config.js';
import { getErrorDetails, ValidationError } from './errors.js';
import { createLogger, type Logger } from './logger.js';
import { IriClient } from './operation-client.js';
import { requireHttpMethod } from './path-resolver.js';
import type { JsonValue } from './types/catalog.js';

export interface BodyInput {
  bodyJson?: string;
  bodyFile?: string;
}

export type CliCommand =
  | { kind: 'operations'; filter?: string }
  | { kind: 'call'; operationId: string; pathParams: string[]; query: string[]; body: BodyInput }
  | { kind: 'request'; method: string; path: string; query: string[]; body: BodyInput };

export interface CliInvocation {
  baseUrl?: string;
  accessToken?: string;
  compact: boolean;
  command: CliCommand;
}

export interface CliIO {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  env: NodeJS.ProcessEnv;
  logger?: Logger;
}

export const EXIT_CODE = {
  OK: 0,
  FAILURE: 1,
  USAGE: 2,
} as const;

/**
 * Parse argv; resolves to undefined when only help or version was requested
 */
export async function parseCliArgs(argv: string[]): Promise<CliInvocation | undefined> {
  const parsed: { command?: CliCommand } = {};

  const args = await yargs(argv)
    .scriptName('iri-cli')
    .usage('$0 <command> [options]\n\nSmall CLI for querying the IRI API')
    .option('base-url', {
      type: 'string',
      describe: 'Base URL for the API. Defaults to $IRI_BASE_URL, then the OpenAPI server URL.',
    })
    .option('access-token', {
      type: 'string',
      describe: 'Access token sent as a bearer Authorization header. Defaults to $IRI_ACCESS_TOKEN.',
    })
    .option('compact', {
      type: 'boolean',
      default: false,
      describe: 'Emit compact JSON instead of pretty-printed output',
    })
    .command(
      'operations',
      'List OpenAPI operation ids',
      (y) => y.option('filter', { type: 'string', describe: 'Case-sensitive substring of the operation id' }),
      (a) => {
        parsed.command = { kind: 'operations', filter: a.filter };
      }
    )
    .command(
      'call <operationId>',
      'Call an endpoint by OpenAPI operation id',
      (y) =>
        y
          .positional('operationId', { type: 'string', demandOption: true, describe: 'For example: getSite' })
          .option('path-param', {
            type: 'string',
            array: true,
            describe: 'Path parameter in form key=value. Repeat as needed.',
          })
          .option('query', {
            type: 'string',
            array: true,
            describe: 'Query parameter in form key=value. Repeat as needed.',
          })
          .option('body-json', { type: 'string', describe: 'JSON request body literal' })
          .option('body-file', { type: 'string', describe: 'Path to a file containing a JSON request body' })
          .conflicts('body-json', 'body-file'),
      (a) => {
        parsed.command = {
          kind: 'call',
          operationId: a.operationId,
          pathParams: a['path-param'] ?? [],
          query: a.query ?? [],
          body: { bodyJson: a['body-json'], bodyFile: a['body-file'] },
        };
      }
    )
    .command(
      'request <method> <path>',
      'Send a raw HTTP request using method + path',
      (y) =>
        y
          .positional('method', { type: 'string', demandOption: true, describe: 'GET, POST, PUT, DELETE, ...' })
          .positional('path', { type: 'string', demandOption: true, describe: 'For example: /api/v1/facility/sites' })
          .option('query', {
            type: 'string',
            array: true,
            describe: 'Query parameter in form key=value. Repeat as needed.',
          })
          .option('body-json', { type: 'string', describe: 'JSON request body literal' })
          .option('body-file', { type: 'string', describe: 'Path to a file containing a JSON request body' })
          .conflicts('body-json', 'body-file'),
      (a) => {
        parsed.command = {
          kind: 'request',
          method: a.method,
          path: a.path,
          query: a.query ?? [],
          body: { bodyJson: a['body-json'], bodyFile: a['body-file'] },
        };
      }
    )
    // Repeatable options take one value each, so positionals may follow them
    .parserConfiguration({ 'greedy-arrays': false })
    .demandCommand(1)
    .strict()
    .exitProcess(false)
    .fail(false)
    .parseAsync();

  if (!parsed.command) return undefined;

  return {
    baseUrl: args['base-url'],
    accessToken: args['access-token'],
    compact: args.compact,
    command: parsed.command,
  };
}

/**
 * Run the CLI and return the process exit code
 */
export async function runCli(argv: string[], io: CliIO = processIO()): Promise<number> {
  const config = loadConfig(io.env);
  const logger = io.logger ?? createLogger(config.logFormat);

  let invocation: CliInvocation | undefined;
  try {
    invocation = await parseCliArgs(argv);
  } catch (error) {
    io.stderr(`error: ${errorMessage(error)}\n`);
    return EXIT_CODE.USAGE;
  }

  if (!invocation) return EXIT_CODE.OK;

  try {
    const { command } = invocation;

    // `operations` is metadata-only and needs no client
    if (command.kind === 'operations') {
      for (const op of defaultCatalog().operations()) {
        if (command.filter !== undefined && !op.operationId.includes(command.filter)) continue;
        io.stdout(`${op.operationId}\t${op.method}\t${op.pathTemplate}\n`);
      }
      return EXIT_CODE.OK;
    }

    const baseUrl = invocation.baseUrl ?? config.baseUrl;
    const accessToken = invocation.accessToken ?? config.accessToken;

    let client = baseUrl === undefined ? IriClient.fromDefaultServer({ logger }) : new IriClient(baseUrl, { logger });
    if (accessToken) {
      client = client.withAuthorizationToken(accessToken);
    }

    let output: JsonValue;
    if (command.kind === 'call') {
      output = await client.callOperation(command.operationId, {
        pathParams: parsePairs(command.pathParams, '--path-param'),
        query: parsePairs(command.query, '--query'),
        body: parseBody(command.body),
      });
    } else {
      // Validated before any network call
      const method = requireHttpMethod(command.method);
      output = await client.request(method, command.path, {
        query: parsePairs(command.query, '--query'),
        body: parseBody(command.body),
      });
    }

    io.stdout(`${formatJson(output, invocation.compact)}\n`);
    return EXIT_CODE.OK;
  } catch (error) {
    logger.debug('Command failed', getErrorDetails(error));
    io.stderr(`error: ${errorMessage(error)}\n`);
    return EXIT_CODE.FAILURE;
  }
}

/**
 * Split repeated `key=value` arguments on the first `=`
 */
export function parsePairs(values: string[], flagName: string): Array<[string, string]> {
  return values.map((item): [string, string] => {
    const index = item.indexOf('=');
    if (index === -1) {
      throw new ValidationError(`invalid ${flagName} value '${item}': expected key=value`);
    }
    const key = item.slice(0, index);
    if (!key) {
      throw new ValidationError(`invalid ${flagName} value '${item}': empty key`);
    }
    return [key, item.slice(index + 1)];
  });
}

/**
 * Inline JSON or the contents of a file; at most one of them
 */
export function parseBody(body: BodyInput): JsonValue | undefined {
  if (body.bodyJson !== undefined && body.bodyFile !== undefined) {
    throw new ValidationError('use only one of --body-json or --body-file');
  }

  if (body.bodyJson !== undefined) {
    return parseJsonText(body.bodyJson, '--body-json');
  }

  if (body.bodyFile !== undefined) {
    let raw: string;
    try {
      raw = fs.readFileSync(body.bodyFile, 'utf-8');
    } catch (error) {
      throw new ValidationError(`cannot read body file '${body.bodyFile}': ${errorMessage(error)}`);
    }
    return parseJsonText(raw, body.bodyFile);
  }

  return undefined;
}

export function formatJson(value: JsonValue, compact: boolean): string {
  return compact ? JSON.stringify(value) : JSON.stringify(value, null, 2);
}

function parseJsonText(raw: string, source: string): JsonValue {
  try {
    return JSON.parse(raw);
  } catch (error) {
    throw new ValidationError(`invalid JSON in ${source}: ${errorMessage(error)}`);
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function processIO(): CliIO {
  return {
    stdout: (text) => process.stdout.write(text),
    stderr: (text) => process.stderr.write(text),
    env: process.env,
  };
}
