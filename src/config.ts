/**
 * Environment-derived defaults for the CLI and the JSON bindings
 */

import { ENV } from './constants.js';
import type { LogFormat } from './logger.js';

export interface ClientConfig {
  /** `IRI_BASE_URL`; absent means the catalog's default server */
  baseUrl?: string;
  /** `IRI_ACCESS_TOKEN` */
  accessToken?: string;
  logFormat: LogFormat;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ClientConfig {
  return {
    baseUrl: nonEmpty(env[ENV.BASE_URL]),
    accessToken: nonEmpty(env[ENV.ACCESS_TOKEN]),
    logFormat: env[ENV.LOG_FORMAT] === 'json' ? 'json' : 'console',
  };
}

// An exported-but-empty variable counts as unset
function nonEmpty(value: string | undefined): string | undefined {
  return value && value.length > 0 ? value : undefined;
}
