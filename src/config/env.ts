/**
 * Environment variable configuration loading
 * @module config/env
 */

import { ConfigError } from '../errors/index.js';
import type { ServerSettings } from './types.js';
import { normalizeConfig } from './validation.js';

/**
 * Environment variable names.
 */
export const ENV_VARS = {
  URL: 'S3_URL',
  ACCESS: 'S3_ACCESS',
  SECRET: 'S3_SECRET',
  REGION: 'S3_REGION',
  VERBOSE: 'S3_VERBOSE',
  CONNECT_TIMEOUT_MS: 'S3_CONNECT_TIMEOUT_MS',
} as const;

function parseBoolEnv(value: string | undefined): boolean | undefined {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  return ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());
}

function parseIntEnv(value: string | undefined, name: string): number | undefined {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }

  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed)) {
    throw ConfigError.invalidConfig(name, `${name} must be a valid integer, got: ${value}`);
  }
  return parsed;
}

function emptyToUndefined(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === '' ? undefined : value;
}

/**
 * Creates server settings from environment variables.
 *
 * - S3_URL (required): endpoint URL
 * - S3_ACCESS (required): access key ID
 * - S3_SECRET (required): secret access key
 * - S3_REGION (optional): signing region
 * - S3_VERBOSE (optional): `true`/`1` to trace HTTP exchanges
 * - S3_CONNECT_TIMEOUT_MS (optional): dial plus TLS handshake timeout
 *
 * @throws {ConfigError} If required variables are missing or invalid
 */
export function createConfigFromEnv(env: NodeJS.ProcessEnv = process.env): ServerSettings {
  return normalizeConfig({
    endpoint: env[ENV_VARS.URL] ?? '',
    accessKey: env[ENV_VARS.ACCESS] ?? '',
    secretKey: env[ENV_VARS.SECRET] ?? '',
    region: emptyToUndefined(env[ENV_VARS.REGION]),
    verbose: parseBoolEnv(env[ENV_VARS.VERBOSE]),
    connectTimeout: parseIntEnv(env[ENV_VARS.CONNECT_TIMEOUT_MS], ENV_VARS.CONNECT_TIMEOUT_MS),
  });
}
