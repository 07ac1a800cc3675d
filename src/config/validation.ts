/**
 * Configuration validation and normalization
 * @module config/validation
 */

import { z } from 'zod';
import { ConfigError } from '../errors/index.js';
import type { ServerConfigOptions, ServerSettings } from './types.js';
import { AMAZON_DEFAULT_REGION, DEFAULT_CONNECT_TIMEOUT, GLOBAL_DEFAULT_REGION } from './defaults.js';
import { isAmazonEndpoint, parseEndpoint } from './endpoint.js';

const ServerConfigOptionsSchema = z.object({
  endpoint: z.string().trim().min(1),
  accessKey: z.string().min(1),
  secretKey: z.string().min(1),
  region: z
    .string()
    .trim()
    .regex(/^([a-z0-9-]+)?$/, 'region must contain only lowercase letters, digits and hyphens')
    .optional(),
  verbose: z.boolean().optional(),
  connectTimeout: z.number().int().positive().optional(),
});

/**
 * Validates raw configuration input.
 *
 * @throws {ConfigError} If a required field is missing or a value is invalid
 */
export function validateConfig(input: unknown): ServerConfigOptions {
  const result = ServerConfigOptionsSchema.safeParse(input);
  if (!result.success) {
    throw toConfigError(result.error);
  }

  parseEndpoint(result.data.endpoint);

  return result.data;
}

function toConfigError(error: z.ZodError): ConfigError {
  const issue = error.issues[0];
  const field = issue ? String(issue.path[0] ?? '') : '';

  if (field === 'accessKey' || field === 'secretKey') {
    return ConfigError.missingCredentials(field);
  }

  if (field === 'endpoint') {
    return ConfigError.invalidConfig('endpoint', 'endpoint is required');
  }

  return ConfigError.invalidConfig(field, issue ? `${field}: ${issue.message}` : undefined);
}

/**
 * Region to sign with: the configured one, else a default chosen by whether
 * the endpoint is an Amazon S3 host.
 */
export function resolveRegion(endpoint: URL, region?: string): string {
  if (region) {
    return region;
  }
  return isAmazonEndpoint(endpoint) ? AMAZON_DEFAULT_REGION : GLOBAL_DEFAULT_REGION;
}

/**
 * Validates configuration and applies defaults.
 *
 * @throws {ConfigError} If configuration is invalid
 */
export function normalizeConfig(input: unknown): ServerSettings {
  const options = validateConfig(input);
  const endpointUrl = parseEndpoint(options.endpoint);

  return Object.freeze({
    endpoint: options.endpoint,
    accessKey: options.accessKey,
    secretKey: options.secretKey,
    region: resolveRegion(endpointUrl, options.region),
    verbose: options.verbose ?? false,
    connectTimeout: options.connectTimeout ?? DEFAULT_CONNECT_TIMEOUT,
  });
}
