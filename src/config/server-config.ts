/**
 * ServerConfig construction: settings plus the shared HTTP client
 * @module config/server-config
 */

import type { ServerConfig, ServerConfigOptions, ServerSettings } from './types.js';
import { normalizeConfig } from './validation.js';
import {
  createFetchTransport,
  TracingTransport,
  type HttpTransport,
} from '../transport/index.js';
import { createLogger, type Logger } from '../observability/index.js';

/**
 * Collaborators that can be substituted, mainly by tests.
 */
export interface ServerConfigDependencies {
  transport?: HttpTransport;
  logger?: Logger;
}

/**
 * Creates the run-wide ServerConfig.
 * Verbose configs log at debug level and trace every HTTP exchange.
 *
 * @throws {ConfigError} If the options are invalid
 */
export function createServerConfig(
  options: ServerConfigOptions | ServerSettings,
  dependencies: ServerConfigDependencies = {}
): ServerConfig {
  const settings = normalizeConfig(options);
  const logger = dependencies.logger ?? createLogger(settings.verbose);
  const baseTransport = dependencies.transport ?? createFetchTransport(settings.connectTimeout);
  const transport = settings.verbose ? new TracingTransport(baseTransport, logger) : baseTransport;

  return Object.freeze({
    ...settings,
    transport,
    logger,
  });
}

/**
 * Releases the pooled connections of a ServerConfig's transport.
 */
export async function closeServerConfig(config: ServerConfig): Promise<void> {
  await config.transport.close();
}
