/**
 * Configuration module
 * @module config
 */

export type { ServerConfig, ServerConfigOptions, ServerSettings } from './types.js';

export {
  GLOBAL_DEFAULT_REGION,
  AMAZON_DEFAULT_REGION,
  DEFAULT_CONNECT_TIMEOUT,
  DEFAULT_EXPECTED_STATUS,
} from './defaults.js';

export { parseEndpoint, isAmazonEndpoint, getAmazonS3Host } from './endpoint.js';

export { validateConfig, normalizeConfig, resolveRegion } from './validation.js';

export { ServerConfigBuilder } from './builder.js';

export { createConfigFromEnv, ENV_VARS } from './env.js';

export {
  createServerConfig,
  closeServerConfig,
  type ServerConfigDependencies,
} from './server-config.js';
