/**
 * Fluent configuration builder
 * @module config/builder
 */

import type { ServerConfigOptions, ServerSettings } from './types.js';
import { normalizeConfig } from './validation.js';

/**
 * Fluent builder for server settings.
 */
export class ServerConfigBuilder {
  private readonly config: Partial<ServerConfigOptions> = {};

  /**
   * Sets the endpoint URL of the server under test.
   */
  endpoint(url: string): this {
    this.config.endpoint = url;
    return this;
  }

  /**
   * Sets the access credentials.
   */
  credentials(accessKey: string, secretKey: string): this {
    this.config.accessKey = accessKey;
    this.config.secretKey = secretKey;
    return this;
  }

  /**
   * Sets the signing region explicitly.
   */
  region(region: string): this {
    this.config.region = region;
    return this;
  }

  /**
   * Enables or disables HTTP tracing.
   */
  verbose(enabled = true): this {
    this.config.verbose = enabled;
    return this;
  }

  /**
   * Sets the dial plus TLS handshake timeout in milliseconds.
   */
  connectTimeout(ms: number): this {
    this.config.connectTimeout = ms;
    return this;
  }

  /**
   * Builds and validates the settings.
   *
   * @throws {ConfigError} If configuration is invalid
   */
  build(): ServerSettings {
    return normalizeConfig(this.config);
  }
}
