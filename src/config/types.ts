/**
 * Configuration type definitions
 * @module config/types
 */

import type { HttpTransport } from '../transport/index.js';
import type { Logger } from '../observability/index.js';

/**
 * Server connection parameters as supplied by the caller.
 */
export interface ServerConfigOptions {
  /**
   * Endpoint URL of the server under test, e.g. `https://play.example.com:9000`.
   */
  endpoint: string;

  /**
   * Access key ID.
   */
  accessKey: string;

  /**
   * Secret access key.
   */
  secretKey: string;

  /**
   * Signing region. Defaults to `us-west-1` for Amazon S3 endpoints and
   * `us-east-1` for everything else.
   */
  region?: string;

  /**
   * Trace every HTTP exchange and log at debug level.
   * @default false
   */
  verbose?: boolean;

  /**
   * Dial plus TLS handshake timeout in milliseconds.
   * @default 5000
   */
  connectTimeout?: number;
}

/**
 * Validated options with every default applied.
 */
export type ServerSettings = Readonly<Required<ServerConfigOptions>>;

/**
 * Settings plus the shared HTTP client and logger of a run.
 * Constructed once at startup and read-only thereafter.
 */
export interface ServerConfig extends ServerSettings {
  readonly transport: HttpTransport;
  readonly logger: Logger;
}
