/**
 * Default configuration values
 * @module config/defaults
 */

/**
 * Region used for non-Amazon endpoints when none is configured.
 */
export const GLOBAL_DEFAULT_REGION = 'us-east-1';

/**
 * Region used for Amazon S3 endpoints when none is configured.
 */
export const AMAZON_DEFAULT_REGION = 'us-west-1';

/**
 * Dial plus TLS handshake timeout of the shared HTTP agent (5 seconds).
 * There is no per-request timeout.
 */
export const DEFAULT_CONNECT_TIMEOUT = 5000;

/**
 * Status line every list operation expects.
 */
export const DEFAULT_EXPECTED_STATUS = '200 OK';
