/**
 * Endpoint classification helpers
 * @module config/endpoint
 */

import { ConfigError } from '../errors/index.js';

const AMAZON_S3_HOST = /^s3([.-][a-z0-9-]+)?\.amazonaws\.com(\.cn)?$/;

/**
 * Parses an endpoint string, accepting only absolute http(s) URLs.
 *
 * @throws {ConfigError} InvalidEndpoint
 */
export function parseEndpoint(endpoint: string): URL {
  let url: URL;
  try {
    url = new URL(endpoint);
  } catch (error) {
    throw ConfigError.invalidEndpoint(endpoint, error instanceof Error ? error.message : undefined);
  }

  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw ConfigError.invalidEndpoint(endpoint, 'endpoint must use http or https protocol');
  }
  if (!url.hostname) {
    throw ConfigError.invalidEndpoint(endpoint, 'endpoint has no host');
  }

  return url;
}

/**
 * True when the endpoint is an Amazon S3 host (s3.amazonaws.com or a
 * regional variant)
 */
export function isAmazonEndpoint(url: URL): boolean {
  return AMAZON_S3_HOST.test(url.hostname.toLowerCase());
}

/**
 * Regional Amazon S3 host for path-style requests
 */
export function getAmazonS3Host(region: string): string {
  if (region === 'us-east-1') {
    return 's3.amazonaws.com';
  }
  return region.startsWith('cn-') ? `s3.${region}.amazonaws.com.cn` : `s3.${region}.amazonaws.com`;
}
