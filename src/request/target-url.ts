/**
 * Target URL construction for path-style S3 requests
 * @module request/target-url
 */

import { getAmazonS3Host, isAmazonEndpoint, parseEndpoint } from '../config/endpoint.js';
import { encodeQuery, uriEncode, uriEncodePath } from '../signing/index.js';

/**
 * Query parameters keyed by name. An empty value is sent as `name=`.
 */
export type QueryParameters = Readonly<Record<string, string>>;

/**
 * Builds the fully qualified URL of a bucket or object.
 *
 * - path-style: `/bucket/` for the bucket root, `/bucket/key` for an object,
 *   below any path the endpoint carries
 * - object keys are RFC 3986 encoded with `/` kept
 * - query parameters are RFC 3986 encoded and sorted by name
 * - Amazon S3 endpoints are pointed at the regional host
 *
 * @throws {ConfigError} InvalidEndpoint when the endpoint is not an http(s) URL
 *
 * @example
 * ```typescript
 * makeTargetUrl('http://localhost:9000', 'photos', '', 'us-east-1', { 'max-keys': '30' });
 * // http://localhost:9000/photos/?max-keys=30
 * ```
 */
export function makeTargetUrl(
  endpoint: string,
  bucket: string,
  key: string,
  region: string,
  query: QueryParameters = {}
): URL {
  const endpointUrl = parseEndpoint(endpoint);
  const host = isAmazonEndpoint(endpointUrl) ? getAmazonS3Host(region) : endpointUrl.host;

  let path = `${endpointUrl.pathname.replace(/\/+$/, '')}/`;
  if (bucket) {
    path += `${uriEncode(bucket)}/`;
    if (key) {
      path += uriEncodePath(key);
    }
  }

  const queryString = encodeQuery(Object.entries(query));

  return new URL(`${endpointUrl.protocol}//${host}${path}${queryString ? `?${queryString}` : ''}`);
}
