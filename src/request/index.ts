/**
 * Request construction: target URL, payload hash, signed request
 * @module request
 */

export { makeTargetUrl, type QueryParameters } from './target-url.js';
export { computeHash, type ContentHash, type PayloadSource } from './content-hash.js';
export { buildSignedRequest, toHttpRequest, type RequestSpec } from './builder.js';
