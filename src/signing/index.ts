/**
 * S3 Signature V4 signing
 *
 * - Request signing with Authorization header
 * - Canonical request construction
 * - Signing key derivation with caching
 * - Cryptographic utilities (HMAC-SHA256, SHA-256)
 */

export type { HttpMethod, SigningRequest, SignedRequest, SignerCredentials } from './types.js';

export { SignatureV4Signer, SIGNING_ALGORITHM, EMPTY_SHA256 } from './signer.js';

export { hmacSha256, sha256Hash, sha256Hex, createSha256Hasher, toHex } from './crypto.js';

export {
  createCanonicalRequest,
  encodeQuery,
  getCanonicalUri,
  getCanonicalQueryString,
  getCanonicalHeaders,
  getSignedHeaders,
  uriEncode,
  uriEncodePath,
} from './canonical.js';

export { deriveSigningKey, SigningKeyCache } from './key-derivation.js';

export { formatDateStamp, formatAmzDate } from './format.js';
