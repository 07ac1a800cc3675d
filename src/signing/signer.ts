/**
 * SignatureV4Signer - request signing for S3 Signature V4
 */

import { sha256Hex, hmacSha256, toHex } from './crypto.js';
import { createCanonicalRequest, getSignedHeaders } from './canonical.js';
import { formatDateStamp, formatAmzDate } from './format.js';
import { SigningKeyCache } from './key-derivation.js';
import type { SignedRequest, SignerCredentials, SigningRequest } from './types.js';

export const SIGNING_ALGORITHM = 'AWS4-HMAC-SHA256';
export const EMPTY_SHA256 =
  'e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855';

export class SignatureV4Signer {
  private readonly accessKey: string;
  private readonly secretKey: string;
  private readonly region: string;
  private readonly service: string;
  private readonly keyCache = new SigningKeyCache();

  constructor(credentials: SignerCredentials) {
    this.accessKey = credentials.accessKey;
    this.secretKey = credentials.secretKey;
    this.region = credentials.region;
    this.service = credentials.service ?? 's3';
  }

  /**
   * Credential scope: date/region/service/aws4_request
   */
  credentialScope(dateStamp: string): string {
    return `${dateStamp}/${this.region}/${this.service}/aws4_request`;
  }

  /**
   * Sign a request with S3 Signature V4.
   * Adds host, x-amz-date, x-amz-content-sha256 and authorization headers to
   * a copy of the request; the input is left untouched.
   */
  signRequest(request: SigningRequest, payloadHash: string, timestamp: Date = new Date()): SignedRequest {
    const amzDate = formatAmzDate(timestamp);
    const dateStamp = formatDateStamp(timestamp);

    const headers: Record<string, string> = {};
    for (const [name, value] of Object.entries(request.headers)) {
      headers[name.toLowerCase()] = value;
    }
    headers['host'] = request.url.host;
    headers['x-amz-date'] = amzDate;
    headers['x-amz-content-sha256'] = payloadHash;

    const canonicalRequest = createCanonicalRequest(request.method, request.url, headers, payloadHash);

    const credentialScope = this.credentialScope(dateStamp);
    const stringToSign = [
      SIGNING_ALGORITHM,
      amzDate,
      credentialScope,
      sha256Hex(canonicalRequest),
    ].join('\n');

    const signingKey = this.keyCache.getSigningKey(this.secretKey, dateStamp, this.region, this.service);
    const signature = toHex(hmacSha256(signingKey, stringToSign));

    headers['authorization'] = [
      `${SIGNING_ALGORITHM} Credential=${this.accessKey}/${credentialScope}`,
      `SignedHeaders=${getSignedHeaders(headers)}`,
      `Signature=${signature}`,
    ].join(', ');

    return {
      ...request,
      headers,
      signature,
      amzDate,
    };
  }
}
