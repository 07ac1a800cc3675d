/**
 * Signing types for S3 Signature V4 authentication
 */

export type HttpMethod = 'GET' | 'PUT' | 'POST' | 'DELETE' | 'HEAD';

export interface SigningRequest {
  method: HttpMethod;
  url: URL;
  headers: Record<string, string>;
  body: Uint8Array;
}

/**
 * A request carrying `host`, `x-amz-date`, `x-amz-content-sha256` and
 * `authorization`; ready to send verbatim
 */
export interface SignedRequest extends SigningRequest {
  readonly signature: string;
  readonly amzDate: string;
}

export interface SignerCredentials {
  accessKey: string;
  secretKey: string;
  region: string;
  /** @default 's3' */
  service?: string;
}
