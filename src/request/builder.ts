/**
 * Signed request construction
 * @module request/builder
 */

import type { ServerConfig } from '../config/index.js';
import { SignatureV4Signer, type HttpMethod, type SignedRequest } from '../signing/index.js';
import type { HttpRequest } from '../transport/index.js';
import { makeTargetUrl, type QueryParameters } from './target-url.js';
import { computeHash, type PayloadSource } from './content-hash.js';

/**
 * What to request: the operation-specific part of a signed request.
 */
export interface RequestSpec {
  readonly method: HttpMethod;
  readonly bucket: string;
  /** Object key; empty or absent addresses the bucket root */
  readonly key?: string;
  readonly parameters?: QueryParameters;
  /** Request payload; GET-style list operations send none */
  readonly body?: PayloadSource;
  /** Extra headers to sign and send */
  readonly headers?: Readonly<Record<string, string>>;
}

type SigningConfig = Pick<ServerConfig, 'endpoint' | 'region' | 'accessKey' | 'secretKey'>;

// One signer per config so same-day signing keys are derived once per run.
const signers = new WeakMap<SigningConfig, SignatureV4Signer>();

function signerFor(config: SigningConfig): SignatureV4Signer {
  let signer = signers.get(config);
  if (!signer) {
    signer = new SignatureV4Signer({
      accessKey: config.accessKey,
      secretKey: config.secretKey,
      region: config.region,
    });
    signers.set(config, signer);
  }
  return signer;
}

/**
 * Builds a fully formed, signed request for the configured server.
 *
 * URL and hashing failures propagate unchanged; no request is returned.
 */
export async function buildSignedRequest(
  config: SigningConfig,
  spec: RequestSpec,
  timestamp: Date = new Date()
): Promise<SignedRequest> {
  const url = makeTargetUrl(config.endpoint, spec.bucket, spec.key ?? '', config.region, spec.parameters);
  const hash = await computeHash(spec.body ?? new Uint8Array(0));

  return signerFor(config).signRequest(
    {
      method: spec.method,
      url,
      headers: {
        ...spec.headers,
        'x-amz-content-sha256': hash.sha256Hex,
      },
      body: hash.body,
    },
    hash.sha256Hex,
    timestamp
  );
}

/**
 * Converts a signed request into the transport's wire form
 */
export function toHttpRequest(request: SignedRequest): HttpRequest {
  return {
    method: request.method,
    url: request.url.toString(),
    headers: { ...request.headers },
    body: request.body,
  };
}
