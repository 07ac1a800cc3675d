/**
 * Payload hashing for the x-amz-content-sha256 header
 * @module request/content-hash
 */

import { createSha256Hasher } from '../signing/index.js';
import { SigningError } from '../errors/index.js';

/**
 * Anything a request body can be read from.
 */
export type PayloadSource = Uint8Array | AsyncIterable<Uint8Array>;

/**
 * Result of hashing a payload.
 */
export interface ContentHash {
  /** Hex-encoded SHA-256 of the payload */
  readonly sha256Hex: string;
  /** Payload length in bytes */
  readonly size: number;
  /** Copy of the payload that can be read again when the request is sent */
  readonly body: Uint8Array;
}

/**
 * Hashes a payload, buffering it so it can be replayed as the request body.
 * The empty payload hashes to the well-known EMPTY_SHA256 digest.
 *
 * @throws {SigningError} IOError when reading the stream fails
 */
export async function computeHash(source: PayloadSource): Promise<ContentHash> {
  const hasher = createSha256Hasher();

  if (source instanceof Uint8Array) {
    hasher.update(source);
    return { sha256Hex: hasher.digestHex(), size: source.length, body: source.slice() };
  }

  const chunks: Uint8Array[] = [];
  let size = 0;
  try {
    for await (const chunk of source) {
      hasher.update(chunk);
      chunks.push(chunk);
      size += chunk.length;
    }
  } catch (error) {
    throw SigningError.ioError(error);
  }

  const body = new Uint8Array(size);
  let offset = 0;
  for (const chunk of chunks) {
    body.set(chunk, offset);
    offset += chunk.length;
  }

  return { sha256Hex: hasher.digestHex(), size, body };
}
