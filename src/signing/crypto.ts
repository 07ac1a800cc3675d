/**
 * Cryptographic utilities for S3 Signature V4 signing
 * Uses @noble/hashes for SHA-256 and HMAC-SHA256
 */

import { hmac } from '@noble/hashes/hmac';
import { sha256 } from '@noble/hashes/sha256';

const encoder = new TextEncoder();

function toBytes(data: string | Uint8Array): Uint8Array {
  return typeof data === 'string' ? encoder.encode(data) : data;
}

/**
 * Compute HMAC-SHA256
 */
export function hmacSha256(key: Uint8Array, data: string | Uint8Array): Uint8Array {
  return hmac(sha256, key, toBytes(data));
}

/**
 * Compute SHA-256 hash
 */
export function sha256Hash(data: string | Uint8Array): Uint8Array {
  return sha256(toBytes(data));
}

/**
 * Compute SHA-256 hash and return as hex string
 */
export function sha256Hex(data: string | Uint8Array): string {
  return toHex(sha256Hash(data));
}

/**
 * Incremental SHA-256 for payloads that arrive in chunks
 */
export function createSha256Hasher(): { update(chunk: Uint8Array): void; digestHex(): string } {
  const hash = sha256.create();
  return {
    update(chunk: Uint8Array): void {
      hash.update(chunk);
    },
    digestHex(): string {
      return toHex(hash.digest());
    },
  };
}

/**
 * Convert byte array to hex string
 */
export function toHex(bytes: Uint8Array): string {
  return Array.from(bytes)
    .map((b) => b.toString(16).padStart(2, '0'))
    .join('');
}
