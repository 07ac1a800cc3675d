/**
 * Tests for payload hashing
 */

import { describe, it, expect } from 'vitest';
import { computeHash } from '../content-hash.js';
import { EMPTY_SHA256 } from '../../signing/index.js';
import { SigningError } from '../../errors/index.js';

const HELLO_SHA256 = '2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824';

async function* chunks(...parts: string[]): AsyncGenerator<Uint8Array> {
  for (const part of parts) {
    yield new TextEncoder().encode(part);
  }
}

async function* failing(): AsyncGenerator<Uint8Array> {
  yield new TextEncoder().encode('partial');
  throw new Error('stream closed unexpectedly');
}

describe('computeHash', () => {
  it('should hash the empty payload to the well-known digest', async () => {
    const hash = await computeHash(new Uint8Array(0));

    expect(hash.sha256Hex).toBe(EMPTY_SHA256);
    expect(hash.size).toBe(0);
  });

  it('should hash a byte payload', async () => {
    const hash = await computeHash(new TextEncoder().encode('hello'));

    expect(hash.sha256Hex).toBe(HELLO_SHA256);
    expect(hash.size).toBe(5);
  });

  it('should give the same result for a stream of chunks', async () => {
    const hash = await computeHash(chunks('hel', 'lo'));

    expect(hash.sha256Hex).toBe(HELLO_SHA256);
    expect(hash.size).toBe(5);
    expect(new TextDecoder().decode(hash.body)).toBe('hello');
  });

  it('should be idempotent', async () => {
    const payload = new TextEncoder().encode('hello');

    expect((await computeHash(payload)).sha256Hex).toBe((await computeHash(payload)).sha256Hex);
  });

  it('should return a copy of the payload', async () => {
    const payload = new TextEncoder().encode('hello');
    const hash = await computeHash(payload);
    payload[0] = 0;

    expect(new TextDecoder().decode(hash.body)).toBe('hello');
  });

  it('should turn a stream failure into an IOError', async () => {
    const result = computeHash(failing());

    await expect(result).rejects.toBeInstanceOf(SigningError);
    await expect(computeHash(failing())).rejects.toMatchObject({
      kind: 'SigningError',
      code: 'IOError',
      message: 'Failed to read payload: stream closed unexpectedly',
    });
  });
});
