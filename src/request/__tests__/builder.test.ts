/**
 * Tests for signed request construction
 */

import { describe, it, expect } from 'vitest';
import { buildSignedRequest, toHttpRequest } from '../builder.js';
import { EMPTY_SHA256 } from '../../signing/index.js';
import { ConfigError } from '../../errors/index.js';

const CONFIG = {
  endpoint: 'http://localhost:9000',
  region: 'us-east-1',
  accessKey: 'test-access-key',
  secretKey: 'test-secret',
};

const TIMESTAMP = new Date(Date.UTC(2024, 0, 15, 10, 30, 0));

describe('buildSignedRequest', () => {
  it('should sign a bucket listing with the empty payload hash', async () => {
    const signed = await buildSignedRequest(
      CONFIG,
      { method: 'GET', bucket: 'test-bucket', parameters: { 'max-keys': '30' } },
      TIMESTAMP
    );

    expect(signed.url.toString()).toBe('http://localhost:9000/test-bucket/?max-keys=30');
    expect(signed.headers['x-amz-content-sha256']).toBe(EMPTY_SHA256);
    expect(signed.headers['x-amz-date']).toBe('20240115T103000Z');
    expect(signed.headers['host']).toBe('localhost:9000');
    expect(signed.headers['authorization']).toMatch(
      /^AWS4-HMAC-SHA256 Credential=test-access-key\/20240115\/us-east-1\/s3\/aws4_request, SignedHeaders=host;x-amz-content-sha256;x-amz-date, Signature=[0-9a-f]{64}$/
    );
  });

  it('should produce identical signatures for identical inputs', async () => {
    const spec = { method: 'GET' as const, bucket: 'test-bucket', parameters: { uploads: '' } };
    const first = await buildSignedRequest(CONFIG, spec, TIMESTAMP);
    const second = await buildSignedRequest(CONFIG, spec, TIMESTAMP);

    expect(second.signature).toBe(first.signature);
  });

  it('should hash and carry a request body', async () => {
    const signed = await buildSignedRequest(
      CONFIG,
      { method: 'PUT', bucket: 'test-bucket', key: 'greeting.txt', body: new TextEncoder().encode('hello') },
      TIMESTAMP
    );

    expect(signed.headers['x-amz-content-sha256']).toBe(
      '2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824'
    );
    expect(new TextDecoder().decode(signed.body)).toBe('hello');
  });

  it('should sign extra headers', async () => {
    const signed = await buildSignedRequest(
      CONFIG,
      { method: 'GET', bucket: 'test-bucket', headers: { 'X-Amz-Request-Payer': 'requester' } },
      TIMESTAMP
    );

    expect(signed.headers['authorization']).toContain(
      'SignedHeaders=host;x-amz-content-sha256;x-amz-date;x-amz-request-payer'
    );
  });

  it('should propagate endpoint errors', async () => {
    await expect(
      buildSignedRequest({ ...CONFIG, endpoint: 'ftp://localhost' }, { method: 'GET', bucket: 'b' })
    ).rejects.toBeInstanceOf(ConfigError);
  });
});

describe('toHttpRequest', () => {
  it('should carry method, URL string, headers and body', async () => {
    const signed = await buildSignedRequest(
      CONFIG,
      { method: 'GET', bucket: 'test-bucket' },
      TIMESTAMP
    );
    const request = toHttpRequest(signed);

    expect(request.method).toBe('GET');
    expect(request.url).toBe('http://localhost:9000/test-bucket/');
    expect(request.headers).toEqual(signed.headers);
    expect(request.body).toHaveLength(0);
  });
});
