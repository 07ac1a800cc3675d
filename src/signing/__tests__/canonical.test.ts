/**
 * Tests for canonical request construction
 */

import { describe, it, expect } from 'vitest';
import {
  uriEncode,
  uriEncodePath,
  encodeQuery,
  getCanonicalQueryString,
  getCanonicalHeaders,
  getSignedHeaders,
  createCanonicalRequest,
} from '../canonical.js';
import { EMPTY_SHA256 } from '../signer.js';

describe('uriEncode', () => {
  it('should leave unreserved characters alone', () => {
    expect(uriEncode('AZaz09-_.~')).toBe('AZaz09-_.~');
  });

  it('should encode reserved characters that encodeURIComponent keeps', () => {
    expect(uriEncode("!'()*")).toBe('%21%27%28%29%2A');
  });

  it('should encode slashes and spaces', () => {
    expect(uriEncode('a b/c')).toBe('a%20b%2Fc');
  });

  it('should percent-encode UTF-8 bytes in upper case', () => {
    expect(uriEncode('é')).toBe('%C3%A9');
  });

  it('should keep slashes in paths', () => {
    expect(uriEncodePath('dir/file name.txt')).toBe('dir/file%20name.txt');
  });
});

describe('encodeQuery', () => {
  it('should sort parameters by key', () => {
    expect(
      encodeQuery([
        ['uploads', ''],
        ['max-uploads', '2'],
      ])
    ).toBe('max-uploads=2&uploads=');
  });

  it('should encode keys and values', () => {
    expect(encodeQuery([['prefix', 'a b&c']])).toBe('prefix=a%20b%26c');
  });

  it('should return an empty string for no parameters', () => {
    expect(encodeQuery([])).toBe('');
  });
});

describe('getCanonicalQueryString', () => {
  it('should not double-encode an already encoded query', () => {
    const url = new URL('http://localhost:9000/test-bucket/?prefix=a%20b');
    expect(getCanonicalQueryString(url.searchParams)).toBe('prefix=a%20b');
  });

  it('should keep empty values as key=', () => {
    const url = new URL('http://localhost:9000/test-bucket/?uploads=');
    expect(getCanonicalQueryString(url.searchParams)).toBe('uploads=');
  });
});

describe('getCanonicalHeaders', () => {
  it('should lowercase, sort and trim headers', () => {
    const canonical = getCanonicalHeaders({
      'X-Amz-Date': '20240115T103000Z',
      Host: '  localhost:9000  ',
      'X-Custom': 'a   b',
    });

    expect(canonical).toBe(
      'host:localhost:9000\nx-amz-date:20240115T103000Z\nx-custom:a b\n'
    );
  });
});

describe('getSignedHeaders', () => {
  it('should list sorted lowercase header names', () => {
    expect(
      getSignedHeaders({ 'X-Amz-Date': 'x', host: 'y', 'x-amz-content-sha256': 'z' })
    ).toBe('host;x-amz-content-sha256;x-amz-date');
  });
});

describe('createCanonicalRequest', () => {
  it('should assemble the canonical request for a bucket listing', () => {
    const url = new URL('http://localhost:9000/test-bucket/?max-keys=30');
    const headers = {
      host: 'localhost:9000',
      'x-amz-content-sha256': EMPTY_SHA256,
      'x-amz-date': '20240115T103000Z',
    };

    expect(createCanonicalRequest('get', url, headers, EMPTY_SHA256)).toBe(
      [
        'GET',
        '/test-bucket/',
        'max-keys=30',
        'host:localhost:9000',
        `x-amz-content-sha256:${EMPTY_SHA256}`,
        'x-amz-date:20240115T103000Z',
        '',
        'host;x-amz-content-sha256;x-amz-date',
        EMPTY_SHA256,
      ].join('\n')
    );
  });
});
