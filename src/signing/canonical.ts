/**
 * Canonical request construction for S3 Signature V4
 */

const encoder = new TextEncoder();

/**
 * URI encode following S3 requirements (RFC 3986)
 * Different from standard encodeURIComponent, which leaves !'()* alone
 */
export function uriEncode(str: string, encodeSlash = true): string {
  let encoded = '';
  for (const char of str) {
    const code = char.charCodeAt(0);

    // Unreserved characters: A-Z a-z 0-9 - _ . ~
    if (
      (code >= 0x41 && code <= 0x5a) || // A-Z
      (code >= 0x61 && code <= 0x7a) || // a-z
      (code >= 0x30 && code <= 0x39) || // 0-9
      code === 0x2d || // -
      code === 0x5f || // _
      code === 0x2e || // .
      code === 0x7e // ~
    ) {
      encoded += char;
    } else if (char === '/' && !encodeSlash) {
      encoded += '/';
    } else {
      for (const byte of encoder.encode(char)) {
        encoded += '%' + byte.toString(16).toUpperCase().padStart(2, '0');
      }
    }
  }
  return encoded;
}

/**
 * URI encode path (preserve slashes)
 */
export function uriEncodePath(path: string): string {
  return uriEncode(path, false);
}

/**
 * Get canonical URI from an already-encoded URL pathname.
 * S3 does not normalize paths, so the pathname is used as sent.
 */
export function getCanonicalUri(pathname: string): string {
  return pathname === '' ? '/' : pathname;
}

/**
 * Encodes query parameters as `k=v` pairs sorted by encoded key, then value.
 * Used both for the URL sent on the wire and for the canonical request, so
 * the two never disagree.
 */
export function encodeQuery(params: Iterable<[string, string]>): string {
  const pairs: Array<[string, string]> = [];
  for (const [key, value] of params) {
    pairs.push([uriEncode(key), uriEncode(value)]);
  }

  pairs.sort((a, b) => {
    if (a[0] < b[0]) return -1;
    if (a[0] > b[0]) return 1;
    if (a[1] < b[1]) return -1;
    if (a[1] > b[1]) return 1;
    return 0;
  });

  return pairs.map(([key, value]) => `${key}=${value}`).join('&');
}

/**
 * Get canonical query string from decoded URL search params
 */
export function getCanonicalQueryString(searchParams: URLSearchParams): string {
  return encodeQuery(searchParams.entries());
}

/**
 * Get canonical headers
 * Headers must be lowercase, sorted, and trimmed
 */
export function getCanonicalHeaders(headers: Record<string, string>): string {
  const lowered = new Map<string, string>();
  for (const [name, value] of Object.entries(headers)) {
    lowered.set(name.toLowerCase(), value.trim().replace(/\s+/g, ' '));
  }

  const canonical = [...lowered.keys()]
    .sort()
    .map((name) => `${name}:${lowered.get(name) ?? ''}`);

  // Must end with newline
  return canonical.join('\n') + '\n';
}

/**
 * Get signed headers (semicolon-separated list of lowercase header names)
 */
export function getSignedHeaders(headers: Record<string, string>): string {
  return [...new Set(Object.keys(headers).map((name) => name.toLowerCase()))].sort().join(';');
}

/**
 * Create canonical request for S3 Signature V4
 * Format:
 * HTTP_METHOD\n
 * CANONICAL_URI\n
 * CANONICAL_QUERY_STRING\n
 * CANONICAL_HEADERS\n
 * SIGNED_HEADERS\n
 * PAYLOAD_HASH
 */
export function createCanonicalRequest(
  method: string,
  url: URL,
  headers: Record<string, string>,
  payloadHash: string
): string {
  return [
    method.toUpperCase(),
    getCanonicalUri(url.pathname),
    getCanonicalQueryString(url.searchParams),
    getCanonicalHeaders(headers),
    getSignedHeaders(headers),
    payloadHash,
  ].join('\n');
}
