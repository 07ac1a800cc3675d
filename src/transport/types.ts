/**
 * HTTP transport type definitions
 */

import { STATUS_CODES } from 'node:http';
import type { HttpMethod } from '../signing/index.js';

/**
 * HTTP request
 */
export interface HttpRequest {
  /** HTTP method */
  method: HttpMethod;
  /** Full URL including protocol, host, path, and query string */
  url: string;
  /** HTTP headers */
  headers: Record<string, string>;
  /** Request body (optional) */
  body?: Uint8Array;
}

/**
 * HTTP response with buffered body
 */
export interface HttpResponse {
  /** HTTP status code */
  status: number;
  /** Reason phrase as sent by the server (may be empty) */
  statusText: string;
  /** HTTP headers, names lowercased */
  headers: Record<string, string>;
  /** Response body, fully drained */
  body: Uint8Array;
}

/**
 * HTTP transport interface
 */
export interface HttpTransport {
  /**
   * Sends an HTTP request and returns the buffered response.
   * The body is always drained and released before this resolves or rejects.
   */
  send(request: HttpRequest): Promise<HttpResponse>;

  /**
   * Closes the transport and releases pooled connections
   */
  close(): Promise<void>;
}

/**
 * Helper to get header value (case-insensitive)
 */
export function getHeader(headers: Record<string, string>, name: string): string | undefined {
  const lowerName = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === lowerName) {
      return value;
    }
  }
  return undefined;
}

/**
 * Status line as `<code> <reason>`, e.g. "200 OK".
 * Servers that omit the reason phrase get the standard one for the code.
 */
export function getStatusLine(response: Pick<HttpResponse, 'status' | 'statusText'>): string {
  const reason = response.statusText || STATUS_CODES[response.status] || '';
  return reason ? `${response.status} ${reason}` : String(response.status);
}

/**
 * Helper to extract request ID from response headers
 */
export function getRequestId(headers: Record<string, string>): string | undefined {
  return getHeader(headers, 'x-amz-request-id');
}

/**
 * Decodes a response body as UTF-8 text
 */
export function bodyText(response: Pick<HttpResponse, 'body'>): string {
  return new TextDecoder().decode(response.body);
}
