/**
 * Transport wrapper that traces every HTTP exchange
 */

import type { HttpRequest, HttpResponse, HttpTransport } from './types.js';
import { bodyText, getStatusLine } from './types.js';
import type { Logger } from '../observability/index.js';

const REDACTED_HEADERS = new Set(['authorization']);

/**
 * Decorator around another transport that logs each request and response at
 * debug level. Signatures are redacted; bodies are logged as text.
 */
export class TracingTransport implements HttpTransport {
  constructor(
    private readonly inner: HttpTransport,
    private readonly logger: Logger
  ) {}

  async send(request: HttpRequest): Promise<HttpResponse> {
    this.logger.debug(`--> ${request.method} ${request.url}`, {
      headers: redactHeaders(request.headers),
      bodyBytes: request.body?.length ?? 0,
    });

    const started = Date.now();
    let response: HttpResponse;
    try {
      response = await this.inner.send(request);
    } catch (error) {
      this.logger.debug(`<-- ${request.method} ${request.url} failed`, {
        durationMs: Date.now() - started,
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }

    this.logger.debug(`<-- ${getStatusLine(response)}`, {
      durationMs: Date.now() - started,
      headers: response.headers,
      body: bodyText(response),
    });

    return response;
  }

  async close(): Promise<void> {
    return this.inner.close();
  }
}

/**
 * Copies headers with credentials replaced by a placeholder
 */
export function redactHeaders(headers: Record<string, string>): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers)) {
    result[name] = REDACTED_HEADERS.has(name.toLowerCase()) ? '[REDACTED]' : value;
  }
  return result;
}
