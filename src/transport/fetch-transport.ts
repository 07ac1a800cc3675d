/**
 * undici-based HTTP transport
 */

import { Agent, fetch, type Dispatcher, type Response } from 'undici';
import type { HttpRequest, HttpResponse, HttpTransport } from './types.js';
import { TransportError, isConformanceError } from '../errors/index.js';
import { DEFAULT_CONNECT_TIMEOUT } from '../config/defaults.js';

/**
 * Fetch transport options
 */
export interface FetchTransportOptions {
  /** Dial plus TLS handshake timeout in milliseconds */
  connectTimeout: number;
  /** Dispatcher to send through instead of a new Agent, e.g. an undici MockAgent */
  dispatcher?: Dispatcher;
}

/**
 * HTTP transport over one shared undici Agent.
 *
 * The agent pools connections; every response body is drained before send()
 * settles. No per-request timeout is applied.
 */
export class FetchTransport implements HttpTransport {
  private readonly options: FetchTransportOptions;
  private readonly agent: Dispatcher;

  constructor(options: Partial<FetchTransportOptions> = {}) {
    this.options = { connectTimeout: options.connectTimeout ?? DEFAULT_CONNECT_TIMEOUT };
    this.agent =
      options.dispatcher ?? new Agent({ connect: { timeout: this.options.connectTimeout } });
  }

  async send(request: HttpRequest): Promise<HttpResponse> {
    let response: Response;
    try {
      response = await fetch(request.url, {
        method: request.method,
        headers: withoutHost(request.headers),
        body: request.body && request.body.length > 0 ? request.body : undefined,
        dispatcher: this.agent,
      });
    } catch (error) {
      throw this.handleError(error, request);
    }

    // Reading the body to the end is what hands the socket back to the pool;
    // a failed read destroys it instead.
    try {
      const body = new Uint8Array(await response.arrayBuffer());
      return {
        status: response.status,
        statusText: response.statusText,
        headers: convertHeaders(response),
        body,
      };
    } catch (error) {
      throw this.handleError(error, request);
    }
  }

  async close(): Promise<void> {
    await this.agent.close();
  }

  /**
   * Maps undici/fetch failures to TransportError.
   * fetch reports network failures as TypeError('fetch failed') with the
   * socket error as its cause.
   */
  private handleError(error: unknown, request: HttpRequest): Error {
    if (isConformanceError(error)) {
      return error;
    }

    if (!(error instanceof Error)) {
      return TransportError.connectionFailed(String(error), error);
    }

    const cause = error.cause instanceof Error ? error.cause : error;
    const code = errorCode(cause);
    const message = `${cause.name} ${cause.message} ${code ?? ''}`.toLowerCase();

    if (code === 'UND_ERR_CONNECT_TIMEOUT' || message.includes('connect timeout')) {
      return TransportError.connectTimeout(this.options.connectTimeout, error);
    }

    if (code === 'ENOTFOUND' || code === 'EAI_AGAIN' || message.includes('getaddrinfo')) {
      return TransportError.dnsError(request.url, error);
    }

    if (code === 'ECONNREFUSED' || code === 'ECONNRESET' || code === 'UND_ERR_SOCKET') {
      return TransportError.connectionReset(error);
    }

    return TransportError.connectionFailed(cause.message, error);
  }
}

/**
 * The dispatcher derives Host from the URL; it is signed with the same value.
 */
function withoutHost(headers: Record<string, string>): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers)) {
    if (name.toLowerCase() !== 'host') {
      result[name] = value;
    }
  }
  return result;
}

function convertHeaders(response: Response): Record<string, string> {
  const result: Record<string, string> = {};
  response.headers.forEach((value, key) => {
    result[key.toLowerCase()] = value;
  });
  return result;
}

function errorCode(error: Error): string | undefined {
  if ('code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Creates the shared transport for a run
 */
export function createFetchTransport(connectTimeout: number = DEFAULT_CONNECT_TIMEOUT): HttpTransport {
  return new FetchTransport({ connectTimeout });
}
