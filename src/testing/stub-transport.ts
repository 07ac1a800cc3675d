/**
 * In-process transport stand-in
 * @module testing/stub-transport
 */

import type { HttpRequest, HttpResponse, HttpTransport } from '../transport/index.js';

/**
 * Computes a response for a request
 */
export type StubHandler = (request: HttpRequest) => HttpResponse | Promise<HttpResponse>;

/**
 * A queued reply: a canned response, a handler, or an error to throw
 */
export type StubReply = HttpResponse | StubHandler | Error;

/**
 * Transport that never touches the network.
 *
 * Queued replies are used first, in order; once the queue is empty the
 * fallback handler answers. Every request is recorded.
 *
 * @example
 * ```typescript
 * const transport = new StubTransport();
 * transport.enqueue(xmlResponse('<ListBucketResult>...</ListBucketResult>'));
 * const config = createTestServerConfig({}, transport);
 * ```
 */
export class StubTransport implements HttpTransport {
  readonly requests: HttpRequest[] = [];
  private readonly queue: StubReply[] = [];
  private closed = false;

  constructor(private readonly fallback?: StubHandler) {}

  /**
   * Queues replies for the next requests
   */
  enqueue(...replies: StubReply[]): this {
    this.queue.push(...replies);
    return this;
  }

  async send(request: HttpRequest): Promise<HttpResponse> {
    this.requests.push(request);

    const reply = this.queue.shift() ?? this.fallback;
    if (reply === undefined) {
      throw new Error(`No stubbed response for ${request.method} ${request.url}`);
    }
    if (reply instanceof Error) {
      throw reply;
    }
    return typeof reply === 'function' ? reply(request) : reply;
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Most recent request, if any
   */
  get lastRequest(): HttpRequest | undefined {
    return this.requests[this.requests.length - 1];
  }
}
