/**
 * HTTP transport layer
 *
 * - Buffered responses, always drained so pooled connections are reused
 * - Shared undici Agent with a connect timeout and no request timeout
 * - Tracing decorator for verbose runs
 */

export type { HttpRequest, HttpResponse, HttpTransport } from './types.js';

export { getHeader, getStatusLine, getRequestId, bodyText } from './types.js';

export type { FetchTransportOptions } from './fetch-transport.js';
export { FetchTransport, createFetchTransport } from './fetch-transport.js';

export { TracingTransport, redactHeaders } from './tracing-transport.js';
