/**
 * Standard response header checks
 * @module verify/headers
 */

import { VerificationError } from '../errors/index.js';
import { getHeader, getRequestId, type HttpResponse } from '../transport/index.js';

/**
 * Checks the headers every S3 response carries: a parseable `Date` and a
 * non-empty `x-amz-request-id`.
 *
 * @throws VerificationError of kind UnexpectedHeader naming the header
 */
export function verifyStandardHeaders(response: HttpResponse): void {
  const date = getHeader(response.headers, 'date');
  if (date === undefined || date.trim() === '') {
    throw VerificationError.unexpectedHeader('Date', 'missing');
  }
  if (Number.isNaN(Date.parse(date))) {
    throw VerificationError.unexpectedHeader('Date', 'not a valid HTTP date', date);
  }

  const requestId = getRequestId(response.headers);
  if (requestId === undefined) {
    throw VerificationError.unexpectedHeader('x-amz-request-id', 'missing');
  }
  if (requestId.trim() === '') {
    throw VerificationError.unexpectedHeader('x-amz-request-id', 'empty', requestId);
  }
}
