/**
 * Status line check
 * @module verify/status
 */

import { VerificationError } from '../errors/index.js';
import { bodyText, getStatusLine, type HttpResponse } from '../transport/index.js';
import { readErrorResponse } from '../xml/index.js';

/**
 * Checks the response status line against the expected literal, e.g. "200 OK".
 *
 * On a mismatch only an S3 `<Error>` envelope is read, never the expected
 * document; its code and message ride along as error details.
 *
 * @throws VerificationError of kind UnexpectedStatus
 */
export function verifyStatus(response: HttpResponse, expectedStatus: string): void {
  const received = getStatusLine(response);
  if (received === expectedStatus) {
    return;
  }

  const error = readErrorResponse(bodyText(response));
  if (!error) {
    throw VerificationError.unexpectedStatus(expectedStatus, received);
  }

  throw VerificationError.unexpectedStatus(expectedStatus, received, {
    errorCode: error.code,
    errorMessage: error.message,
    ...(error.requestId && { requestId: error.requestId }),
  });
}
