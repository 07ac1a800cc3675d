/**
 * Whole-response verification
 * @module verify/response
 */

import { VerificationError, isConformanceError } from '../errors/index.js';
import { bodyText, type HttpResponse } from '../transport/index.js';
import { verifyStandardHeaders } from './headers.js';
import { verifyStatus } from './status.js';

/**
 * Decodes a response body and compares it with the expected result.
 * Decoding failures are plain errors; comparison failures are
 * VerificationErrors.
 */
export type BodyCheck = (body: string) => void;

/**
 * Runs the status, header and body checks in that order, stopping at the
 * first failure. The body is not looked at unless the status matched.
 *
 * @throws VerificationError describing the first mismatch
 */
export function verifyResponse(
  response: HttpResponse,
  expectedStatus: string,
  checkBody: BodyCheck
): void {
  verifyStatus(response, expectedStatus);
  verifyStandardHeaders(response);

  try {
    checkBody(bodyText(response));
  } catch (error) {
    if (isConformanceError(error)) {
      throw error;
    }
    throw VerificationError.malformedBody(
      error instanceof Error ? error.message : String(error),
      error
    );
  }
}
