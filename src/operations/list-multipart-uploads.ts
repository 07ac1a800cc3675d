/**
 * ListMultipartUploads: GET /bucket/?uploads=
 * @module operations/list-multipart-uploads
 */

import { DEFAULT_EXPECTED_STATUS } from '../config/index.js';
import type { FixtureContext, ObjectMultipartInfo } from '../fixtures/index.js';
import { matchUpload, verifyListing, type ListingExpectation } from '../verify/index.js';
import {
  parseListMultipartUploadsResponse,
  type ListMultipartUploadsResult,
} from '../xml/index.js';
import type { ConformanceOperation, OperationVariant } from './types.js';

/**
 * Expected result of an upload listing of the fixture bucket. With
 * `maxUploads` the expected page is the first `maxUploads` uploads by key.
 */
export function buildExpectedMultipartUploads(
  fixtures: FixtureContext,
  maxUploads?: number
): ListingExpectation<ObjectMultipartInfo> {
  return {
    bucket: fixtures.bucket,
    entries: maxUploads === undefined ? fixtures.uploads : fixtures.uploads.slice(0, maxUploads),
    population: fixtures.uploads,
    ...(maxUploads !== undefined && { limit: maxUploads }),
  };
}

/**
 * Compares a decoded ListMultipartUploadsResult with its expectation
 *
 * @throws VerificationError on the first mismatch
 */
export function verifyListMultipartUploadsResult(
  result: ListMultipartUploadsResult,
  expectation: ListingExpectation<ObjectMultipartInfo>
): void {
  verifyListing(
    'Uploads',
    expectation,
    {
      bucket: result.bucket,
      entries: result.uploads,
      commonPrefixCount: result.commonPrefixes.length,
    },
    matchUpload
  );
}

function uploadsVariant(
  fixtures: FixtureContext,
  description: string,
  maxUploads?: number
): OperationVariant {
  const expectation = buildExpectedMultipartUploads(fixtures, maxUploads);
  const parameters: Record<string, string> = { uploads: '' };
  if (maxUploads !== undefined) {
    parameters['max-uploads'] = String(maxUploads);
  }

  return {
    description,
    request: { method: 'GET', bucket: fixtures.bucket, parameters },
    expectedStatus: DEFAULT_EXPECTED_STATUS,
    verifyBody: (body) =>
      verifyListMultipartUploadsResult(parseListMultipartUploadsResponse(body), expectation),
  };
}

/**
 * Lists every in-progress upload, then one fewer than that with max-uploads
 */
export const listMultipartUploads: ConformanceOperation = {
  name: 'ListMultipartUploads',
  variants(fixtures) {
    const variants = [uploadsVariant(fixtures, 'all uploads')];
    const count = fixtures.uploads.length;
    if (count > 1) {
      variants.push(uploadsVariant(fixtures, `max-uploads=${count - 1}`, count - 1));
    }
    return variants;
  },
};
