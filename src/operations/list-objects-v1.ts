/**
 * ListObjects (V1): GET /bucket/
 * @module operations/list-objects-v1
 */

import { DEFAULT_EXPECTED_STATUS } from '../config/index.js';
import type { FixtureContext, ObjectInfo } from '../fixtures/index.js';
import { matchObject, verifyListing, type ListingExpectation } from '../verify/index.js';
import { parseListObjectsV1Response, type ListBucketResult } from '../xml/index.js';
import type { ConformanceOperation, OperationVariant } from './types.js';

/**
 * Page size of the limited listing variant
 */
export const LIST_OBJECTS_MAX_KEYS = 30;

/**
 * Expected result of a listing of the fixture bucket. With `maxKeys` the
 * expected page is the first `maxKeys` objects by key.
 */
export function buildExpectedListBucketResult(
  fixtures: FixtureContext,
  maxKeys?: number
): ListingExpectation<ObjectInfo> {
  return {
    bucket: fixtures.bucket,
    entries: maxKeys === undefined ? fixtures.objects : fixtures.objects.slice(0, maxKeys),
    population: fixtures.objects,
    ...(maxKeys !== undefined && { limit: maxKeys }),
  };
}

/**
 * Compares a decoded ListBucketResult with its expectation
 *
 * @throws VerificationError on the first mismatch
 */
export function verifyListBucketResult(
  result: ListBucketResult,
  expectation: ListingExpectation<ObjectInfo>
): void {
  verifyListing(
    'Objects',
    expectation,
    {
      bucket: result.name,
      entries: result.contents,
      commonPrefixCount: result.commonPrefixes.length,
    },
    matchObject
  );
}

function listVariant(
  fixtures: FixtureContext,
  description: string,
  maxKeys?: number
): OperationVariant {
  const expectation = buildExpectedListBucketResult(fixtures, maxKeys);
  return {
    description,
    request: {
      method: 'GET',
      bucket: fixtures.bucket,
      ...(maxKeys !== undefined && { parameters: { 'max-keys': String(maxKeys) } }),
    },
    expectedStatus: DEFAULT_EXPECTED_STATUS,
    verifyBody: (body) => verifyListBucketResult(parseListObjectsV1Response(body), expectation),
  };
}

/**
 * Lists the whole bucket, then lists it again with max-keys
 */
export const listObjectsV1: ConformanceOperation = {
  name: 'ListObjects V1',
  variants(fixtures) {
    const maxKeys = Math.min(LIST_OBJECTS_MAX_KEYS, fixtures.objects.length);
    return [
      listVariant(fixtures, 'all objects'),
      listVariant(fixtures, `max-keys=${maxKeys}`, maxKeys),
    ];
  },
};
