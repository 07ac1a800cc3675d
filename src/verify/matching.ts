/**
 * Set comparison of listed entries against fixture state
 * @module verify/matching
 */

import { VerificationError } from '../errors/index.js';
import type { ObjectInfo, ObjectMultipartInfo } from '../fixtures/index.js';
import { cleanETag, type ListedObject, type ListedUpload } from '../xml/index.js';

/**
 * What a listing should return.
 *
 * `entries` is the expected page; `population` is everything the page was
 * drawn from. A `limit` marks a max-keys/max-uploads listing.
 */
export interface ListingExpectation<T> {
  readonly bucket: string;
  readonly entries: readonly T[];
  readonly population: readonly T[];
  readonly limit?: number;
}

/**
 * What a listing actually returned
 */
export interface ReceivedListing<R> {
  readonly bucket: string;
  readonly entries: readonly R[];
  readonly commonPrefixCount: number;
}

export type EntryMatcher<T, R> = (expected: T, received: R) => boolean;

/**
 * Pairs each `wanted` entry with a distinct `available` entry and returns the
 * number paired. Order is never significant.
 */
export function countMatches<W, A>(
  wanted: readonly W[],
  available: readonly A[],
  matches: (wanted: W, available: A) => boolean
): number {
  const used = new Array<boolean>(available.length).fill(false);
  let matched = 0;

  for (const entry of wanted) {
    const index = available.findIndex((candidate, i) => !used[i] && matches(entry, candidate));
    if (index !== -1) {
      used[index] = true;
      matched++;
    }
  }

  return matched;
}

/**
 * Object entries match on key, size and ETag; the listed ETag is compared
 * without its surrounding quotes.
 */
export const matchObject: EntryMatcher<ObjectInfo, ListedObject> = (expected, received) =>
  expected.key === received.key &&
  expected.size === received.size &&
  expected.eTag === cleanETag(received.eTag);

/**
 * Upload entries match on key and upload ID, and on size when the server
 * reports one.
 */
export const matchUpload: EntryMatcher<ObjectMultipartInfo, ListedUpload> = (expected, received) =>
  expected.key === received.key &&
  expected.uploadId === received.uploadId &&
  (received.size === undefined || expected.size === received.size);

/**
 * Compares a received listing with its expectation: bucket first, then the
 * entry set, then the entry count.
 *
 * An unrestricted listing must contain every expected entry. A limited one
 * may return any `limit` entries of the population, so each received entry
 * must instead be found in the population.
 *
 * @param what - Plural noun for messages, e.g. "Objects"
 * @throws VerificationError of kind UnexpectedBucket, UnexpectedContents or UnexpectedCount
 */
export function verifyListing<T, R>(
  what: string,
  expectation: ListingExpectation<T>,
  received: ReceivedListing<R>,
  matches: EntryMatcher<T, R>
): void {
  if (received.bucket !== expectation.bucket) {
    throw VerificationError.unexpectedBucket(expectation.bucket, received.bucket);
  }

  if (expectation.limit === undefined) {
    const matched = countMatches(expectation.entries, received.entries, matches);
    if (matched !== expectation.entries.length) {
      throw VerificationError.unexpectedContents(what, expectation.entries.length, matched);
    }
  } else {
    const matched = countMatches(received.entries, expectation.population, (entry, candidate) =>
      matches(candidate, entry)
    );
    if (matched !== received.entries.length) {
      throw VerificationError.unexpectedContents(what, received.entries.length, matched);
    }
  }

  const wantedCount = expectation.limit ?? expectation.population.length;
  const receivedCount = received.entries.length + received.commonPrefixCount;
  if (receivedCount !== wantedCount) {
    throw VerificationError.unexpectedCount(what, wantedCount, receivedCount);
  }
}
