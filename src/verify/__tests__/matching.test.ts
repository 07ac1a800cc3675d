/**
 * Tests for listing set comparison
 */

import { describe, it, expect } from 'vitest';
import { countMatches, matchObject, matchUpload, verifyListing } from '../matching.js';
import type { ListingExpectation, ReceivedListing } from '../matching.js';
import { VerificationError } from '../../errors/index.js';
import type { ObjectInfo } from '../../fixtures/index.js';
import type { ListedObject } from '../../xml/index.js';
import { makeObjects } from '../../testing/index.js';

function listed(objects: readonly ObjectInfo[]): ListedObject[] {
  return objects.map((object) => ({
    key: object.key,
    size: object.size,
    eTag: `"${object.eTag}"`,
  }));
}

function received(entries: ListedObject[], bucket = 'test-bucket'): ReceivedListing<ListedObject> {
  return { bucket, entries, commonPrefixCount: 0 };
}

function captureError(fn: () => void): VerificationError {
  try {
    fn();
  } catch (error) {
    if (error instanceof VerificationError) {
      return error;
    }
    throw error;
  }
  throw new Error('expected a VerificationError');
}

const population = makeObjects(45);

const unrestricted: ListingExpectation<ObjectInfo> = {
  bucket: 'test-bucket',
  entries: population,
  population,
};

const limited: ListingExpectation<ObjectInfo> = {
  bucket: 'test-bucket',
  entries: population.slice(0, 30),
  population,
  limit: 30,
};

describe('countMatches', () => {
  it('should pair each entry at most once', () => {
    expect(countMatches(['a', 'a'], ['a'], (x, y) => x === y)).toBe(1);
    expect(countMatches(['a', 'b'], ['b', 'a'], (x, y) => x === y)).toBe(2);
  });

  it('should count nothing against an empty set', () => {
    expect(countMatches(['a'], [], (x: string, y: string) => x === y)).toBe(0);
  });
});

describe('matchObject', () => {
  const [object] = makeObjects(1);

  it('should compare the ETag without quotes', () => {
    expect(matchObject(object, { key: object.key, size: object.size, eTag: `"${object.eTag}"` })).toBe(true);
    expect(matchObject(object, { key: object.key, size: object.size, eTag: object.eTag })).toBe(true);
  });

  it('should require key, size and ETag to agree', () => {
    expect(matchObject(object, { key: 'other', size: object.size, eTag: object.eTag })).toBe(false);
    expect(matchObject(object, { key: object.key, size: object.size + 1, eTag: object.eTag })).toBe(false);
    expect(matchObject(object, { key: object.key, size: object.size, eTag: '"0000"' })).toBe(false);
  });
});

describe('matchUpload', () => {
  const upload = { key: 'big.bin', uploadId: 'upload-1', size: 10 };

  it('should ignore size when the server does not report one', () => {
    expect(matchUpload(upload, { key: 'big.bin', uploadId: 'upload-1' })).toBe(true);
  });

  it('should compare size when the server reports one', () => {
    expect(matchUpload(upload, { key: 'big.bin', uploadId: 'upload-1', size: 10 })).toBe(true);
    expect(matchUpload(upload, { key: 'big.bin', uploadId: 'upload-1', size: 11 })).toBe(false);
  });

  it('should require the upload ID to agree', () => {
    expect(matchUpload(upload, { key: 'big.bin', uploadId: 'upload-2' })).toBe(false);
  });
});

describe('verifyListing', () => {
  describe('unrestricted listing', () => {
    it('should accept every object in any order', () => {
      const entries = listed(population).reverse();

      expect(() => verifyListing('Objects', unrestricted, received(entries), matchObject)).not.toThrow();
    });

    it('should report a missing object as unexpected contents', () => {
      const error = captureError(() =>
        verifyListing('Objects', unrestricted, received(listed(population.slice(1))), matchObject)
      );

      expect(error.kind).toBe('UnexpectedContents');
      expect(error.expected).toBe(45);
      expect(error.received).toBe(44);
      expect(error.message).toBe('Unexpected Objects Listed: wanted 45 matching entries, got 44');
    });

    it('should not let a duplicate stand in for a missing object', () => {
      const entries = listed(population);
      entries[1] = entries[0];

      const error = captureError(() =>
        verifyListing('Objects', unrestricted, received(entries), matchObject)
      );

      expect(error.kind).toBe('UnexpectedContents');
      expect(error.received).toBe(44);
    });

    it('should report an extra object as an unexpected count', () => {
      const entries = [...listed(population), { key: 'stray', size: 1, eTag: '"ffff"' }];

      const error = captureError(() =>
        verifyListing('Objects', unrestricted, received(entries), matchObject)
      );

      expect(error.kind).toBe('UnexpectedCount');
      expect(error.message).toBe('Unexpected Number of Objects Listed: wanted 45, got 46');
    });

    it('should count common prefixes as entries', () => {
      const error = captureError(() =>
        verifyListing(
          'Objects',
          unrestricted,
          { bucket: 'test-bucket', entries: listed(population), commonPrefixCount: 2 },
          matchObject
        )
      );

      expect(error.kind).toBe('UnexpectedCount');
      expect(error.received).toBe(47);
    });

    it('should report a different bucket before looking at entries', () => {
      const error = captureError(() =>
        verifyListing('Objects', unrestricted, received([], 'other-bucket'), matchObject)
      );

      expect(error.kind).toBe('UnexpectedBucket');
      expect(error.expected).toBe('test-bucket');
      expect(error.received).toBe('other-bucket');
    });
  });

  describe('limited listing', () => {
    it('should accept the first 30 objects', () => {
      expect(() =>
        verifyListing('Objects', limited, received(listed(population.slice(0, 30))), matchObject)
      ).not.toThrow();
    });

    it('should accept any 30 objects of the population', () => {
      expect(() =>
        verifyListing('Objects', limited, received(listed(population.slice(15))), matchObject)
      ).not.toThrow();
    });

    it('should report 29 objects as an unexpected count', () => {
      const error = captureError(() =>
        verifyListing('Objects', limited, received(listed(population.slice(0, 29))), matchObject)
      );

      expect(error.kind).toBe('UnexpectedCount');
      expect(error.expected).toBe(30);
      expect(error.received).toBe(29);
    });

    it('should report 31 objects as an unexpected count', () => {
      const error = captureError(() =>
        verifyListing('Objects', limited, received(listed(population.slice(0, 31))), matchObject)
      );

      expect(error.kind).toBe('UnexpectedCount');
      expect(error.expected).toBe(30);
      expect(error.received).toBe(31);
    });

    it('should report an object outside the population as unexpected contents', () => {
      const entries = listed(population.slice(0, 29));
      entries.push({ key: 'stray', size: 1, eTag: '"ffff"' });

      const error = captureError(() =>
        verifyListing('Objects', limited, received(entries), matchObject)
      );

      expect(error.kind).toBe('UnexpectedContents');
      expect(error.expected).toBe(30);
      expect(error.received).toBe(29);
    });
  });
});
