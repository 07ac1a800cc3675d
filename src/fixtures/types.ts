/**
 * Fixture state created on the server before a run
 * @module fixtures/types
 */

/**
 * An object known to exist in the test bucket
 */
export interface ObjectInfo {
  readonly key: string;
  readonly size: number;
  /** Unquoted ETag */
  readonly eTag: string;
  readonly lastModified: Date;
}

/**
 * A multipart upload known to be in progress in the test bucket
 */
export interface ObjectMultipartInfo {
  readonly key: string;
  readonly uploadId: string;
  readonly size: number;
}

/**
 * Everything the operations read from the fixture population
 */
export interface FixtureContext {
  readonly bucket: string;
  /** Sorted by key */
  readonly objects: readonly ObjectInfo[];
  readonly uploads: readonly ObjectMultipartInfo[];
}
