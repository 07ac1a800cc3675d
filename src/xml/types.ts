/**
 * Decoded S3 list response types
 * @module xml/types
 */

/**
 * An object entry of a bucket listing, as the server reported it
 */
export interface ListedObject {
  key: string;
  size: number;
  /** ETag exactly as received, normally quote-wrapped */
  eTag: string;
  lastModified?: Date;
  storageClass?: string;
}

/**
 * A grouping entry produced by a delimiter
 */
export interface CommonPrefix {
  prefix: string;
}

/**
 * Decoded ListObjects (V1) response
 */
export interface ListBucketResult {
  name: string;
  prefix?: string;
  marker?: string;
  nextMarker?: string;
  delimiter?: string;
  /** max-keys echoed by the server */
  maxKeys?: number;
  /** More results exist beyond this page */
  isTruncated: boolean;
  contents: ListedObject[];
  commonPrefixes: CommonPrefix[];
}

/**
 * An in-progress upload entry of a multipart upload listing
 */
export interface ListedUpload {
  key: string;
  uploadId: string;
  /** Only some servers report the bytes uploaded so far */
  size?: number;
  initiated?: Date;
  storageClass?: string;
}

/**
 * Decoded ListMultipartUploads response
 */
export interface ListMultipartUploadsResult {
  bucket: string;
  prefix?: string;
  delimiter?: string;
  keyMarker?: string;
  uploadIdMarker?: string;
  nextKeyMarker?: string;
  nextUploadIdMarker?: string;
  maxUploads?: number;
  isTruncated: boolean;
  uploads: ListedUpload[];
  commonPrefixes: CommonPrefix[];
}
