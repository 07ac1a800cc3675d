/**
 * S3 response builders
 * @module testing/responses
 */

import type { ObjectInfo, ObjectMultipartInfo } from '../fixtures/index.js';
import type { HttpResponse } from '../transport/index.js';
import { buildXml } from '../xml/index.js';

const S3_NAMESPACE = 'http://s3.amazonaws.com/doc/2006-03-01/';

export const TEST_DATE_HEADER = 'Mon, 15 Jan 2024 10:30:00 GMT';
export const TEST_REQUEST_ID = 'TESTREQUESTID0001';

/**
 * Headers every stubbed S3 response carries
 */
export function standardHeaders(): Record<string, string> {
  return {
    date: TEST_DATE_HEADER,
    'x-amz-request-id': TEST_REQUEST_ID,
    'content-type': 'application/xml',
    server: 'StubS3',
  };
}

export interface XmlResponseOptions {
  status?: number;
  statusText?: string;
  headers?: Record<string, string>;
}

/**
 * Wraps an XML document in a response with the standard headers
 */
export function xmlResponse(xml: string, options: XmlResponseOptions = {}): HttpResponse {
  return {
    status: options.status ?? 200,
    statusText: options.statusText ?? 'OK',
    headers: { ...standardHeaders(), ...options.headers },
    body: new TextEncoder().encode(xml),
  };
}

/**
 * S3 `<Error>` response
 */
export function errorResponse(
  status: number,
  statusText: string,
  code: string,
  message: string
): HttpResponse {
  const xml = buildXml({
    Error: { Code: code, Message: message, RequestId: TEST_REQUEST_ID },
  });
  return xmlResponse(xml, { status, statusText });
}

export interface ListBucketResultXmlOptions {
  bucket: string;
  objects: readonly ObjectInfo[];
  maxKeys?: number;
  isTruncated?: boolean;
  commonPrefixes?: readonly string[];
}

/**
 * `ListBucketResult` document listing the given objects in the given order,
 * ETags quoted as S3 sends them
 */
export function buildListBucketResultXml(options: ListBucketResultXmlOptions): string {
  const contents = options.objects.map((object) => ({
    Key: object.key,
    LastModified: object.lastModified.toISOString(),
    ETag: `"${object.eTag}"`,
    Size: object.size,
    StorageClass: 'STANDARD',
  }));
  const prefixes = (options.commonPrefixes ?? []).map((prefix) => ({ Prefix: prefix }));

  return buildXml({
    ListBucketResult: {
      '@_xmlns': S3_NAMESPACE,
      Name: options.bucket,
      Prefix: '',
      Marker: '',
      MaxKeys: options.maxKeys ?? 1000,
      IsTruncated: options.isTruncated ?? false,
      ...(contents.length > 0 && { Contents: contents }),
      ...(prefixes.length > 0 && { CommonPrefixes: prefixes }),
    },
  });
}

export interface ListMultipartUploadsXmlOptions {
  bucket: string;
  uploads: readonly ObjectMultipartInfo[];
  maxUploads?: number;
  isTruncated?: boolean;
  /** Report each upload's size, as some servers do */
  includeSize?: boolean;
}

/**
 * `ListMultipartUploadsResult` document listing the given uploads
 */
export function buildListMultipartUploadsXml(options: ListMultipartUploadsXmlOptions): string {
  const uploads = options.uploads.map((upload) => ({
    Key: upload.key,
    UploadId: upload.uploadId,
    ...(options.includeSize && { Size: upload.size }),
    Initiated: '2024-01-15T10:30:00.000Z',
    StorageClass: 'STANDARD',
  }));

  return buildXml({
    ListMultipartUploadsResult: {
      '@_xmlns': S3_NAMESPACE,
      Bucket: options.bucket,
      KeyMarker: '',
      UploadIdMarker: '',
      MaxUploads: options.maxUploads ?? 1000,
      IsTruncated: options.isTruncated ?? false,
      ...(uploads.length > 0 && { Upload: uploads }),
    },
  });
}
