/**
 * XML decoding for ListMultipartUploads responses
 * @module xml/list-multipart-uploads
 */

import { z } from 'zod';
import type { CommonPrefix, ListMultipartUploadsResult, ListedUpload } from './types.js';
import {
  decodeXml,
  normalizeArray,
  oneOrMany,
  parseBooleanSafe,
  parseDate,
  parseOptionalInt,
} from './parser.js';

const UploadXml = z.object({
  Key: z.string(),
  UploadId: z.string(),
  Size: z.string().trim().optional(),
  Initiated: z.string().optional(),
  StorageClass: z.string().optional(),
});

const CommonPrefixXml = z.object({
  Prefix: z.string(),
});

const ListMultipartUploadsResultXml = z.object({
  ListMultipartUploadsResult: z.object({
    Bucket: z.string(),
    Prefix: z.string().optional(),
    Delimiter: z.string().optional(),
    KeyMarker: z.string().optional(),
    UploadIdMarker: z.string().optional(),
    NextKeyMarker: z.string().optional(),
    NextUploadIdMarker: z.string().optional(),
    MaxUploads: z.string().trim().optional(),
    IsTruncated: z.string().trim().optional(),
    Upload: oneOrMany(UploadXml).optional(),
    CommonPrefixes: oneOrMany(CommonPrefixXml).optional(),
  }),
});

function parseUpload(xmlUpload: z.infer<typeof UploadXml>): ListedUpload {
  const size = parseOptionalInt(xmlUpload.Size, 'Size');
  return {
    key: xmlUpload.Key,
    uploadId: xmlUpload.UploadId,
    ...(size !== undefined && { size }),
    ...(xmlUpload.Initiated && { initiated: parseDate(xmlUpload.Initiated) }),
    ...(xmlUpload.StorageClass && { storageClass: xmlUpload.StorageClass }),
  };
}

function parseCommonPrefix(xmlPrefix: z.infer<typeof CommonPrefixXml>): CommonPrefix {
  return { prefix: xmlPrefix.Prefix };
}

/**
 * Decodes a `ListMultipartUploadsResult` document.
 *
 * Handles edge cases:
 * - Single vs multiple Upload elements
 * - No uploads at all
 * - Servers that report a Size per upload
 *
 * @throws Error if the XML is malformed or lacks required elements
 */
export function parseListMultipartUploadsResponse(xml: string): ListMultipartUploadsResult {
  try {
    const result = decodeXml(xml, ListMultipartUploadsResultXml).ListMultipartUploadsResult;

    return {
      bucket: result.Bucket,
      prefix: result.Prefix,
      delimiter: result.Delimiter,
      keyMarker: result.KeyMarker,
      uploadIdMarker: result.UploadIdMarker,
      nextKeyMarker: result.NextKeyMarker,
      nextUploadIdMarker: result.NextUploadIdMarker,
      maxUploads: parseOptionalInt(result.MaxUploads, 'MaxUploads'),
      isTruncated: parseBooleanSafe(result.IsTruncated, false),
      uploads: normalizeArray(result.Upload).map(parseUpload),
      commonPrefixes: normalizeArray(result.CommonPrefixes).map(parseCommonPrefix),
    };
  } catch (error) {
    if (error instanceof Error) {
      throw new Error(`Failed to parse ListMultipartUploads response: ${error.message}`, {
        cause: error,
      });
    }
    throw error;
  }
}
