/**
 * XML decoding for ListObjects (V1) responses
 * @module xml/list-objects
 */

import { z } from 'zod';
import type { CommonPrefix, ListBucketResult, ListedObject } from './types.js';
import {
  decodeXml,
  normalizeArray,
  oneOrMany,
  parseBooleanSafe,
  parseDate,
  parseOptionalInt,
} from './parser.js';

const ContentsXml = z.object({
  Key: z.string(),
  Size: z.string().trim().regex(/^\d+$/, 'Size must be a non-negative integer'),
  ETag: z.string().optional(),
  LastModified: z.string().optional(),
  StorageClass: z.string().optional(),
});

const CommonPrefixXml = z.object({
  Prefix: z.string(),
});

const ListBucketResultXml = z.object({
  ListBucketResult: z.object({
    Name: z.string(),
    Prefix: z.string().optional(),
    Marker: z.string().optional(),
    NextMarker: z.string().optional(),
    Delimiter: z.string().optional(),
    MaxKeys: z.string().trim().optional(),
    IsTruncated: z.string().trim().optional(),
    Contents: oneOrMany(ContentsXml).optional(),
    CommonPrefixes: oneOrMany(CommonPrefixXml).optional(),
  }),
});

type ContentsXml = z.infer<typeof ContentsXml>;

function parseContents(xmlContents: ContentsXml): ListedObject {
  return {
    key: xmlContents.Key,
    size: Number.parseInt(xmlContents.Size, 10),
    eTag: xmlContents.ETag ?? '',
    ...(xmlContents.LastModified && { lastModified: parseDate(xmlContents.LastModified) }),
    ...(xmlContents.StorageClass && { storageClass: xmlContents.StorageClass }),
  };
}

function parseCommonPrefix(xmlPrefix: z.infer<typeof CommonPrefixXml>): CommonPrefix {
  return { prefix: xmlPrefix.Prefix };
}

/**
 * Decodes a ListObjects (V1) `ListBucketResult` document.
 *
 * Single `Contents`/`CommonPrefixes` elements are normalized to arrays;
 * ETags are kept as received.
 *
 * @throws Error if the XML is malformed or lacks required elements
 *
 * @example
 * ```typescript
 * const result = parseListObjectsV1Response(`
 *   <ListBucketResult>
 *     <Name>photos</Name>
 *     <IsTruncated>false</IsTruncated>
 *     <Contents>
 *       <Key>a.jpg</Key>
 *       <ETag>"abc123"</ETag>
 *       <Size>1024</Size>
 *     </Contents>
 *   </ListBucketResult>
 * `);
 * result.contents[0].eTag; // '"abc123"'
 * ```
 */
export function parseListObjectsV1Response(xml: string): ListBucketResult {
  try {
    const result = decodeXml(xml, ListBucketResultXml).ListBucketResult;

    return {
      name: result.Name,
      prefix: result.Prefix,
      marker: result.Marker,
      nextMarker: result.NextMarker,
      delimiter: result.Delimiter,
      maxKeys: parseOptionalInt(result.MaxKeys, 'MaxKeys'),
      isTruncated: parseBooleanSafe(result.IsTruncated, false),
      contents: normalizeArray(result.Contents).map(parseContents),
      commonPrefixes: normalizeArray(result.CommonPrefixes).map(parseCommonPrefix),
    };
  } catch (error) {
    if (error instanceof Error) {
      throw new Error(`Failed to parse ListObjects response: ${error.message}`, { cause: error });
    }
    throw error;
  }
}
