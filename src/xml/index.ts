/**
 * XML decoding for S3 list and error responses
 * @module xml
 */

export type {
  ListedObject,
  CommonPrefix,
  ListBucketResult,
  ListedUpload,
  ListMultipartUploadsResult,
} from './types.js';

export {
  createXmlParser,
  createXmlBuilder,
  parseXml,
  decodeXml,
  buildXml,
  oneOrMany,
  normalizeArray,
  cleanETag,
  parseDate,
  parseOptionalInt,
  parseBooleanSafe,
} from './parser.js';

export { parseListObjectsV1Response } from './list-objects.js';
export { parseListMultipartUploadsResponse } from './list-multipart-uploads.js';
export { isErrorResponse, readErrorResponse, parseErrorResponse } from './error.js';
export type { ParsedError } from './error.js';
