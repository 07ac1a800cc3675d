/**
 * Operations under test
 * @module operations
 */

import { listObjectsV1 } from './list-objects-v1.js';
import { listMultipartUploads } from './list-multipart-uploads.js';
import type { ConformanceOperation } from './types.js';

export type { ConformanceOperation, OperationVariant } from './types.js';
export {
  LIST_OBJECTS_MAX_KEYS,
  buildExpectedListBucketResult,
  verifyListBucketResult,
  listObjectsV1,
} from './list-objects-v1.js';
export {
  buildExpectedMultipartUploads,
  verifyListMultipartUploadsResult,
  listMultipartUploads,
} from './list-multipart-uploads.js';

/**
 * Every operation, in run order
 */
export const ALL_OPERATIONS: readonly ConformanceOperation[] = [listObjectsV1, listMultipartUploads];
