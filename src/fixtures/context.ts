/**
 * Fixture context construction
 * @module fixtures/context
 */

import { ConfigError } from '../errors/index.js';
import type { FixtureContext, ObjectInfo, ObjectMultipartInfo } from './types.js';

/**
 * Input for {@link createFixtureContext}; order is not significant
 */
export interface FixtureContextOptions {
  bucket: string;
  objects?: Iterable<ObjectInfo>;
  uploads?: Iterable<ObjectMultipartInfo>;
}

function compareKeys(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Freezes a snapshot of the fixture population.
 *
 * Objects are ordered by key in code-unit order, the order S3 lists keys in
 * for ASCII names. Uploads are ordered by key, then upload ID.
 *
 * @throws ConfigError if the bucket name is empty or an object key repeats
 */
export function createFixtureContext(options: FixtureContextOptions): FixtureContext {
  if (!options.bucket) {
    throw ConfigError.invalidConfig('bucket', 'Fixture bucket name is required');
  }

  const objects = [...(options.objects ?? [])]
    .map((object) => Object.freeze({ ...object }))
    .sort((a, b) => compareKeys(a.key, b.key));

  for (let i = 1; i < objects.length; i++) {
    if (objects[i - 1].key === objects[i].key) {
      throw ConfigError.invalidConfig('objects', `Duplicate fixture object key: ${objects[i].key}`);
    }
  }

  const uploads = [...(options.uploads ?? [])]
    .map((upload) => Object.freeze({ ...upload }))
    .sort((a, b) => compareKeys(a.key, b.key) || compareKeys(a.uploadId, b.uploadId));

  return Object.freeze({
    bucket: options.bucket,
    objects: Object.freeze(objects),
    uploads: Object.freeze(uploads),
  });
}
