/**
 * Operation descriptor types
 * @module operations/types
 */

import type { FixtureContext } from '../fixtures/index.js';
import type { RequestSpec } from '../request/index.js';
import type { BodyCheck } from '../verify/index.js';

/**
 * One request/response round trip of an operation
 */
export interface OperationVariant {
  /** Short label for reports, e.g. "max-keys=30" */
  readonly description: string;
  readonly request: RequestSpec;
  /** Status line literal, e.g. "200 OK" */
  readonly expectedStatus: string;
  readonly verifyBody: BodyCheck;
}

/**
 * An API operation under test.
 *
 * `variants` derives the expected results from the fixtures; the driver runs
 * the variants in order and stops at the first failure.
 */
export interface ConformanceOperation {
  readonly name: string;
  variants(fixtures: FixtureContext): OperationVariant[];
}
