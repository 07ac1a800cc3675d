/**
 * Fixture population consumed by the operations
 * @module fixtures
 */

export type { ObjectInfo, ObjectMultipartInfo, FixtureContext } from './types.js';
export type { FixtureContextOptions } from './context.js';
export { createFixtureContext } from './context.js';
