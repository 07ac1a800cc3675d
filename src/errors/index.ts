/**
 * Error system for the S3 conformance suite
 * @module errors
 */

export { ConformanceError, type ConformanceErrorKind, type ConformanceErrorParams } from './error.js';

export { ConfigError, SigningError, TransportError, VerificationError } from './categories.js';

export { isConformanceError, isErrorKind, wrapError } from './mapping.js';
