/**
 * Error classification helpers
 * @module errors/mapping
 */

import { ConformanceError, type ConformanceErrorKind } from './error.js';
import { TransportError } from './categories.js';

/**
 * Checks if an error is a ConformanceError
 */
export function isConformanceError(error: unknown): error is ConformanceError {
  return error instanceof ConformanceError;
}

/**
 * Checks if an error is a ConformanceError of the given kind
 */
export function isErrorKind(error: unknown, kind: ConformanceErrorKind): error is ConformanceError {
  return isConformanceError(error) && error.kind === kind;
}

/**
 * Wraps an unknown error into a ConformanceError.
 * Errors already in the hierarchy pass through; anything else is treated as a
 * transport failure, the only place foreign errors enter the suite.
 */
export function wrapError(error: unknown): ConformanceError {
  if (isConformanceError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return TransportError.connectionFailed(error.message, error);
  }

  return TransportError.connectionFailed(String(error), error);
}
