/**
 * Base error class for the S3 conformance suite
 * @module errors/error
 */

/**
 * Every failure the suite can report, tagged so callers branch on the kind
 * instead of parsing messages.
 */
export type ConformanceErrorKind =
  | 'ConfigError'
  | 'SigningError'
  | 'TransportError'
  | 'UnexpectedStatus'
  | 'UnexpectedHeader'
  | 'MalformedBody'
  | 'UnexpectedBucket'
  | 'UnexpectedContents'
  | 'UnexpectedCount';

/**
 * Parameters for creating a ConformanceError
 */
export interface ConformanceErrorParams {
  /**
   * Error kind tag
   */
  readonly kind: ConformanceErrorKind;

  /**
   * Human-readable error message
   */
  readonly message: string;

  /**
   * Finer-grained code within the kind (e.g. 'InvalidEndpoint', 'IOError')
   */
  readonly code?: string;

  /**
   * Value the check wanted
   */
  readonly expected?: unknown;

  /**
   * Value the server produced
   */
  readonly received?: unknown;

  /**
   * Additional error details
   */
  readonly details?: Record<string, unknown>;

  /**
   * Underlying error, if this one wraps another
   */
  readonly cause?: unknown;
}

/**
 * Base class for all errors raised by the suite
 *
 * Carries the kind tag plus structured expected/received values so a failed
 * check can be reported without re-deriving what went wrong.
 */
export class ConformanceError extends Error {
  readonly kind: ConformanceErrorKind;
  readonly code?: string;
  readonly expected?: unknown;
  readonly received?: unknown;
  readonly details?: Record<string, unknown>;

  constructor(params: ConformanceErrorParams) {
    super(params.message, params.cause === undefined ? undefined : { cause: params.cause });

    // Set the prototype explicitly to maintain instanceof checks
    Object.setPrototypeOf(this, ConformanceError.prototype);

    this.name = 'ConformanceError';
    this.kind = params.kind;
    this.code = params.code;
    this.expected = params.expected;
    this.received = params.received;
    this.details = params.details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ConformanceError);
    }
  }

  /**
   * Converts the error to a JSON representation
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      kind: this.kind,
      code: this.code,
      message: this.message,
      expected: this.expected,
      received: this.received,
      details: this.details,
    };
  }

  /**
   * Returns a string representation of the error
   */
  toString(): string {
    const parts = [this.name, this.kind];

    if (this.code) {
      parts.push(`[${this.code}]`);
    }

    parts.push(`- ${this.message}`);

    return parts.join(' ');
  }
}
