/**
 * Specific error categories for the S3 conformance suite
 * @module errors/categories
 */

import { ConformanceError, type ConformanceErrorParams } from './error.js';

type CategoryParams = Omit<ConformanceErrorParams, 'kind'>;

/**
 * Configuration errors: malformed endpoint, region or missing credentials.
 * Fatal for the whole run.
 */
export class ConfigError extends ConformanceError {
  constructor(params: CategoryParams) {
    super({ ...params, kind: 'ConfigError' });
    this.name = 'ConfigError';
    Object.setPrototypeOf(this, ConfigError.prototype);
  }

  /**
   * Endpoint is not an absolute http(s) URL
   */
  static invalidEndpoint(endpoint: string, reason?: string): ConfigError {
    return new ConfigError({
      message: `Invalid endpoint URL: ${endpoint}${reason ? ` (${reason})` : ''}`,
      code: 'InvalidEndpoint',
      details: { endpoint },
    });
  }

  /**
   * Missing access or secret key
   */
  static missingCredentials(which: 'accessKey' | 'secretKey'): ConfigError {
    return new ConfigError({
      message: `${which} is required`,
      code: 'MissingCredentials',
      details: { field: which },
    });
  }

  /**
   * Invalid configuration parameter
   */
  static invalidConfig(paramName: string, message?: string): ConfigError {
    return new ConfigError({
      message: message ?? `Invalid configuration parameter: ${paramName}`,
      code: 'InvalidConfig',
      details: { paramName },
    });
  }
}

/**
 * Content hashing or signature computation failed
 */
export class SigningError extends ConformanceError {
  constructor(params: CategoryParams) {
    super({ ...params, kind: 'SigningError' });
    this.name = 'SigningError';
    Object.setPrototypeOf(this, SigningError.prototype);
  }

  /**
   * Reading the payload stream failed while hashing it
   */
  static ioError(cause: unknown): SigningError {
    return new SigningError({
      message: `Failed to read payload: ${cause instanceof Error ? cause.message : String(cause)}`,
      code: 'IOError',
      cause,
    });
  }
}

/**
 * Connection or I/O failure while executing a request
 */
export class TransportError extends ConformanceError {
  constructor(params: CategoryParams) {
    super({ ...params, kind: 'TransportError' });
    this.name = 'TransportError';
    Object.setPrototypeOf(this, TransportError.prototype);
  }

  static connectionFailed(message: string, cause?: unknown): TransportError {
    return new TransportError({
      message: `Connection failed: ${message}`,
      code: 'ConnectionFailed',
      cause,
    });
  }

  static connectionReset(cause?: unknown): TransportError {
    return new TransportError({
      message: 'Connection was reset or refused by the server',
      code: 'ConnectionReset',
      cause,
    });
  }

  static dnsError(url: string, cause?: unknown): TransportError {
    return new TransportError({
      message: `Could not resolve host for ${url}`,
      code: 'DnsError',
      details: { url },
      cause,
    });
  }

  static connectTimeout(timeoutMs: number, cause?: unknown): TransportError {
    return new TransportError({
      message: `Connect timed out after ${timeoutMs}ms`,
      code: 'ConnectTimeout',
      details: { timeoutMs },
      cause,
    });
  }
}

/**
 * A response did not match what the check expected
 */
export class VerificationError extends ConformanceError {
  constructor(params: ConformanceErrorParams) {
    super(params);
    this.name = 'VerificationError';
    Object.setPrototypeOf(this, VerificationError.prototype);
  }

  static unexpectedStatus(
    expected: string,
    received: string,
    details?: Record<string, unknown>
  ): VerificationError {
    return new VerificationError({
      kind: 'UnexpectedStatus',
      message: `Unexpected Status Received: wanted ${expected}, got ${received}`,
      expected,
      received,
      details,
    });
  }

  static unexpectedHeader(header: string, problem: string, received?: string): VerificationError {
    return new VerificationError({
      kind: 'UnexpectedHeader',
      message: `Unexpected Header ${header}: ${problem}`,
      received,
      details: { header },
    });
  }

  static malformedBody(reason: string, cause?: unknown): VerificationError {
    return new VerificationError({
      kind: 'MalformedBody',
      message: `Malformed Response Body: ${reason}`,
      cause,
    });
  }

  static unexpectedBucket(expected: string, received: string): VerificationError {
    return new VerificationError({
      kind: 'UnexpectedBucket',
      message: `Unexpected Bucket Listed: wanted ${expected}, got ${received}`,
      expected,
      received,
    });
  }

  static unexpectedContents(what: string, expected: number, received: number): VerificationError {
    return new VerificationError({
      kind: 'UnexpectedContents',
      message: `Unexpected ${what} Listed: wanted ${expected} matching entries, got ${received}`,
      expected,
      received,
    });
  }

  static unexpectedCount(what: string, expected: number, received: number): VerificationError {
    return new VerificationError({
      kind: 'UnexpectedCount',
      message: `Unexpected Number of ${what} Listed: wanted ${expected}, got ${received}`,
      expected,
      received,
    });
  }
}
