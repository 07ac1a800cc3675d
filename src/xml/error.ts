/**
 * XML parsing for S3 error responses
 * @module xml/error
 */

import { z } from 'zod';
import { decodeXml } from './parser.js';

const ErrorResponseXml = z.object({
  Error: z.object({
    Code: z.string(),
    Message: z.string().optional(),
    RequestId: z.string().optional(),
    Resource: z.string().optional(),
    HostId: z.string().optional(),
  }),
});

/**
 * Parsed error information from an S3 response
 */
export interface ParsedError {
  /**
   * Error code (e.g., 'NoSuchBucket', 'AccessDenied')
   */
  readonly code: string;

  readonly message: string;

  readonly requestId?: string;

  /**
   * Resource that caused the error
   */
  readonly resource?: string;

  readonly hostId?: string;
}

/**
 * Checks if an XML string is an S3 `<Error>` document
 *
 * @example
 * ```typescript
 * isErrorResponse('<Error><Code>AccessDenied</Code></Error>'); // true
 * isErrorResponse('<ListBucketResult>...</ListBucketResult>'); // false
 * ```
 */
export function isErrorResponse(xml: string): boolean {
  return readErrorResponse(xml) !== undefined;
}

/**
 * Reads an S3 `<Error>` envelope. Bodies without an `<Error>` element are
 * never parsed; anything that does not decode as one yields undefined.
 */
export function readErrorResponse(xml: string): ParsedError | undefined {
  if (!xml.includes('<Error>')) {
    return undefined;
  }
  try {
    return parseErrorResponse(xml);
  } catch {
    return undefined;
  }
}

/**
 * Parses an S3 `<Error>` document
 *
 * @throws Error if the XML is malformed or has no Error/Code element
 *
 * @example
 * ```typescript
 * const error = parseErrorResponse(`
 *   <Error>
 *     <Code>NoSuchBucket</Code>
 *     <Message>The specified bucket does not exist</Message>
 *     <RequestId>4442587FB7D0A2F9</RequestId>
 *   </Error>
 * `);
 * error.code; // 'NoSuchBucket'
 * ```
 */
export function parseErrorResponse(xml: string): ParsedError {
  try {
    const error = decodeXml(xml, ErrorResponseXml).Error;
    return {
      code: error.Code,
      message: error.Message ?? '',
      ...(error.RequestId && { requestId: error.RequestId }),
      ...(error.Resource && { resource: error.Resource }),
      ...(error.HostId && { hostId: error.HostId }),
    };
  } catch (error) {
    if (error instanceof Error) {
      throw new Error(`Failed to parse error response: ${error.message}`, { cause: error });
    }
    throw error;
  }
}
