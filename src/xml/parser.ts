/**
 * Core XML utilities for S3 API responses
 * @module xml/parser
 */

import { XMLParser, XMLBuilder, XMLValidator } from 'fast-xml-parser';
import { z } from 'zod';

/**
 * Parser options for S3 XML: values stay strings, attributes are kept under
 * an `@_` prefix and never collide with element names. Text is not trimmed,
 * since object keys may begin or end with spaces; numeric and boolean
 * elements are trimmed by their schemas.
 */
const PARSER_OPTIONS = {
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  textNodeName: '#text',
  ignoreDeclaration: true,
  parseAttributeValue: false,
  parseTagValue: false,
  trimValues: false,
};

/**
 * Builder options for generating S3 XML documents
 */
const BUILDER_OPTIONS = {
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  textNodeName: '#text',
  format: false,
  suppressEmptyNode: true,
};

/**
 * Creates a configured XML parser instance
 */
export function createXmlParser(): XMLParser {
  return new XMLParser(PARSER_OPTIONS);
}

/**
 * Creates a configured XML builder instance
 */
export function createXmlBuilder(): XMLBuilder {
  return new XMLBuilder(BUILDER_OPTIONS);
}

/**
 * Parses an XML document into a plain object tree.
 * The document is validated first; fast-xml-parser alone tolerates some
 * malformed input such as unclosed elements.
 *
 * @throws Error if the document is not well-formed
 */
export function parseXml(xml: string): unknown {
  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    const { code, msg, line, col } = validation.err;
    throw new Error(`Failed to parse XML: ${code} ${msg} (line ${line}, column ${col})`);
  }

  try {
    return createXmlParser().parse(xml);
  } catch (error) {
    throw new Error(
      `Failed to parse XML: ${error instanceof Error ? error.message : String(error)}`
    );
  }
}

/**
 * Parses an XML document and checks it against a schema
 *
 * @throws Error if the document is not well-formed or does not match
 */
export function decodeXml<T>(xml: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T {
  const result = schema.safeParse(parseXml(xml));
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue ? issue.path.join('.') : '';
    throw new Error(`Unexpected document structure at ${where || 'root'}: ${issue?.message ?? 'invalid'}`);
  }
  return result.data;
}

/**
 * Converts an object to an XML string
 *
 * @example
 * ```typescript
 * buildXml({ Root: { Value: 'example' } }); // <Root><Value>example</Value></Root>
 * ```
 */
export function buildXml(obj: Record<string, unknown>): string {
  const builder = createXmlBuilder();
  try {
    return builder.build(obj);
  } catch (error) {
    throw new Error(
      `Failed to build XML: ${error instanceof Error ? error.message : String(error)}`
    );
  }
}

/**
 * Schema for an element that S3 repeats. The parser yields a single object
 * when it occurs once, so the value is wrapped before the array is checked.
 */
export function oneOrMany<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((value) => (Array.isArray(value) ? value : [value]), z.array(schema));
}

/**
 * Normalizes array-or-single-item XML parsing behavior
 *
 * @example
 * ```typescript
 * normalizeArray(undefined); // []
 * normalizeArray('single'); // ['single']
 * normalizeArray(['a', 'b']); // ['a', 'b']
 * ```
 */
export function normalizeArray<T>(value: T | T[] | undefined): T[] {
  if (value === undefined) {
    return [];
  }
  return Array.isArray(value) ? value : [value];
}

/**
 * Removes surrounding quotes from ETag values
 *
 * @example
 * ```typescript
 * cleanETag('"abc123"'); // 'abc123'
 * cleanETag('abc123'); // 'abc123'
 * ```
 */
export function cleanETag(eTag: string): string {
  return eTag.replace(/^"(.+)"$/, '$1');
}

/**
 * Parses ISO 8601 date string to Date object
 *
 * @throws Error if date string is invalid
 */
export function parseDate(dateStr: string): Date {
  const date = new Date(dateStr);
  if (isNaN(date.getTime())) {
    throw new Error(`Invalid date string: ${dateStr}`);
  }
  return date;
}

/**
 * Parses an optional integer element; absent or empty stays undefined
 *
 * @throws Error if the value is present but not an integer
 */
export function parseOptionalInt(value: string | undefined, element: string): number | undefined {
  if (value === undefined || value === '') {
    return undefined;
  }
  if (!/^-?\d+$/.test(value)) {
    throw new Error(`${element} is not an integer: ${value}`);
  }
  return Number.parseInt(value, 10);
}

/**
 * Safely parses a boolean from a string
 * S3 uses 'true'/'false' strings
 */
export function parseBooleanSafe(value: string | undefined, defaultValue: boolean): boolean {
  if (!value) {
    return defaultValue;
  }
  return value.toLowerCase() === 'true';
}
