/**
 * Tests for core XML utilities
 */

import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import {
  parseXml,
  decodeXml,
  buildXml,
  normalizeArray,
  cleanETag,
  parseDate,
  parseOptionalInt,
  parseBooleanSafe,
} from '../parser.js';

describe('parseXml', () => {
  it('should keep element values as strings', () => {
    expect(parseXml('<Root><Size>0042</Size><Flag>true</Flag></Root>')).toEqual({
      Root: { Size: '0042', Flag: 'true' },
    });
  });

  it('should ignore the XML declaration', () => {
    expect(parseXml('<?xml version="1.0" encoding="UTF-8"?><Root><A>x</A></Root>')).toEqual({
      Root: { A: 'x' },
    });
  });

  it('should keep attributes under a prefix', () => {
    expect(parseXml('<Root xmlns="urn:test"><A>x</A></Root>')).toEqual({
      Root: { '@_xmlns': 'urn:test', A: 'x' },
    });
  });

  it('should reject an unclosed element', () => {
    expect(() => parseXml('<Root><A>x</A>')).toThrow(/^Failed to parse XML/);
  });

  it('should reject text that is not XML', () => {
    expect(() => parseXml('not xml at all')).toThrow(/^Failed to parse XML/);
  });

  it('should reject an empty document', () => {
    expect(() => parseXml('')).toThrow(/^Failed to parse XML/);
  });
});

describe('decodeXml', () => {
  const schema = z.object({ Root: z.object({ A: z.string() }) });

  it('should return the checked document', () => {
    expect(decodeXml('<Root><A>x</A></Root>', schema)).toEqual({ Root: { A: 'x' } });
  });

  it('should name the path of a missing element', () => {
    expect(() => decodeXml('<Root><B>x</B></Root>', schema)).toThrow(
      'Unexpected document structure at Root.A: Required'
    );
  });
});

describe('buildXml', () => {
  it('should build nested and repeated elements', () => {
    expect(buildXml({ Root: { Item: [{ K: 'a' }, { K: 'b' }] } })).toBe(
      '<Root><Item><K>a</K></Item><Item><K>b</K></Item></Root>'
    );
  });
});

describe('helpers', () => {
  it('normalizeArray should wrap single values', () => {
    expect(normalizeArray(undefined)).toEqual([]);
    expect(normalizeArray('a')).toEqual(['a']);
    expect(normalizeArray(['a', 'b'])).toEqual(['a', 'b']);
  });

  it('cleanETag should strip surrounding quotes only', () => {
    expect(cleanETag('"abc123"')).toBe('abc123');
    expect(cleanETag('abc123')).toBe('abc123');
    expect(cleanETag('"abc-2"')).toBe('abc-2');
  });

  it('parseDate should reject invalid dates', () => {
    expect(parseDate('2024-01-15T10:30:00.000Z').getTime()).toBe(Date.UTC(2024, 0, 15, 10, 30));
    expect(() => parseDate('yesterday')).toThrow('Invalid date string: yesterday');
  });

  it('parseOptionalInt should reject non-integers', () => {
    expect(parseOptionalInt(undefined, 'MaxKeys')).toBeUndefined();
    expect(parseOptionalInt('', 'MaxKeys')).toBeUndefined();
    expect(parseOptionalInt('30', 'MaxKeys')).toBe(30);
    expect(() => parseOptionalInt('thirty', 'MaxKeys')).toThrow('MaxKeys is not an integer: thirty');
  });

  it('parseBooleanSafe should read S3 booleans', () => {
    expect(parseBooleanSafe('true', false)).toBe(true);
    expect(parseBooleanSafe('False', true)).toBe(false);
    expect(parseBooleanSafe(undefined, true)).toBe(true);
  });
});
