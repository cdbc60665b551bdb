/**
 * Tests for CLI input schemas
 */

import { describe, it, expect } from 'vitest';

import { IngestOptionsSchema, QueryArgSchema, TopKSchema, parseInput } from '../validation.js';
import { ValidationError } from '../../errors/index.js';

describe('TopKSchema', () => {
  it.each([
    ['5', 5],
    [' 7 ', 7],
    ['100', 100],
  ])('parses %j', (input, expected) => {
    expect(TopKSchema.parse(input)).toBe(expected);
  });

  it.each([
    ['0', '--top must be at least 1'],
    ['101', '--top cannot exceed 100'],
    ['abc', '--top must be a whole number'],
    ['-3', '--top must be a whole number'],
    ['2.5', '--top must be a whole number'],
  ])('rejects %j', (input, message) => {
    const result = TopKSchema.safeParse(input);
    expect(result.success).toBe(false);
    expect(result.error?.issues.map((issue) => issue.message)).toEqual([message]);
  });
});

describe('QueryArgSchema', () => {
  it('trims the query', () => {
    expect(QueryArgSchema.parse('  thermostat reset ')).toBe('thermostat reset');
  });

  it('rejects blank and over-long queries', () => {
    expect(QueryArgSchema.safeParse('   ').success).toBe(false);
    expect(QueryArgSchema.safeParse('x'.repeat(2001)).success).toBe(false);
  });
});

describe('IngestOptionsSchema', () => {
  it('converts numeric flags', () => {
    expect(IngestOptionsSchema.parse({ chunkSize: '800', chunkOverlap: '0' })).toEqual({
      chunkSize: 800,
      chunkOverlap: 0,
    });
  });

  it('leaves absent flags undefined', () => {
    expect(IngestOptionsSchema.parse({})).toEqual({});
  });
});

describe('parseInput', () => {
  it('returns the parsed value', () => {
    expect(parseInput(TopKSchema, '3')).toBe(3);
  });

  it('throws a ValidationError listing each issue with its path', () => {
    let caught: unknown;
    try {
      parseInput(IngestOptionsSchema, { chunkSize: 'big', docs: '' }, 'Invalid ingest options');
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ValidationError);
    if (caught instanceof ValidationError) {
      expect(caught.message).toBe('Invalid ingest options');
      expect(caught.issues).toEqual([
        'docs: --docs cannot be empty',
        'chunkSize: --chunk-size must be a whole number',
      ]);
    }
  });
});
