/**
 * Tests for formatting helpers.
 */
import { describe, it, expect } from 'vitest';
import { condense, formatDuration, pluralize } from '../../../src/utils/format.js';

describe('pluralize', () => {
  it('should keep the noun for a count of one', () => {
    expect(pluralize(1, 'type literal')).toBe('1 type literal');
  });

  it('should add an s otherwise', () => {
    expect(pluralize(0, 'error')).toBe('0 errors');
    expect(pluralize(3, 'high confidence unnamed tearoff')).toBe('3 high confidence unnamed tearoffs');
  });
});

describe('formatDuration', () => {
  it('should format zero', () => {
    expect(formatDuration(0)).toBe('0:00:00.000');
  });

  it('should format hours, minutes, seconds and milliseconds', () => {
    expect(formatDuration(3_723_045)).toBe('1:02:03.045');
  });

  it('should round fractional milliseconds', () => {
    expect(formatDuration(1500.6)).toBe('0:00:01.501');
  });

  it('should clamp negative durations', () => {
    expect(formatDuration(-5)).toBe('0:00:00.000');
  });
});

describe('condense', () => {
  it('should collapse whitespace runs', () => {
    expect(condense('new Point(\n    x,\n    y)')).toBe('new Point( x, y)');
  });

  it('should truncate long text', () => {
    expect(condense('abcdefghij', 8)).toBe('abcde...');
  });

  it('should keep text at the limit', () => {
    expect(condense('abcdefgh', 8)).toBe('abcdefgh');
  });
});
