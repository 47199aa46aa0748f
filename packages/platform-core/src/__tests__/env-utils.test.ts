import { describe, it, expect } from 'vitest';
import { parsePositiveInt } from '../config/env-utils';
import { DomainError } from '../error-handling/errors';

describe('parsePositiveInt', () => {
  it('should return the default when the variable is unset', () => {
    expect(parsePositiveInt('WORKERS', 4, 1, {})).toBe(4);
  });

  it('should parse a valid value', () => {
    expect(parsePositiveInt('WORKERS', 4, 1, { WORKERS: '12' })).toBe(12);
  });

  it('should accept zero when the minimum allows it', () => {
    expect(parsePositiveInt('LOOKAHEAD', 3, 0, { LOOKAHEAD: '0' })).toBe(0);
  });

  it('should reject values below the minimum', () => {
    expect(() => parsePositiveInt('WORKERS', 4, 1, { WORKERS: '0' })).toThrow(DomainError);
  });

  it('should reject non-numeric values', () => {
    expect(() => parsePositiveInt('WORKERS', 4, 1, { WORKERS: 'many' })).toThrow(
      'Invalid WORKERS: "many". Must be a positive integer >= 1. Default is 4.'
    );
  });
});
