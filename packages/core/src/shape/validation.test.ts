import { describe, it, expect } from 'vitest';
import { assertRank, assertValidShape, isValidShape } from './validation';
import { InvalidSizeError } from '../errors';

describe('isValidShape', () => {
  it('should accept non-negative integer shapes', () => {
    expect(isValidShape([])).toBe(true);
    expect(isValidShape([2, 3])).toBe(true);
    expect(isValidShape([0, 4])).toBe(true);
  });

  it('should reject malformed shapes', () => {
    expect(isValidShape([-1])).toBe(false);
    expect(isValidShape([1.5])).toBe(false);
    expect(isValidShape(['2'])).toBe(false);
    expect(isValidShape('abc')).toBe(false);
    expect(isValidShape([1, 1, 1], 2)).toBe(false);
  });
});

describe('assertValidShape', () => {
  it('should pass valid shapes', () => {
    expect(() => assertValidShape([2, 0, 3])).not.toThrow();
  });

  it('should name the bad dimension', () => {
    expect(() => assertValidShape([2, -1])).toThrow(
      'Invalid dimension -1 at index 1 in shape [2, -1]: dimensions must be non-negative integers',
    );
  });
});

describe('assertRank', () => {
  it('should reject shapes above the limit', () => {
    expect(() => assertRank([1, 2, 3], 2)).toThrow(
      'Shape [1, 2, 3] has rank 3, exceeding the maximum supported rank of 2',
    );
    expect(() => assertRank([1, 2], 2)).not.toThrow();
    expect(() => assertRank([1, 2, 3], 2)).toThrow(InvalidSizeError);
  });
});
