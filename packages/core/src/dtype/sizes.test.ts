/**
 * Runtime tests for dtype/sizes.ts
 */

import { describe, it, expect } from 'vitest';
import {
  DEFAULT_REFERENCE_ELEMENT_SIZE,
  ELEMENT_SIZES,
  calculateByteSize,
  createElementSizeTable,
  elementSize,
  isElementKind,
  isNumericKind,
  numericByteWidth,
  sizeOf,
} from './sizes';
import { ELEMENT_KINDS, NUMERIC_KINDS, type ElementKind } from './types';
import { ConfigError, UnsupportedKindError } from '../errors';

// =============================================================================
// Element Size Lookup
// =============================================================================

describe('elementSize', () => {
  it('should return machine widths for numeric kinds', () => {
    expect(elementSize('int8')).toBe(1);
    expect(elementSize('int16')).toBe(2);
    expect(elementSize('int32')).toBe(4);
    expect(elementSize('float32')).toBe(4);
    expect(elementSize('int64')).toBe(8);
    expect(elementSize('float64')).toBe(8);
  });

  it('should return the placeholder width for reference kinds', () => {
    expect(elementSize('string')).toBe(16);
    expect(elementSize('object')).toBe(16);
  });

  it('should be exported as sizeOf too', () => {
    expect(sizeOf).toBe(elementSize);
    expect(sizeOf('float64')).toBe(8);
  });

  it('should reject unregistered kinds', () => {
    const kind: string = 'complex128';
    expect(() => elementSize(kind as ElementKind)).toThrow(UnsupportedKindError);
    expect(() => elementSize(kind as ElementKind)).toThrow('Unsupported element kind: complex128');
  });

  it('should carry the rejected kind on the error', () => {
    const kind: string = 'bool';
    try {
      elementSize(kind as ElementKind);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(UnsupportedKindError);
      if (error instanceof UnsupportedKindError) {
        expect(error.kind).toBe('bool');
        expect(error.code).toBe('UNSUPPORTED_KIND');
      }
    }
  });

  it('should look up in a caller-supplied table', () => {
    const table = createElementSizeTable(8);
    expect(elementSize('object', table)).toBe(8);
    expect(elementSize('int16', table)).toBe(2);
  });
});

// =============================================================================
// Size Tables
// =============================================================================

describe('createElementSizeTable', () => {
  it('should cover every element kind', () => {
    const table = createElementSizeTable();
    expect(Object.keys(table).sort()).toEqual([...ELEMENT_KINDS].sort());
  });

  it('should default the reference width', () => {
    expect(DEFAULT_REFERENCE_ELEMENT_SIZE).toBe(16);
    expect(createElementSizeTable().string).toBe(16);
  });

  it('should produce frozen tables', () => {
    expect(Object.isFrozen(createElementSizeTable(24))).toBe(true);
    expect(Object.isFrozen(ELEMENT_SIZES)).toBe(true);
  });

  it('should reject invalid reference widths', () => {
    expect(() => createElementSizeTable(0)).toThrow(ConfigError);
    expect(() => createElementSizeTable(-4)).toThrow(ConfigError);
    expect(() => createElementSizeTable(2.5)).toThrow(ConfigError);
  });
});

describe('isElementKind', () => {
  it('should recognise registered kinds only', () => {
    expect(isElementKind('int32')).toBe(true);
    expect(isElementKind('object')).toBe(true);
    expect(isElementKind('uint8')).toBe(false);
    expect(isElementKind(4)).toBe(false);
    expect(isElementKind(undefined)).toBe(false);
  });
});

describe('numeric kinds', () => {
  it('should recognise only the machine kinds', () => {
    expect(isNumericKind('float32')).toBe(true);
    expect(isNumericKind('int64')).toBe(true);
    expect(isNumericKind('string')).toBe(false);
    expect(isNumericKind(4)).toBe(false);
  });

  it('should report the same widths as the size table', () => {
    for (const kind of NUMERIC_KINDS) {
      expect(numericByteWidth(kind)).toBe(elementSize(kind));
    }
    expect(numericByteWidth('int16')).toBe(2);
  });
});

describe('calculateByteSize', () => {
  it('should multiply length by element width', () => {
    expect(calculateByteSize(10, 'float32')).toBe(40);
    expect(calculateByteSize(3, 'int64')).toBe(24);
    expect(calculateByteSize(0, 'int8')).toBe(0);
  });
});
