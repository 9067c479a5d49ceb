/**
 * Type tests for element kinds and their widths
 */

import { describe, it } from 'vitest';
import { expectTypeOf } from 'expect-type';
import { numericByteWidth } from './sizes';
import type { ByteWidthOf, ElementKind, NUMERIC_KINDS, NumericKind } from './types';

describe('Byte widths', () => {
  it('should map numeric kinds to literal widths', () => {
    expectTypeOf<ByteWidthOf<'int8'>>().toEqualTypeOf<1>();
    expectTypeOf<ByteWidthOf<'int16'>>().toEqualTypeOf<2>();
    expectTypeOf<ByteWidthOf<'float32'>>().toEqualTypeOf<4>();
    expectTypeOf<ByteWidthOf<'float64'>>().toEqualTypeOf<8>();
  });

  it('should leave reference kinds unsized', () => {
    expectTypeOf<ByteWidthOf<'string'>>().toEqualTypeOf<number>();
    expectTypeOf<ByteWidthOf<'object'>>().toEqualTypeOf<number>();
  });

  it('should type numericByteWidth by its argument', () => {
    expectTypeOf(numericByteWidth('int64')).toEqualTypeOf<8>();
  });
});

describe('Kind lists', () => {
  it('should list numeric kinds only', () => {
    expectTypeOf<(typeof NUMERIC_KINDS)[number]>().toEqualTypeOf<NumericKind>();
    expectTypeOf<NumericKind>().toMatchTypeOf<ElementKind>();
  });
});
