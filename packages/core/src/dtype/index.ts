/**
 * Element kinds, byte widths and scalar introspection
 *
 * @module dtype
 */

export type {
  ElementKind,
  IntegerKind,
  FloatKind,
  ReferenceKind,
  NumericKind,
  NumericByteWidths,
  ByteWidthOf,
  KindedTypedArray,
  NumericTypedArray,
  ScalarValue,
  NestedArray,
} from './types';

export { ELEMENT_KINDS, NUMERIC_KINDS } from './types';

export {
  type ElementSizeTable,
  DEFAULT_REFERENCE_ELEMENT_SIZE,
  ELEMENT_SIZES,
  createElementSizeTable,
  isElementKind,
  isNumericKind,
  numericByteWidth,
  elementSize,
  sizeOf,
  calculateByteSize,
} from './sizes';

export {
  typedArrayKind,
  isKindedTypedArray,
  isNumericTypedArray,
  typedArrayElementKind,
  isScalarValue,
  kindOfScalar,
  isFloatingScalar,
  resolveScalarKind,
  isPrimitiveArray,
} from './introspection';
