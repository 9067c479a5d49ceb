/**
 * Element kinds
 *
 * The scalar categories an array element can belong to. Numeric kinds map to
 * a machine width; `string` and `object` are reference-like and only carry a
 * placeholder width for bookkeeping.
 */

export type IntegerKind = 'int8' | 'int16' | 'int32' | 'int64';

export type FloatKind = 'float32' | 'float64';

export type ReferenceKind = 'string' | 'object';

export type NumericKind = IntegerKind | FloatKind;

export type ElementKind = NumericKind | ReferenceKind;

/**
 * Every supported kind, in order of increasing width
 */
export const ELEMENT_KINDS = Object.freeze([
  'int8',
  'int16',
  'int32',
  'float32',
  'int64',
  'float64',
  'string',
  'object',
] as const satisfies readonly ElementKind[]);

/**
 * Kinds whose width is a real machine width
 */
export const NUMERIC_KINDS = Object.freeze([
  'int8',
  'int16',
  'int32',
  'float32',
  'int64',
  'float64',
] as const satisfies readonly NumericKind[]);

/**
 * Byte widths of the numeric kinds at the type level
 *
 * @example
 * type W = ByteWidthOf<'int16'> // 2
 */
export interface NumericByteWidths {
  readonly int8: 1;
  readonly int16: 2;
  readonly int32: 4;
  readonly float32: 4;
  readonly int64: 8;
  readonly float64: 8;
}

export type ByteWidthOf<K extends ElementKind> = K extends NumericKind
  ? NumericByteWidths[K]
  : number;

/**
 * Typed array constructors that stand for a numeric kind
 */
export type KindedTypedArray =
  | Int8Array
  | Int16Array
  | Int32Array
  | BigInt64Array
  | Float32Array
  | Float64Array;

/**
 * Every typed array view, including the unsigned ones that have no kind of
 * their own
 */
export type NumericTypedArray =
  | KindedTypedArray
  | Uint8Array
  | Uint8ClampedArray
  | Uint16Array
  | Uint32Array
  | BigUint64Array;

/**
 * A scalar value that can be an array element
 */
export type ScalarValue = number | bigint | string;

/**
 * Arbitrarily nested array data
 */
export type NestedArray<T = unknown> = readonly (T | NestedArray<T>)[];
