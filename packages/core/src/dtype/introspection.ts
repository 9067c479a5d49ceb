/**
 * Value and array introspection
 *
 * Helpers for working out what kind of scalar a piece of array data holds.
 * JavaScript has no boxed machine types, so a plain number is classified by
 * value: integers in int32 range are `int32`, every other number is
 * `float64`. Typed arrays carry their kind in their constructor.
 */

import { UnsupportedKindError } from '../errors';
import type {
  ElementKind,
  KindedTypedArray,
  NestedArray,
  NumericKind,
  NumericTypedArray,
  ScalarValue,
} from './types';

const INT32_MIN = -2147483648;
const INT32_MAX = 2147483647;

/**
 * Kind of a typed array, or null for anything else
 */
export function typedArrayKind(value: unknown): NumericKind | null {
  if (value instanceof Int8Array) {
    return 'int8';
  }
  if (value instanceof Int16Array) {
    return 'int16';
  }
  if (value instanceof Int32Array) {
    return 'int32';
  }
  if (value instanceof BigInt64Array) {
    return 'int64';
  }
  if (value instanceof Float32Array) {
    return 'float32';
  }
  if (value instanceof Float64Array) {
    return 'float64';
  }
  return null;
}

export function isKindedTypedArray(value: unknown): value is KindedTypedArray {
  return typedArrayKind(value) !== null;
}

/**
 * Check if a value is any typed array view (a DataView is not)
 */
export function isNumericTypedArray(value: unknown): value is NumericTypedArray {
  return ArrayBuffer.isView(value) && !(value instanceof DataView);
}

/**
 * Smallest signed kind that holds every value of an unsigned typed array
 */
function widenedUnsignedKind(value: NumericTypedArray): NumericKind | null {
  if (value instanceof Uint8Array || value instanceof Uint8ClampedArray) {
    return 'int16';
  }
  if (value instanceof Uint16Array) {
    return 'int32';
  }
  if (value instanceof Uint32Array) {
    return 'int64';
  }
  return null;
}

/**
 * Element kind of any typed array
 *
 * Unsigned arrays widen to the next signed kind. `BigUint64Array` has no
 * signed kind wide enough and is rejected.
 *
 * @throws UnsupportedKindError for a typed array with no matching kind
 */
export function typedArrayElementKind(value: NumericTypedArray): NumericKind {
  const kind = typedArrayKind(value) ?? widenedUnsignedKind(value);
  if (kind === null) {
    throw new UnsupportedKindError(value.constructor.name);
  }
  return kind;
}

/**
 * Check if a value is a scalar: a number, bigint or string
 */
export function isScalarValue(value: unknown): value is ScalarValue {
  return typeof value === 'number' || typeof value === 'bigint' || typeof value === 'string';
}

/**
 * Element kind of a single value
 *
 * @example
 * kindOfScalar(3);     // 'int32'
 * kindOfScalar(2.5);   // 'float64'
 * kindOfScalar(2 ** 40); // 'float64'
 * kindOfScalar(-0);    // 'float64'
 * kindOfScalar(7n);    // 'int64'
 * kindOfScalar('a');   // 'string'
 * kindOfScalar(null);  // 'object'
 */
export function kindOfScalar(value: unknown): ElementKind {
  if (typeof value === 'number') {
    if (
      Number.isInteger(value) &&
      !Object.is(value, -0) &&
      value >= INT32_MIN &&
      value <= INT32_MAX
    ) {
      return 'int32';
    }
    return 'float64';
  }
  if (typeof value === 'bigint') {
    return 'int64';
  }
  if (typeof value === 'string') {
    return 'string';
  }
  return 'object';
}

/**
 * Check if a value is a 32- or 64-bit floating point scalar
 */
export function isFloatingScalar(value: unknown): boolean {
  if (!isScalarValue(value)) {
    return false;
  }
  const kind = kindOfScalar(value);
  return kind === 'float32' || kind === 'float64';
}

/**
 * Innermost element kind of nested array data
 *
 * Descends through the first element of each nesting level until it reaches
 * a value that is not an array. An empty level has no elements to inspect
 * and resolves to `object`. Typed arrays resolve through
 * `typedArrayElementKind`.
 *
 * @example
 * resolveScalarKind([[1, 2], [3, 4]]);          // 'int32'
 * resolveScalarKind([new Float32Array(2)]);      // 'float32'
 * resolveScalarKind([new Uint8Array(3)]);       // 'int16'
 * resolveScalarKind([['a', 'b']]);               // 'string'
 */
export function resolveScalarKind(value: NestedArray | NumericTypedArray): ElementKind {
  let current: unknown = value;

  for (;;) {
    if (isNumericTypedArray(current)) {
      return typedArrayElementKind(current);
    }
    if (!Array.isArray(current)) {
      return kindOfScalar(current);
    }
    if (current.length === 0) {
      return 'object';
    }
    current = current[0];
  }
}

/**
 * Nesting depth at which every leaf is a scalar, or null when some leaf is
 * not a scalar or the leaves sit at different depths
 */
function scalarLeafDepth(value: unknown): number | null {
  if (isScalarValue(value)) {
    return 0;
  }
  if (isNumericTypedArray(value)) {
    return 1;
  }
  if (!Array.isArray(value)) {
    return null;
  }

  let depth: number | undefined;
  for (const element of value) {
    const elementDepth = scalarLeafDepth(element);
    if (elementDepth === null || (depth !== undefined && elementDepth !== depth)) {
      return null;
    }
    depth = elementDepth;
  }
  return (depth ?? 0) + 1;
}

/**
 * Check if array data holds scalars all the way down
 *
 * Nested arrays count as primitive when every leaf is a scalar at the same
 * depth. Every typed array is primitive, as is an empty array. Anything that
 * is not an array is not a primitive array.
 *
 * @example
 * isPrimitiveArray([]);               // true
 * isPrimitiveArray([[1, 2], [3, 4]]); // true
 * isPrimitiveArray([{}, {}]);         // false
 * isPrimitiveArray([1, [2]]);         // false
 */
export function isPrimitiveArray(value: unknown): boolean {
  if (isNumericTypedArray(value)) {
    return true;
  }
  if (!Array.isArray(value)) {
    return false;
  }
  return scalarLeafDepth(value) !== null;
}
