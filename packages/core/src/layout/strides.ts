/**
 * Stride computation
 */

import { DimensionMismatchError } from '../errors';
import { elementSize } from '../dtype/sizes';
import type { ElementKind } from '../dtype/types';
import type { Shape, Strides } from '../shape/types';

/**
 * Compute strides for a shape in C-order (row-major)
 *
 * @example
 * computeStrides([2, 3, 4]); // [12, 4, 1]
 */
export function computeStrides(shape: Shape): number[] {
  const strides: number[] = [];
  let stride = 1;
  for (let i = shape.length - 1; i >= 0; i--) {
    strides.unshift(stride);
    const dim = shape[i];
    if (dim === undefined) {
      throw new Error(`Invalid shape dimension at index ${i.toString()}`);
    }
    stride *= dim;
  }
  return strides;
}

export { computeStrides as rowMajorStrides };

/**
 * Compute the product of a shape (total number of elements)
 */
export function computeSize(shape: Shape): number {
  return shape.reduce((a, b) => a * b, 1);
}

/**
 * Row-major strides measured in bytes for elements of the given kind
 *
 * @example
 * computeByteStrides([2, 3], 'float32'); // [12, 4]
 */
export function computeByteStrides(shape: Shape, kind: ElementKind): number[] {
  const width = elementSize(kind);
  return computeStrides(shape).map((stride) => stride * width);
}

/**
 * Check if strides describe a dense row-major layout of `shape`
 *
 * Dimensions of extent 1 are never stepped along, so their stride is ignored.
 */
export function isContiguous(shape: Shape, strides: Strides): boolean {
  if (strides.length !== shape.length) {
    throw new DimensionMismatchError(shape.length, strides.length, 'strides');
  }

  const expected = computeStrides(shape);
  return shape.every((dim, i) => dim === 1 || strides[i] === expected[i]);
}
