/**
 * Broadcasting engine
 *
 * Implements NumPy-compatible broadcasting of shapes. Two shapes are aligned
 * at their trailing dimension and the shorter one is padded on the left with
 * 1s. Each aligned pair must be equal, or one side must be 1, in which case
 * the result takes the larger extent.
 *
 * ```typescript
 * broadcastTwo([2, 3], [3]);             // [2, 3]
 * broadcastTwo([8, 1, 6, 1], [7, 1, 5]); // [8, 7, 6, 5]
 * broadcastTwo([3, 4], [4, 3]);          // throws ShapeIncompatibilityError
 * ```
 *
 * `normalizeOne` is not a broadcast: it validates a single shape and returns
 * it unchanged.
 */

import { DimensionMismatchError, InvalidSizeError, ShapeIncompatibilityError } from '../errors';
import { computeStrides } from '../layout/strides';
import type { BroadcastResult, Shape, Strides } from './types';
import { assertRank } from './validation';

/**
 * Broadcast two dimensions, or null when they are incompatible
 */
function broadcastDim(a: number, b: number): number | null {
  if (a === b || a === 1 || b === 1) {
    return Math.max(a, b);
  }
  return null;
}

/**
 * Broadcast two shapes
 *
 * Literal tuple shapes get their result computed at the type level as well.
 *
 * @throws ShapeIncompatibilityError naming both shapes in the order given
 */
export function broadcastTwo<const A extends Shape, const B extends Shape>(
  shapeA: A,
  shapeB: B,
): BroadcastResult<A, B> {
  const lenA = shapeA.length;
  const lenB = shapeB.length;
  const maxLen = Math.max(lenA, lenB);
  const result = new Array<number>(maxLen);

  // Walk from the trailing dimension; missing leading dimensions are 1
  for (let i = 0; i < maxLen; i++) {
    const dimA = i < lenA ? shapeA[lenA - i - 1] : 1;
    const dimB = i < lenB ? shapeB[lenB - i - 1] : 1;
    if (dimA === undefined || dimB === undefined) {
      throw new Error(`Dimension at offset ${i.toString()} from the end is undefined`);
    }

    const dim = broadcastDim(dimA, dimB);
    if (dim === null) {
      throw new ShapeIncompatibilityError(shapeA, shapeB);
    }
    result[maxLen - i - 1] = dim;
  }

  return result as unknown as BroadcastResult<A, B>;
}

/**
 * Validate a single shape and return a copy of it
 *
 * No padding or broadcasting happens here.
 *
 * @throws InvalidSizeError if a dimension is zero, negative or not an
 * integer, or the rank exceeds the configured maximum
 */
export function normalizeOne(shape: Shape): number[] {
  assertRank(shape);

  const result = new Array<number>(shape.length);
  for (let i = 0; i < shape.length; i++) {
    const dim = shape[i];
    if (dim === 0) {
      throw new InvalidSizeError(shape, 'zero-dimension');
    }
    if (dim === undefined || !Number.isInteger(dim) || dim < 0) {
      throw new InvalidSizeError(shape, 'invalid-dimension', i);
    }
    result[i] = dim;
  }

  return result;
}

/**
 * Check if two shapes can be broadcast together
 */
export function canBroadcast(shapeA: Shape, shapeB: Shape): boolean {
  const lenA = shapeA.length;
  const lenB = shapeB.length;
  const maxLen = Math.max(lenA, lenB);

  for (let i = 0; i < maxLen; i++) {
    const dimA = i < lenA ? shapeA[lenA - i - 1] : 1;
    const dimB = i < lenB ? shapeB[lenB - i - 1] : 1;
    if (dimA === undefined || dimB === undefined || broadcastDim(dimA, dimB) === null) {
      return false;
    }
  }

  return true;
}

/**
 * Broadcast any number of shapes, left to right
 *
 * A single shape goes through `normalizeOne`.
 *
 * @throws InvalidSizeError when called with no shapes
 */
export function broadcastShapes(...shapes: Shape[]): Shape {
  const [first, ...rest] = shapes;
  if (first === undefined) {
    throw new InvalidSizeError([], 'empty');
  }
  if (rest.length === 0) {
    return normalizeOne(first);
  }
  return rest.reduce<Shape>((acc, shape) => broadcastTwo(acc, shape), first);
}

/**
 * Strides that read an operand of `shape` as if it had `targetShape`
 *
 * Stretched dimensions (extent 1 in `shape`) and padded leading dimensions
 * get stride 0, so every index along them maps to the same element.
 *
 * @example
 * broadcastStrides([3], [1], [2, 3]);       // [0, 1]
 * broadcastStrides([2, 1], [1, 1], [2, 4]); // [1, 0]
 */
export function broadcastStrides(shape: Shape, strides: Strides, targetShape: Shape): number[] {
  if (strides.length !== shape.length) {
    throw new DimensionMismatchError(shape.length, strides.length, 'strides');
  }
  if (shape.length > targetShape.length) {
    throw new ShapeIncompatibilityError(shape, targetShape);
  }

  const offset = targetShape.length - shape.length;
  const result = new Array<number>(targetShape.length).fill(0);

  for (let i = 0; i < shape.length; i++) {
    const dim = shape[i];
    const target = targetShape[i + offset];
    const stride = strides[i];
    if (dim === undefined || target === undefined || stride === undefined) {
      throw new Error(`Invalid dimension access at index ${i.toString()}`);
    }

    if (dim === target) {
      result[i + offset] = stride;
    } else if (dim !== 1) {
      throw new ShapeIncompatibilityError(shape, targetShape);
    }
  }

  return result;
}

/**
 * An operand taking part in a broadcast
 */
export interface BroadcastOperand {
  readonly shape: Shape;
  /** Defaults to the row-major strides of `shape` */
  readonly strides?: Strides;
}

/**
 * Everything an elementwise kernel needs to walk broadcast operands together
 */
export interface BroadcastContext {
  readonly outputShape: Shape;
  readonly inputShapes: readonly Shape[];
  /** Per operand, strides over `outputShape` */
  readonly strides: readonly Strides[];
}

/**
 * Compute the output shape and per-operand strides for a broadcast
 *
 * Every operand shape goes through `normalizeOne` first. A zero extent has no
 * stride that reads it as the broadcast extent.
 *
 * @throws InvalidSizeError for an operand with a zero, negative or
 * non-integer dimension
 */
export function createBroadcastContext(operands: readonly BroadcastOperand[]): BroadcastContext {
  const inputShapes = operands.map((operand) => normalizeOne(operand.shape));
  const outputShape = broadcastShapes(...inputShapes);
  const strides = operands.map((operand) =>
    broadcastStrides(operand.shape, operand.strides ?? computeStrides(operand.shape), outputShape),
  );

  return { outputShape, inputShapes, strides };
}
