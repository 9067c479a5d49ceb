/**
 * Error taxonomy
 *
 * Every failure raised by stridekit is a StrideKitError subclass carrying the
 * offending shapes or values as readonly fields. Nothing here is recovered
 * internally; callers decide whether to abort or surface a message.
 */

import {
  dimensionMismatchMessage,
  emptyShapeListMessage,
  indexOutOfBoundsMessage,
  inhomogeneousShapeMessage,
  invalidConfigMessage,
  invalidDimensionMessage,
  rankExceededMessage,
  shapeIncompatibleMessage,
  unsupportedKindMessage,
  zeroDimensionMessage,
} from './messages';

export type StrideKitErrorCode =
  | 'SHAPE_INCOMPATIBLE'
  | 'INVALID_SIZE'
  | 'UNSUPPORTED_KIND'
  | 'DIMENSION_MISMATCH'
  | 'INDEX_OUT_OF_BOUNDS'
  | 'INHOMOGENEOUS_SHAPE'
  | 'INVALID_CONFIG';

/**
 * Base class for all stridekit errors
 */
export class StrideKitError extends Error {
  constructor(
    message: string,
    public readonly code: StrideKitErrorCode,
  ) {
    super(message);
    this.name = 'StrideKitError';
  }
}

/**
 * Two shapes cannot be broadcast together
 */
export class ShapeIncompatibilityError extends StrideKitError {
  constructor(
    public readonly shapeA: readonly number[],
    public readonly shapeB: readonly number[],
  ) {
    super(shapeIncompatibleMessage(shapeA, shapeB), 'SHAPE_INCOMPATIBLE');
    this.name = 'ShapeIncompatibilityError';
  }
}

/**
 * Why a shape was rejected as a size
 */
export type InvalidSizeReason = 'zero-dimension' | 'invalid-dimension' | 'rank-exceeded' | 'empty';

/**
 * A shape has a zero, negative or non-integer dimension, too many dimensions,
 * or there was no shape at all
 */
export class InvalidSizeError extends StrideKitError {
  constructor(
    public readonly shape: readonly number[],
    public readonly reason: InvalidSizeReason,
    detail?: number,
  ) {
    super(InvalidSizeError.render(shape, reason, detail ?? 0), 'INVALID_SIZE');
    this.name = 'InvalidSizeError';
  }

  private static render(shape: readonly number[], reason: InvalidSizeReason, detail: number): string {
    switch (reason) {
      case 'zero-dimension':
        return zeroDimensionMessage(shape);
      case 'invalid-dimension':
        return invalidDimensionMessage(shape, detail);
      case 'rank-exceeded':
        return rankExceededMessage(shape, detail);
      case 'empty':
        return emptyShapeListMessage();
    }
  }
}

/**
 * An element kind has no entry in the size table
 */
export class UnsupportedKindError extends StrideKitError {
  constructor(public readonly kind: unknown) {
    super(unsupportedKindMessage(kind), 'UNSUPPORTED_KIND');
    this.name = 'UnsupportedKindError';
  }
}

/**
 * Two sequences that must have the same length do not
 */
export class DimensionMismatchError extends StrideKitError {
  constructor(
    public readonly expected: number,
    public readonly actual: number,
    what = 'dimensions',
  ) {
    super(dimensionMismatchMessage(what, expected, actual), 'DIMENSION_MISMATCH');
    this.name = 'DimensionMismatchError';
  }
}

export class IndexOutOfBoundsError extends StrideKitError {
  constructor(
    public readonly index: number,
    public readonly size: number,
  ) {
    super(indexOutOfBoundsMessage(index, size), 'INDEX_OUT_OF_BOUNDS');
    this.name = 'IndexOutOfBoundsError';
  }
}

/**
 * Nested array data is ragged. `shape` is the shape detected up to `depth`.
 */
export class InhomogeneousShapeError extends StrideKitError {
  constructor(
    public readonly depth: number,
    public readonly shape: readonly number[],
  ) {
    super(inhomogeneousShapeMessage(depth, shape), 'INHOMOGENEOUS_SHAPE');
    this.name = 'InhomogeneousShapeError';
  }
}

export class ConfigError extends StrideKitError {
  constructor(
    public readonly key: string,
    public readonly value: string,
    expected: string,
  ) {
    super(invalidConfigMessage(key, value, expected), 'INVALID_CONFIG');
    this.name = 'ConfigError';
  }
}

/**
 * Type guard for errors raised by this package
 */
export function isStrideKitError(error: unknown): error is StrideKitError {
  return error instanceof StrideKitError;
}
