/**
 * Flat index and coordinate conversion
 *
 * `toCoordinates` always decomposes against the implicit row-major strides of
 * a shape, while `toFlatIndex` takes explicit strides. They are inverses only
 * when those strides are the row-major ones; transposed or broadcast strides
 * are legal input to `toFlatIndex` and give a different offset.
 */

import { CONFIG } from '../config';
import { DimensionMismatchError, IndexOutOfBoundsError } from '../errors';
import { formatDims } from '../errors/messages';
import { LogLevel, Logger } from '../logger';
import type { Coordinates, Shape, Strides } from '../shape/types';
import { computeSize } from './strides';

const logger = new Logger('Layout');

export interface CoordinateOptions {
  /**
   * Reject flat indices outside `[0, size)`. Defaults to `CONFIG.checkBounds`.
   * When disabled, an out-of-range index yields meaningless coordinates.
   */
  readonly checkBounds?: boolean;
}

/**
 * Convert a flat row-major index into per-dimension coordinates
 *
 * @example
 * toCoordinates(5, [2, 3]);     // [1, 2]
 * toCoordinates(23, [2, 3, 4]); // [1, 2, 3]
 *
 * @throws IndexOutOfBoundsError when bounds checking is on and the index is
 * not an integer in `[0, product(shape))`
 */
export function toCoordinates(
  flatIndex: number,
  shape: Shape,
  options: CoordinateOptions = {},
): number[] {
  const checkBounds = options.checkBounds ?? CONFIG.checkBounds;

  if (checkBounds) {
    const size = computeSize(shape);
    if (!Number.isInteger(flatIndex) || flatIndex < 0 || flatIndex >= size) {
      throw new IndexOutOfBoundsError(flatIndex, size);
    }
  } else if (logger.isEnabled(LogLevel.WARN)) {
    const size = computeSize(shape);
    if (!(flatIndex >= 0 && flatIndex < size)) {
      logger.warn(
        `Unchecked flat index ${flatIndex.toString()} is outside shape ${formatDims(shape)}`,
      );
    }
  }

  const coordinates = new Array<number>(shape.length);
  let remaining = flatIndex;

  for (let i = shape.length - 1; i >= 0; i--) {
    const dim = shape[i];
    if (dim === undefined) {
      throw new Error(`Dimension at index ${i.toString()} is undefined`);
    }
    coordinates[i] = remaining % dim;
    remaining = Math.trunc(remaining / dim);
  }

  return coordinates;
}

/**
 * Convert coordinates into a flat offset using explicit strides
 *
 * @example
 * toFlatIndex([1, 2], [10, 1]); // 12
 *
 * @throws DimensionMismatchError when the two sequences differ in length
 */
export function toFlatIndex(coordinates: Coordinates, strides: Strides): number {
  if (coordinates.length !== strides.length) {
    throw new DimensionMismatchError(strides.length, coordinates.length, 'coordinates');
  }

  let flatIndex = 0;
  for (let i = 0; i < coordinates.length; i++) {
    const coordinate = coordinates[i];
    const stride = strides[i];
    if (coordinate === undefined || stride === undefined) {
      throw new Error(`Coordinate or stride at position ${i.toString()} is undefined`);
    }
    flatIndex += coordinate * stride;
  }

  return flatIndex;
}
