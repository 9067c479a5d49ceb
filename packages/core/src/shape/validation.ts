/**
 * Runtime shape validation
 */

import { CONFIG } from '../config';
import { InvalidSizeError } from '../errors';
import type { Shape } from './types';

/**
 * Type guard for a well-formed shape: non-negative integer extents and a rank
 * no larger than `maxRank`
 */
export function isValidShape(value: unknown, maxRank: number = CONFIG.maxRank): value is Shape {
  return (
    Array.isArray(value) &&
    value.length <= maxRank &&
    value.every((dim) => typeof dim === 'number' && Number.isInteger(dim) && dim >= 0)
  );
}

/**
 * Throw if a shape has more dimensions than the configured maximum
 */
export function assertRank(shape: Shape, maxRank: number = CONFIG.maxRank): void {
  if (shape.length > maxRank) {
    throw new InvalidSizeError(shape, 'rank-exceeded', maxRank);
  }
}

/**
 * Throw unless every extent is a non-negative integer and the rank is in range
 */
export function assertValidShape(shape: Shape, maxRank: number = CONFIG.maxRank): void {
  assertRank(shape, maxRank);
  for (let i = 0; i < shape.length; i++) {
    const dim = shape[i];
    if (dim === undefined || !Number.isInteger(dim) || dim < 0) {
      throw new InvalidSizeError(shape, 'invalid-dimension', i);
    }
  }
}
