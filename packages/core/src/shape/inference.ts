/**
 * Shape inference from nested array data
 */

import { CONFIG } from '../config';
import { InhomogeneousShapeError, InvalidSizeError } from '../errors';
import { isNumericTypedArray } from '../dtype/introspection';
import type { NumericTypedArray } from '../dtype/types';

type ArrayLevel = readonly unknown[] | NumericTypedArray;

function isArrayLevel(value: unknown): value is ArrayLevel {
  return Array.isArray(value) || isNumericTypedArray(value);
}

/**
 * Infer the shape of nested array data
 *
 * The data is walked one nesting level at a time. At every level either all
 * entries are arrays of the same length, which adds a dimension, or none are,
 * which ends the shape. Anything in between is ragged.
 *
 * @example
 * inferShape(5);                     // []
 * inferShape([]);                    // [0]
 * inferShape([[1, 2, 3], [4, 5, 6]]); // [2, 3]
 * inferShape([[1, 2], [3]]);         // throws InhomogeneousShapeError (depth 1, shape [2])
 *
 * @throws InhomogeneousShapeError when nesting is ragged
 * @throws InvalidSizeError when the rank exceeds `maxRank`
 */
export function inferShape(data: unknown, maxRank: number = CONFIG.maxRank): number[] {
  const shape: number[] = [];
  let level: readonly unknown[] = [data];

  for (;;) {
    const arrays = level.filter(isArrayLevel);
    const first = arrays[0];
    if (first === undefined) {
      return shape;
    }
    if (arrays.length !== level.length || arrays.some((array) => array.length !== first.length)) {
      throw new InhomogeneousShapeError(shape.length, [...shape]);
    }

    shape.push(first.length);
    if (shape.length > maxRank) {
      throw new InvalidSizeError(shape, 'rank-exceeded', maxRank);
    }
    level = arrays.flatMap((array): unknown[] => Array.from<unknown>(array));
  }
}
