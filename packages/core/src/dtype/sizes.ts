/**
 * Element size resolution
 *
 * Maps an element kind to its byte width using a table built once, when this
 * module loads, from the process configuration. Widths are never estimated:
 * a kind missing from the table is an error.
 */

import { CONFIG } from '../config';
import { ConfigError, UnsupportedKindError } from '../errors';
import { Logger } from '../logger';
import {
  ELEMENT_KINDS,
  NUMERIC_KINDS,
  type ElementKind,
  type NumericByteWidths,
  type NumericKind,
} from './types';

const logger = new Logger('ElementSize');

const NUMERIC_WIDTHS: NumericByteWidths = Object.freeze({
  int8: 1,
  int16: 2,
  int32: 4,
  float32: 4,
  int64: 8,
  float64: 8,
});

export type ElementSizeTable = Readonly<Record<ElementKind, number>>;

/**
 * Placeholder width used for `string` and `object` unless configured otherwise
 */
export const DEFAULT_REFERENCE_ELEMENT_SIZE = 16;

/**
 * Build a frozen kind-to-width table
 *
 * Targets with another object model pick their own placeholder width for the
 * reference kinds; numeric widths are fixed.
 */
export function createElementSizeTable(
  referenceSize: number = DEFAULT_REFERENCE_ELEMENT_SIZE,
): ElementSizeTable {
  if (!Number.isSafeInteger(referenceSize) || referenceSize <= 0) {
    throw new ConfigError('referenceElementSize', String(referenceSize), 'a positive integer');
  }
  if (referenceSize !== DEFAULT_REFERENCE_ELEMENT_SIZE) {
    logger.debug(`Reference element size set to ${referenceSize.toString()} bytes`);
  }

  return Object.freeze({
    ...NUMERIC_WIDTHS,
    string: referenceSize,
    object: referenceSize,
  });
}

/**
 * Table in effect for this process
 */
export const ELEMENT_SIZES: ElementSizeTable = createElementSizeTable(CONFIG.referenceElementSize);

/**
 * Check whether a value names a kind present in the size table
 */
export function isElementKind(value: unknown): value is ElementKind {
  return typeof value === 'string' && (ELEMENT_KINDS as readonly string[]).includes(value);
}

export function isNumericKind(value: unknown): value is NumericKind {
  return typeof value === 'string' && (NUMERIC_KINDS as readonly string[]).includes(value);
}

/**
 * Machine width of a numeric kind, typed as its literal width
 *
 * @example
 * const width = numericByteWidth('int16'); // 2, typed as 2
 */
export function numericByteWidth<K extends NumericKind>(kind: K): NumericByteWidths[K] {
  return NUMERIC_WIDTHS[kind];
}

/**
 * Byte width of one element of the given kind
 *
 * @throws UnsupportedKindError if the kind is not in the table
 *
 * @example
 * elementSize('int32');   // 4
 * elementSize('float64'); // 8
 */
export function elementSize(kind: ElementKind, table: ElementSizeTable = ELEMENT_SIZES): number {
  // Untyped callers can pass anything
  if (!isElementKind(kind)) {
    throw new UnsupportedKindError(kind);
  }
  return table[kind];
}

export { elementSize as sizeOf };

/**
 * Total bytes needed for `length` elements of a kind
 */
export function calculateByteSize(length: number, kind: ElementKind): number {
  return length * elementSize(kind);
}
