/**
 * Message rendering for stridekit errors
 *
 * Text produced here is for humans only; callers that need to branch on a
 * failure should use the error class or its `code`.
 */

/**
 * Format a shape or index tuple as `[2, 3, 4]`
 */
export function formatDims(dims: readonly number[]): string {
  return `[${dims.join(', ')}]`;
}

export function shapeIncompatibleMessage(
  shapeA: readonly number[],
  shapeB: readonly number[],
): string {
  return (
    `Cannot broadcast shapes ${formatDims(shapeA)} and ${formatDims(shapeB)}: ` +
    'dimensions must be equal or one of them must be 1'
  );
}

export function zeroDimensionMessage(shape: readonly number[]): string {
  return `Dimension cannot be zero in shape: ${formatDims(shape)}`;
}

export function invalidDimensionMessage(shape: readonly number[], index: number): string {
  return (
    `Invalid dimension ${String(shape[index])} at index ${index.toString()} in shape ` +
    `${formatDims(shape)}: dimensions must be non-negative integers`
  );
}

export function rankExceededMessage(shape: readonly number[], maxRank: number): string {
  return (
    `Shape ${formatDims(shape)} has rank ${shape.length.toString()}, ` +
    `exceeding the maximum supported rank of ${maxRank.toString()}`
  );
}

export function emptyShapeListMessage(): string {
  return 'Cannot broadcast an empty list of shapes';
}

export function unsupportedKindMessage(kind: unknown): string {
  return `Unsupported element kind: ${String(kind)}`;
}

export function dimensionMismatchMessage(
  what: string,
  expected: number,
  actual: number,
): string {
  return `Dimension mismatch: expected ${expected.toString()} ${what}, got ${actual.toString()}`;
}

export function indexOutOfBoundsMessage(index: number, size: number): string {
  return `Index ${index.toString()} out of bounds for array with ${size.toString()} elements`;
}

export function inhomogeneousShapeMessage(depth: number, shape: readonly number[]): string {
  return (
    `The requested array has an inhomogeneous shape after ${depth.toString()} dimensions. ` +
    `The detected shape was ${formatDims(shape)} + inhomogeneous part.`
  );
}

export function invalidConfigMessage(key: string, value: string, expected: string): string {
  return `Invalid value "${value}" for ${key}: expected ${expected}`;
}
