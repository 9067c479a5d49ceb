/**
 * Runtime layout of an N-dimensional array: a shape paired with strides
 */

import { DimensionMismatchError, IndexOutOfBoundsError } from '../errors';
import { formatDims } from '../errors/messages';
import { broadcastStrides } from '../shape/broadcasting';
import type { Coordinates, Shape, Strides } from '../shape/types';
import { assertValidShape } from '../shape/validation';
import { type CoordinateOptions, toCoordinates, toFlatIndex } from './converter';
import { computeSize, computeStrides, isContiguous } from './strides';

export class Layout {
  readonly shape: readonly number[];
  readonly strides: readonly number[];
  readonly offset: number;
  private readonly _size: number;

  /**
   * @param strides - defaults to row-major strides of `shape`
   * @param offset - flat offset of the first element in the underlying buffer
   */
  constructor(shape: Shape, strides?: Strides, offset = 0) {
    assertValidShape(shape);
    const resolvedStrides = strides ?? computeStrides(shape);
    if (resolvedStrides.length !== shape.length) {
      throw new DimensionMismatchError(shape.length, resolvedStrides.length, 'strides');
    }

    this.shape = Object.freeze([...shape]);
    this.strides = Object.freeze([...resolvedStrides]);
    this.offset = offset;
    this._size = computeSize(shape);
  }

  get rank(): number {
    return this.shape.length;
  }

  /**
   * Total number of elements
   */
  get size(): number {
    return this._size;
  }

  get isScalar(): boolean {
    return this.shape.length === 0;
  }

  get isContiguous(): boolean {
    return isContiguous(this.shape, this.strides);
  }

  /**
   * Buffer offset of the element at the given row-major position
   */
  offsetAt(flatIndex: number, options?: CoordinateOptions): number {
    return this.offsetOf(toCoordinates(flatIndex, this.shape, options));
  }

  /**
   * Buffer offset of the element at the given coordinates
   */
  offsetOf(coordinates: Coordinates): number {
    if (coordinates.length !== this.rank) {
      throw new DimensionMismatchError(this.rank, coordinates.length, 'coordinates');
    }
    for (let i = 0; i < coordinates.length; i++) {
      const coordinate = coordinates[i];
      const dim = this.shape[i];
      if (coordinate === undefined || dim === undefined || coordinate < 0 || coordinate >= dim) {
        throw new IndexOutOfBoundsError(coordinate ?? Number.NaN, dim ?? 0);
      }
    }
    return this.offset + toFlatIndex(coordinates, this.strides);
  }

  /**
   * Coordinates of the element at the given row-major position
   */
  coordinatesAt(flatIndex: number, options?: CoordinateOptions): number[] {
    return toCoordinates(flatIndex, this.shape, options);
  }

  /**
   * A layout over the same buffer with the axes reordered
   */
  permute(axes: readonly number[]): Layout {
    if (axes.length !== this.rank) {
      throw new DimensionMismatchError(this.rank, axes.length, 'axes');
    }
    const seen = new Set<number>();
    const shape: number[] = [];
    const strides: number[] = [];
    for (const axis of axes) {
      const dim = this.shape[axis];
      const stride = this.strides[axis];
      if (seen.has(axis) || dim === undefined || stride === undefined) {
        throw new Error(`Invalid permutation ${formatDims(axes)} for rank ${this.rank.toString()}`);
      }
      seen.add(axis);
      shape.push(dim);
      strides.push(stride);
    }
    return new Layout(shape, strides, this.offset);
  }

  /**
   * Reverse the order of all axes
   */
  transpose(): Layout {
    return this.permute(this.shape.map((_, i) => this.rank - 1 - i));
  }

  /**
   * A view of this layout stretched to `targetShape`
   */
  broadcastTo(targetShape: Shape): Layout {
    return new Layout(targetShape, broadcastStrides(this.shape, this.strides, targetShape), this.offset);
  }

  /**
   * Every buffer offset in row-major order of the logical elements
   */
  *offsets(): Generator<number, void, undefined> {
    for (let i = 0; i < this._size; i++) {
      yield this.offsetAt(i);
    }
  }

  toString(): string {
    return `Layout(shape=${formatDims(this.shape)}, strides=${formatDims(this.strides)}, offset=${this.offset.toString()})`;
  }
}
