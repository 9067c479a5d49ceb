/**
 * Type-level shape operations
 *
 * Shapes written as literal tuples are checked at compile time: broadcasting
 * two incompatible literal shapes yields `never`, so the mistake surfaces in
 * the editor before anything runs.
 */

import type { Multiply } from 'ts-arithmetic';

// =============================================================================
// Basic Shape Types
// =============================================================================

/**
 * An array shape: one non-negative extent per dimension
 */
export type Shape = readonly number[];

/**
 * Per-dimension linear offset deltas, same rank as the paired shape
 */
export type Strides = readonly number[];

/**
 * One index per dimension
 */
export type Coordinates = readonly number[];

// =============================================================================
// Shape Arithmetic and Utilities
// =============================================================================

/**
 * Whether a shape is a tuple of known length
 */
export type IsTuple<T extends Shape> = number extends T['length'] ? false : true;

/**
 * Total number of elements in a literal shape, or `number` for a shape of
 * unknown rank
 *
 * @example
 * type Size = Product<[2, 3, 4]> // 24
 */
export type Product<S extends Shape, Acc extends number = 1> =
  IsTuple<S> extends false
    ? number
    : S extends readonly [infer H extends number, ...infer T extends Shape]
      ? H extends 0
        ? 0
        : Product<T, Multiply<Acc, H>>
      : Acc;

/**
 * @example
 * type Reversed = Reverse<[2, 3, 4]> // readonly [4, 3, 2]
 */
export type Reverse<S extends Shape, Acc extends Shape = readonly []> =
  S extends readonly [infer H extends number, ...infer T extends Shape]
    ? Reverse<T, readonly [H, ...Acc]>
    : Acc;

/**
 * Render a literal shape for error messages
 *
 * @example
 * type S = ShapeToString<[2, 3]> // '2, 3'
 */
export type ShapeToString<S extends Shape> = S extends readonly []
  ? ''
  : S extends readonly [infer H extends number]
    ? `${H}`
    : S extends readonly [infer H extends number, ...infer T extends Shape]
      ? `${H}, ${ShapeToString<T>}`
      : string;

// =============================================================================
// Broadcasting
// =============================================================================

/**
 * Compute the broadcast of two literal shapes, or never if they are incompatible
 *
 * Walks both shapes from the trailing dimension and prepends each result to
 * `Acc`. A pair broadcasts when the extents are equal or one of them is 1, and
 * takes the larger extent, so a 1 against a 0 stays 1 as it does at runtime.
 * Once one shape runs out, the rest of the other is copied unchanged.
 *
 * @example
 * type Result = BroadcastShapes<[8, 1, 6, 1], [7, 1, 5]> // readonly [8, 7, 6, 5]
 * type Error = BroadcastShapes<[3, 4], [4, 3]> // never
 */
export type BroadcastShapes<A extends Shape, B extends Shape, Acc extends Shape = readonly []> =
  A extends readonly [...infer RestA extends Shape, infer DimA extends number]
    ? B extends readonly [...infer RestB extends Shape, infer DimB extends number]
      ? DimA extends DimB | 1
        ? BroadcastShapes<
            RestA,
            RestB,
            readonly [DimA extends 1 ? (DimB extends 0 ? 1 : DimB) : DimA, ...Acc]
          >
        : DimB extends 1
          ? BroadcastShapes<RestA, RestB, readonly [DimA extends 0 ? 1 : DimA, ...Acc]>
          : never
      : readonly [...A, ...Acc]
    : readonly [...B, ...Acc];

/**
 * Check if two literal shapes can be broadcast together
 *
 * @example
 * type Ok = CanBroadcast<[1, 3], [2, 1]> // true
 * type No = CanBroadcast<[2, 3], [4, 5]> // false
 */
export type CanBroadcast<A extends Shape, B extends Shape> =
  BroadcastShapes<A, B> extends never ? false : true;

/**
 * Result type of `broadcastTwo`: the literal broadcast when both shapes are
 * tuples, otherwise a plain Shape
 */
export type BroadcastResult<A extends Shape, B extends Shape> =
  IsTuple<A> extends true
    ? IsTuple<B> extends true
      ? BroadcastShapes<A, B>
      : Shape
    : Shape;
