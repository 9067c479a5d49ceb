/**
 * Type tests for the type-level shape operations
 */

import { describe, it } from 'vitest';
import { expectTypeOf } from 'expect-type';
import type {
  BroadcastResult,
  BroadcastShapes,
  CanBroadcast,
  IsTuple,
  Product,
  Reverse,
  Shape,
  ShapeToString,
} from './types';
import { broadcastTwo } from './broadcasting';

describe('Shape utilities', () => {
  it('should compute products', () => {
    expectTypeOf<Product<[2, 3, 4]>>().toEqualTypeOf<24>();
    expectTypeOf<Product<[]>>().toEqualTypeOf<1>();
    expectTypeOf<Product<[2, 0, 3]>>().toEqualTypeOf<0>();
    expectTypeOf<Product<number[]>>().toEqualTypeOf<number>();
  });

  it('should reverse and render shapes', () => {
    expectTypeOf<Reverse<[2, 3, 4]>>().toEqualTypeOf<readonly [4, 3, 2]>();
    expectTypeOf<ShapeToString<[2, 3]>>().toEqualTypeOf<'2, 3'>();
    expectTypeOf<ShapeToString<[]>>().toEqualTypeOf<''>();
  });

  it('should tell tuples from arrays', () => {
    expectTypeOf<IsTuple<readonly [2, 3]>>().toEqualTypeOf<true>();
    expectTypeOf<IsTuple<number[]>>().toEqualTypeOf<false>();
  });
});

describe('Broadcasting Rules', () => {
  it('should validate broadcastable shapes', () => {
    expectTypeOf<CanBroadcast<[1, 3], [2, 1]>>().toEqualTypeOf<true>();
    expectTypeOf<CanBroadcast<[2, 3], [3]>>().toEqualTypeOf<true>();
    expectTypeOf<CanBroadcast<[], [2, 3]>>().toEqualTypeOf<true>();
    expectTypeOf<CanBroadcast<[3, 4], [4, 3]>>().toEqualTypeOf<false>();
  });

  it('should compute broadcast shapes', () => {
    expectTypeOf<BroadcastShapes<[1, 3], [2, 1]>>().toEqualTypeOf<readonly [2, 3]>();
    expectTypeOf<BroadcastShapes<[8, 1, 6, 1], [7, 1, 5]>>().toEqualTypeOf<
      readonly [8, 7, 6, 5]
    >();
    expectTypeOf<BroadcastShapes<[3, 4], [4, 3]>>().toBeNever();
  });

  it('should keep 1 against a zero extent', () => {
    expectTypeOf<BroadcastShapes<[1], [0]>>().toEqualTypeOf<readonly [1]>();
    expectTypeOf<BroadcastShapes<[2, 0], [2, 1]>>().toEqualTypeOf<readonly [2, 1]>();
    expectTypeOf<BroadcastShapes<[0], [0]>>().toEqualTypeOf<readonly [0]>();
  });

  it('should widen to Shape for non-literal operands', () => {
    expectTypeOf<BroadcastResult<number[], readonly [3]>>().toEqualTypeOf<Shape>();
    expectTypeOf<BroadcastResult<readonly [2, 3], readonly [3]>>().toEqualTypeOf<
      readonly [2, 3]
    >();
  });

  it('should type broadcastTwo calls', () => {
    expectTypeOf(broadcastTwo([2, 3], [3])).toEqualTypeOf<readonly [2, 3]>();

    const dynamic: number[] = [2, 3];
    expectTypeOf(broadcastTwo(dynamic, [3])).toEqualTypeOf<Shape>();
  });
});
