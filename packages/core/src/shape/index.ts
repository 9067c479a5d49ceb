/**
 * Shape module exports
 *
 * @module shape
 *
 * ## Broadcasting Rules
 * Two shapes are compatible for broadcasting when, after prepending 1s to the
 * shorter one, every pair of dimensions is equal or contains a 1.
 *
 * ```typescript
 * [2, 3] + [] => [2, 3]
 * [2, 1] + [1, 3] => [2, 3]
 * [8, 1, 6, 1] + [7, 1, 5] => [8, 7, 6, 5]
 * ```
 */

export type {
  Shape,
  Strides,
  Coordinates,
  Product,
  IsTuple,
  Reverse,
  ShapeToString,
  BroadcastShapes,
  CanBroadcast,
  BroadcastResult,
} from './types';

export {
  broadcastTwo,
  normalizeOne,
  canBroadcast,
  broadcastShapes,
  broadcastStrides,
  createBroadcastContext,
  type BroadcastOperand,
  type BroadcastContext,
} from './broadcasting';

export { isValidShape, assertRank, assertValidShape } from './validation';

export { inferShape } from './inference';
