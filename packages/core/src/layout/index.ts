/**
 * Layout module exports
 *
 * @module layout
 */

export {
  toCoordinates,
  toFlatIndex,
  type CoordinateOptions,
} from './converter';

export {
  computeStrides,
  rowMajorStrides,
  computeSize,
  computeByteStrides,
  isContiguous,
} from './strides';

export { Layout } from './layout';
