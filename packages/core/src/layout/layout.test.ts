/**
 * Runtime tests for the Layout class
 */

import { describe, it, expect } from 'vitest';
import { Layout } from './layout';
import { DimensionMismatchError, IndexOutOfBoundsError, InvalidSizeError } from '../errors';

describe('Layout', () => {
  describe('Construction and Basic Properties', () => {
    it('should default to row-major strides', () => {
      const layout = new Layout([2, 3, 4]);

      expect(layout.shape).toEqual([2, 3, 4]);
      expect(layout.strides).toEqual([12, 4, 1]);
      expect(layout.rank).toBe(3);
      expect(layout.size).toBe(24);
      expect(layout.offset).toBe(0);
      expect(layout.isContiguous).toBe(true);
      expect(layout.isScalar).toBe(false);
    });

    it('should handle scalar layouts', () => {
      const scalar = new Layout([]);

      expect(scalar.rank).toBe(0);
      expect(scalar.size).toBe(1);
      expect(scalar.isScalar).toBe(true);
      expect(scalar.offsetAt(0)).toBe(0);
    });

    it('should copy and freeze its shape and strides', () => {
      const shape = [2, 3];
      const layout = new Layout(shape);
      shape[0] = 9;

      expect(layout.shape).toEqual([2, 3]);
      expect(Object.isFrozen(layout.shape)).toBe(true);
      expect(Object.isFrozen(layout.strides)).toBe(true);
    });

    it('should validate shape and strides', () => {
      expect(() => new Layout([2, -1])).toThrow(InvalidSizeError);
      expect(() => new Layout([2, 3], [1])).toThrow(DimensionMismatchError);
    });

    it('should render for debugging', () => {
      expect(new Layout([2, 3]).toString()).toBe('Layout(shape=[2, 3], strides=[3, 1], offset=0)');
    });
  });

  describe('Offsets', () => {
    it('should map coordinates through strides and offset', () => {
      expect(new Layout([2, 3]).offsetOf([1, 2])).toBe(5);
      expect(new Layout([2, 2], [2, 1], 10).offsetOf([1, 1])).toBe(13);
    });

    it('should map row-major positions', () => {
      const layout = new Layout([2, 3]);
      expect(layout.offsetAt(4)).toBe(4);
      expect(layout.coordinatesAt(4)).toEqual([1, 1]);
    });

    it('should reject coordinates outside the shape', () => {
      const layout = new Layout([2, 3]);
      expect(() => layout.offsetOf([2, 0])).toThrow(IndexOutOfBoundsError);
      expect(() => layout.offsetOf([0, -1])).toThrow(IndexOutOfBoundsError);
      expect(() => layout.offsetOf([1])).toThrow(DimensionMismatchError);
    });

    it('should enumerate offsets in logical order', () => {
      expect([...new Layout([2, 3]).offsets()]).toEqual([0, 1, 2, 3, 4, 5]);
      expect([...new Layout([2, 0]).offsets()]).toEqual([]);
    });
  });

  describe('Views', () => {
    it('should transpose by reversing axes', () => {
      const transposed = new Layout([2, 3]).transpose();

      expect(transposed.shape).toEqual([3, 2]);
      expect(transposed.strides).toEqual([1, 3]);
      expect(transposed.isContiguous).toBe(false);
      expect([...transposed.offsets()]).toEqual([0, 3, 1, 4, 2, 5]);
    });

    it('should permute axes', () => {
      const permuted = new Layout([2, 3, 4]).permute([2, 0, 1]);

      expect(permuted.shape).toEqual([4, 2, 3]);
      expect(permuted.strides).toEqual([1, 12, 4]);
    });

    it('should reject invalid permutations', () => {
      const layout = new Layout([2, 3]);
      expect(() => layout.permute([0, 0])).toThrow('Invalid permutation [0, 0] for rank 2');
      expect(() => layout.permute([0, 2])).toThrow('Invalid permutation [0, 2] for rank 2');
      expect(() => layout.permute([0])).toThrow(DimensionMismatchError);
    });

    it('should broadcast with zero strides', () => {
      const row = new Layout([3]).broadcastTo([2, 3]);

      expect(row.shape).toEqual([2, 3]);
      expect(row.strides).toEqual([0, 1]);
      expect([...row.offsets()]).toEqual([0, 1, 2, 0, 1, 2]);
    });

    it('should keep the base offset in views', () => {
      const layout = new Layout([2, 2], [2, 1], 4);
      expect(layout.transpose().offset).toBe(4);
      expect(layout.broadcastTo([3, 2, 2]).offsetOf([2, 1, 0])).toBe(6);
    });
  });
});
