/**
 * Tests for GrowableArray operations
 */

import { describe, it, expect } from 'vitest';
import { GrowableArray, ContainerReleasedError, type Slot, type SlotAllocator } from './index';

function switchableAllocator<T>() {
  const state = { fail: false, calls: 0 };
  const allocate: SlotAllocator<T> = capacity => {
    state.calls++;
    if (state.fail) return null;
    return new Array<Slot<T>>(capacity).fill(undefined);
  };
  return { state, allocate };
}

function arrayOf(values: number[], capacity: number): GrowableArray<number> {
  const arr = GrowableArray.create<number>(capacity);
  if (!arr) throw new Error('allocation failed');
  for (const v of values) arr.append(v);
  return arr;
}

describe('GrowableArray', () => {
  describe('create', () => {
    it('should start empty with the requested capacity', () => {
      const arr = GrowableArray.create<number>(8);

      expect(arr?.size).toBe(0);
      expect(arr?.capacity).toBe(8);
    });

    it('should clamp capacities below 1', () => {
      expect(GrowableArray.create(0)?.capacity).toBe(1);
      expect(GrowableArray.create(-3)?.capacity).toBe(1);
      expect(GrowableArray.create(Number.NaN)?.capacity).toBe(1);
      expect(GrowableArray.create(2.7)?.capacity).toBe(2);
    });

    it('should report allocation failure as undefined', () => {
      const { state, allocate } = switchableAllocator<number>();
      state.fail = true;

      expect(GrowableArray.create(4, { allocate })).toBeUndefined();
      expect(GrowableArray.create(Number.POSITIVE_INFINITY)).toBeUndefined();
    });

    it('should allocate a very large capacity without writing every slot', () => {
      const arr = GrowableArray.create<number>(2 ** 31);

      expect(arr?.capacity).toBe(2 ** 31);
      expect(arr?.append(1)).toBe(true);
      expect(arr?.get(0)).toBe(1);
      expect(arr?.get(1)).toBeUndefined();
      expect(arr?.size).toBe(1);
    });

    it('should build from an iterable', () => {
      const arr = GrowableArray.from(new Set([1, 2, 3]));

      expect(arr?.toArray()).toEqual([1, 2, 3]);
      expect(arr?.capacity).toBe(3);
      expect(GrowableArray.from<number>([])?.capacity).toBe(1);
    });
  });

  describe('append', () => {
    it('should double capacity when full', () => {
      const arr = arrayOf([10, 20], 2);

      expect(arr.size).toBe(2);
      expect(arr.capacity).toBe(2);

      expect(arr.append(30)).toBe(true);
      expect(arr.capacity).toBe(4);
      expect(arr.size).toBe(3);
      expect(arr.get(2)).toBe(30);
    });

    it('should grow 2 → 4 → 8 across five appends', () => {
      const arr = arrayOf([], 2);
      const capacities: number[] = [];

      for (const v of [10, 20, 30, 40, 50]) {
        arr.append(v);
        capacities.push(arr.capacity);
      }

      expect(capacities).toEqual([2, 2, 4, 4, 8]);
      expect(arr.toArray()).toEqual([10, 20, 30, 40, 50]);
    });

    it('should leave the array untouched when growth fails', () => {
      const { state, allocate } = switchableAllocator<number>();
      const arr = GrowableArray.create(2, { allocate });
      if (!arr) throw new Error('allocation failed');
      arr.append(1);
      arr.append(2);

      state.fail = true;
      expect(arr.append(3)).toBe(false);
      expect(arr.size).toBe(2);
      expect(arr.capacity).toBe(2);
      expect(arr.toArray()).toEqual([1, 2]);

      state.fail = false;
      expect(arr.append(3)).toBe(true);
      expect(arr.capacity).toBe(4);
      expect(arr.toArray()).toEqual([1, 2, 3]);
    });
  });

  describe('insert', () => {
    it('should shift later elements toward the end', () => {
      const arr = arrayOf([10, 20, 30, 40, 50], 2);

      expect(arr.insert(2, 25)).toBe(true);
      expect(arr.toArray()).toEqual([10, 20, 25, 30, 40, 50]);
      expect(arr.get(3)).toBe(30);
    });

    it('should insert at the front and at size', () => {
      const arr = arrayOf([1, 2, 3], 4);

      expect(arr.insert(0, 0)).toBe(true);
      expect(arr.insert(4, 4)).toBe(true);
      expect(arr.toArray()).toEqual([0, 1, 2, 3, 4]);
      expect(arr.capacity).toBe(8);
    });

    it('should grow before inserting into a full buffer', () => {
      const arr = arrayOf([1, 2], 2);

      expect(arr.insert(1, 5)).toBe(true);
      expect(arr.capacity).toBe(4);
      expect(arr.toArray()).toEqual([1, 5, 2]);
    });

    it('should reject indices outside [0, size]', () => {
      const arr = arrayOf([1], 2);

      expect(arr.insert(2, 9)).toBe(false);
      expect(arr.insert(-1, 9)).toBe(false);
      expect(arr.insert(0.5, 9)).toBe(false);
      expect(arr.toArray()).toEqual([1]);
    });

    it('should check bounds before allocating', () => {
      const { state, allocate } = switchableAllocator<number>();
      const arr = GrowableArray.create(1, { allocate });
      if (!arr) throw new Error('allocation failed');
      arr.append(1);
      const calls = state.calls;

      expect(arr.insert(5, 9)).toBe(false);
      expect(state.calls).toBe(calls);
    });

    it('should leave the array untouched when growth fails', () => {
      const { state, allocate } = switchableAllocator<number>();
      const arr = GrowableArray.create(2, { allocate });
      if (!arr) throw new Error('allocation failed');
      arr.append(1);
      arr.append(2);

      state.fail = true;
      expect(arr.insert(0, 9)).toBe(false);
      expect(arr.toArray()).toEqual([1, 2]);
      expect(arr.capacity).toBe(2);
    });
  });

  describe('delete', () => {
    it('should shift later elements toward the front', () => {
      const arr = arrayOf([10, 20, 25, 30, 40, 50], 8);

      expect(arr.delete(0)).toBe(true);
      expect(arr.toArray()).toEqual([20, 25, 30, 40, 50]);
      expect(arr.delete(4)).toBe(true);
      expect(arr.toArray()).toEqual([20, 25, 30, 40]);
      expect(arr.delete(1)).toBe(true);
      expect(arr.toArray()).toEqual([20, 30, 40]);
    });

    it('should reject indices outside [0, size)', () => {
      const arr = arrayOf([1, 2], 4);

      expect(arr.delete(2)).toBe(false);
      expect(arr.delete(-1)).toBe(false);
      expect(arr.delete(Number.NaN)).toBe(false);
      expect(arr.toArray()).toEqual([1, 2]);
    });

    it('should fail on an empty array', () => {
      const arr = arrayOf([], 4);

      expect(arr.delete(0)).toBe(false);
      expect(arr.size).toBe(0);
    });

    it('should succeed even when the shrink cannot be allocated', () => {
      const { state, allocate } = switchableAllocator<number>();
      const arr = GrowableArray.create(8, { allocate });
      if (!arr) throw new Error('allocation failed');
      arr.append(1);
      arr.append(2);

      state.fail = true;
      expect(arr.delete(0)).toBe(true);
      expect(arr.size).toBe(1);
      expect(arr.capacity).toBe(8);
      expect(arr.toArray()).toEqual([2]);
    });
  });

  describe('get / has', () => {
    it('should return undefined out of range', () => {
      const arr = arrayOf([1, 2], 2);

      expect(arr.get(0)).toBe(1);
      expect(arr.get(2)).toBeUndefined();
      expect(arr.get(-1)).toBeUndefined();
    });

    it('should tell a stored undefined from a missing slot', () => {
      const arr = GrowableArray.create<number | undefined>(2);
      if (!arr) throw new Error('allocation failed');
      arr.append(undefined);

      expect(arr.get(0)).toBeUndefined();
      expect(arr.has(0)).toBe(true);
      expect(arr.has(1)).toBe(false);
    });
  });

  describe('indexOf', () => {
    it('should use SameValueZero by default', () => {
      const arr = GrowableArray.from([0, Number.NaN, 3]);

      expect(arr?.indexOf(Number.NaN)).toBe(1);
      expect(arr?.indexOf(-0)).toBe(0);
      expect(arr?.indexOf(4)).toBe(-1);
    });

    it('should honour a custom equality', () => {
      const arr = GrowableArray.from([{ id: 1 }, { id: 2 }], {
        equals: (a, b) => a.id === b.id,
      });

      expect(arr?.indexOf({ id: 2 })).toBe(1);
    });
  });

  describe('reverse', () => {
    it('should reverse in place without reallocating', () => {
      const arr = arrayOf([1, 2, 3, 4, 5], 8);

      arr.reverse();

      expect(arr.toArray()).toEqual([5, 4, 3, 2, 1]);
      expect(arr.capacity).toBe(8);
    });
  });

  describe('iteration', () => {
    it('should yield live elements in order', () => {
      const arr = arrayOf([3, 1, 2], 8);

      expect([...arr]).toEqual([3, 1, 2]);
    });
  });

  describe('destroy', () => {
    it('should refuse every use afterwards', () => {
      const arr = arrayOf([1], 2);

      arr.destroy();

      expect(arr.released).toBe(true);
      expect(() => arr.append(2)).toThrow(ContainerReleasedError);
      expect(() => arr.get(0)).toThrow('GrowableArray.get() called after destroy()');
      expect(() => arr.size).toThrow(ContainerReleasedError);
      expect(() => arr.destroy()).toThrow(ContainerReleasedError);
    });
  });
});
