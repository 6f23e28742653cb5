/**
 * Shared helpers
 */

import { MIN_CAPACITY } from './constants';

// SameValueZero: NaN equals NaN, +0 equals -0
export function sameValueZero<T>(a: T, b: T): boolean {
  if (typeof a === 'number' && typeof b === 'number') {
    if (a === 0 && b === 0) return true;
  }
  return Object.is(a, b);
}

export function isIndex(index: number, limit: number): boolean {
  return Number.isInteger(index) && index >= 0 && index < limit;
}

export function clampCapacity(capacity: number): number {
  if (Number.isNaN(capacity)) return MIN_CAPACITY;
  return Math.max(MIN_CAPACITY, Math.floor(capacity));
}
