/**
 * GrowBuffer - contiguous buffer with doubling growth and quarter-occupancy shrink
 *
 * Slots [0, size) are live, slots [size, capacity) are allocated but hold undefined.
 */

import {
  GROWTH_FACTOR,
  MAX_CAPACITY,
  SHRINK_DIVISOR,
  SHRINK_MIN_CAPACITY,
  SHRINK_OCCUPANCY_DIVISOR,
} from './constants';
import type { Equals, GrowBuffer, Slot, SlotAllocator } from './types';
import { isIndex } from './utils';

export function allocSlots<T>(capacity: number): Slot<T>[] | null {
  if (capacity > MAX_CAPACITY) return null;
  try {
    // Holey on purpose: unwritten slots read as undefined
    return new Array<Slot<T>>(capacity);
  } catch (err) {
    // Engine refuses the length
    if (err instanceof RangeError) return null;
    throw err;
  }
}

export function bufAlloc<T>(capacity: number, allocate: SlotAllocator<T>): GrowBuffer<T> | null {
  const data = allocate(capacity);
  if (!data) return null;
  return { data, size: 0, capacity };
}

export function bufFromValues<T>(
  values: Iterable<T>,
  capacity: number,
  allocate: SlotAllocator<T>
): GrowBuffer<T> | null {
  const items = Array.from(values);
  const buf = bufAlloc(Math.max(capacity, items.length), allocate);
  if (!buf) return null;
  for (let i = 0; i < items.length; i++) {
    buf.data[i] = items[i];
  }
  buf.size = items.length;
  return buf;
}

/**
 * Swap in a buffer of `capacity` slots. The current buffer is kept
 * until the new one is allocated and filled, so failure leaves `buf` as it was.
 */
export function bufResize<T>(buf: GrowBuffer<T>, capacity: number, allocate: SlotAllocator<T>): boolean {
  if (capacity < buf.size || capacity > MAX_CAPACITY) return false;
  const next = allocate(capacity);
  if (!next) return false;
  for (let i = 0; i < buf.size; i++) {
    next[i] = buf.data[i];
  }
  buf.data = next;
  buf.capacity = capacity;
  return true;
}

function ensureRoom<T>(buf: GrowBuffer<T>, allocate: SlotAllocator<T>): boolean {
  if (buf.size < buf.capacity) return true;
  return bufResize(buf, buf.capacity * GROWTH_FACTOR, allocate);
}

function maybeShrink<T>(buf: GrowBuffer<T>, allocate: SlotAllocator<T>): void {
  const { size, capacity } = buf;
  if (capacity > SHRINK_MIN_CAPACITY && size < Math.floor(capacity / SHRINK_OCCUPANCY_DIVISOR)) {
    // Best effort: the buffer stays valid at its current capacity on failure
    bufResize(buf, Math.floor(capacity / SHRINK_DIVISOR), allocate);
  }
}

export function bufAppend<T>(buf: GrowBuffer<T>, allocate: SlotAllocator<T>, value: T): boolean {
  if (!ensureRoom(buf, allocate)) return false;
  buf.data[buf.size++] = value;
  return true;
}

export function bufInsert<T>(
  buf: GrowBuffer<T>,
  allocate: SlotAllocator<T>,
  index: number,
  value: T
): boolean {
  // index == size is a valid insertion point (append)
  if (!isIndex(index, buf.size + 1)) return false;
  if (!ensureRoom(buf, allocate)) return false;

  const { data } = buf;
  for (let i = buf.size; i > index; i--) {
    data[i] = data[i - 1];
  }
  data[index] = value;
  buf.size++;
  return true;
}

export function bufDelete<T>(buf: GrowBuffer<T>, allocate: SlotAllocator<T>, index: number): boolean {
  if (!isIndex(index, buf.size)) return false;

  const { data } = buf;
  const last = buf.size - 1;
  for (let i = index; i < last; i++) {
    data[i] = data[i + 1];
  }
  // Vacated slot must not keep the value alive
  data[last] = undefined;
  buf.size = last;

  maybeShrink(buf, allocate);
  return true;
}

export function bufGet<T>(buf: GrowBuffer<T>, index: number): T | undefined {
  if (!isIndex(index, buf.size)) return undefined;
  return buf.data[index];
}

export function bufIndexOf<T>(buf: GrowBuffer<T>, equals: Equals<T>, value: T): number {
  const { data, size } = buf;
  for (let i = 0; i < size; i++) {
    if (equals(data[i] as T, value)) return i;
  }
  return -1;
}

export function bufReverse<T>(buf: GrowBuffer<T>): void {
  const { data } = buf;
  let lo = 0;
  let hi = buf.size - 1;
  while (lo < hi) {
    const tmp = data[lo];
    data[lo] = data[hi];
    data[hi] = tmp;
    lo++;
    hi--;
  }
}

export function bufToArray<T>(buf: GrowBuffer<T>): T[] {
  return buf.data.slice(0, buf.size) as T[];
}

export function* bufIter<T>(buf: GrowBuffer<T>): IterableIterator<T> {
  for (let i = 0; i < buf.size; i++) {
    yield buf.data[i] as T;
  }
}

export function bufRelease<T>(buf: GrowBuffer<T>): void {
  buf.data = [];
  buf.size = 0;
  buf.capacity = 0;
}
