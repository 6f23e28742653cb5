/**
 * Core type definitions
 */

// Unused buffer slots past `size` hold undefined
export type Slot<T> = T | undefined;

// Returns a fresh buffer of `capacity` slots, or null when it cannot be allocated
export type SlotAllocator<T> = (capacity: number) => Slot<T>[] | null;

export type Equals<T> = (a: T, b: T) => boolean;

// Contiguous growable buffer
export interface GrowBuffer<T> {
  data: Slot<T>[];
  size: number;
  capacity: number;
}

// Singly linked chain node; null is the terminal marker
export interface ChainNode<T> {
  value: T;
  next: ChainNode<T> | null;
}

// Returns a detached node holding `value`, or null when it cannot be allocated
export type NodeAllocator<T> = (value: T) => ChainNode<T> | null;

export interface Chain<T> {
  head: ChainNode<T> | null;
}
