/**
 * seqkit – GrowableArray + LinkedSequence
 *
 * - GrowableArray.create(n) → contiguous buffer, doubles when full, halves below 1/4
 * - new LinkedSequence()    → singly linked chain owned from its head
 *
 * Both containers are synchronous and unsynchronized. Sharing one instance
 * between interleaved async tasks requires the caller to serialize access.
 */

import {
  allocSlots,
  bufAlloc,
  bufFromValues,
  bufAppend,
  bufInsert,
  bufDelete,
  bufGet,
  bufIndexOf,
  bufReverse,
  bufToArray,
  bufIter,
  bufRelease,
  chainNode,
  chainEmpty,
  chainInsertFront,
  chainInsertEnd,
  chainInsertAfter,
  chainFind,
  chainDelete,
  chainLength,
  chainReverse,
  chainRelease,
  chainFromValues,
  chainIter,
  chainToArray,
  sameValueZero,
  isIndex,
  clampCapacity,
  type Chain,
  type Equals,
  type GrowBuffer,
  type NodeAllocator,
  type SlotAllocator,
} from './internal';
import { ContainerReleasedError } from './errors';

export { ContainerReleasedError } from './errors';
export type { Equals, Slot, SlotAllocator, NodeAllocator, ChainNode } from './internal';
export {
  GROWTH_FACTOR,
  SHRINK_DIVISOR,
  SHRINK_OCCUPANCY_DIVISOR,
  SHRINK_MIN_CAPACITY,
  MIN_CAPACITY,
  MAX_CAPACITY,
} from './internal';

// =====================================================
// GrowableArray
// =====================================================

export interface GrowableArrayOptions<T> {
  /** Equality used by indexOf(). Defaults to SameValueZero. */
  equals?: Equals<T>;
  /** Buffer allocator; return null to report allocation failure. */
  allocate?: SlotAllocator<T>;
}

/**
 * Index-addressable sequence backed by one contiguous buffer.
 *
 * Capacity doubles when an insertion finds the buffer full and halves
 * after a deletion leaves it under a quarter full (only while capacity > 4).
 * Failed operations return false/undefined and leave the array untouched.
 */
export class GrowableArray<T> implements Iterable<T> {
  private buf: GrowBuffer<T> | null;
  private readonly allocate: SlotAllocator<T>;
  private readonly equals: Equals<T>;

  private constructor(buf: GrowBuffer<T>, allocate: SlotAllocator<T>, equals: Equals<T>) {
    this.buf = buf;
    this.allocate = allocate;
    this.equals = equals;
  }

  /**
   * Capacities below 1 are clamped to 1. Returns undefined if the
   * initial buffer cannot be allocated.
   */
  static create<T>(initialCapacity: number, options: GrowableArrayOptions<T> = {}): GrowableArray<T> | undefined {
    const allocate: SlotAllocator<T> = options.allocate ?? allocSlots;
    const buf = bufAlloc(clampCapacity(initialCapacity), allocate);
    if (!buf) return undefined;
    return new GrowableArray(buf, allocate, options.equals ?? sameValueZero);
  }

  static from<T>(values: Iterable<T>, options: GrowableArrayOptions<T> = {}): GrowableArray<T> | undefined {
    const allocate: SlotAllocator<T> = options.allocate ?? allocSlots;
    const buf = bufFromValues(values, 1, allocate);
    if (!buf) return undefined;
    return new GrowableArray(buf, allocate, options.equals ?? sameValueZero);
  }

  private live(operation: string): GrowBuffer<T> {
    if (!this.buf) throw new ContainerReleasedError('GrowableArray', operation);
    return this.buf;
  }

  get size(): number {
    return this.live('size').size;
  }

  get capacity(): number {
    return this.live('capacity').capacity;
  }

  get released(): boolean {
    return this.buf === null;
  }

  /** O(1) amortized; O(n) when the buffer has to grow. */
  append(value: T): boolean {
    return bufAppend(this.live('append'), this.allocate, value);
  }

  /** `index` may equal size, which appends. */
  insert(index: number, value: T): boolean {
    return bufInsert(this.live('insert'), this.allocate, index, value);
  }

  delete(index: number): boolean {
    return bufDelete(this.live('delete'), this.allocate, index);
  }

  get(index: number): T | undefined {
    return bufGet(this.live('get'), index);
  }

  /** Tells a stored undefined apart from an out-of-range index. */
  has(index: number): boolean {
    return isIndex(index, this.live('has').size);
  }

  indexOf(value: T): number {
    return bufIndexOf(this.live('indexOf'), this.equals, value);
  }

  reverse(): void {
    bufReverse(this.live('reverse'));
  }

  toArray(): T[] {
    return bufToArray(this.live('toArray'));
  }

  [Symbol.iterator](): IterableIterator<T> {
    return bufIter(this.live('iterator'));
  }

  /** Releases the buffer. The array cannot be used afterwards. */
  destroy(): void {
    bufRelease(this.live('destroy'));
    this.buf = null;
  }
}

// =====================================================
// LinkedSequence
// =====================================================

/** Read-only view of a node in a LinkedSequence. */
export interface SequenceNode<T> {
  readonly value: T;
  readonly next: SequenceNode<T> | null;
}

export interface LinkedSequenceOptions<T> {
  /** Equality used to locate values. Defaults to SameValueZero. */
  equals?: Equals<T>;
  /** Node allocator; return null to report allocation failure. */
  allocate?: NodeAllocator<T>;
}

export function createNode<T>(value: T): SequenceNode<T> {
  return chainNode(value);
}

/**
 * Singly linked sequence. The head owns the first node and every node owns
 * its successor; a removed node is unlinked and cut loose immediately.
 *
 * No element count is cached, so length() walks the chain.
 */
export class LinkedSequence<T> implements Iterable<T> {
  private readonly chain: Chain<T> = chainEmpty();
  private readonly allocate: NodeAllocator<T>;
  private readonly equals: Equals<T>;

  constructor(options: LinkedSequenceOptions<T> = {}) {
    this.allocate = options.allocate ?? chainNode;
    this.equals = options.equals ?? sameValueZero;
  }

  /** Returns undefined if a node cannot be allocated; nothing is kept in that case. */
  static from<T>(values: Iterable<T>, options: LinkedSequenceOptions<T> = {}): LinkedSequence<T> | undefined {
    const seq = new LinkedSequence<T>(options);
    const chain = chainFromValues(values, seq.allocate);
    if (!chain) return undefined;
    seq.chain.head = chain.head;
    return seq;
  }

  get head(): SequenceNode<T> | null {
    return this.chain.head;
  }

  get isEmpty(): boolean {
    return this.chain.head === null;
  }

  /** O(1) */
  insertFront(value: T): boolean {
    return chainInsertFront(this.chain, this.allocate, value);
  }

  /** O(n): walks to the tail. */
  insertEnd(value: T): boolean {
    return chainInsertEnd(this.chain, this.allocate, value);
  }

  /** Links `value` after the first node equal to `target`. */
  insertAfter(target: T, value: T): boolean {
    return chainInsertAfter(this.chain, this.allocate, this.equals, target, value);
  }

  /** Removes the first node equal to `value`. */
  deleteNode(value: T): boolean {
    return chainDelete(this.chain, this.equals, value);
  }

  search(value: T): SequenceNode<T> | undefined {
    return chainFind(this.chain, this.equals, value) ?? undefined;
  }

  length(): number {
    return chainLength(this.chain);
  }

  /** In place, O(1) extra space. */
  reverse(): void {
    chainReverse(this.chain);
  }

  toArray(): T[] {
    return chainToArray(this.chain);
  }

  [Symbol.iterator](): IterableIterator<T> {
    return chainIter(this.chain);
  }

  /** Releases every node. No-op when already empty; the sequence stays usable. */
  destroy(): void {
    chainRelease(this.chain);
  }
}
