/**
 * Internal modules barrel export
 */

// Constants
export {
  GROWTH_FACTOR,
  SHRINK_DIVISOR,
  SHRINK_OCCUPANCY_DIVISOR,
  SHRINK_MIN_CAPACITY,
  MIN_CAPACITY,
  MAX_CAPACITY,
} from './constants';

// Utils
export { sameValueZero, isIndex, clampCapacity } from './utils';

// GrowBuffer
export {
  allocSlots,
  bufAlloc,
  bufFromValues,
  bufResize,
  bufAppend,
  bufInsert,
  bufDelete,
  bufGet,
  bufIndexOf,
  bufReverse,
  bufToArray,
  bufIter,
  bufRelease,
} from './buffer';

// Chain
export {
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
} from './chain';

// Types
export type {
  Slot,
  SlotAllocator,
  Equals,
  GrowBuffer,
  ChainNode,
  NodeAllocator,
  Chain,
} from './types';
