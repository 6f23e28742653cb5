/**
 * Core constants for seqkit containers
 */

// Grow: multiply capacity when the buffer is full
export const GROWTH_FACTOR = 2;

// Shrink: divide capacity once occupancy drops below 1/SHRINK_OCCUPANCY_DIVISOR
export const SHRINK_DIVISOR = 2;
export const SHRINK_OCCUPANCY_DIVISOR = 4;

// Buffers at or below this capacity are never shrunk
export const SHRINK_MIN_CAPACITY = 4;

export const MIN_CAPACITY = 1;

// Largest length a JS array can hold (2^32 - 1)
export const MAX_CAPACITY = 4294967295;
