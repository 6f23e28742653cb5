/**
 * Benchmark: LinkedSequence vs GrowableArray vs Native
 */

import { bench, describe } from 'vitest';
import { GrowableArray, LinkedSequence } from '../packages/core/src/index';

// ===== Setup =====
const SIZE = 1000;

// ===== Front insertion =====
describe(`Insert ${SIZE} items at the front`, () => {
  bench('Native unshift', () => {
    const arr: number[] = [];
    for (let i = 0; i < SIZE; i++) arr.unshift(i);
    arr;
  });

  bench('LinkedSequence insertFront', () => {
    const seq = new LinkedSequence<number>();
    for (let i = 0; i < SIZE; i++) seq.insertFront(i);
    seq;
  });

  bench('GrowableArray insert(0)', () => {
    const arr = GrowableArray.create<number>(1);
    if (!arr) throw new Error('allocation failed');
    for (let i = 0; i < SIZE; i++) arr.insert(0, i);
    arr;
  });
});

// ===== Search =====
describe(`Search the last of ${SIZE} items`, () => {
  const native = Array.from({ length: SIZE }, (_, i) => i);
  const seq = LinkedSequence.from(native);
  const arr = GrowableArray.from(native);

  bench('Native indexOf', () => {
    native.indexOf(SIZE - 1);
  });

  bench('LinkedSequence search', () => {
    seq?.search(SIZE - 1);
  });

  bench('GrowableArray indexOf', () => {
    arr?.indexOf(SIZE - 1);
  });
});

// ===== Reverse =====
describe(`Reverse ${SIZE} items`, () => {
  const seq = LinkedSequence.from(Array.from({ length: SIZE }, (_, i) => i));

  bench('LinkedSequence reverse', () => {
    seq?.reverse();
  });
});
