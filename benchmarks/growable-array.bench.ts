/**
 * Benchmark: GrowableArray vs Native vs Immer
 */

import { bench, describe } from 'vitest';
import { produce } from 'immer';
import { GrowableArray } from '../packages/core/src/index';

// ===== Setup =====
const SIZE = 1000;
// produce() copies the whole array per update, so keep its run short
const IMMER_SIZE = 100;

function filled(size: number): GrowableArray<number> {
  const arr = GrowableArray.create<number>(1);
  if (!arr) throw new Error('allocation failed');
  for (let i = 0; i < size; i++) arr.append(i);
  return arr;
}

// ===== Append =====
describe(`Append ${SIZE} items from capacity 1`, () => {
  bench('Native push', () => {
    const arr: number[] = [];
    for (let i = 0; i < SIZE; i++) arr.push(i);
    arr;
  });

  bench('GrowableArray append', () => {
    filled(SIZE);
  });
});

// ===== Append, one copy-on-write update per item =====
describe(`Append ${IMMER_SIZE} items one update at a time`, () => {
  bench('GrowableArray append', () => {
    filled(IMMER_SIZE);
  });

  bench('Immer produce() push', () => {
    let arr: number[] = [];
    for (let i = 0; i < IMMER_SIZE; i++) {
      arr = produce(arr, draft => {
        draft.push(i);
      });
    }
    arr;
  });
});

// ===== Insert at front =====
describe('Insert 100 items at index 0', () => {
  bench('Native unshift', () => {
    const arr = Array.from({ length: SIZE }, (_, i) => i);
    for (let i = 0; i < 100; i++) arr.unshift(i);
    arr;
  });

  bench('GrowableArray insert(0)', () => {
    const arr = filled(SIZE);
    for (let i = 0; i < 100; i++) arr.insert(0, i);
    arr;
  });
});

// ===== Drain with shrink =====
describe(`Delete ${SIZE} items from the end`, () => {
  bench('Native pop', () => {
    const arr = Array.from({ length: SIZE }, (_, i) => i);
    while (arr.length > 0) arr.pop();
    arr;
  });

  bench('GrowableArray delete(size - 1)', () => {
    const arr = filled(SIZE);
    while (arr.size > 0) arr.delete(arr.size - 1);
    arr;
  });
});
