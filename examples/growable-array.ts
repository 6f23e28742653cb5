/**
 * GrowableArray walkthrough - doubling on append, halving after deletes
 */

import { GrowableArray } from '../packages/core/src/index';
import { formatArray } from './format';

console.log('=== seqkit: GrowableArray ===\n');

// ===== Create =====
console.log('1️⃣ Created array with capacity 2');
const arr = GrowableArray.create<number>(2);
if (!arr) {
  console.error('Failed to create array');
  process.exit(1);
}
console.log(formatArray(arr));

// ===== Append =====
console.log('\n2️⃣ Appending elements 10, 20, 30, 40, 50');
for (const value of [10, 20, 30, 40, 50]) {
  const before = arr.capacity;
  arr.append(value);
  if (arr.capacity !== before) {
    console.log(`   (Resize triggered! Capacity ${before} → ${arr.capacity})`);
  }
  console.log(formatArray(arr));
}

// ===== Insert =====
console.log('\n3️⃣ Inserting 25 at index 2');
arr.insert(2, 25);
console.log(formatArray(arr));

// ===== Get =====
console.log('\n4️⃣ Getting element at index 3');
if (arr.has(3)) {
  console.log(`   arr[3] = ${arr.get(3)}`);
}

// ===== Delete =====
console.log('\n5️⃣ Deleting from the front until the buffer shrinks');
while (arr.size > 0) {
  const before = arr.capacity;
  arr.delete(0);
  if (arr.capacity !== before) {
    console.log(`   (Shrink triggered! Capacity ${before} → ${arr.capacity})`);
  }
  console.log(formatArray(arr));
}

// ===== Destroy =====
arr.destroy();
console.log('\n6️⃣ Array destroyed');
console.log(formatArray(arr));

// ===== Summary =====
console.log('\n=== Summary ===');
console.log('✅ append: O(1) amortized');
console.log('✅ insert / delete: O(n) due to shifting');
console.log('✅ get: O(1) direct access');
console.log('✅ capacity ×2 when full, ÷2 below 1/4 (capacity > 4)');
