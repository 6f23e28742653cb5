/**
 * LinkedSequence walkthrough - front/end/after insertion, deletion, reversal
 */

import { LinkedSequence } from '../packages/core/src/index';
import { formatSequence } from './format';

console.log('=== seqkit: LinkedSequence ===\n');

const list = new LinkedSequence<number>();

// ===== Insert front =====
console.log('1️⃣ Inserting at front: 30, 20, 10');
for (const value of [30, 20, 10]) {
  list.insertFront(value);
  console.log(formatSequence(list));
}

// ===== Insert end =====
console.log('\n2️⃣ Inserting at end: 40, 50');
for (const value of [40, 50]) {
  list.insertEnd(value);
  console.log(formatSequence(list));
}

// ===== Insert after =====
console.log('\n3️⃣ Inserting 25 after 20');
if (list.insertAfter(20, 25)) {
  console.log(formatSequence(list));
}

// ===== Search =====
console.log('\n4️⃣ Searching for 25');
const found = list.search(25);
if (found) {
  console.log(`   Found node with value: ${found.value}`);
}
console.log('   Searching for 100');
if (!list.search(100)) {
  console.log('   Node with value 100 not found');
}

// ===== Length =====
console.log(`\n5️⃣ List length: ${list.length()}`);

// ===== Delete =====
console.log('\n6️⃣ Deleting 25, 10 (head), 50 (tail)');
for (const value of [25, 10, 50]) {
  if (list.deleteNode(value)) {
    console.log(formatSequence(list));
  }
}

// ===== Reverse =====
console.log('\n7️⃣ Reversing list');
console.log(`   Before: ${formatSequence(list)}`);
list.reverse();
console.log(`   After:  ${formatSequence(list)}`);

// ===== Destroy =====
console.log('\n8️⃣ Releasing all nodes');
list.destroy();
console.log(formatSequence(list));

// ===== Summary =====
console.log('\n=== Summary ===');
console.log('✅ insertFront: O(1)');
console.log('✅ insertEnd / insertAfter / deleteNode / search: O(n)');
console.log('✅ reverse: O(n) time, O(1) space');
