/**
 * Text rendering for the walkthroughs. The containers never print anything themselves.
 */

import type { GrowableArray, LinkedSequence } from '../packages/core/src/index';

export function formatArray<T>(arr: GrowableArray<T>): string {
  if (arr.released) return 'NULL array';
  return `Array[size=${arr.size}, capacity=${arr.capacity}]: [${arr.toArray().join(', ')}]`;
}

export function formatSequence<T>(seq: LinkedSequence<T>): string {
  if (seq.isEmpty) return 'List is empty';
  return `List: ${seq.toArray().join(' -> ')} -> NULL`;
}
