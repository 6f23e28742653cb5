/**
 * Chain - singly linked node chain owned from its head
 */

import type { Chain, ChainNode, Equals, NodeAllocator } from './types';

export function chainNode<T>(value: T): ChainNode<T> {
  return { value, next: null };
}

export function chainEmpty<T>(): Chain<T> {
  return { head: null };
}

// Unlinked nodes drop their successor
function releaseNode<T>(node: ChainNode<T>): void {
  node.next = null;
}

export function chainInsertFront<T>(chain: Chain<T>, allocate: NodeAllocator<T>, value: T): boolean {
  const node = allocate(value);
  if (!node) return false;
  node.next = chain.head;
  chain.head = node;
  return true;
}

export function chainInsertEnd<T>(chain: Chain<T>, allocate: NodeAllocator<T>, value: T): boolean {
  const node = allocate(value);
  if (!node) return false;
  node.next = null;

  if (!chain.head) {
    chain.head = node;
    return true;
  }

  let current = chain.head;
  while (current.next) {
    current = current.next;
  }
  current.next = node;
  return true;
}

export function chainFind<T>(chain: Chain<T>, equals: Equals<T>, value: T): ChainNode<T> | null {
  let current = chain.head;
  while (current) {
    if (equals(current.value, value)) return current;
    current = current.next;
  }
  return null;
}

export function chainInsertAfter<T>(
  chain: Chain<T>,
  allocate: NodeAllocator<T>,
  equals: Equals<T>,
  target: T,
  value: T
): boolean {
  const anchor = chainFind(chain, equals, target);
  if (!anchor) return false;

  const node = allocate(value);
  if (!node) return false;
  node.next = anchor.next;
  anchor.next = node;
  return true;
}

export function chainDelete<T>(chain: Chain<T>, equals: Equals<T>, value: T): boolean {
  const { head } = chain;
  if (!head) return false;

  if (equals(head.value, value)) {
    chain.head = head.next;
    releaseNode(head);
    return true;
  }

  let prev = head;
  while (prev.next && !equals(prev.next.value, value)) {
    prev = prev.next;
  }

  const removed = prev.next;
  if (!removed) return false;
  prev.next = removed.next;
  releaseNode(removed);
  return true;
}

export function chainLength<T>(chain: Chain<T>): number {
  let count = 0;
  let current = chain.head;
  while (current) {
    count++;
    current = current.next;
  }
  return count;
}

export function chainReverse<T>(chain: Chain<T>): void {
  let prev: ChainNode<T> | null = null;
  let current = chain.head;
  while (current) {
    const next: ChainNode<T> | null = current.next;
    current.next = prev;
    prev = current;
    current = next;
  }
  chain.head = prev;
}

export function chainRelease<T>(chain: Chain<T>): void {
  let current = chain.head;
  chain.head = null;
  while (current) {
    const next: ChainNode<T> | null = current.next;
    releaseNode(current);
    current = next;
  }
}

export function chainFromValues<T>(values: Iterable<T>, allocate: NodeAllocator<T>): Chain<T> | null {
  const chain = chainEmpty<T>();
  let tail: ChainNode<T> | null = null;
  for (const value of values) {
    const node = allocate(value);
    if (!node) {
      chainRelease(chain);
      return null;
    }
    node.next = null;
    if (tail) {
      tail.next = node;
    } else {
      chain.head = node;
    }
    tail = node;
  }
  return chain;
}

export function* chainIter<T>(chain: Chain<T>): IterableIterator<T> {
  let current = chain.head;
  while (current) {
    yield current.value;
    current = current.next;
  }
}

export function chainToArray<T>(chain: Chain<T>): T[] {
  return Array.from(chainIter(chain));
}
