import type { Comparator, Order } from "./types.js";

type Primitive = number | string | bigint;

/** Smallest first: use for a min-heap. */
export function ascending<T extends Primitive>(): Order<T> {
  return (a, b) => a < b;
}

/** Largest first: use for a max-heap. */
export function descending<T extends Primitive>(): Order<T> {
  return (a, b) => a > b;
}

/** Orders records by a projected key, e.g. `by((job) => job.priority, descending())`. */
export function by<T, K>(key: (value: T) => K, order: Order<K>): Order<T> {
  return (a, b) => order(key(a), key(b));
}

export function reverse<T>(order: Order<T>): Order<T> {
  return (a, b) => order(b, a);
}

/**
 * Adapts an Array.sort comparator. Items the comparator sorts earlier end up
 * nearer the root.
 */
export function fromComparator<T>(comparator: Comparator<T>): Order<T> {
  return (a, b) => comparator(a, b) < 0;
}
