import type { Comparator, Equality } from "./types.js";

/**
 * Priority queue contract over a dense binary heap.
 *
 * Absence (empty heap, out-of-range index, value not found) is reported as
 * `undefined`, never thrown.
 */
export interface Heap<T> {
  readonly count: number;
  readonly isEmpty: boolean;

  peek(): T | undefined;
  insert(value: T): void;
  /** Inserts one element at a time; heapify is reserved for bulk construction. */
  insertMany(values: Iterable<T>): void;
  removeRoot(): T | undefined;
  removeAt(index: number): T | undefined;
  /** Same result as `removeAt(index)` followed by `insert(value)`. */
  replace(index: number, value: T): T | undefined;

  indexOf(node: T, equals?: Equality<T>): number | undefined;
  removeValue(node: T, equals?: Equality<T>): T | undefined;

  clear(): void;
  /** Removes roots until empty. */
  drain(): Generator<T, void, undefined>;
  /** Copy of the backing sequence in layout order. */
  toArray(): T[];
}

export interface TopKSelector<T> {
  /**
   * Returns top K items by comparator.
   * Comparator should behave like Array.sort: <0 means a before b.
   */
  topK(items: Iterable<T>, k: number, comparator: Comparator<T>): T[];
}
