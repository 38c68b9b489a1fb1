/** Shared core types used by module contracts. */

/**
 * Strict ordering predicate: `order(a, b)` is true when `a` should sit above `b`.
 *
 * Must behave as a strict weak ordering (irreflexive, transitive). `>` gives a
 * max-heap, `<` a min-heap.
 */
export type Order<T> = (a: T, b: T) => boolean;

export type Equality<T> = (a: T, b: T) => boolean;

/** Array.sort-style comparator: <0 means a before b. */
export type Comparator<T> = (a: T, b: T) => number;

/** A parent/child pair that breaks the heap property. */
export interface HeapViolation {
  /** JSON-path style location of the offending child, e.g. `$[4]`. */
  path: string;
  parent: number;
  child: number;
  message: string;
}

export interface WeightedEdge<N> {
  to: N;
  weight: number;
}

export interface PathEntry<N> {
  distance: number;
  /** Predecessor on the shortest path; undefined for the source. */
  previous: N | undefined;
}
