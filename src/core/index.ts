export type { Heap, TopKSelector } from "./heap.js";
export type { Comparator, Equality, HeapViolation, Order, PathEntry, WeightedEdge } from "./types.js";
export { ascending, by, descending, fromComparator, reverse } from "./order.js";
export { findHeapViolations, isHeap, isPermutation } from "./validation.js";
export * from "./impl/index.js";
