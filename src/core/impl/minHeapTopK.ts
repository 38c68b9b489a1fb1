import type { TopKSelector } from "../heap.js";
import type { Comparator } from "../types.js";
import { BinaryHeap } from "./binaryHeap.js";

/**
 * Keeps a bounded heap of the best K items.
 *
 * Comparator uses Array.sort semantics (a before b if <0). The heap is ordered
 * worst-first, so the root is the *worst of the best* and is the one evicted.
 */
export class MinHeapTopKSelector<T> implements TopKSelector<T> {
  topK(items: Iterable<T>, k: number, comparator: Comparator<T>): T[] {
    if (k <= 0) return [];

    // order(a,b) means a is WORSE than b
    const heap = new BinaryHeap<T>((a, b) => comparator(a, b) > 0);

    for (const item of items) {
      if (heap.count < k) {
        heap.insert(item);
        continue;
      }
      const worst = heap.peek()!;
      // if item is better than worst => replace
      if (comparator(item, worst) < 0) {
        heap.removeRoot();
        heap.insert(item);
      }
    }

    const arr = heap.toArray();
    arr.sort(comparator);
    return arr;
  }
}
