import type { Heap } from "../heap.js";
import type { Equality, Order } from "../types.js";

const strictEquals = <T>(a: T, b: T): boolean => a === b;

/**
 * Binary heap over a dense, zero-indexed array.
 *
 * The root is whichever element `order` ranks above all others:
 * `(a, b) => a > b` keeps the maximum on top, `(a, b) => a < b` the minimum.
 * No child ever satisfies `order(child, parent)`.
 */
export class BinaryHeap<T> implements Heap<T> {
  private nodes: T[] = [];

  constructor(private readonly order: Order<T>) {}

  /**
   * Builds a heap from arbitrary input with bottom-up heapify, O(n).
   * The input is copied, never reordered.
   */
  static from<T>(elements: Iterable<T>, order: Order<T>): BinaryHeap<T> {
    const heap = new BinaryHeap(order);
    const a = Array.from(elements);
    heap.nodes = a;
    for (let i = (a.length >> 1) - 1; i >= 0; i--) {
      heap.siftDown(i, a.length);
    }
    return heap;
  }

  get count(): number {
    return this.nodes.length;
  }

  get isEmpty(): boolean {
    return this.nodes.length === 0;
  }

  peek(): T | undefined {
    return this.nodes[0];
  }

  insert(value: T): void {
    this.nodes.push(value);
    this.siftUp(this.nodes.length - 1);
  }

  insertMany(values: Iterable<T>): void {
    for (const v of values) this.insert(v);
  }

  removeRoot(): T | undefined {
    const a = this.nodes;
    if (a.length === 0) return undefined;
    if (a.length === 1) return a.pop();

    const top = a[0];
    a[0] = a.pop()!;
    this.siftDown(0, a.length);
    return top;
  }

  removeAt(index: number): T | undefined {
    if (!this.inBounds(index)) return undefined;

    const size = this.nodes.length - 1;
    if (index !== size) {
      this.swap(index, size);
      this.siftDown(index, size);
      this.siftUp(index);
    }
    return this.nodes.pop();
  }

  replace(index: number, value: T): T | undefined {
    if (!this.inBounds(index)) return undefined;

    const removed = this.removeAt(index);
    this.insert(value);
    return removed;
  }

  // linear: siblings are unordered, so the heap property cannot narrow the scan
  indexOf(node: T, equals: Equality<T> = strictEquals): number | undefined {
    const i = this.nodes.findIndex((n) => equals(n, node));
    return i === -1 ? undefined : i;
  }

  removeValue(node: T, equals: Equality<T> = strictEquals): T | undefined {
    const i = this.indexOf(node, equals);
    return i === undefined ? undefined : this.removeAt(i);
  }

  clear(): void {
    this.nodes = [];
  }

  *drain(): Generator<T, void, undefined> {
    while (this.nodes.length > 0) {
      yield this.removeRoot()!;
    }
  }

  toArray(): T[] {
    return Array.from(this.nodes);
  }

  private inBounds(index: number): boolean {
    return Number.isInteger(index) && index >= 0 && index < this.nodes.length;
  }

  private siftUp(index: number): void {
    const a = this.nodes;
    const child = a[index]!;
    let i = index;

    while (i > 0) {
      const p = (i - 1) >> 1;
      const parent = a[p]!;
      if (!this.order(child, parent)) break;
      a[i] = parent;
      i = p;
    }

    a[i] = child;
  }

  /** `end` is exclusive; elements at or past it are ignored. */
  private siftDown(index: number, end: number): void {
    const a = this.nodes;
    let i = index;

    while (true) {
      const l = i * 2 + 1;
      const r = l + 1;
      let first = i;

      if (l < end && this.order(a[l]!, a[first]!)) first = l;
      if (r < end && this.order(a[r]!, a[first]!)) first = r;
      if (first === i) return;

      this.swap(i, first);
      i = first;
    }
  }

  private swap(i: number, j: number): void {
    const a = this.nodes;
    [a[i], a[j]] = [a[j]!, a[i]!];
  }
}
