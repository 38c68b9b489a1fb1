import type { Equality, HeapViolation, Order } from "./types.js";

function pushViolation(out: HeapViolation[], parent: number, child: number): void {
  out.push({
    path: `$[${child}]`,
    parent,
    child,
    message: `ranks above its parent at index ${parent}`,
  });
}

/**
 * Lists every parent/child pair where the child should sit above its parent.
 * An empty result means `nodes` is a valid heap under `order`.
 */
export function findHeapViolations<T>(nodes: readonly T[], order: Order<T>): HeapViolation[] {
  const out: HeapViolation[] = [];
  for (let c = 1; c < nodes.length; c++) {
    const p = (c - 1) >> 1;
    if (order(nodes[c]!, nodes[p]!)) pushViolation(out, p, c);
  }
  return out;
}

export function isHeap<T>(nodes: readonly T[], order: Order<T>): boolean {
  return findHeapViolations(nodes, order).length === 0;
}

/** Multiset equality: same elements with the same multiplicities, any order. */
export function isPermutation<T>(
  a: readonly T[],
  b: readonly T[],
  equals: Equality<T> = (x, y) => x === y,
): boolean {
  if (a.length !== b.length) return false;

  const rest = Array.from(b);
  for (const item of a) {
    const i = rest.findIndex((r) => equals(r, item));
    if (i === -1) return false;
    rest.splice(i, 1);
  }
  return true;
}
