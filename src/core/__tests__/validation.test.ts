import { describe, expect, it } from "vitest";
import { findHeapViolations, isHeap, isPermutation } from "../validation.js";

const max = (a: number, b: number) => a > b;

describe("findHeapViolations", () => {
  it("accepts valid and trivial heaps", () => {
    expect(findHeapViolations([7, 5, 6, 4, 2, 1, 3], max)).toEqual([]);
    expect(isHeap([], max)).toBe(true);
    expect(isHeap([1], max)).toBe(true);
  });

  it("reports each child that outranks its parent", () => {
    expect(findHeapViolations([5, 9, 4, 1, 12], max)).toEqual([
      { path: "$[1]", parent: 0, child: 1, message: "ranks above its parent at index 0" },
      { path: "$[4]", parent: 1, child: 4, message: "ranks above its parent at index 1" },
    ]);
  });
});

describe("isPermutation", () => {
  it("compares multisets", () => {
    expect(isPermutation([1, 2, 2, 3], [2, 3, 1, 2])).toBe(true);
    expect(isPermutation([1, 2, 2], [1, 1, 2])).toBe(false);
    expect(isPermutation([1, 2], [1, 2, 3])).toBe(false);
  });

  it("takes a custom equality", () => {
    const a = [{ id: 1 }, { id: 2 }];
    const b = [{ id: 2 }, { id: 1 }];
    expect(isPermutation(a, b)).toBe(false);
    expect(isPermutation(a, b, (x, y) => x.id === y.id)).toBe(true);
  });
});
