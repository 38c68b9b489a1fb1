import { describe, expect, it } from "vitest";
import { pathTo, shortestPaths } from "../shortestPaths.js";
import type { WeightedEdge } from "../../types.js";

const graph: Record<string, WeightedEdge<string>[]> = {
  a: [
    { to: "b", weight: 1 },
    { to: "c", weight: 4 },
  ],
  b: [
    { to: "c", weight: 2 },
    { to: "d", weight: 5 },
  ],
  c: [{ to: "d", weight: 1 }],
  d: [],
  e: [{ to: "a", weight: 1 }],
};

const edges = (node: string) => graph[node] ?? [];

describe("shortestPaths", () => {
  it("settles every reachable node at its minimal distance", () => {
    const paths = shortestPaths("a", edges);
    expect(Object.fromEntries([...paths].map(([n, e]) => [n, e.distance]))).toEqual({
      a: 0,
      b: 1,
      c: 3,
      d: 4,
    });
    expect(paths.has("e")).toBe(false);
  });

  it("rebuilds the route through predecessors", () => {
    const paths = shortestPaths("a", edges);
    expect(pathTo(paths, "d")).toEqual(["a", "b", "c", "d"]);
    expect(pathTo(paths, "a")).toEqual(["a"]);
    expect(pathTo(paths, "e")).toBeUndefined();
  });

  it("rejects negative weights", () => {
    expect(() => shortestPaths("x", () => [{ to: "y", weight: -1 }])).toThrow(RangeError);
  });
});
