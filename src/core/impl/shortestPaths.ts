import type { PathEntry, WeightedEdge } from "../types.js";
import { BinaryHeap } from "./binaryHeap.js";

type Frontier<N> = {
  node: N;
  distance: number;
};

export type ShortestPaths<N> = Map<N, PathEntry<N>>;

/**
 * Single-source shortest paths (Dijkstra) over non-negative edge weights.
 *
 * `edges(node)` lists the outgoing edges of a node; nodes are compared by
 * identity, so use ids or shared object references. Only reachable nodes
 * appear in the result.
 *
 * Improved distances are pushed as new frontier entries instead of being
 * updated in place; entries that no longer match the settled distance are
 * skipped when popped.
 */
export function shortestPaths<N>(
  source: N,
  edges: (node: N) => Iterable<WeightedEdge<N>>,
): ShortestPaths<N> {
  const best: ShortestPaths<N> = new Map();
  best.set(source, { distance: 0, previous: undefined });
  const settled = new Set<N>();
  const frontier = new BinaryHeap<Frontier<N>>((a, b) => a.distance < b.distance);
  frontier.insert({ node: source, distance: 0 });

  for (const { node, distance } of frontier.drain()) {
    if (settled.has(node)) continue;
    settled.add(node);

    for (const edge of edges(node)) {
      if (!Number.isFinite(edge.weight) || edge.weight < 0) {
        throw new RangeError(`edge weight must be a finite non-negative number, got ${edge.weight}`);
      }
      if (settled.has(edge.to)) continue;

      const tentative = distance + edge.weight;
      const known = best.get(edge.to);
      if (known === undefined || tentative < known.distance) {
        best.set(edge.to, { distance: tentative, previous: node });
        frontier.insert({ node: edge.to, distance: tentative });
      }
    }
  }

  return best;
}

/** Rebuilds the node sequence source..target, or undefined when target was not reached. */
export function pathTo<N>(paths: ShortestPaths<N>, target: N): N[] | undefined {
  let entry = paths.get(target);
  if (!entry) return undefined;

  const path: N[] = [target];
  while (entry.previous !== undefined) {
    const prev: N = entry.previous;
    path.unshift(prev);
    entry = paths.get(prev);
    if (!entry) return undefined;
  }
  return path;
}
