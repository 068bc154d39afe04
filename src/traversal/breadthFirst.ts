import { StaleViewError } from "../errors.js";
import type { GraphEntry, NeighborEntry, NeighborSource, NodeIndex } from "../graph/types.js";

/**
 * Lazy breadth-first traversal over any {@link NeighborSource}.
 *
 * Each reachable node is emitted once, in layer order with ties broken by
 * ascending index. An entry lists every outgoing neighbour of its node, visited
 * or not. A start index outside `[0, nodeCount)` yields an empty sequence.
 *
 * The returned iterator is single-use and throws {@link StaleViewError} if the
 * source is mutated after this call.
 *
 * Takes O(n) space and O(n + e) time over the reachable part of the graph.
 */
export function breadthFirst<N>(source: NeighborSource<N>, start: NodeIndex): IterableIterator<GraphEntry<N>> {
  return traverse(source, start, source.revision);
}

function* traverse<N>(
  source: NeighborSource<N>,
  start: NodeIndex,
  revision: number,
): IterableIterator<GraphEntry<N>> {
  if (source.revision !== revision) {
    throw new StaleViewError(revision, source.revision);
  }
  if (!Number.isInteger(start) || start < 0 || start >= source.nodeCount) {
    return;
  }
  const startNode = source.getNodeByIndex(start);
  if (startNode === undefined) {
    return;
  }

  const queue: Array<NeighborEntry<N>> = [{ index: start, node: startNode }];
  const visited = new Set<NodeIndex>([start]);
  let head = 0;

  while (head < queue.length) {
    if (source.revision !== revision) {
      throw new StaleViewError(revision, source.revision);
    }
    const current = queue[head];
    head += 1;

    const edges: N[] = [];
    for (const neighbor of source.neighbors(current.index)) {
      edges.push(neighbor.node);
      if (!visited.has(neighbor.index)) {
        visited.add(neighbor.index);
        queue.push(neighbor);
      }
    }

    yield { node: current.node, edges };
  }
}
