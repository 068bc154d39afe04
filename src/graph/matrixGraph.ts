import { IndexOutOfBoundsError, StaleViewError } from "../errors.js";
import { createLogger, type StructuredLogger } from "../logger.js";
import { breadthFirst } from "../traversal/breadthFirst.js";
import { MatrixAdjacencyView } from "./adjacencyView.js";
import { EdgeMatrix } from "./edgeMatrix.js";
import { NodeIndexRegistry } from "./nodeRegistry.js";
import type {
  AdjacencySource,
  AdjacencyView,
  EdgeRecord,
  EdgeWeight,
  GraphEntry,
  NeighborEntry,
  NeighborSource,
  NodeIndex,
  NodeKeyFn,
  NodeValue,
} from "./types.js";

/** Options accepted by {@link MatrixGraph}. */
export interface MatrixGraphOptions<N> {
  /** Projects a node onto its identity key. Defaults to the node itself. */
  readonly keyOf?: NodeKeyFn<N>;
  /** Logger receiving debug entries; built from the runtime config when omitted. */
  readonly logger?: StructuredLogger;
}

/**
 * Directed weighted graph stored as an adjacency matrix.
 *
 * Node indices are dense and transient: removing a node moves the node that
 * held the last index into the freed slot, together with its edges. Lazy
 * sequences and views handed out by the graph capture {@link revision} and
 * throw {@link StaleViewError} once a mutation bumps it.
 *
 * Costs: edge operations O(1), {@link addNode} O(n), node removal O(n).
 */
export class MatrixGraph<N extends NodeValue, W extends EdgeWeight = EdgeWeight>
  implements NeighborSource<N>, AdjacencySource<N, W>
{
  private readonly registry: NodeIndexRegistry<N>;
  private readonly matrix = new EdgeMatrix<W>();
  private readonly logger: StructuredLogger;
  private revisionCounter = 0;

  constructor(options: MatrixGraphOptions<N> = {}) {
    this.registry = new NodeIndexRegistry<N>(options.keyOf);
    this.logger = options.logger ?? createLogger();
  }

  /**
   * Builds a graph from `(source, destination, weight)` triples, inserting the
   * endpoints on first sight. A repeated pair keeps the last weight.
   */
  static fromEdges<N extends NodeValue, W extends EdgeWeight>(
    edges: Iterable<readonly [N, N, W]>,
    options: MatrixGraphOptions<N> = {},
  ): MatrixGraph<N, W> {
    const graph = new MatrixGraph<N, W>(options);
    for (const [from, to, weight] of edges) {
      const fromIndex = graph.addNode(from);
      const toIndex = graph.addNode(to);
      graph.addEdge(fromIndex, toIndex, weight);
    }
    return graph;
  }

  /** Incremented by every mutation. */
  get revision(): number {
    return this.revisionCounter;
  }

  get nodeCount(): number {
    return this.registry.size;
  }

  get edgeCount(): number {
    return this.matrix.edgeCount;
  }

  /** Returns the index of {@link value}, inserting it when it is new. */
  addNode(value: N): NodeIndex {
    const before = this.registry.size;
    const index = this.registry.insert(value);
    if (this.registry.size > before) {
      this.matrix.grow();
      this.bump();
    }
    return index;
  }

  /**
   * Writes the edge `from -> to`, returning the weight it replaced.
   *
   * @throws IndexOutOfBoundsError when either index does not address a node.
   */
  addEdge(from: NodeIndex, to: NodeIndex, weight: W): W | undefined {
    this.assertIndex(from);
    this.assertIndex(to);
    const previous = this.matrix.set(from, to, weight);
    this.bump();
    return previous;
  }

  /**
   * Clears the edge `from -> to`, returning the weight that was present.
   *
   * @throws IndexOutOfBoundsError when either index does not address a node.
   */
  removeEdge(from: NodeIndex, to: NodeIndex): W | undefined {
    this.assertIndex(from);
    this.assertIndex(to);
    const previous = this.matrix.clear(from, to);
    if (previous !== undefined) {
      this.bump();
    }
    return previous;
  }

  /** Removes {@link value} and its edges; `undefined` when the node is unknown. */
  removeNode(value: N): N | undefined {
    const index = this.registry.indexOf(value);
    return index === undefined ? undefined : this.removeNodeAt(index);
  }

  /**
   * Removes the node at {@link index} and its edges. The node previously at the
   * last index takes over {@link index}.
   */
  removeNodeAt(index: NodeIndex): N | undefined {
    if (!this.registry.contains(index)) {
      return undefined;
    }
    const last = this.registry.size - 1;
    const removed = this.registry.remove(index);
    this.matrix.swapRemove(index);
    this.bump();
    this.logger.debug("graph_node_removed", {
      index,
      relocated_from: index === last ? null : last,
    });
    return removed;
  }

  getNodeByIndex(index: NodeIndex): N | undefined {
    return this.registry.valueAt(index);
  }

  getEdgeByIndex(from: NodeIndex, to: NodeIndex): W | undefined {
    if (!this.registry.contains(from) || !this.registry.contains(to)) {
      return undefined;
    }
    return this.matrix.get(from, to);
  }

  indexOf(value: N): NodeIndex | undefined {
    return this.registry.indexOf(value);
  }

  hasNode(value: N): boolean {
    return this.registry.has(value);
  }

  hasEdge(from: NodeIndex, to: NodeIndex): boolean {
    return this.getEdgeByIndex(from, to) !== undefined;
  }

  /** Node values in index order. */
  nodes(): IterableIterator<N> {
    return this.guard(this.registry[Symbol.iterator]());
  }

  /** Present edges in ascending `(from, to)` order. */
  edges(): IterableIterator<EdgeRecord<W>> {
    return this.guard(this.matrix.entries());
  }

  /**
   * Lazily enumerates the outgoing neighbours of {@link index} in ascending
   * index order. Each call returns a fresh, single-use iterator.
   *
   * @throws IndexOutOfBoundsError eagerly when {@link index} is not a node.
   */
  neighbors(index: NodeIndex): IterableIterator<NeighborEntry<N>> {
    this.assertIndex(index);
    return this.guard(this.iterateRow(index));
  }

  /** Breadth-first traversal from {@link start}; empty when the index is unknown. */
  bfsIter(start: NodeIndex): IterableIterator<GraphEntry<N>> {
    return breadthFirst(this, start);
  }

  getAdjacencyMatrix(): AdjacencyView<N, W> {
    return new MatrixAdjacencyView(
      this.registry.values(),
      this.matrix.cells(),
      this.revisionCounter,
      () => this.revisionCounter,
    );
  }

  private *iterateRow(index: NodeIndex): IterableIterator<NeighborEntry<N>> {
    const row = this.matrix.row(index);
    const nodes = this.registry.values();
    for (let column = 0; column < row.length; column += 1) {
      if (row[column] !== undefined) {
        yield { index: column, node: nodes[column] };
      }
    }
  }

  /**
   * Wraps an iterator so it stops with {@link StaleViewError} after a mutation.
   * The revision is read here rather than inside the generator body, which
   * would only run on the first `next()`.
   */
  private guard<T>(source: Iterator<T>): IterableIterator<T> {
    return this.guarded(source, this.revisionCounter);
  }

  private *guarded<T>(source: Iterator<T>, revision: number): IterableIterator<T> {
    while (true) {
      if (this.revisionCounter !== revision) {
        throw new StaleViewError(revision, this.revisionCounter);
      }
      const step = source.next();
      if (step.done) {
        return;
      }
      yield step.value;
    }
  }

  private assertIndex(index: NodeIndex): void {
    if (!this.registry.contains(index)) {
      throw new IndexOutOfBoundsError(index, this.registry.size);
    }
  }

  private bump(): void {
    this.revisionCounter += 1;
  }
}
