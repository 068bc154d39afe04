/**
 * Shared type definitions for the matrix-backed graph. Keeping the capability
 * interfaces here lets the traversal and serialisation modules depend on what
 * they consume rather than on {@link MatrixGraph} itself.
 */

/** Any value except `undefined`, which the matrix reserves for "no edge". */
export type NodeValue = NonNullable<unknown> | null;

/** Weight stored in a matrix cell. `undefined` is reserved for absent edges. */
export type EdgeWeight = NonNullable<unknown> | null;

/**
 * Row/column position of a node inside the adjacency matrix. Indices are
 * transient: removing a node relocates the last node into the freed slot.
 */
export type NodeIndex = number;

/**
 * Projects a node onto the key used for identity. Two nodes with the same key
 * (SameValueZero, as for `Map`) are the same node.
 */
export type NodeKeyFn<N> = (node: N) => unknown;

/** Neighbour produced while enumerating the outgoing edges of a node. */
export interface NeighborEntry<N> {
  readonly index: NodeIndex;
  readonly node: N;
}

/** Item emitted by the breadth-first traversal, one per visited node. */
export interface GraphEntry<N> {
  readonly node: N;
  /** Every outgoing neighbour, in ascending index order. */
  readonly edges: readonly N[];
}

/** Present edge enumerated from the matrix. */
export interface EdgeRecord<W> {
  readonly from: NodeIndex;
  readonly to: NodeIndex;
  readonly weight: W;
}

/** Capability consumed by the traversal engine. */
export interface NeighborSource<N> {
  /** Incremented on every structural mutation. */
  readonly revision: number;
  readonly nodeCount: number;
  getNodeByIndex(index: NodeIndex): N | undefined;
  neighbors(index: NodeIndex): Iterable<NeighborEntry<N>>;
}

/**
 * Read-only view over the node registry and the edge matrix. The arrays are
 * the graph's own storage, so the view is only valid until the next mutation;
 * every accessor throws {@link StaleViewError} afterwards.
 */
export interface AdjacencyView<N, W> {
  readonly revision: number;
  /** Node values in index order. */
  readonly nodes: readonly N[];
  /** `edges[from][to]`, `undefined` where no edge exists. */
  readonly edges: ReadonlyArray<ReadonlyArray<W | undefined>>;
  isStale(): boolean;
  /** Present edges in ascending `(from, to)` order. */
  edgeEntries(): IterableIterator<EdgeRecord<W>>;
}

/** Capability consumed by the TGF renderer. */
export interface AdjacencySource<N, W> {
  getAdjacencyMatrix(): AdjacencyView<N, W>;
}
