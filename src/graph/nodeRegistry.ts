import type { NodeIndex, NodeKeyFn } from "./types.js";

const identityKey = <N>(node: N): unknown => node;

/**
 * Insertion-ordered, deduplicating set of node values with O(1) lookups in both
 * directions. Removal uses swap-with-last: the last value moves into the freed
 * slot so indices stay dense, at the cost of renumbering that one value.
 */
export class NodeIndexRegistry<N> {
  private readonly entries: N[] = [];
  private readonly indexByKey = new Map<unknown, NodeIndex>();

  constructor(private readonly keyOf: NodeKeyFn<N> = identityKey) {}

  get size(): number {
    return this.entries.length;
  }

  /** Returns the index of {@link value}, appending it first when unknown. */
  insert(value: N): NodeIndex {
    const key = this.keyOf(value);
    const existing = this.indexByKey.get(key);
    if (existing !== undefined) {
      return existing;
    }
    const index = this.entries.length;
    this.entries.push(value);
    this.indexByKey.set(key, index);
    return index;
  }

  indexOf(value: N): NodeIndex | undefined {
    return this.indexByKey.get(this.keyOf(value));
  }

  has(value: N): boolean {
    return this.indexByKey.has(this.keyOf(value));
  }

  contains(index: NodeIndex): boolean {
    return Number.isInteger(index) && index >= 0 && index < this.entries.length;
  }

  valueAt(index: NodeIndex): N | undefined {
    return this.contains(index) ? this.entries[index] : undefined;
  }

  /** Removes the value at {@link index}; the former last value takes its place. */
  remove(index: NodeIndex): N | undefined {
    if (!this.contains(index)) {
      return undefined;
    }
    const removed = this.entries[index];
    const last = this.entries.length - 1;
    this.indexByKey.delete(this.keyOf(removed));
    if (index !== last) {
      const moved = this.entries[last];
      this.entries[index] = moved;
      this.indexByKey.set(this.keyOf(moved), index);
    }
    this.entries.pop();
    return removed;
  }

  /** Live, read-only reference to the stored values in index order. */
  values(): readonly N[] {
    return this.entries;
  }

  [Symbol.iterator](): IterableIterator<N> {
    return this.entries[Symbol.iterator]();
  }
}
