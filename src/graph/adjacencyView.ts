import { StaleViewError } from "../errors.js";
import type { AdjacencyView, EdgeRecord } from "./types.js";

/**
 * {@link AdjacencyView} backed by the graph's own storage. The revision read at
 * construction is compared with the graph's current revision on every access.
 */
export class MatrixAdjacencyView<N, W> implements AdjacencyView<N, W> {
  constructor(
    private readonly nodeStorage: readonly N[],
    private readonly cellStorage: ReadonlyArray<ReadonlyArray<W | undefined>>,
    readonly revision: number,
    private readonly currentRevision: () => number,
  ) {}

  get nodes(): readonly N[] {
    this.assertFresh();
    return this.nodeStorage;
  }

  get edges(): ReadonlyArray<ReadonlyArray<W | undefined>> {
    this.assertFresh();
    return this.cellStorage;
  }

  isStale(): boolean {
    return this.currentRevision() !== this.revision;
  }

  *edgeEntries(): IterableIterator<EdgeRecord<W>> {
    this.assertFresh();
    for (let from = 0; from < this.cellStorage.length; from += 1) {
      const row = this.cellStorage[from];
      for (let to = 0; to < row.length; to += 1) {
        const weight = row[to];
        if (weight !== undefined) {
          yield { from, to, weight };
        }
        this.assertFresh();
      }
    }
  }

  private assertFresh(): void {
    const found = this.currentRevision();
    if (found !== this.revision) {
      throw new StaleViewError(this.revision, found);
    }
  }
}
