import type { EdgeRecord, NodeIndex } from "./types.js";

/**
 * Square grid of optional edge weights. Row = source index, column =
 * destination index, `undefined` = no edge. Callers are expected to validate
 * indices; out-of-range writes are treated as a broken invariant.
 */
export class EdgeMatrix<W> {
  private readonly rows: Array<Array<W | undefined>> = [];
  private populated = 0;

  get dimension(): number {
    return this.rows.length;
  }

  /** Number of present cells. */
  get edgeCount(): number {
    return this.populated;
  }

  /** Adds one empty row and one empty column. */
  grow(): void {
    for (const row of this.rows) {
      row.push(undefined);
    }
    this.rows.push(new Array<W | undefined>(this.rows.length + 1).fill(undefined));
  }

  get(from: NodeIndex, to: NodeIndex): W | undefined {
    return this.rows[from]?.[to];
  }

  /** Writes a weight and returns the one it replaced. */
  set(from: NodeIndex, to: NodeIndex, weight: W): W | undefined {
    const row = this.requireRow(from, to);
    const previous = row[to];
    row[to] = weight;
    if (previous === undefined) {
      this.populated += 1;
    }
    return previous;
  }

  /** Clears a cell and returns the weight that was present. */
  clear(from: NodeIndex, to: NodeIndex): W | undefined {
    const row = this.requireRow(from, to);
    const previous = row[to];
    row[to] = undefined;
    if (previous !== undefined) {
      this.populated -= 1;
    }
    return previous;
  }

  row(index: NodeIndex): ReadonlyArray<W | undefined> {
    return this.requireRow(index, index);
  }

  /** Live, read-only reference to the grid. */
  cells(): ReadonlyArray<ReadonlyArray<W | undefined>> {
    return this.rows;
  }

  /**
   * Drops row and column {@link index}. The last row and column are first
   * swapped into that position so the surviving cells follow the node that the
   * registry relocates.
   */
  swapRemove(index: NodeIndex): void {
    const last = this.rows.length - 1;
    const removedRow = this.requireRow(index, index);

    let incident = 0;
    for (let other = 0; other <= last; other += 1) {
      if (removedRow[other] !== undefined) {
        incident += 1;
      }
      if (other !== index && this.rows[other][index] !== undefined) {
        incident += 1;
      }
    }

    if (index !== last) {
      this.rows[index] = this.rows[last];
      this.rows[last] = removedRow;
      for (const row of this.rows) {
        const cell = row[index];
        row[index] = row[last];
        row[last] = cell;
      }
    }

    this.rows.pop();
    for (const row of this.rows) {
      row.pop();
    }
    this.populated -= incident;
  }

  /** Present edges in ascending `(from, to)` order. */
  *entries(): IterableIterator<EdgeRecord<W>> {
    for (let from = 0; from < this.rows.length; from += 1) {
      const row = this.rows[from];
      for (let to = 0; to < row.length; to += 1) {
        const weight = row[to];
        if (weight !== undefined) {
          yield { from, to, weight };
        }
      }
    }
  }

  private requireRow(from: NodeIndex, to: NodeIndex): Array<W | undefined> {
    const row = this.rows[from];
    if (row === undefined || !Number.isInteger(to) || to < 0 || to >= this.rows.length) {
      throw new Error(`edge matrix cell (${from}, ${to}) is outside a ${this.rows.length}x${this.rows.length} grid`);
    }
    return row;
  }
}
