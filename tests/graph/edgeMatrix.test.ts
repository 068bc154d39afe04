import { describe, it } from "mocha";
import { expect } from "chai";

import { EdgeMatrix } from "../../src/graph/edgeMatrix.js";

function squareOf(size: number): EdgeMatrix<string> {
  const matrix = new EdgeMatrix<string>();
  for (let index = 0; index < size; index += 1) {
    matrix.grow();
  }
  return matrix;
}

describe("graph edge matrix", () => {
  it("grows one row and one column at a time", () => {
    const matrix = squareOf(3);

    expect(matrix.dimension).to.equal(3);
    expect(matrix.cells().map((row) => row.length)).to.deep.equal([3, 3, 3]);
    expect(matrix.edgeCount).to.equal(0);
  });

  it("tracks the edge count across writes and clears", () => {
    const matrix = squareOf(2);

    expect(matrix.set(0, 1, "x")).to.equal(undefined);
    expect(matrix.set(0, 1, "y")).to.equal("x");
    expect(matrix.set(1, 1, "loop")).to.equal(undefined);
    expect(matrix.edgeCount).to.equal(2);

    expect(matrix.clear(0, 1)).to.equal("y");
    expect(matrix.clear(0, 1)).to.equal(undefined);
    expect(matrix.edgeCount).to.equal(1);
  });

  it("returns undefined when reading outside the grid", () => {
    const matrix = squareOf(1);
    matrix.set(0, 0, "self");

    expect(matrix.get(0, 0)).to.equal("self");
    expect(matrix.get(0, 1)).to.equal(undefined);
    expect(matrix.get(4, 0)).to.equal(undefined);
  });

  it("rejects writes outside the grid", () => {
    const matrix = squareOf(2);

    expect(() => matrix.set(2, 0, "nope")).to.throw("outside a 2x2 grid");
    expect(() => matrix.clear(0, 5)).to.throw("outside a 2x2 grid");
  });

  it("moves the last row and column into a removed slot", () => {
    const matrix = squareOf(3);
    matrix.set(0, 1, "a");
    matrix.set(1, 2, "b");
    matrix.set(2, 0, "c");
    matrix.set(2, 2, "d");
    matrix.set(1, 1, "e");

    matrix.swapRemove(1);

    expect(matrix.dimension).to.equal(2);
    expect(matrix.edgeCount).to.equal(2);
    expect([...matrix.entries()]).to.deep.equal([
      { from: 1, to: 0, weight: "c" },
      { from: 1, to: 1, weight: "d" },
    ]);
  });

  it("drops the last row and column in place", () => {
    const matrix = squareOf(2);
    matrix.set(0, 1, "out");
    matrix.set(1, 0, "in");
    matrix.set(0, 0, "keep");

    matrix.swapRemove(1);

    expect(matrix.cells()).to.deep.equal([["keep"]]);
    expect(matrix.edgeCount).to.equal(1);
  });
});
