import { afterEach, describe, it } from "mocha";
import { expect } from "chai";
import sinon from "sinon";

import { IndexOutOfBoundsError, StaleViewError } from "../../src/errors.js";
import { MatrixGraph } from "../../src/graph/matrixGraph.js";
import { StructuredLogger } from "../../src/logger.js";

function buildSpecimen(): MatrixGraph<number, number> {
  return MatrixGraph.fromEdges<number, number>([
    [1, 2, 3],
    [3, 4, 7],
    [1, 3, 4],
  ]);
}

/** a -> b, b -> c, c -> d, d -> a, d -> d, b -> d */
function buildLettersGraph(): MatrixGraph<string, number> {
  const graph = new MatrixGraph<string, number>();
  const [a, b, c, d] = ["a", "b", "c", "d"].map((value) => graph.addNode(value));
  graph.addEdge(a, b, 1);
  graph.addEdge(b, c, 2);
  graph.addEdge(c, d, 3);
  graph.addEdge(d, a, 4);
  graph.addEdge(d, d, 5);
  graph.addEdge(b, d, 6);
  return graph;
}

describe("graph matrix engine", () => {
  afterEach(() => {
    sinon.restore();
  });

  it("starts empty", () => {
    const graph = new MatrixGraph<string, number>();

    expect(graph.nodeCount).to.equal(0);
    expect(graph.edgeCount).to.equal(0);
    expect([...graph.nodes()]).to.deep.equal([]);
    expect(graph.getAdjacencyMatrix().edges).to.deep.equal([]);
  });

  it("rejects edge removal on an empty graph", () => {
    const graph = new MatrixGraph<string, number>();

    expect(() => graph.removeEdge(0, 0)).to.throw(IndexOutOfBoundsError);
  });

  it("builds a graph from edge triples", () => {
    const graph = buildSpecimen();

    expect(graph.nodeCount).to.equal(4);
    expect(graph.edgeCount).to.equal(3);
    expect([...graph.nodes()]).to.deep.equal([1, 2, 3, 4]);

    const origin = graph.indexOf(1);
    expect(origin).to.equal(0);
    const neighbours = [...graph.neighbors(0)];
    expect(neighbours.map((entry) => entry.node)).to.deep.equal([2, 3]);
    expect(neighbours.map((entry) => entry.index)).to.deep.equal([1, 2]);
  });

  it("keeps the last weight when a pair repeats in the input", () => {
    const graph = MatrixGraph.fromEdges<string, number>([
      ["x", "y", 1],
      ["x", "y", 9],
    ]);

    expect(graph.edgeCount).to.equal(1);
    expect(graph.getEdgeByIndex(0, 1)).to.equal(9);
  });

  it("treats repeated node insertion as a lookup", () => {
    const graph = new MatrixGraph<string, number>();
    const first = graph.addNode("solo");
    const revision = graph.revision;

    expect(graph.addNode("solo")).to.equal(first);
    expect(graph.nodeCount).to.equal(1);
    expect(graph.revision).to.equal(revision);
  });

  it("stores edges in one direction only", () => {
    const graph = new MatrixGraph<string, string>();
    const a = graph.addNode("a");
    const b = graph.addNode("b");

    expect(graph.addEdge(a, b, "forward")).to.equal(undefined);
    expect(graph.getEdgeByIndex(a, b)).to.equal("forward");
    expect(graph.getEdgeByIndex(b, a)).to.equal(undefined);

    expect(graph.addEdge(a, b, "updated")).to.equal("forward");
    expect(graph.edgeCount).to.equal(1);
    expect(graph.hasEdge(a, b)).to.equal(true);
    expect(graph.hasEdge(b, a)).to.equal(false);
  });

  it("reports the offending index when an edge endpoint is unknown", () => {
    const graph = new MatrixGraph<string, string>();
    graph.addNode("only");

    let caught: unknown;
    try {
      graph.addEdge(0, 3, "dangling");
    } catch (error) {
      caught = error;
    }

    expect(caught).to.be.instanceOf(IndexOutOfBoundsError);
    if (caught instanceof IndexOutOfBoundsError) {
      expect(caught.code).to.equal("E-GRAPH-INDEX-OUT-OF-BOUNDS");
      expect(caught.details).to.deep.equal({ index: 3, size: 1 });
    }
    expect(graph.edgeCount).to.equal(0);
  });

  it("removes edges and reports what was present", () => {
    const graph = buildLettersGraph();

    expect(graph.removeEdge(0, 1)).to.equal(1);
    expect(graph.removeEdge(0, 1)).to.equal(undefined);
    expect(graph.edgeCount).to.equal(5);
  });

  it("drops every incident edge and relocates the last node on removal", () => {
    const graph = buildLettersGraph();

    expect(graph.removeNode("b")).to.equal("b");

    expect(graph.nodeCount).to.equal(3);
    expect([...graph.nodes()]).to.deep.equal(["a", "d", "c"]);
    expect(graph.indexOf("d")).to.equal(1);
    expect(graph.edgeCount).to.equal(3);
    expect([...graph.edges()]).to.deep.equal([
      { from: 1, to: 0, weight: 4 },
      { from: 1, to: 1, weight: 5 },
      { from: 2, to: 1, weight: 3 },
    ]);

    const view = graph.getAdjacencyMatrix();
    expect(view.edges).to.have.lengthOf(3);
    expect(view.edges.every((row) => row.length === 3)).to.equal(true);
  });

  it("returns undefined when removing unknown nodes", () => {
    const graph = buildLettersGraph();

    expect(graph.removeNode("z")).to.equal(undefined);
    expect(graph.removeNodeAt(10)).to.equal(undefined);
    expect(graph.nodeCount).to.equal(4);
  });

  it("answers lookups outside the graph with undefined", () => {
    const graph = buildLettersGraph();

    expect(graph.getNodeByIndex(2)).to.equal("c");
    expect(graph.getNodeByIndex(-1)).to.equal(undefined);
    expect(graph.getNodeByIndex(1.5)).to.equal(undefined);
    expect(graph.getNodeByIndex(99)).to.equal(undefined);
    expect(graph.getEdgeByIndex(0, 99)).to.equal(undefined);
    expect(graph.hasEdge(99, 0)).to.equal(false);
    expect(graph.hasNode("c")).to.equal(true);
    expect(graph.hasNode("q")).to.equal(false);
  });

  it("yields nothing for a node without outgoing edges", () => {
    const graph = buildSpecimen();

    expect([...graph.neighbors(graph.indexOf(2) ?? -1)]).to.deep.equal([]);
  });

  it("rejects neighbour enumeration for unknown indices before iterating", () => {
    const graph = buildSpecimen();

    expect(() => graph.neighbors(4)).to.throw(IndexOutOfBoundsError);
  });

  it("hands out single-use neighbour iterators", () => {
    const graph = buildSpecimen();
    const iterator = graph.neighbors(0);

    expect([...iterator]).to.have.lengthOf(2);
    expect([...iterator]).to.deep.equal([]);
    expect([...graph.neighbors(0)]).to.have.lengthOf(2);
  });

  it("invalidates neighbour iterators once the graph changes", () => {
    const graph = buildSpecimen();
    const iterator = graph.neighbors(0);
    iterator.next();

    graph.addNode(5);

    expect(() => iterator.next()).to.throw(StaleViewError);
  });

  it("invalidates neighbour iterators that were never pulled", () => {
    const graph = buildSpecimen();
    const iterator = graph.neighbors(0);

    graph.removeEdge(0, 1);

    expect(() => iterator.next()).to.throw(StaleViewError);
  });

  it("identifies structured nodes through the key function", () => {
    type Task = { id: string; owner: string };
    const graph = new MatrixGraph<Task, null>({ keyOf: (task) => task.id });

    const build = graph.addNode({ id: "build", owner: "ci" });
    const test = graph.addNode({ id: "test", owner: "ci" });
    graph.addEdge(build, test, null);

    expect(graph.addNode({ id: "build", owner: "someone else" })).to.equal(build);
    expect(graph.removeNode({ id: "test", owner: "" })?.owner).to.equal("ci");
    expect(graph.edgeCount).to.equal(0);
  });

  it("logs node removals at debug level", () => {
    const onEntry = sinon.spy();
    const logger = new StructuredLogger({ level: "debug", sink: () => undefined, onEntry });
    const graph = new MatrixGraph<string, number>({ logger });
    graph.addNode("first");
    graph.addNode("second");
    graph.addNode("third");

    graph.removeNodeAt(0);
    graph.removeNodeAt(1);

    expect(onEntry.callCount).to.equal(2);
    expect(onEntry.firstCall.args[0]).to.include({ level: "debug", message: "graph_node_removed" });
    expect(onEntry.firstCall.args[0].payload).to.deep.equal({ index: 0, relocated_from: 2 });
    expect(onEntry.secondCall.args[0].payload).to.deep.equal({ index: 1, relocated_from: null });
  });
});
