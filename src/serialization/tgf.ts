import { z } from "zod";

import { loadRuntimeConfig, type TgfIndexBase } from "../config/runtime.js";
import { TGF_PARSE_ERROR_CODES, TgfParseError, TgfRenderError } from "../errors.js";
import { MatrixGraph, type MatrixGraphOptions } from "../graph/matrixGraph.js";
import type { AdjacencySource, EdgeWeight, NodeIndex, NodeValue } from "../graph/types.js";
import { createLogger, type StructuredLogger } from "../logger.js";
import type { LabelCodec } from "./labelCodecs.js";

/**
 * Trivial Graph Format:
 *
 * ```
 * <index> <label>          one line per node
 * #
 * <from> <to> [<label>]    one line per edge
 * ```
 */

export const TgfIndexBaseSchema = z.union([z.literal(0), z.literal(1)]);

export interface TgfRenderOptions<N, W> {
  readonly nodes?: Pick<LabelCodec<N>, "format">;
  readonly weights?: Pick<LabelCodec<W>, "format">;
  /** Number written for the node at index 0. Defaults to the runtime config. */
  readonly indexBase?: TgfIndexBase;
}

export interface TgfParseOptions<N, W> {
  readonly nodes: LabelCodec<N>;
  readonly weights: LabelCodec<W>;
  /** Number used in the document for the node at index 0. Defaults to the runtime config. */
  readonly indexBase?: TgfIndexBase;
  /** Options forwarded to the graph being built. */
  readonly graph?: MatrixGraphOptions<N>;
  readonly logger?: StructuredLogger;
}

const SEPARATOR = "#";
// `s`: labels may contain U+2028 and U+2029, which `.` skips otherwise.
const NODE_LINE = /^(\S+)(?: (.*))?$/s;
const EDGE_LINE = /^(\S+) (\S+)(?: (.*))?$/s;
const INDEX_TOKEN = /^\d+$/;
const LINE_BREAK = /[\r\n]/;

interface DeclaredNode<N> {
  readonly index: NodeIndex;
  readonly value: N;
  readonly line: number;
}

function resolveIndexBase(requested: TgfIndexBase | undefined): TgfIndexBase {
  return TgfIndexBaseSchema.parse(requested ?? loadRuntimeConfig().tgfIndexBase);
}

function isBlank(line: string): boolean {
  return line.trim().length === 0;
}

function joinFields(fields: string[], label: string): string {
  return label.length === 0 ? fields.join(" ") : `${fields.join(" ")} ${label}`;
}

function assertSingleLine(label: string, location: string): string {
  if (LINE_BREAK.test(label)) {
    throw new TgfRenderError(location, label);
  }
  return label;
}

/**
 * Renders the graph as TGF: nodes in index order, `#`, then present edges in
 * ascending `(from, to)` order. Labels default to `String(value)`, and a `null`
 * weight renders as an empty label. An empty label is omitted together with its
 * separating space.
 */
export function renderTgf<N, W>(source: AdjacencySource<N, W>, options: TgfRenderOptions<N, W> = {}): string {
  const base = resolveIndexBase(options.indexBase);
  const formatNode = (value: N): string => (options.nodes ? options.nodes.format(value) : String(value));
  const formatWeight = (value: W): string => {
    if (options.weights) {
      return options.weights.format(value);
    }
    return value === null ? "" : String(value);
  };
  const view = source.getAdjacencyMatrix();

  const lines: string[] = [];
  view.nodes.forEach((node, index) => {
    const label = assertSingleLine(formatNode(node), `node ${index}`);
    lines.push(joinFields([String(index + base)], label));
  });
  lines.push(SEPARATOR);
  for (const edge of view.edgeEntries()) {
    const label = assertSingleLine(formatWeight(edge.weight), `edge ${edge.from} -> ${edge.to}`);
    lines.push(joinFields([String(edge.from + base), String(edge.to + base)], label));
  }
  return `${lines.join("\n")}\n`;
}

/**
 * Decodes TGF text into a new graph. Node `k` of the document lands at index
 * `k - indexBase`, so the declared indices must cover a contiguous range.
 * Repeated edge lines keep the last weight.
 *
 * @throws TgfParseError describing the first offending line.
 */
export function parseTgf<N extends NodeValue, W extends EdgeWeight>(
  text: string,
  options: TgfParseOptions<N, W>,
): MatrixGraph<N, W> {
  const logger = options.logger ?? options.graph?.logger ?? createLogger();
  const base = resolveIndexBase(options.indexBase);
  try {
    const graph = new TgfReader(text, options, base).read(new MatrixGraph<N, W>({ ...options.graph, logger }));
    logger.debug("tgf_parsed", { nodes: graph.nodeCount, edges: graph.edgeCount });
    return graph;
  } catch (error) {
    if (error instanceof TgfParseError) {
      logger.debug("tgf_parse_failed", { kind: error.kind, line: error.line });
    }
    throw error;
  }
}

/** Single-use cursor over the lines of one document. */
class TgfReader<N extends NodeValue, W extends EdgeWeight> {
  private readonly lines: string[];
  private cursor = 0;

  constructor(
    text: string,
    private readonly options: TgfParseOptions<N, W>,
    private readonly base: TgfIndexBase,
  ) {
    this.lines = text.split(/\r?\n/);
  }

  read(graph: MatrixGraph<N, W>): MatrixGraph<N, W> {
    const declared = this.readNodeBlock();
    this.insertNodes(graph, declared);
    this.readEdgeBlock(graph);
    return graph;
  }

  private readNodeBlock(): Array<DeclaredNode<N>> {
    const declared: Array<DeclaredNode<N>> = [];
    const declaredOn = new Map<NodeIndex, number>();

    for (; this.cursor < this.lines.length; this.cursor += 1) {
      const raw = this.lines[this.cursor];
      const line = this.cursor + 1;
      if (isBlank(raw)) {
        continue;
      }
      if (raw.trim() === SEPARATOR) {
        this.cursor += 1;
        this.assertNodeIndicesContiguous(declared);
        return declared;
      }

      const match = NODE_LINE.exec(raw);
      if (!match || !INDEX_TOKEN.test(match[1])) {
        throw new TgfParseError(TGF_PARSE_ERROR_CODES.MALFORMED_LINE, line, 'expected "<index> <label>"');
      }
      const index = Number(match[1]) - this.base;
      if (index < 0) {
        throw new TgfParseError(
          TGF_PARSE_ERROR_CODES.MALFORMED_LINE,
          line,
          `node index ${match[1]} is below the index base ${this.base}`,
        );
      }
      const previousLine = declaredOn.get(index);
      if (previousLine !== undefined) {
        throw new TgfParseError(
          TGF_PARSE_ERROR_CODES.DUPLICATE_INDEX,
          line,
          `node index ${match[1]} already declared on line ${previousLine}`,
        );
      }

      const label = match[2] ?? "";
      const decoded = this.options.nodes.parse(label);
      if (!decoded.ok) {
        throw new TgfParseError(
          TGF_PARSE_ERROR_CODES.INVALID_NODE,
          line,
          `invalid node label "${label}": ${decoded.reason}`,
        );
      }
      declaredOn.set(index, line);
      declared.push({ index, value: decoded.value, line });
    }

    throw new TgfParseError(
      TGF_PARSE_ERROR_CODES.MALFORMED_LINE,
      null,
      `missing "${SEPARATOR}" separator between the node and edge blocks`,
    );
  }

  /** Indices are unique at this point, so any index >= count implies a gap. */
  private assertNodeIndicesContiguous(declared: ReadonlyArray<DeclaredNode<N>>): void {
    const gap = declared.find((node) => node.index >= declared.length);
    if (gap) {
      throw new TgfParseError(
        TGF_PARSE_ERROR_CODES.MALFORMED_LINE,
        gap.line,
        `node index ${gap.index + this.base} leaves a gap; indices must be contiguous from ${this.base}`,
      );
    }
  }

  private insertNodes(graph: MatrixGraph<N, W>, declared: ReadonlyArray<DeclaredNode<N>>): void {
    const ordered = [...declared].sort((left, right) => left.index - right.index);
    for (const node of ordered) {
      const index = graph.addNode(node.value);
      if (index !== node.index) {
        throw new TgfParseError(
          TGF_PARSE_ERROR_CODES.DUPLICATE_NODE,
          node.line,
          `node ${node.index + this.base} repeats node ${index + this.base}`,
        );
      }
    }
  }

  private readEdgeBlock(graph: MatrixGraph<N, W>): void {
    for (; this.cursor < this.lines.length; this.cursor += 1) {
      const raw = this.lines[this.cursor];
      const line = this.cursor + 1;
      if (isBlank(raw)) {
        continue;
      }

      const match = EDGE_LINE.exec(raw);
      if (!match) {
        throw new TgfParseError(TGF_PARSE_ERROR_CODES.MALFORMED_LINE, line, 'expected "<from> <to> [<label>]"');
      }
      const from = this.resolveEndpoint(match[1], graph, line);
      const to = this.resolveEndpoint(match[2], graph, line);

      const label = match[3] ?? "";
      const decoded = this.options.weights.parse(label);
      if (!decoded.ok) {
        throw new TgfParseError(
          TGF_PARSE_ERROR_CODES.INVALID_WEIGHT,
          line,
          `invalid edge label "${label}": ${decoded.reason}`,
        );
      }
      graph.addEdge(from, to, decoded.value);
    }
  }

  private resolveEndpoint(token: string, graph: MatrixGraph<N, W>, line: number): NodeIndex {
    if (!INDEX_TOKEN.test(token)) {
      throw new TgfParseError(TGF_PARSE_ERROR_CODES.MALFORMED_LINE, line, `edge endpoint "${token}" is not an index`);
    }
    const index = Number(token) - this.base;
    if (index < 0 || index >= graph.nodeCount) {
      throw new TgfParseError(
        TGF_PARSE_ERROR_CODES.UNKNOWN_NODE_REFERENCE,
        line,
        `edge references undeclared node ${token}`,
      );
    }
    return index;
  }
}
