/** Stable error codes surfaced by the graph engine and the TGF codec. */
export const GRAPH_ERROR_CODES = {
  INDEX_OUT_OF_BOUNDS: "E-GRAPH-INDEX-OUT-OF-BOUNDS",
  STALE_VIEW: "E-GRAPH-STALE-VIEW",
  UNSERIALISABLE_LABEL: "E-TGF-UNSERIALISABLE-LABEL",
  TGF_PARSE: "E-TGF-PARSE",
} as const;

export type GraphErrorCode = (typeof GRAPH_ERROR_CODES)[keyof typeof GRAPH_ERROR_CODES];

/** Base error used by every failure raised from this package. */
export class GraphError extends Error {
  public readonly code: GraphErrorCode;
  public readonly hint?: string;

  constructor(code: GraphErrorCode, message: string, hint?: string) {
    super(message);
    this.name = "GraphError";
    this.code = code;
    this.hint = hint;
  }
}

/** Error thrown when an index argument does not address an existing node. */
export class IndexOutOfBoundsError extends GraphError {
  public readonly details: { index: number; size: number };

  constructor(index: number, size: number) {
    super(
      GRAPH_ERROR_CODES.INDEX_OUT_OF_BOUNDS,
      `index ${index} is out of bounds for a graph of ${size} node(s)`,
      "indices are invalidated by node removal; look the node up again",
    );
    this.name = "IndexOutOfBoundsError";
    this.details = { index, size };
  }
}

/**
 * Error thrown when a view or lazy sequence is used after the graph it was
 * created from has been mutated.
 */
export class StaleViewError extends GraphError {
  public readonly details: { expected: number; found: number };

  constructor(expected: number, found: number) {
    super(
      GRAPH_ERROR_CODES.STALE_VIEW,
      `graph mutated while a view was in use (revision ${expected} -> ${found})`,
      "finish iterating before mutating the graph, or request a fresh view",
    );
    this.name = "StaleViewError";
    this.details = { expected, found };
  }
}

/** Failure categories reported while decoding TGF text. */
export const TGF_PARSE_ERROR_CODES = {
  MALFORMED_LINE: "MALFORMED_LINE",
  INVALID_NODE: "INVALID_NODE",
  INVALID_WEIGHT: "INVALID_WEIGHT",
  DUPLICATE_INDEX: "DUPLICATE_INDEX",
  DUPLICATE_NODE: "DUPLICATE_NODE",
  UNKNOWN_NODE_REFERENCE: "UNKNOWN_NODE_REFERENCE",
} as const;

export type TgfParseErrorCode = (typeof TGF_PARSE_ERROR_CODES)[keyof typeof TGF_PARSE_ERROR_CODES];

/** Error thrown by {@link parseTgf}; `line` is 1-based, `null` when no single line is at fault. */
export class TgfParseError extends GraphError {
  public readonly kind: TgfParseErrorCode;
  public readonly line: number | null;

  constructor(kind: TgfParseErrorCode, line: number | null, message: string) {
    super(GRAPH_ERROR_CODES.TGF_PARSE, line === null ? message : `line ${line}: ${message}`);
    this.name = "TgfParseError";
    this.kind = kind;
    this.line = line;
  }
}

/** Error thrown when a label cannot be written on a single TGF line. */
export class TgfRenderError extends GraphError {
  public readonly details: { location: string; label: string };

  constructor(location: string, label: string) {
    super(
      GRAPH_ERROR_CODES.UNSERIALISABLE_LABEL,
      `label of ${location} contains a line break`,
      "use a label codec that escapes or strips line breaks",
    );
    this.name = "TgfRenderError";
    this.details = { location, label };
  }
}
