export * from "./errors.js";
export * from "./logger.js";
export * from "./config/runtime.js";
export * from "./graph/types.js";
export * from "./graph/nodeRegistry.js";
export * from "./graph/edgeMatrix.js";
export * from "./graph/adjacencyView.js";
export * from "./graph/matrixGraph.js";
export * from "./traversal/breadthFirst.js";
export * from "./serialization/labelCodecs.js";
export * from "./serialization/tgf.js";
