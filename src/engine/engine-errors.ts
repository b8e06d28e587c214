export type GraphStructureErrorKind =
  | "NoInput"
  | "MultipleInputs"
  | "NoOutput"
  | "MultipleOutputs"
  | "CycleDetected"
  | "DanglingEdge"
  | "DuplicateNode";

/**
 * A malformed caller-supplied graph. Always raised while a model is being
 * built, never while it runs.
 */
export abstract class GraphStructureError extends Error {
  name = "GraphStructureError";
  abstract readonly kind: GraphStructureErrorKind;
  readonly nodeNames: readonly string[];

  constructor(message: string, nodeNames: readonly string[] = []) {
    super(message);
    this.nodeNames = nodeNames;
  }
}

export class NoInputError extends GraphStructureError {
  name = "NoInputError";
  readonly kind = "NoInput";

  constructor() {
    super(
      "Graph must have exactly one input node (no predecessors), but found zero",
    );
  }
}

export class MultipleInputsError extends GraphStructureError {
  name = "MultipleInputsError";
  readonly kind = "MultipleInputs";

  constructor(nodeNames: readonly string[]) {
    super(
      `Graph must have exactly one input node, but found ${nodeNames.length}: ${nodeNames.join(", ")}`,
      nodeNames,
    );
  }
}

export class NoOutputError extends GraphStructureError {
  name = "NoOutputError";
  readonly kind = "NoOutput";

  constructor() {
    super(
      "Graph must have exactly one output node (no successors), but found zero",
    );
  }
}

export class MultipleOutputsError extends GraphStructureError {
  name = "MultipleOutputsError";
  readonly kind = "MultipleOutputs";

  constructor(nodeNames: readonly string[]) {
    super(
      `Graph must have exactly one output node, but found ${nodeNames.length}: ${nodeNames.join(", ")}`,
      nodeNames,
    );
  }
}

export class CycleDetectedError extends GraphStructureError {
  name = "CycleDetectedError";
  readonly kind = "CycleDetected";

  constructor(nodeNames: readonly string[], detail: string) {
    super(`Graph has a cycle, cannot perform topological sort: ${detail}`, nodeNames);
  }
}

export class DanglingEdgeError extends GraphStructureError {
  name = "DanglingEdgeError";
  readonly kind = "DanglingEdge";

  constructor(from: string, to: string, reason: string) {
    super(`Edge ${from} -> ${to} ${reason}`, [from, to]);
  }
}

export class DuplicateNodeError extends GraphStructureError {
  name = "DuplicateNodeError";
  readonly kind = "DuplicateNode";

  constructor(nodeNames: readonly string[]) {
    super(
      `Each node must appear once in the node list; repeated: ${nodeNames.join(", ")}`,
      nodeNames,
    );
  }
}

export class ModelConfigurationError extends Error {
  name = "ModelConfigurationError";
}

export class UnknownStrategyError extends ModelConfigurationError {
  name = "UnknownStrategyError";
  readonly strategy: string;

  constructor(strategy: string) {
    super(
      `Unknown sort strategy "${strategy}" (expected "wide-first" or "deep-first")`,
    );
    this.strategy = strategy;
  }
}

export class SharedStateMismatchError extends ModelConfigurationError {
  name = "SharedStateMismatchError";
  readonly nodeNames: readonly string[];

  constructor(field: "cache" | "args", nodeNames: readonly string[]) {
    super(
      `All nodes must share the same ${field} instance; different ${field} on: ${nodeNames.join(", ")}`,
    );
    this.nodeNames = nodeNames;
  }
}

export class BacksubUnsupportedError extends ModelConfigurationError {
  name = "BacksubUnsupportedError";
  readonly nodeNames: readonly string[];

  constructor(nodeNames: readonly string[]) {
    super(
      `Back-substitution needs backward() and evictBackwardCache() on every node; missing on: ${nodeNames.join(", ")}`,
    );
    this.nodeNames = nodeNames;
  }
}
