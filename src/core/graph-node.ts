/**
 * Graph node primitives.
 *
 * No imports, so any layer can depend on it.
 * Edges are plain arrays of references owned by the caller; the engine never
 * adds or removes entries, it only swaps the two lists when reversing a graph.
 */

export type PropMode = "forward" | "backward";

/**
 * Shared, immutable run configuration. Every node of a model holds the same
 * instance.
 */
export interface NodeArguments {
  readonly propMode?: PropMode;
}

/**
 * The structural part of a node: what the validator, sorters and the
 * reversal transform look at.
 */
export interface GraphVertex {
  readonly name: string;
  predecessors: GraphVertex[];
  successors: GraphVertex[];
}

export interface ForwardOps {
  forward(): void;
  evictForwardCache(): void;
}

/**
 * Capability of node variants that take part in back-substitution.
 */
export interface BacksubOps {
  backward(): void;
  evictBackwardCache(): void;
}

export abstract class GraphNode<
  TCache extends object = object,
  TArgs extends NodeArguments = NodeArguments,
> implements GraphVertex, ForwardOps {
  readonly name: string;
  readonly cache: TCache;
  readonly args: TArgs;
  predecessors: GraphNode<TCache, TArgs>[] = [];
  successors: GraphNode<TCache, TArgs>[] = [];

  constructor(name: string, cache: TCache, args: TArgs) {
    this.name = name;
    this.cache = cache;
    this.args = args;
  }

  abstract forward(): void;

  abstract evictForwardCache(): void;

  /** No predecessors: the graph input. */
  get isSource(): boolean {
    return this.predecessors.length === 0;
  }

  /** No successors: the graph output. */
  get isSink(): boolean {
    return this.successors.length === 0;
  }

  toString(): string {
    return this.name;
  }
}

export type BacksubNode<
  TCache extends object = object,
  TArgs extends NodeArguments = NodeArguments,
> = GraphNode<TCache, TArgs> & BacksubOps;

export function supportsBacksub<TCache extends object, TArgs extends NodeArguments>(
  node: GraphNode<TCache, TArgs>,
): node is BacksubNode<TCache, TArgs> {
  return (
    "backward" in node &&
    typeof node.backward === "function" &&
    "evictBackwardCache" in node &&
    typeof node.evictBackwardCache === "function"
  );
}

/**
 * Record the edge `from -> to` on both endpoints. Calling it twice for the
 * same pair records a duplicate edge (e.g. `x * x`).
 */
export function connect<N extends GraphVertex>(from: N, to: N): void {
  from.successors.push(to);
  to.predecessors.push(from);
}

export function nodeNames(nodes: Iterable<GraphVertex>): string[] {
  return Array.from(nodes, (node) => node.name);
}
