import type { GraphNode, NodeArguments } from "../core/graph-node";
import type { ModelOptions } from "./config";
import { Model } from "./model";
import { reverseGraph, swapEdges } from "./reverse";
import type { SortStrategy } from "./topo-sort";
import type { TraceRecorder } from "./trace";

export type ReversedModelOptions = Omit<ModelOptions, "backsub">;

/**
 * Backward propagation as a plain forward pass.
 *
 * The caller builds the graph input -> output. Construction reverses every
 * edge, so the node order runs from the user's output to the user's input and
 * each node only needs forward() / evictForwardCache(). The reversal is the
 * one mutation the engine makes to a caller's graph; if the reversed graph is
 * rejected (e.g. it contains a cycle) the edges are swapped back before the
 * error propagates.
 */
export class ReversedModel<
  TCache extends object = object,
  TArgs extends NodeArguments = NodeArguments,
> {
  /** Input of the graph as the caller built it; runs last. */
  readonly userInput: GraphNode<TCache, TArgs>;
  /** Output of the graph as the caller built it; runs first. */
  readonly userOutput: GraphNode<TCache, TArgs>;

  private readonly model: Model<TCache, TArgs>;

  constructor(
    userNodes: readonly GraphNode<TCache, TArgs>[],
    options: ReversedModelOptions = {},
  ) {
    const [userInput, userOutput] = reverseGraph(userNodes);
    try {
      this.model = new Model(userNodes, { ...options, backsub: false });
    } catch (error) {
      swapEdges(userNodes);
      throw error;
    }
    this.userInput = userInput;
    this.userOutput = userOutput;
  }

  /** Nodes in reversed order: the user's output first, the user's input last. */
  get nodes(): readonly GraphNode<TCache, TArgs>[] {
    return this.model.nodes;
  }

  get cache(): TCache {
    return this.model.cache;
  }

  get args(): TArgs {
    return this.model.args;
  }

  get sortStrategy(): SortStrategy {
    return this.model.sortStrategy;
  }

  get evictCaches(): boolean {
    return this.model.evictCaches;
  }

  get verbose(): boolean {
    return this.model.verbose;
  }

  get trace(): TraceRecorder | undefined {
    return this.model.trace;
  }

  run(): void {
    this.model.run();
  }
}
