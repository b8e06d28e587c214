/**
 * Scheduler for a single-input, single-output DAG of nodes.
 *
 * Build: validate the graph, check the shared cache/arguments, sort, and
 * (with back-substitution) compute every node's ancestor closure. All
 * structural and configuration errors surface here, before any node runs.
 *
 * Trace events go to the caller's recorder when one is passed and to
 * console.log in verbose mode; the model keeps none itself.
 *
 * Run: forward every node in order. With back-substitution, each non-source
 * node is followed by a backward walk over its ancestor closure. Caches are
 * evicted through reference-count tables as soon as their last consumer ran.
 * Errors thrown by node operations propagate unchanged and leave the cache as
 * the failing node left it.
 */

import {
  type BacksubNode,
  type GraphNode,
  type NodeArguments,
  nodeNames,
  supportsBacksub,
} from "../core/graph-node";
import { resolveModelOptions, type ModelOptions } from "./config";
import {
  BacksubUnsupportedError,
  SharedStateMismatchError,
} from "./engine-errors";
import { ReferenceCountTable } from "./eviction";
import { ancestorClosures, type SortStrategy, topologicalSort } from "./topo-sort";
import { formatTraceEvent, type TraceEvent, type TraceRecorder } from "./trace";
import { validateGraph } from "./validate";

function checkSharedState<TCache extends object, TArgs extends NodeArguments>(
  nodes: readonly GraphNode<TCache, TArgs>[],
  cache: TCache,
  args: TArgs,
): void {
  const foreignCache = nodes.filter((node) => node.cache !== cache);
  if (foreignCache.length > 0) {
    throw new SharedStateMismatchError("cache", nodeNames(foreignCache));
  }
  const foreignArgs = nodes.filter((node) => node.args !== args);
  if (foreignArgs.length > 0) {
    throw new SharedStateMismatchError("args", nodeNames(foreignArgs));
  }
}

export class Model<
  TCache extends object = object,
  TArgs extends NodeArguments = NodeArguments,
> {
  /** The caller's recorder; without one, events are only printed in verbose mode. */
  readonly trace: TraceRecorder | undefined;
  readonly sortStrategy: SortStrategy;
  readonly backsubEnabled: boolean;
  readonly evictCaches: boolean;
  readonly verbose: boolean;
  readonly source: GraphNode<TCache, TArgs>;
  readonly sink: GraphNode<TCache, TArgs>;
  readonly cache: TCache;
  readonly args: TArgs;

  private readonly order: GraphNode<TCache, TArgs>[];
  private readonly closures: Map<
    GraphNode<TCache, TArgs>,
    BacksubNode<TCache, TArgs>[]
  > | null;

  constructor(
    nodes: readonly GraphNode<TCache, TArgs>[],
    options: ModelOptions = {},
  ) {
    const { source, sink } = validateGraph(nodes);
    this.source = source;
    this.sink = sink;
    this.cache = source.cache;
    this.args = source.args;
    checkSharedState(nodes, this.cache, this.args);

    const resolved = resolveModelOptions(options, this.args);
    this.sortStrategy = resolved.sortStrategy;
    this.backsubEnabled = resolved.backsub;
    this.evictCaches = resolved.evictCaches;
    this.verbose = resolved.verbose;
    this.trace = options.trace;

    this.order = topologicalSort(nodes, this.sortStrategy);

    if (this.backsubEnabled) {
      const backsubNodes = this.order.filter(
        (node): node is BacksubNode<TCache, TArgs> => supportsBacksub(node),
      );
      if (backsubNodes.length !== this.order.length) {
        throw new BacksubUnsupportedError(
          nodeNames(this.order.filter((node) => !supportsBacksub(node))),
        );
      }
      this.closures = ancestorClosures(backsubNodes);
    } else {
      this.closures = null;
    }

    this.emit({
      type: "sort",
      strategy: this.sortStrategy,
      order: nodeNames(this.order),
    });
  }

  /**
   * Nodes in forward execution order.
   */
  get nodes(): readonly GraphNode<TCache, TArgs>[] {
    return this.order;
  }

  /**
   * The back-substitution scope of `node` in topological order (source
   * first, `node` last), or undefined when back-substitution is disabled.
   */
  closureOf(
    node: GraphNode<TCache, TArgs>,
  ): readonly BacksubNode<TCache, TArgs>[] | undefined {
    return this.closures?.get(node);
  }

  run(): void {
    this.emit({
      type: "run_begin",
      nodeCount: this.order.length,
      backsub: this.backsubEnabled,
      evictCaches: this.evictCaches,
    });

    const forwardRefs = this.evictCaches
      ? ReferenceCountTable.forward(this.order, (node) => {
          node.evictForwardCache();
          this.emit({ type: "evict_forward", node: node.name });
        })
      : null;

    this.order.forEach((node, step) => {
      this.emit({ type: "forward", node: node.name, step });
      node.forward();
      if (node !== this.source) {
        this.backsub(node);
      }
      forwardRefs?.release(node.predecessors);
    });
    forwardRefs?.release([this.sink]);

    this.emit({ type: "run_end" });
  }

  /**
   * Walk `node`'s ancestor closure from `node` back to the source, calling
   * backward() on each member. A member's backward cache is evicted once
   * every closure member that lists it as a successor has run.
   */
  private backsub(node: GraphNode<TCache, TArgs>): void {
    const closure = this.closures?.get(node);
    if (!closure || closure.length <= 1) {
      return;
    }
    this.emit({
      type: "backsub_begin",
      node: node.name,
      closureSize: closure.length,
    });

    const backwardRefs = this.evictCaches
      ? ReferenceCountTable.backward(closure, (member) => {
          member.evictBackwardCache();
          this.emit({
            type: "evict_backward",
            node: member.name,
            target: node.name,
          });
        })
      : null;

    for (let i = closure.length - 1; i >= 0; i--) {
      const member = closure[i];
      this.emit({ type: "backward", node: member.name, target: node.name });
      member.backward();
      backwardRefs?.release(member.successors);
    }
    backwardRefs?.release([closure[0]]);

    this.emit({ type: "backsub_end", node: node.name });
  }

  private emit(event: TraceEvent): void {
    this.trace?.record(event);
    if (this.verbose) {
      console.log(formatTraceEvent(event));
    }
  }
}

export function createModel<TCache extends object, TArgs extends NodeArguments>(
  nodes: readonly GraphNode<TCache, TArgs>[],
  options: ModelOptions = {},
): Model<TCache, TArgs> {
  return new Model(nodes, options);
}
