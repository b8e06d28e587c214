import type { GraphVertex } from "../core/graph-node";
import { validateGraph } from "./validate";

/**
 * Swap every node's predecessor and successor lists in place, without
 * validation. Applying it twice restores the original graph exactly (the
 * same array objects end up where they started).
 */
export function swapEdges(nodes: readonly GraphVertex[]): void {
  for (const node of nodes) {
    const predecessors = node.predecessors;
    node.predecessors = node.successors;
    node.successors = predecessors;
  }
}

/**
 * Validate the caller's graph, then reverse every edge in place.
 *
 * Afterwards the original output has no predecessors and the original input
 * has no successors, so an ordinary forward traversal of the reversed graph
 * runs from the output back to the input. The original edge direction is
 * not kept anywhere else: callers that need it must copy the graph first, or
 * call `swapEdges` to undo.
 *
 * @returns the original input (source) and output (sink)
 */
export function reverseGraph<N extends GraphVertex>(
  nodes: readonly N[],
): readonly [originalSource: N, originalSink: N] {
  const { source, sink } = validateGraph(nodes);
  swapEdges(nodes);
  return [source, sink];
}
