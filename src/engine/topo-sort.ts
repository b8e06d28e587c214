/**
 * Topological ordering of a validated graph.
 *
 * Two interchangeable strategies produce the forward order:
 * - wide-first (Kahn's algorithm): nodes close to the input run, and can be
 *   evicted, early. Suits networks whose early layers hold the largest state.
 * - deep-first (reversed DFS post-order): descends one branch at a time.
 *   Suits networks whose later layers are the large ones.
 *
 * Structural decisions use distinct neighbours, so a duplicated edge (x * x)
 * counts as one dependency here.
 */

import type { GraphVertex } from "../core/graph-node";
import { nodeNames } from "../core/graph-node";
import {
  CycleDetectedError,
  DanglingEdgeError,
  UnknownStrategyError,
} from "./engine-errors";

export type SortStrategy = "wide-first" | "deep-first";

export const SORT_STRATEGIES: readonly SortStrategy[] = [
  "wide-first",
  "deep-first",
];

export function isSortStrategy(value: string): value is SortStrategy {
  return value === "wide-first" || value === "deep-first";
}

export function memberIndex<N extends GraphVertex>(
  nodes: readonly N[],
): Map<GraphVertex, N> {
  return new Map<GraphVertex, N>(nodes.map((node) => [node, node]));
}

/**
 * Look `vertex` up among the graph members; `from -> to` is the edge it was
 * reached through.
 */
function lookup<N extends GraphVertex>(
  members: Map<GraphVertex, N>,
  vertex: GraphVertex,
  from: GraphVertex,
  to: GraphVertex,
): N {
  const member = members.get(vertex);
  if (member === undefined) {
    throw new DanglingEdgeError(
      from.name,
      to.name,
      `points at a node outside the graph (${vertex.name})`,
    );
  }
  return member;
}

function distinct<T>(items: readonly T[]): T[] {
  return [...new Set(items)];
}

/**
 * Wide-first: Kahn's algorithm with a FIFO queue seeded in input order.
 */
export function sortWideFirst<N extends GraphVertex>(nodes: readonly N[]): N[] {
  const members = memberIndex(nodes);
  const inDegrees = new Map<GraphVertex, number>();
  for (const node of nodes) {
    inDegrees.set(node, new Set(node.predecessors).size);
  }

  const queue: N[] = nodes.filter((node) => inDegrees.get(node) === 0);
  const ordered: N[] = [];
  let head = 0;
  while (head < queue.length) {
    const node = queue[head++];
    ordered.push(node);
    for (const successor of distinct(node.successors)) {
      const next = lookup(members, successor, node, successor);
      const remaining = (inDegrees.get(next) ?? 0) - 1;
      inDegrees.set(next, remaining);
      if (remaining === 0) {
        queue.push(next);
      }
    }
  }

  if (ordered.length !== nodes.length) {
    const placed = new Set<GraphVertex>(ordered);
    const unordered = nodeNames(nodes.filter((node) => !placed.has(node)));
    throw new CycleDetectedError(
      unordered,
      `${unordered.length} of ${nodes.length} nodes could not be ordered (${unordered.join(", ")})`,
    );
  }
  return ordered;
}

interface DfsFrame<N> {
  node: N;
  neighbours: readonly GraphVertex[];
  cursor: number;
}

/**
 * Deep-first: DFS post-order from every input node, reversed. Uses an
 * explicit stack; the visiting order matches the recursive formulation.
 */
export function sortDeepFirst<N extends GraphVertex>(nodes: readonly N[]): N[] {
  const members = memberIndex(nodes);
  const visited = new Set<GraphVertex>();
  const onStack = new Set<GraphVertex>();
  const postOrder: N[] = [];
  const stack: DfsFrame<N>[] = [];

  const enter = (node: N): void => {
    onStack.add(node);
    stack.push({ node, neighbours: distinct(node.successors), cursor: 0 });
  };

  for (const root of nodes) {
    if (root.predecessors.length > 0 || visited.has(root)) {
      continue;
    }
    enter(root);
    while (stack.length > 0) {
      const frame = stack[stack.length - 1];
      if (frame.cursor < frame.neighbours.length) {
        const successor = frame.neighbours[frame.cursor++];
        const next = lookup(members, successor, frame.node, successor);
        if (onStack.has(next)) {
          const start = stack.findIndex((f) => f.node === next);
          const path = nodeNames(stack.slice(start).map((f) => f.node));
          throw new CycleDetectedError(
            path,
            `edge ${frame.node.name} -> ${next.name} closes the cycle ${[...path, next.name].join(" -> ")}`,
          );
        }
        if (!visited.has(next)) {
          enter(next);
        }
        continue;
      }
      stack.pop();
      onStack.delete(frame.node);
      visited.add(frame.node);
      postOrder.push(frame.node);
    }
  }

  if (postOrder.length !== nodes.length) {
    const unordered = nodeNames(nodes.filter((node) => !visited.has(node)));
    throw new CycleDetectedError(
      unordered,
      `${unordered.length} of ${nodes.length} nodes are unreachable from an input node (${unordered.join(", ")})`,
    );
  }
  return postOrder.reverse();
}

export function topologicalSort<N extends GraphVertex>(
  nodes: readonly N[],
  strategy: string,
): N[] {
  switch (strategy) {
    case "wide-first":
      return sortWideFirst(nodes);
    case "deep-first":
      return sortDeepFirst(nodes);
    default:
      throw new UnknownStrategyError(strategy);
  }
}

/**
 * The node plus everything reachable through predecessor edges, in
 * topological order: the graph source first, `node` itself last.
 */
export function ancestorClosure<N extends GraphVertex>(
  node: N,
  members: Map<GraphVertex, N>,
): N[] {
  const visited = new Set<GraphVertex>([node]);
  const closure: N[] = [];
  const stack: DfsFrame<N>[] = [
    { node, neighbours: node.predecessors, cursor: 0 },
  ];

  while (stack.length > 0) {
    const frame = stack[stack.length - 1];
    if (frame.cursor < frame.neighbours.length) {
      const predecessor = frame.neighbours[frame.cursor++];
      if (!visited.has(predecessor)) {
        visited.add(predecessor);
        const prev = lookup(members, predecessor, predecessor, frame.node);
        stack.push({ node: prev, neighbours: prev.predecessors, cursor: 0 });
      }
      continue;
    }
    stack.pop();
    closure.push(frame.node);
  }
  return closure;
}

/**
 * Ancestor closure of every node, keyed by node. O(V * (V + E)).
 */
export function ancestorClosures<N extends GraphVertex>(
  nodes: readonly N[],
): Map<N, N[]> {
  const members = memberIndex(nodes);
  const closures = new Map<N, N[]>();
  for (const node of nodes) {
    closures.set(node, ancestorClosure(node, members));
  }
  return closures;
}
