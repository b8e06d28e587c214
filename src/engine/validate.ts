import type { GraphVertex } from "../core/graph-node";
import { nodeNames } from "../core/graph-node";
import {
  DanglingEdgeError,
  DuplicateNodeError,
  MultipleInputsError,
  MultipleOutputsError,
  NoInputError,
  NoOutputError,
} from "./engine-errors";

export interface GraphBoundaries<N extends GraphVertex> {
  /** The only node without predecessors. */
  source: N;
  /** The only node without successors. */
  sink: N;
}

/**
 * Check that exactly one node has no predecessors and exactly one has no
 * successors. Cycles are left to the sorters.
 */
export function findBoundaries<N extends GraphVertex>(
  nodes: readonly N[],
): GraphBoundaries<N> {
  const sources = nodes.filter((node) => node.predecessors.length === 0);
  const sinks = nodes.filter((node) => node.successors.length === 0);

  if (sources.length === 0) {
    throw new NoInputError();
  }
  if (sources.length > 1) {
    throw new MultipleInputsError(nodeNames(sources));
  }
  if (sinks.length === 0) {
    throw new NoOutputError();
  }
  if (sinks.length > 1) {
    throw new MultipleOutputsError(nodeNames(sinks));
  }
  return { source: sources[0], sink: sinks[0] };
}

/**
 * Every neighbour must belong to `nodes`, and every edge must be recorded on
 * both of its endpoints. Multiplicity is not compared: `x * x` may list its
 * operand twice on one side only.
 */
export function checkEdges(nodes: readonly GraphVertex[]): void {
  const members = new Set<GraphVertex>(nodes);
  for (const node of nodes) {
    for (const next of node.successors) {
      if (!members.has(next)) {
        throw new DanglingEdgeError(
          node.name,
          next.name,
          `points at a node outside the graph (${next.name})`,
        );
      }
      if (!next.predecessors.includes(node)) {
        throw new DanglingEdgeError(
          node.name,
          next.name,
          `is missing from ${next.name}.predecessors`,
        );
      }
    }
    for (const prev of node.predecessors) {
      if (!members.has(prev)) {
        throw new DanglingEdgeError(
          prev.name,
          node.name,
          `points at a node outside the graph (${prev.name})`,
        );
      }
      if (!prev.successors.includes(node)) {
        throw new DanglingEdgeError(
          prev.name,
          node.name,
          `is missing from ${prev.name}.successors`,
        );
      }
    }
  }
}

/**
 * Every node object may be listed only once.
 */
export function checkDistinct(nodes: readonly GraphVertex[]): void {
  const seen = new Set<GraphVertex>();
  const repeated = new Set<GraphVertex>();
  for (const node of nodes) {
    if (seen.has(node)) {
      repeated.add(node);
    }
    seen.add(node);
  }
  if (repeated.size > 0) {
    throw new DuplicateNodeError(nodeNames(repeated));
  }
}

/**
 * Structural validation run before any sorting or execution.
 */
export function validateGraph<N extends GraphVertex>(
  nodes: readonly N[],
): GraphBoundaries<N> {
  checkDistinct(nodes);
  const boundaries = findBoundaries(nodes);
  checkEdges(nodes);
  return boundaries;
}
