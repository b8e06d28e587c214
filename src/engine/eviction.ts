/**
 * Reference-counted cache eviction.
 *
 * A table maps each node to the number of consumers that still have to read
 * its cache. Counts are seeded from the same edge lists that later drive the
 * decrements (one unit per list entry), so a duplicated edge such as `x * x`
 * is one use per entry and a count can never stay above zero once every
 * consumer has run. Boundary nodes have no consumer inside the traversal and
 * start at zero; the scheduler releases them once at the end, which takes
 * them to -1 and evicts them exactly once.
 */

import type { GraphVertex } from "../core/graph-node";

interface CountEntry<N> {
  node: N;
  remaining: number;
}

export class ReferenceCountTable<N extends GraphVertex> {
  private readonly entries = new Map<GraphVertex, CountEntry<N>>();
  private readonly evict: (node: N) => void;

  private constructor(nodes: readonly N[], evict: (node: N) => void) {
    this.evict = evict;
    for (const node of nodes) {
      this.entries.set(node, { node, remaining: 0 });
    }
  }

  /**
   * Forward direction: a node's consumers are the nodes listing it as a
   * predecessor. Release `node.predecessors` after each `forward()`.
   */
  static forward<N extends GraphVertex>(
    order: readonly N[],
    evict: (node: N) => void,
  ): ReferenceCountTable<N> {
    const table = new ReferenceCountTable(order, evict);
    for (const consumer of order) {
      table.retain(consumer.predecessors);
    }
    return table;
  }

  /**
   * Backward direction, scoped to one ancestor closure: a node's consumers
   * are the closure members listing it as a successor. Release
   * `node.successors` after each `backward()`.
   */
  static backward<N extends GraphVertex>(
    closure: readonly N[],
    evict: (node: N) => void,
  ): ReferenceCountTable<N> {
    const table = new ReferenceCountTable(closure, evict);
    for (const consumer of closure) {
      table.retain(consumer.successors);
    }
    return table;
  }

  private retain(uses: readonly GraphVertex[]): void {
    for (const used of uses) {
      const entry = this.entries.get(used);
      if (entry) {
        entry.remaining += 1;
      }
    }
  }

  /**
   * Record one read of each listed node. Nodes whose count drops to zero or
   * below are evicted and leave the table; nodes not in the table (already
   * evicted, or outside this closure) are skipped.
   */
  release(consumed: readonly GraphVertex[]): void {
    for (const used of consumed) {
      const entry = this.entries.get(used);
      if (!entry) {
        continue;
      }
      entry.remaining -= 1;
      if (entry.remaining <= 0) {
        this.entries.delete(used);
        this.evict(entry.node);
      }
    }
  }

  has(node: GraphVertex): boolean {
    return this.entries.has(node);
  }

  /**
   * Remaining uses, or undefined once the node has been evicted (or was never
   * tracked).
   */
  remaining(node: GraphVertex): number | undefined {
    return this.entries.get(node)?.remaining;
  }

  get size(): number {
    return this.entries.size;
  }
}
