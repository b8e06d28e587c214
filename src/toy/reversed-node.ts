import { GraphNode } from "../core/graph-node";
import type { ToyArguments, ToyCache } from "./toy-cache";

/**
 * Node for a reversed graph: forward() runs from the user's output towards
 * the user's input, so predecessors here are the user's successors.
 */
export class ReversedToyNode extends GraphNode<ToyCache, ToyArguments> {
  forward(): void {
    if (this.isSource) {
      this.cache.bounds.set(this.name, "output constraint bounds");
      this.cache.log(this.name, "init-output");
      return;
    }

    this.cache.currentNode = this.name;
    this.cache.relaxations.set(this.name, "inverse relaxation");
    const sources = [...new Set(this.predecessors.map((node) => node.name))];
    this.cache.bounds.set(
      this.name,
      `propagated bounds from ${sources.join(", ")}`,
    );
    if (this.cache.forwardBounds.has(this.name)) {
      this.cache.bounds.set(this.name, "tightened bounds");
    }
    this.cache.log(this.name, "forward");
  }

  evictForwardCache(): void {
    if (!this.isSource && !this.isSink) {
      this.cache.bounds.delete(this.name);
    }
    this.cache.relaxations.delete(this.name);
    this.cache.log(this.name, "evict-forward");
  }
}
