import { GraphNode } from "../core/graph-node";
import type { ToyArguments, ToyCache } from "./toy-cache";

/**
 * Forward bound propagation: each node combines its predecessors' symbolic
 * bounds and concretizes them. The input's bounds are supplied by the caller.
 */
export class ForwardToyNode extends GraphNode<ToyCache, ToyArguments> {
  forward(): void {
    if (this.isSource) {
      if (!this.cache.bounds.has(this.name)) {
        throw new Error(`Input bounds not set for ${this.name}`);
      }
      this.cache.log(this.name, "skip-input");
      return;
    }

    this.cache.currentNode = this.name;
    this.cache.relaxations.set(this.name, "relaxation");
    const sources = [...new Set(this.predecessors.map((node) => node.name))];
    this.cache.symbolicBounds.set(
      this.name,
      `symbolic bounds from ${sources.join(", ")}`,
    );
    this.cache.bounds.set(this.name, "scalar bounds");
    this.cache.log(this.name, "forward");
  }

  evictForwardCache(): void {
    // Input and output bounds are the result of the run.
    if (!this.isSource && !this.isSink) {
      this.cache.bounds.delete(this.name);
    }
    this.cache.symbolicBounds.delete(this.name);
    this.cache.relaxations.delete(this.name);
    this.cache.log(this.name, "evict-forward");
  }
}
