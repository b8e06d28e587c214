import { type BacksubOps, GraphNode } from "../core/graph-node";
import type { ToyArguments, ToyCache } from "./toy-cache";

/**
 * Back-substitution: forward() prepares relaxations and initial symbolic
 * bounds; backward() substitutes them back towards the input and writes the
 * concrete bounds of the node currently being bounded.
 */
export class BacksubToyNode
  extends GraphNode<ToyCache, ToyArguments>
  implements BacksubOps
{
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
    this.cache.symbolicBounds.set(this.name, "initial symbolic bounds");
    this.cache.log(this.name, "forward");
  }

  backward(): void {
    const target = this.cache.currentNode;
    if (target === null) {
      throw new Error(
        `${this.name}.backward() called before any node set cache.currentNode`,
      );
    }
    this.cache.symbolicBounds.set(
      this.name,
      target === this.name ? "initial symbolic bounds" : `substituted for ${target}`,
    );
    this.cache.bounds.set(target, "scalar bounds");
    this.cache.log(this.name, `backward(${target})`);
  }

  evictForwardCache(): void {
    if (!this.isSource && !this.isSink) {
      this.cache.bounds.delete(this.name);
    }
    this.cache.relaxations.delete(this.name);
    this.cache.log(this.name, "evict-forward");
  }

  evictBackwardCache(): void {
    this.cache.symbolicBounds.delete(this.name);
    this.cache.log(this.name, "evict-backward");
  }
}
