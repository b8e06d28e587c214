import type { NodeArguments, PropMode } from "../core/graph-node";

/**
 * Shared cache of the toy node family. Values are placeholder strings keyed
 * by node name; `events` logs what each node did, in order.
 */
export class ToyCache {
  /** Name of the node whose bounds are currently being computed. */
  currentNode: string | null = null;
  readonly bounds = new Map<string, string>();
  readonly symbolicBounds = new Map<string, string>();
  readonly relaxations = new Map<string, string>();
  /** Bounds from an earlier forward pass, intersected by reversed nodes. */
  readonly forwardBounds = new Map<string, string>();
  readonly events: string[] = [];

  log(node: string, action: string): void {
    this.events.push(`${node}:${action}`);
  }
}

export interface ToyArguments extends NodeArguments {
  readonly propMode: PropMode;
}

export function createToyArguments(propMode: PropMode = "forward"): ToyArguments {
  return Object.freeze({ propMode });
}
