#!/usr/bin/env npx tsx
/**
 * Runs the toy node family over a small residual block.
 *
 *   npx tsx examples/toy-run.ts [wide-first|deep-first]
 *
 * Set PROPDAG_VERBOSE=1 to print every scheduling step.
 */

import { connect, type GraphVertex, Model, ReversedModel } from "../src";
import {
  BacksubToyNode,
  createToyArguments,
  ReversedToyNode,
  ToyCache,
} from "../src/toy";

const strategy = process.argv[2] ?? "wide-first";

//        +-> conv -> relu -+
// input -+                 +-> add -> output
//        +-----------------+
const layers = ["input", "conv", "relu", "add", "output"];
const edges: [string, string][] = [
  ["input", "conv"],
  ["conv", "relu"],
  ["relu", "add"],
  ["input", "add"],
  ["add", "output"],
];

function wire(nodes: readonly GraphVertex[]): void {
  const byName = new Map<string, GraphVertex>(
    nodes.map((node): [string, GraphVertex] => [node.name, node]),
  );
  for (const [from, to] of edges) {
    const a = byName.get(from);
    const b = byName.get(to);
    if (!a || !b) {
      throw new Error(`unknown layer in edge ${from} -> ${to}`);
    }
    connect(a, b);
  }
}

const forwardCache = new ToyCache();
const backsubArgs = createToyArguments("backward");
const backsubNodes = layers.map(
  (name) => new BacksubToyNode(name, forwardCache, backsubArgs),
);
wire(backsubNodes);
forwardCache.bounds.set("input", "input bounds");

const model = new Model(backsubNodes, { sortStrategy: strategy });
model.run();
console.log(`order (${model.sortStrategy}): ${model.nodes.map((n) => n.name).join(" -> ")}`);
console.log("bounds after back-substitution:", Object.fromEntries(forwardCache.bounds));

const reversedCache = new ToyCache();
for (const [name, value] of forwardCache.bounds) {
  reversedCache.forwardBounds.set(name, value);
}
const reversedArgs = createToyArguments("backward");
const reversedNodes = layers.map(
  (name) => new ReversedToyNode(name, reversedCache, reversedArgs),
);
wire(reversedNodes);

const reversed = new ReversedModel(reversedNodes, { sortStrategy: strategy });
reversed.run();
console.log(`reversed order: ${reversed.nodes.map((n) => n.name).join(" -> ")}`);
console.log("bounds after reversed run:", Object.fromEntries(reversedCache.bounds));
