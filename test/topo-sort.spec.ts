import { describe, expect, it } from "vitest";
import {
  ancestorClosures,
  CycleDetectedError,
  isSortStrategy,
  sortDeepFirst,
  sortWideFirst,
  topologicalSort,
  UnknownStrategyError,
} from "../src";
import { buildGraph, DIAMOND_EDGES, names } from "./helpers/graph";

const CHAIN_EDGES: [string, string][] = [
  ["A", "B"],
  ["B", "C"],
  ["C", "D"],
];

function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}

describe("topological sort", () => {
  it("orders a chain the same way under both strategies, whatever the input order", () => {
    const { node } = buildGraph(["A", "B", "C", "D"], CHAIN_EDGES);
    const shuffled = [node("C"), node("A"), node("D"), node("B")];
    expect(names(sortWideFirst(shuffled))).toEqual(["A", "B", "C", "D"]);
    expect(names(sortDeepFirst(shuffled))).toEqual(["A", "B", "C", "D"]);
  });

  it("runs both diamond branches before the join wide-first", () => {
    const { nodes } = buildGraph(["A", "B", "C", "D"], DIAMOND_EDGES);
    expect(names(topologicalSort(nodes, "wide-first"))).toEqual([
      "A",
      "B",
      "C",
      "D",
    ]);
  });

  it("reverses the DFS post-order deep-first", () => {
    const { nodes } = buildGraph(["A", "B", "C", "D"], DIAMOND_EDGES);
    expect(names(topologicalSort(nodes, "deep-first"))).toEqual([
      "A",
      "C",
      "B",
      "D",
    ]);
  });

  it("treats a duplicated edge as one dependency", () => {
    const { nodes } = buildGraph(
      ["A", "B", "C"],
      [
        ["A", "B"],
        ["A", "B"],
        ["B", "C"],
      ],
    );
    expect(names(sortWideFirst(nodes))).toEqual(["A", "B", "C"]);
    expect(names(sortDeepFirst(nodes))).toEqual(["A", "B", "C"]);
  });

  it("reports the nodes a two-node cycle leaves unordered", () => {
    const { nodes } = buildGraph(
      ["S", "A", "B", "T"],
      [
        ["S", "A"],
        ["A", "B"],
        ["B", "A"],
        ["B", "T"],
      ],
    );
    const wide = catchError(() => sortWideFirst(nodes));
    expect(wide).toBeInstanceOf(CycleDetectedError);
    if (wide instanceof CycleDetectedError) {
      expect(wide.nodeNames).toEqual(["A", "B", "T"]);
      expect(wide.message).toBe(
        "Graph has a cycle, cannot perform topological sort: 3 of 4 nodes could not be ordered (A, B, T)",
      );
    }

    const deep = catchError(() => sortDeepFirst(nodes));
    expect(deep).toBeInstanceOf(CycleDetectedError);
    if (deep instanceof CycleDetectedError) {
      expect(deep.nodeNames).toEqual(["A", "B"]);
      expect(deep.message).toBe(
        "Graph has a cycle, cannot perform topological sort: edge B -> A closes the cycle A -> B -> A",
      );
    }
  });

  it("detects a three-node cycle under both strategies", () => {
    const { nodes } = buildGraph(
      ["S", "A", "B", "C", "T"],
      [
        ["S", "A"],
        ["A", "B"],
        ["B", "C"],
        ["C", "A"],
        ["C", "T"],
      ],
    );
    expect(() => sortWideFirst(nodes)).toThrow(CycleDetectedError);
    const deep = catchError(() => sortDeepFirst(nodes));
    expect(deep).toBeInstanceOf(CycleDetectedError);
    if (deep instanceof CycleDetectedError) {
      expect(deep.nodeNames).toEqual(["A", "B", "C"]);
    }
  });

  it("detects a self-loop", () => {
    const { nodes } = buildGraph(
      ["S", "A", "T"],
      [
        ["S", "A"],
        ["A", "A"],
        ["A", "T"],
      ],
    );
    const wide = catchError(() => sortWideFirst(nodes));
    expect(wide).toBeInstanceOf(CycleDetectedError);
    if (wide instanceof CycleDetectedError) {
      expect(wide.nodeNames).toEqual(["A", "T"]);
    }
    const deep = catchError(() => sortDeepFirst(nodes));
    expect(deep).toBeInstanceOf(CycleDetectedError);
    if (deep instanceof CycleDetectedError) {
      expect(deep.message).toBe(
        "Graph has a cycle, cannot perform topological sort: edge A -> A closes the cycle A -> A",
      );
    }
  });

  it("rejects an unknown strategy name", () => {
    const { nodes } = buildGraph(["A", "B"], [["A", "B"]]);
    const error = catchError(() => topologicalSort(nodes, "sideways"));
    expect(error).toBeInstanceOf(UnknownStrategyError);
    if (error instanceof UnknownStrategyError) {
      expect(error.strategy).toBe("sideways");
    }
    expect(isSortStrategy("deep-first")).toBe(true);
    expect(isSortStrategy("depth-first")).toBe(false);
  });
});

describe("ancestor closures", () => {
  it("lists every ancestor source-first with the node itself last", () => {
    const { nodes, node } = buildGraph(["A", "B", "C", "D"], DIAMOND_EDGES);
    const closures = ancestorClosures(nodes);
    expect(names(closures.get(node("A")) ?? [])).toEqual(["A"]);
    expect(names(closures.get(node("B")) ?? [])).toEqual(["A", "B"]);
    expect(names(closures.get(node("C")) ?? [])).toEqual(["A", "C"]);
    expect(names(closures.get(node("D")) ?? [])).toEqual(["A", "B", "C", "D"]);
  });

  it("visits a duplicated predecessor once", () => {
    const { nodes, node } = buildGraph(
      ["A", "B"],
      [
        ["A", "B"],
        ["A", "B"],
      ],
    );
    expect(names(ancestorClosures(nodes).get(node("B")) ?? [])).toEqual([
      "A",
      "B",
    ]);
  });
});
