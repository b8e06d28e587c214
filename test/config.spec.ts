import { describe, expect, it } from "vitest";
import {
  DEFAULT_SORT_STRATEGY,
  resolveModelOptions,
  UnknownStrategyError,
} from "../src";

describe("resolveModelOptions", () => {
  it("falls back to the defaults with an empty environment", () => {
    expect(resolveModelOptions({}, {}, {})).toEqual({
      sortStrategy: DEFAULT_SORT_STRATEGY,
      backsub: false,
      evictCaches: true,
      verbose: false,
    });
  });

  it("reads the environment", () => {
    expect(
      resolveModelOptions(
        {},
        {},
        {
          PROPDAG_SORT_STRATEGY: "deep-first",
          PROPDAG_EVICT: "0",
          PROPDAG_VERBOSE: "1",
        },
      ),
    ).toEqual({
      sortStrategy: "deep-first",
      backsub: false,
      evictCaches: false,
      verbose: true,
    });
  });

  it("prefers explicit options over the environment", () => {
    const resolved = resolveModelOptions(
      { sortStrategy: "wide-first", evictCaches: true, verbose: false },
      {},
      {
        PROPDAG_SORT_STRATEGY: "deep-first",
        PROPDAG_EVICT: "0",
        PROPDAG_VERBOSE: "1",
      },
    );
    expect(resolved.sortStrategy).toBe("wide-first");
    expect(resolved.evictCaches).toBe(true);
    expect(resolved.verbose).toBe(false);
  });

  it("treats an empty or zero verbose flag as off", () => {
    expect(resolveModelOptions({}, {}, { PROPDAG_VERBOSE: "" }).verbose).toBe(
      false,
    );
    expect(resolveModelOptions({}, {}, { PROPDAG_VERBOSE: "0" }).verbose).toBe(
      false,
    );
  });

  it("enables back-substitution for backward propagation", () => {
    expect(resolveModelOptions({}, { propMode: "backward" }, {}).backsub).toBe(
      true,
    );
    expect(
      resolveModelOptions({ backsub: false }, { propMode: "backward" }, {})
        .backsub,
    ).toBe(false);
  });

  it("rejects an unknown strategy from the environment", () => {
    expect(() =>
      resolveModelOptions({}, {}, { PROPDAG_SORT_STRATEGY: "breadth" }),
    ).toThrow(UnknownStrategyError);
    expect(() =>
      resolveModelOptions({}, {}, { PROPDAG_SORT_STRATEGY: "breadth" }),
    ).toThrow('Unknown sort strategy "breadth" (expected "wide-first" or "deep-first")');
  });
});
