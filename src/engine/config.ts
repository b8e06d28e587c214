/**
 * Model options and their environment defaults.
 *
 *   PROPDAG_SORT_STRATEGY=deep-first   default sort strategy
 *   PROPDAG_EVICT=0                    keep every cache entry for the whole run
 *   PROPDAG_VERBOSE=1                  print trace events with console.log
 *
 * Explicit options always win over the environment.
 */

import type { NodeArguments } from "../core/graph-node";
import { UnknownStrategyError } from "./engine-errors";
import { isSortStrategy, type SortStrategy } from "./topo-sort";
import type { TraceRecorder } from "./trace";

export interface ModelOptions {
  /** Accepts any string so that callers passing user input get an UnknownStrategyError. */
  sortStrategy?: SortStrategy | string;
  /** Run back-substitution after each node. Defaults to `args.propMode === "backward"`. */
  backsub?: boolean;
  evictCaches?: boolean;
  verbose?: boolean;
  /** Receives every event; the caller decides when to clear it. */
  trace?: TraceRecorder;
}

export interface ResolvedModelOptions {
  sortStrategy: SortStrategy;
  backsub: boolean;
  evictCaches: boolean;
  verbose: boolean;
}

export interface ModelEnvironment {
  PROPDAG_SORT_STRATEGY?: string;
  PROPDAG_EVICT?: string;
  PROPDAG_VERBOSE?: string;
}

export const DEFAULT_SORT_STRATEGY: SortStrategy = "wide-first";

export function readModelEnvironment(): ModelEnvironment {
  // Outside Node there is no process.env
  if (typeof process === "undefined") {
    return {};
  }
  return {
    PROPDAG_SORT_STRATEGY: process.env.PROPDAG_SORT_STRATEGY,
    PROPDAG_EVICT: process.env.PROPDAG_EVICT,
    PROPDAG_VERBOSE: process.env.PROPDAG_VERBOSE,
  };
}

function flagEnabled(raw: string | undefined): boolean {
  return raw !== undefined && raw !== "" && raw !== "0";
}

export function resolveModelOptions(
  options: ModelOptions,
  args: NodeArguments,
  env: ModelEnvironment = readModelEnvironment(),
): ResolvedModelOptions {
  const requested =
    options.sortStrategy ?? env.PROPDAG_SORT_STRATEGY ?? DEFAULT_SORT_STRATEGY;
  if (!isSortStrategy(requested)) {
    throw new UnknownStrategyError(requested);
  }
  return {
    sortStrategy: requested,
    backsub: options.backsub ?? args.propMode === "backward",
    evictCaches: options.evictCaches ?? env.PROPDAG_EVICT !== "0",
    verbose: options.verbose ?? flagEnabled(env.PROPDAG_VERBOSE),
  };
}
