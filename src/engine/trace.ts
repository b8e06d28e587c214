import type { SortStrategy } from "./topo-sort";

export type TraceEvent =
  | {
      type: "sort";
      strategy: SortStrategy;
      order: string[];
    }
  | {
      type: "run_begin";
      nodeCount: number;
      backsub: boolean;
      evictCaches: boolean;
    }
  | {
      type: "forward";
      node: string;
      step: number;
    }
  | {
      type: "backsub_begin";
      node: string;
      closureSize: number;
    }
  | {
      type: "backward";
      node: string;
      target: string;
    }
  | {
      type: "backsub_end";
      node: string;
    }
  | {
      type: "evict_forward";
      node: string;
    }
  | {
      type: "evict_backward";
      node: string;
      target: string;
    }
  | {
      type: "run_end";
    };

export class TraceRecorder {
  private readonly events: TraceEvent[] = [];

  record(event: TraceEvent): void {
    this.events.push(event);
  }

  snapshot(): TraceEvent[] {
    return this.events.slice();
  }

  clear(): void {
    this.events.length = 0;
  }
}

/**
 * One-line rendering used by verbose mode.
 */
export function formatTraceEvent(event: TraceEvent): string {
  switch (event.type) {
    case "sort":
      return `[sort:${event.strategy}] ${event.order.join(" -> ")}`;
    case "run_begin":
      return `[run] ${event.nodeCount} nodes (backsub=${event.backsub}, evict=${event.evictCaches})`;
    case "forward":
      return `[forward] ${event.node} (step ${event.step})`;
    case "backsub_begin":
      return `[backsub] ${event.node} (${event.closureSize} nodes)`;
    case "backward":
      return `  [backward] ${event.node} -> ${event.target}`;
    case "backsub_end":
      return `[backsub:done] ${event.node}`;
    case "evict_forward":
      return `[evict:forward] ${event.node}`;
    case "evict_backward":
      return `  [evict:backward] ${event.node} (for ${event.target})`;
    case "run_end":
      return "[run:done]";
  }
}
