export {
  type BacksubNode,
  type BacksubOps,
  connect,
  type ForwardOps,
  GraphNode,
  type GraphVertex,
  type NodeArguments,
  nodeNames,
  type PropMode,
  supportsBacksub,
} from "./core/graph-node";
export * from "./engine";
export * as toy from "./toy";
