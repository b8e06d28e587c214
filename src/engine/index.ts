export {
  DEFAULT_SORT_STRATEGY,
  type ModelEnvironment,
  type ModelOptions,
  readModelEnvironment,
  type ResolvedModelOptions,
  resolveModelOptions,
} from "./config";
export {
  BacksubUnsupportedError,
  CycleDetectedError,
  DanglingEdgeError,
  DuplicateNodeError,
  GraphStructureError,
  type GraphStructureErrorKind,
  ModelConfigurationError,
  MultipleInputsError,
  MultipleOutputsError,
  NoInputError,
  NoOutputError,
  SharedStateMismatchError,
  UnknownStrategyError,
} from "./engine-errors";
export { ReferenceCountTable } from "./eviction";
export { createModel, Model } from "./model";
export { reverseGraph, swapEdges } from "./reverse";
export { ReversedModel, type ReversedModelOptions } from "./reversed-model";
export {
  ancestorClosure,
  ancestorClosures,
  isSortStrategy,
  memberIndex,
  SORT_STRATEGIES,
  type SortStrategy,
  sortDeepFirst,
  sortWideFirst,
  topologicalSort,
} from "./topo-sort";
export { formatTraceEvent, type TraceEvent, TraceRecorder } from "./trace";
export { checkDistinct, checkEdges, findBoundaries, type GraphBoundaries, validateGraph } from "./validate";
