// Tensor first: the op wrappers depend on it being initialized.
export { type IndexKey, Tensor, type TensorOptions } from "./tensor";
export {
  arange,
  full,
  ones,
  rand,
  randn,
  tensor,
  tensorFromArray,
  zeros,
} from "./creation";
export {
  add,
  div,
  exp,
  expand,
  index,
  log,
  matmul,
  maximum,
  mean,
  mul,
  neg,
  permute,
  reshape,
  sub,
  sum,
  transpose,
} from "./functional";
export { backward } from "./autograd/backward";
export { collectGraph, type GraphInfo, graphParents, topologicalSort } from "./autograd/graph";
export {
  createRecipe,
  OP_KINDS,
  type OpKind,
  type OpOptions,
  type RawArg,
  type Recipe,
} from "./autograd/recipe";
export { type BackwardContext, type BackwardRule, lookupBackwardRule } from "./autograd/rules";
export { unbroadcast } from "./autograd/unbroadcast";
export { defineOp, type ForwardFn, type OpArg, type WrappedOp } from "./autograd/wrap";
export { NDArray } from "./backend/cpu/numeric";
export type { NestedArray, SumOptions } from "./backend/types";
export {
  DEFAULT_CONFIG,
  getConfig,
  loadConfig,
  type RecipegradConfig,
  setConfig,
  type SnapshotMode,
  withConfig,
} from "./core/config";
export { debugLog, isDebugEnabled } from "./core/debug";
export {
  ConfigError,
  GradientShapeError,
  GraphCycleError,
  IndexError,
  MissingBackwardRuleError,
  RankError,
  ScalarConversionError,
} from "./core/errors";
export { Generator } from "./core/rng";
export {
  gradcheck,
  type GradcheckMismatch,
  type GradcheckOptions,
  type GradcheckResult,
} from "./gradcheck";
export * as numeric from "./backend/cpu/numeric";
export * as nn from "./nn";
export { SGD, type SGDOptions } from "./optim";
