import type { SumOptions } from "./backend/types";
import * as ops from "./autograd/ops";
import type { OpArg } from "./autograd/wrap";
import type { IndexKey, Tensor } from "./tensor";

// Free-function forms of the Tensor methods. Either operand of a binary op
// may be a plain number or array.

export function add(a: OpArg, b: OpArg): Tensor {
  return ops.add([a, b]);
}

export function sub(a: OpArg, b: OpArg): Tensor {
  return ops.sub([a, b]);
}

export function mul(a: OpArg, b: OpArg): Tensor {
  return ops.mul([a, b]);
}

export function div(a: OpArg, b: OpArg): Tensor {
  return ops.div([a, b]);
}

export function maximum(a: OpArg, b: OpArg): Tensor {
  return ops.maximum([a, b]);
}

export function matmul(a: OpArg, b: OpArg): Tensor {
  return ops.matmul([a, b]);
}

export function neg(a: Tensor): Tensor {
  return a.neg();
}

export function exp(a: Tensor): Tensor {
  return a.exp();
}

export function log(a: Tensor): Tensor {
  return a.log();
}

export function sum(a: Tensor, options?: SumOptions): Tensor {
  return a.sum(options);
}

export function mean(a: Tensor, options?: SumOptions): Tensor {
  return a.mean(options);
}

export function index(a: Tensor, ...keys: IndexKey[]): Tensor {
  return a.index(...keys);
}

export function reshape(a: Tensor, shape: number[]): Tensor {
  return a.reshape(shape);
}

export function expand(a: Tensor, shape: number[]): Tensor {
  return a.expand(shape);
}

export function permute(a: Tensor, dims: number[]): Tensor {
  return a.permute(dims);
}

export function transpose(a: Tensor, dim0 = -2, dim1 = -1): Tensor {
  return a.transpose(dim0, dim1);
}
