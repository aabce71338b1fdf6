import type { NestedArray } from "./backend/types";
import * as numeric from "./backend/cpu/numeric";
import type { Generator } from "./core/rng";
import { Tensor, type TensorOptions } from "./tensor";

/**
 * Leaf tensor from nested data or an existing array. An NDArray is used as
 * the buffer directly (no copy).
 */
export function tensor(data: NestedArray | numeric.NDArray, options?: TensorOptions): Tensor {
  const array = data instanceof numeric.NDArray ? data : numeric.fromNested(data);
  return new Tensor(array, options);
}

export function tensorFromArray(
  values: readonly number[],
  shape: number[],
  options?: TensorOptions,
): Tensor {
  return new Tensor(numeric.fromArray(values, shape), options);
}

export function zeros(shape: number[], options?: TensorOptions): Tensor {
  return new Tensor(numeric.zeros(shape), options);
}

export function ones(shape: number[], options?: TensorOptions): Tensor {
  return new Tensor(numeric.ones(shape), options);
}

export function full(shape: number[], fillValue: number, options?: TensorOptions): Tensor {
  return new Tensor(numeric.full(shape, fillValue), options);
}

export function arange(end: number, start = 0, step = 1, options?: TensorOptions): Tensor {
  return new Tensor(numeric.arange(end, start, step), options);
}

/** Uniform samples in [0, 1) drawn from `generator`. */
export function rand(shape: number[], generator: Generator, options?: TensorOptions): Tensor {
  return new Tensor(generator.uniform(shape), options);
}

/** Standard normal samples drawn from `generator`. */
export function randn(shape: number[], generator: Generator, options?: TensorOptions): Tensor {
  return new Tensor(generator.normalArray(shape), options);
}
