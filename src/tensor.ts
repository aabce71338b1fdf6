import type { NestedArray, SumOptions } from "./backend/types";
import { fromArray, NDArray, fillInPlace, scalar, zeros } from "./backend/cpu/numeric";
import { backward } from "./autograd/backward";
import * as ops from "./autograd/ops";
import type { Recipe } from "./autograd/recipe";
import type { OpArg } from "./autograd/wrap";
import { RankError, ScalarConversionError } from "./core/errors";
import { normalizeDim, normalizeDims } from "./core/shape";

export type TensorOptions = {
  /** Accumulate a gradient for this tensor during backward. Default: false */
  requiresGrad?: boolean;
};

/**
 * One index key. Integers select a position, lists and arrays select
 * several; a Tensor key contributes its values only and is not a graph
 * parent.
 */
export type IndexKey = number | readonly number[] | NDArray | Tensor;

export class Tensor {
  /**
   * Value buffer. Not copied on construction, so tensors built from the same
   * NDArray alias each other. Optimizers write it in place.
   */
  readonly array: NDArray;
  requiresGrad: boolean;
  /** Same shape as `array`. Only ever written in place. */
  readonly grad: NDArray;
  private recipeValue: Recipe | null = null;

  constructor(array: NDArray, options?: TensorOptions) {
    this.array = array;
    this.requiresGrad = options?.requiresGrad ?? false;
    this.grad = zeros(array.shape);
  }

  /** @internal Used by defineOp to attach provenance. */
  static _fromRecipe(array: NDArray, recipe: Recipe): Tensor {
    const out = new Tensor(array, { requiresGrad: true });
    out.recipeValue = recipe;
    return out;
  }

  get recipe(): Recipe | null {
    return this.recipeValue;
  }

  get isLeaf(): boolean {
    return (
      !this.requiresGrad ||
      this.recipeValue === null ||
      this.recipeValue.parents.size === 0
    );
  }

  get shape(): number[] {
    return this.array.shape.slice();
  }

  get ndim(): number {
    return this.array.ndim;
  }

  get size(): number {
    return this.array.size;
  }

  get length(): number {
    if (this.array.ndim === 0) {
      throw new RankError("length of a 0-d tensor is undefined");
    }
    return this.array.shape[0];
  }

  item(): number {
    if (this.size !== 1) {
      throw new ScalarConversionError(
        `Only one-element tensors can be converted to a number, got shape [${this.shape}]`,
      );
    }
    return this.array.toArray()[0];
  }

  toBoolean(): boolean {
    if (this.size !== 1) {
      throw new ScalarConversionError(
        `Truth value of a tensor with ${this.size} elements is ambiguous`,
      );
    }
    return this.item() !== 0;
  }

  toArray(): number[] {
    return this.array.toArray();
  }

  toNested(): NestedArray {
    return this.array.toNested();
  }

  [Symbol.toPrimitive](hint: string): number | string {
    if (hint === "string") {
      return this.toString();
    }
    return this.item();
  }

  valueOf(): number {
    return this.item();
  }

  toString(): string {
    const flag = this.requiresGrad ? ", requiresGrad=true" : "";
    return `Tensor(${JSON.stringify(this.toNested())}, shape=[${this.shape.join(", ")}]${flag})`;
  }

  add(other: OpArg): Tensor {
    return ops.add([this, other]);
  }

  sub(other: OpArg): Tensor {
    return ops.sub([this, other]);
  }

  mul(other: OpArg): Tensor {
    return ops.mul([this, other]);
  }

  div(other: OpArg): Tensor {
    return ops.div([this, other]);
  }

  neg(): Tensor {
    return ops.neg([this]);
  }

  maximum(other: OpArg): Tensor {
    return ops.maximum([this, other]);
  }

  exp(): Tensor {
    return ops.exp([this]);
  }

  log(): Tensor {
    return ops.log([this]);
  }

  matmul(other: OpArg): Tensor {
    return ops.matmul([this, other]);
  }

  sum(options?: SumOptions): Tensor {
    return ops.sum([this], { dim: options?.dim ?? null, keepdim: options?.keepdim ?? false });
  }

  /**
   * `sum / count`, where count is the product of the reduced axis lengths.
   * Reducing an empty axis divides 0 by 0 and gives NaN.
   */
  mean(options?: SumOptions): Tensor {
    const count = normalizeDims(options?.dim, this.ndim, "mean").reduce(
      (acc, axis) => acc * this.shape[axis],
      1,
    );
    return this.sum(options).div(count);
  }

  /**
   * Advanced indexing over the leading axes. `x.index([0, 0, 1])` gathers
   * rows; `x.index(rows, cols)` pairs up positions after broadcasting the
   * keys against each other.
   */
  index(...keys: IndexKey[]): Tensor {
    return ops.index([this, ...keys.map(toIndexArray)]);
  }

  reshape(shape: number[]): Tensor {
    return ops.reshape([this], { shape });
  }

  /** Broadcast to `shape`; -1 keeps the existing size. */
  expand(shape: number[]): Tensor {
    return ops.expand([this], { shape });
  }

  permute(dims: number[]): Tensor {
    return ops.permute([this], { dims });
  }

  transpose(dim0 = -2, dim1 = -1): Tensor {
    const rank = this.ndim;
    const dims = Array.from({ length: rank }, (_, axis) => axis);
    const a = normalizeDim(dim0, rank);
    const b = normalizeDim(dim1, rank);
    [dims[a], dims[b]] = [dims[b], dims[a]];
    return this.permute(dims);
  }

  /** All axes reversed. */
  get T(): Tensor {
    return this.permute(Array.from({ length: this.ndim }, (_, axis) => this.ndim - 1 - axis));
  }

  backward(seed?: NDArray | Tensor): void {
    backward(this, seed);
  }

  zeroGrad(): void {
    fillInPlace(this.grad, 0);
  }

  /** New leaf sharing this tensor's buffer, without a recipe. */
  detach(): Tensor {
    return new Tensor(this.array);
  }
}

function toIndexArray(key: IndexKey): NDArray {
  if (typeof key === "number") {
    return scalar(key);
  }
  if (key instanceof NDArray) {
    return key;
  }
  if (key instanceof Tensor) {
    return key.array;
  }
  return fromArray(key, [key.length]);
}
