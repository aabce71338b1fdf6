import type { NDArray } from "../backend/cpu/numeric";
import { Tensor } from "../tensor";
import { createRecipe, type OpKind, type OpOptions, type RawArg } from "./recipe";

/** Anything an op accepts positionally. Tensors become graph parents. */
export type OpArg = Tensor | NDArray | number;

export type ForwardFn = (args: readonly RawArg[], options: OpOptions) => NDArray;

export type WrappedOp = (args: readonly OpArg[], options?: OpOptions) => Tensor;

/**
 * Lift an array function into a Tensor function that records a Recipe.
 *
 * The result always has `requiresGrad = true`. When `forward` returns a view
 * of one of its operands (reshape, permute, broadcast) the result is copied
 * so the new Tensor owns its buffer.
 *
 * Backward uses the rules registered for `op`, so `forward` must compute the
 * function those rules differentiate, for every slot a Tensor can occupy.
 * Nothing checks this; a mismatched forward yields wrong gradients.
 */
export function defineOp(op: OpKind, forward: ForwardFn): WrappedOp {
  return (args, options = {}) => {
    const raw: RawArg[] = [];
    const parents = new Map<number, Tensor>();
    args.forEach((arg, slot) => {
      if (arg instanceof Tensor) {
        parents.set(slot, arg);
        raw.push(arg.array);
      } else {
        raw.push(arg);
      }
    });

    let result = forward(raw, options);
    if (raw.some((arg) => typeof arg !== "number" && arg.data === result.data)) {
      result = result.clone();
    }
    return Tensor._fromRecipe(result, createRecipe(op, raw, options, parents));
  };
}
