import { type NDArray, sum } from "../backend/cpu/numeric";
import { shapesEqual } from "../core/shape";

/**
 * Reduce a gradient shaped like a broadcast result back to `shape`.
 *
 * Leading axes that broadcasting prepended are summed away, then axes where
 * `shape` has size 1 are summed with keepdim.
 */
export function unbroadcast(grad: NDArray, shape: readonly number[]): NDArray {
  if (shapesEqual(grad.shape, shape)) {
    return grad;
  }
  const extra = grad.ndim - shape.length;
  if (extra < 0) {
    throw new Error(`Cannot unbroadcast gradient of shape [${grad.shape}] to [${shape}]`);
  }

  let reduced = grad;
  if (extra > 0) {
    reduced = sum(reduced, { dim: Array.from({ length: extra }, (_, axis) => axis) });
  }

  const keep: number[] = [];
  for (let axis = 0; axis < shape.length; axis += 1) {
    if (shape[axis] === reduced.shape[axis]) continue;
    if (shape[axis] !== 1) {
      throw new Error(`Cannot unbroadcast gradient of shape [${grad.shape}] to [${shape}]`);
    }
    keep.push(axis);
  }
  if (keep.length > 0) {
    reduced = sum(reduced, { dim: keep, keepdim: true });
  }
  return reduced;
}
