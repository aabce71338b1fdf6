import { addInPlace, copyInPlace, NDArray, ones } from "../backend/cpu/numeric";
import { debugLog } from "../core/debug";
import { GradientShapeError } from "../core/errors";
import { shapesEqual } from "../core/shape";
import type { Tensor } from "../tensor";
import { topologicalSort } from "./graph";
import { lookupBackwardRule } from "./rules";

/**
 * Reverse-mode pass from `root`.
 *
 * `root.grad` is overwritten with `seed` (ones when omitted); every other
 * reachable tensor's `grad` is accumulated into, so calling this twice
 * without zeroing sums both passes.
 */
export function backward(root: Tensor, seed?: NDArray | Tensor): void {
  const order = topologicalSort(root);

  // Fail before touching any gradient buffer.
  let internal = 0;
  for (const node of order) {
    const recipe = node.recipe;
    if (node.isLeaf || recipe === null) continue;
    internal += 1;
    for (const slot of recipe.parents.keys()) {
      lookupBackwardRule(recipe.op, slot);
    }
  }

  const seedArray =
    seed === undefined ? ones(root.shape) : seed instanceof NDArray ? seed : seed.array;
  if (!shapesEqual(seedArray.shape, root.shape)) {
    throw new GradientShapeError(
      `Seed gradient shape [${seedArray.shape}] does not match root shape [${root.shape}]`,
    );
  }

  // Restore every buffer if a contribution fails part way through.
  const saved = order.map((node) => node.grad.clone());
  try {
    copyInPlace(root.grad, seedArray);
    propagate(order);
  } catch (error) {
    order.forEach((node, i) => copyInPlace(node.grad, saved[i]));
    throw error;
  }

  debugLog("backward", `${order.length} nodes, ${internal} with recipes`);
}

function propagate(order: readonly Tensor[]): void {
  for (let i = order.length - 1; i >= 0; i -= 1) {
    const node = order[i];
    const recipe = node.recipe;
    if (node.isLeaf || recipe === null) continue;
    for (const [slot, parent] of recipe.parents) {
      const rule = lookupBackwardRule(recipe.op, slot);
      const contribution = rule({
        grad: node.grad,
        out: node.array,
        args: recipe.args,
        options: recipe.options,
      });
      if (!shapesEqual(contribution.shape, parent.shape)) {
        throw new GradientShapeError(
          `${recipe.op} gradient for slot ${slot} has shape [${contribution.shape}], expected [${parent.shape}]`,
        );
      }
      addInPlace(parent.grad, contribution);
    }
  }
}
