import * as numeric from "../backend/cpu/numeric";
import { MissingBackwardRuleError } from "../core/errors";
import { normalizeDims } from "../core/shape";
import {
  indexOperands,
  type OpKind,
  type OpOptions,
  operand,
  type RawArg,
  requireOption,
} from "./recipe";
import { unbroadcast } from "./unbroadcast";

export type BackwardContext = {
  /** Accumulated gradient of the node's output. */
  grad: numeric.NDArray;
  /** The node's forward value. */
  out: numeric.NDArray;
  args: readonly RawArg[];
  options: Readonly<OpOptions>;
};

/** Computes one parent's contribution, shaped exactly like that parent. */
export type BackwardRule = (ctx: BackwardContext) => numeric.NDArray;

function swapLast(a: numeric.NDArray): numeric.NDArray {
  return numeric.transpose(a, { dim0: -2, dim1: -1 });
}

type MatmulParts = {
  a: numeric.NDArray;
  b: numeric.NDArray;
  a2: numeric.NDArray;
  b2: numeric.NDArray;
  g2: numeric.NDArray;
};

// Promote 1-D operands the way the forward pass does ((k) -> (1,k) on the
// left, (k) -> (k,1) on the right) and give the gradient the matching rank.
function matmulParts({ grad, args }: BackwardContext): MatmulParts {
  const a = operand(args, 0, "matmul");
  const b = operand(args, 1, "matmul");
  const a2 = a.ndim === 1 ? numeric.reshape(a, [1, a.shape[0]]) : a;
  const b2 = b.ndim === 1 ? numeric.reshape(b, [b.shape[0], 1]) : b;
  const gShape = grad.shape.slice();
  if (a.ndim === 1 && b.ndim === 1) {
    gShape.push(1, 1);
  } else if (a.ndim === 1) {
    gShape.splice(gShape.length - 1, 0, 1);
  } else if (b.ndim === 1) {
    gShape.push(1);
  }
  return { a, b, a2, b2, g2: numeric.reshape(grad, gShape) };
}

const rules: Readonly<Record<OpKind, readonly BackwardRule[]>> = {
  add: [
    ({ grad, args }) => unbroadcast(grad, operand(args, 0, "add").shape),
    ({ grad, args }) => unbroadcast(grad, operand(args, 1, "add").shape),
  ],
  sub: [
    ({ grad, args }) => unbroadcast(grad, operand(args, 0, "sub").shape),
    ({ grad, args }) => unbroadcast(numeric.neg(grad), operand(args, 1, "sub").shape),
  ],
  mul: [
    ({ grad, args }) => {
      const [a, b] = [operand(args, 0, "mul"), operand(args, 1, "mul")];
      return unbroadcast(numeric.mul(grad, b), a.shape);
    },
    ({ grad, args }) => {
      const [a, b] = [operand(args, 0, "mul"), operand(args, 1, "mul")];
      return unbroadcast(numeric.mul(grad, a), b.shape);
    },
  ],
  div: [
    ({ grad, args }) => {
      const [a, b] = [operand(args, 0, "div"), operand(args, 1, "div")];
      return unbroadcast(numeric.div(grad, b), a.shape);
    },
    ({ grad, args }) => {
      const [a, b] = [operand(args, 0, "div"), operand(args, 1, "div")];
      const scaled = numeric.div(numeric.mul(grad, a), numeric.mul(b, b));
      return unbroadcast(numeric.neg(scaled), b.shape);
    },
  ],
  neg: [({ grad }) => numeric.neg(grad)],
  // Ties route to the first operand.
  maximum: [
    ({ grad, args }) => {
      const [a, b] = [operand(args, 0, "maximum"), operand(args, 1, "maximum")];
      return unbroadcast(numeric.mul(grad, numeric.ge(a, b)), a.shape);
    },
    ({ grad, args }) => {
      const [a, b] = [operand(args, 0, "maximum"), operand(args, 1, "maximum")];
      return unbroadcast(numeric.mul(grad, numeric.lt(a, b)), b.shape);
    },
  ],
  exp: [({ grad, out }) => numeric.mul(grad, out)],
  log: [({ grad, args }) => numeric.div(grad, operand(args, 0, "log"))],
  matmul: [
    (ctx) => {
      const { a, a2, b2, g2 } = matmulParts(ctx);
      const ga = unbroadcast(numeric.matmul(g2, swapLast(b2)), a2.shape);
      return numeric.reshape(ga, a.shape);
    },
    (ctx) => {
      const { b, a2, b2, g2 } = matmulParts(ctx);
      const gb = unbroadcast(numeric.matmul(swapLast(a2), g2), b2.shape);
      return numeric.reshape(gb, b.shape);
    },
  ],
  // Restore every reduced axis as size 1, then broadcast back. This covers
  // keepdim true/false and dim given as null, a single axis or a list.
  sum: [
    ({ grad, args, options }) => {
      const input = operand(args, 0, "sum");
      const dims = normalizeDims(options.dim, input.ndim, "sum");
      const kept = numeric.reducedShape(input.shape, dims, true);
      return numeric.broadcastTo(numeric.reshape(grad, kept), input.shape).clone();
    },
  ],
  index: [
    ({ grad, args }) => {
      const input = operand(args, 0, "index");
      return numeric.scatterAddAt(numeric.zeros(input.shape), indexOperands(args), grad);
    },
  ],
  reshape: [
    ({ grad, args }) => numeric.reshape(grad, operand(args, 0, "reshape").shape).clone(),
  ],
  expand: [({ grad, args }) => unbroadcast(grad, operand(args, 0, "expand").shape)],
  permute: [
    ({ grad, options }) => {
      const dims = requireOption(options.dims, "permute", "dims");
      return numeric.permute(grad, numeric.invertPermutation(dims)).clone();
    },
  ],
};

/**
 * Backward rule for parent position `slot` of `op`.
 * Throws MissingBackwardRuleError when the pair has no rule.
 */
export function lookupBackwardRule(op: OpKind, slot: number): BackwardRule {
  const table: readonly BackwardRule[] | undefined = rules[op];
  const rule: BackwardRule | undefined = table === undefined ? undefined : table[slot];
  if (rule === undefined) {
    throw new MissingBackwardRuleError(op, slot);
  }
  return rule;
}
