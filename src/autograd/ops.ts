import * as numeric from "../backend/cpu/numeric";
import { normalizeDim } from "../core/shape";
import { indexOperands, operand, requireOption } from "./recipe";
import { defineOp } from "./wrap";

// Every differentiable op is a single defineOp call. Backward rules for
// each kind live in rules.ts.

export const add = defineOp("add", (args) =>
  numeric.add(operand(args, 0, "add"), operand(args, 1, "add")),
);

export const sub = defineOp("sub", (args) =>
  numeric.sub(operand(args, 0, "sub"), operand(args, 1, "sub")),
);

export const mul = defineOp("mul", (args) =>
  numeric.mul(operand(args, 0, "mul"), operand(args, 1, "mul")),
);

export const div = defineOp("div", (args) =>
  numeric.div(operand(args, 0, "div"), operand(args, 1, "div")),
);

export const neg = defineOp("neg", (args) => numeric.neg(operand(args, 0, "neg")));

export const maximum = defineOp("maximum", (args) =>
  numeric.maximum(operand(args, 0, "maximum"), operand(args, 1, "maximum")),
);

export const exp = defineOp("exp", (args) => numeric.exp(operand(args, 0, "exp")));

export const log = defineOp("log", (args) => numeric.log(operand(args, 0, "log")));

export const matmul = defineOp("matmul", (args) =>
  numeric.matmul(operand(args, 0, "matmul"), operand(args, 1, "matmul")),
);

export const sum = defineOp("sum", (args, options) =>
  numeric.sum(operand(args, 0, "sum"), { dim: options.dim, keepdim: options.keepdim }),
);

/** `index([x, i0, i1, ...])` reads `x[i0, i1, ...]` over the leading axes. */
export const index = defineOp("index", (args) =>
  numeric.take(operand(args, 0, "index"), indexOperands(args)),
);

export const reshape = defineOp("reshape", (args, options) =>
  numeric.reshape(operand(args, 0, "reshape"), requireOption(options.shape, "reshape", "shape")),
);

export const expand = defineOp("expand", (args, options) => {
  const input = operand(args, 0, "expand");
  const shape = requireOption(options.shape, "expand", "shape");
  return numeric.broadcastTo(input, resolveExpandShape(input.shape, shape));
});

export const permute = defineOp("permute", (args, options) =>
  numeric.permute(operand(args, 0, "permute"), requireOption(options.dims, "permute", "dims")),
);

/** -1 in an expand target keeps the input's size on that axis. */
export function resolveExpandShape(input: readonly number[], target: readonly number[]): number[] {
  const pad = target.length - input.length;
  if (pad < 0) {
    throw new Error(`expand: target [${target}] has fewer dimensions than input [${input}]`);
  }
  return target.map((size, axis) => {
    if (size !== -1) return size;
    if (axis < pad) {
      throw new Error(`expand: -1 is not allowed for new leading dimension ${axis}`);
    }
    return input[normalizeDim(axis - pad, input.length)];
  });
}
