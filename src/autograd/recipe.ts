import { NDArray, scalar } from "../backend/cpu/numeric";
import { getConfig } from "../core/config";
import type { Tensor } from "../tensor";

export const OP_KINDS = [
  "add",
  "sub",
  "mul",
  "div",
  "neg",
  "maximum",
  "exp",
  "log",
  "matmul",
  "sum",
  "index",
  "reshape",
  "expand",
  "permute",
] as const;

/** Closed set of differentiable operations. */
export type OpKind = (typeof OP_KINDS)[number];

/**
 * Named operands. Each op reads only the fields it needs:
 * `sum` reads dim/keepdim, `reshape`/`expand` read shape, `permute` reads dims.
 */
export type OpOptions = {
  dim?: number | number[] | null;
  keepdim?: boolean;
  shape?: number[];
  dims?: number[];
};

/** Positional operand after Tensor unwrapping. */
export type RawArg = NDArray | number;

/**
 * Provenance of one Tensor: which op produced it, from which raw operands,
 * and which of those operands were graph parents (keyed by call position).
 */
export type Recipe = {
  readonly op: OpKind;
  readonly args: readonly RawArg[];
  readonly options: Readonly<OpOptions>;
  readonly parents: ReadonlyMap<number, Tensor>;
};

export function createRecipe(
  op: OpKind,
  args: readonly RawArg[],
  options: OpOptions,
  parents: ReadonlyMap<number, Tensor>,
): Recipe {
  const share = getConfig().snapshot === "share";
  const captured = args.map((arg) =>
    share || typeof arg === "number" ? arg : arg.clone(),
  );
  return Object.freeze({
    op,
    args: Object.freeze(captured),
    options: Object.freeze(copyOptions(options)),
    parents: new Map(parents),
  });
}

/** Copy with fresh arrays, so later writes to the caller's lists are not seen. */
function copyOptions(options: OpOptions): OpOptions {
  const copy: OpOptions = { ...options };
  if (Array.isArray(options.dim)) copy.dim = options.dim.slice();
  if (options.shape !== undefined) copy.shape = options.shape.slice();
  if (options.dims !== undefined) copy.dims = options.dims.slice();
  return copy;
}

/** Positional operand `slot` as an array; numbers become 0-d arrays. */
export function operand(args: readonly RawArg[], slot: number, op: OpKind): NDArray {
  if (slot >= args.length) {
    throw new Error(`${op}: missing operand at position ${slot}`);
  }
  const arg = args[slot];
  return arg instanceof NDArray ? arg : scalar(arg);
}

export function requireOption<T>(value: T | undefined, op: OpKind, name: string): T {
  if (value === undefined) {
    throw new Error(`${op} requires the "${name}" option`);
  }
  return value;
}

/** Index arrays of an `index` call: every operand after the indexed array. */
export function indexOperands(args: readonly RawArg[]): NDArray[] {
  const indices: NDArray[] = [];
  for (let slot = 1; slot < args.length; slot += 1) {
    indices.push(operand(args, slot, "index"));
  }
  return indices;
}
