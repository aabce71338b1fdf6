import type { Tensor } from "../tensor";

/**
 * Validate common optimizer constructor parameters.
 */
export function validateOptimizerParams(name: string, params: Tensor[]): void {
  if (params.length === 0) {
    throw new Error(`${name} requires at least one parameter`);
  }
  const seen = new Set<Tensor>();
  for (const param of params) {
    if (!param.requiresGrad) {
      throw new Error(`${name} parameters must have requiresGrad=true`);
    }
    if (seen.has(param)) {
      throw new Error(`${name} parameters must not contain duplicates`);
    }
    seen.add(param);
  }
}
