/**
 * Canonical pure shape utility functions.
 *
 * No dependencies: importable from any layer.
 */

export type Shape = number[];

export function sizeOf(shape: readonly number[]): number {
  return shape.reduce((acc, dim) => acc * dim, 1);
}

export function broadcastShapes(a: readonly number[], b: readonly number[]): Shape {
  const outRank = Math.max(a.length, b.length);
  const out = new Array<number>(outRank);
  for (let i = 0; i < outRank; i += 1) {
    const aDim = a[a.length - 1 - i] ?? 1;
    const bDim = b[b.length - 1 - i] ?? 1;
    if (aDim !== bDim && aDim !== 1 && bDim !== 1) {
      throw new Error(`Cannot broadcast shapes [${a}] and [${b}]`);
    }
    out[outRank - 1 - i] = aDim === 1 ? bDim : aDim;
  }
  return out;
}

export function shapesEqual(a: readonly number[], b: readonly number[]): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i += 1) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}

export function normalizeDim(dim: number, rank: number): number {
  const normalized = dim < 0 ? rank + dim : dim;
  if (normalized < 0 || normalized >= rank) {
    throw new Error(`dim out of range: ${dim}`);
  }
  return normalized;
}

/**
 * Normalize a reduction `dim` argument into a sorted list of unique axes.
 * `null`/`undefined` selects every axis.
 */
export function normalizeDims(
  dim: number | readonly number[] | null | undefined,
  rank: number,
  opName: string,
): number[] {
  if (dim == null) {
    return Array.from({ length: rank }, (_, axis) => axis);
  }
  const dims = typeof dim === "number" ? [dim] : dim.slice();
  const unique = new Set<number>();
  for (const value of dims) {
    const normalized = value < 0 ? rank + value : value;
    if (normalized < 0 || normalized >= rank) {
      throw new Error(`${opName} dim out of range: ${value}`);
    }
    if (unique.has(normalized)) {
      throw new Error(`${opName} dim repeated: ${value}`);
    }
    unique.add(normalized);
  }
  return Array.from(unique).sort((a, b) => a - b);
}

export function computeStrides(shape: readonly number[]): number[] {
  const strides = new Array<number>(shape.length);
  let stride = 1;
  for (let i = shape.length - 1; i >= 0; i -= 1) {
    strides[i] = stride;
    stride *= shape[i];
  }
  return strides;
}
