import type {
  ArgReduceOptions,
  MaxOptions,
  NestedArray,
  SumOptions,
  TransposeOptions,
} from "../types";
import {
  broadcastShapes,
  computeStrides,
  normalizeDim,
  normalizeDims,
  type Shape,
  shapesEqual,
  sizeOf,
} from "../../core/shape";
import { IndexError, ScalarConversionError } from "../../core/errors";

/**
 * Strided n-dimensional array of float64 values.
 *
 * Views (reshape of contiguous data, permute, transpose, broadcastTo) share
 * `data` with their source; every arithmetic op allocates a fresh contiguous
 * result.
 */
export class NDArray {
  readonly shape: Shape;
  readonly strides: number[];
  readonly data: Float64Array;
  readonly offset: number;
  private readonly sizeValue: number;

  constructor(
    shape: readonly number[],
    data: Float64Array,
    strides?: readonly number[],
    offset = 0,
    validateLength = true,
  ) {
    const expected = sizeOf(shape);
    if (validateLength && expected !== data.length) {
      throw new Error("NDArray data length does not match shape");
    }
    this.shape = shape.slice();
    this.strides = (strides ?? computeStrides(shape)).slice();
    this.data = data;
    this.offset = offset;
    this.sizeValue = expected;
  }

  get size(): number {
    return this.sizeValue;
  }

  get ndim(): number {
    return this.shape.length;
  }

  view(shape: readonly number[]): NDArray {
    const expected = sizeOf(shape);
    if (expected !== this.size) {
      throw new Error(`Cannot view array of size ${this.size} as shape [${shape}]`);
    }
    // Strided views are copied first; only row-major data is reinterpreted.
    const source = this.contiguous();
    return new NDArray(shape, source.data, computeStrides(shape), source.offset, false);
  }

  isContiguous(): boolean {
    return isContiguous(this);
  }

  /**
   * Return a contiguous array. If already contiguous, returns self.
   */
  contiguous(): NDArray {
    if (isContiguous(this)) {
      return this;
    }
    return this.clone();
  }

  /** Fresh contiguous copy that shares nothing with this array. */
  clone(): NDArray {
    const out = new Float64Array(this.size);
    const shapeStrides = computeStrides(this.shape);
    for (let i = 0; i < this.size; i += 1) {
      out[i] = readAtLinear(this, i, shapeStrides);
    }
    return new NDArray(this.shape, out);
  }

  /** Row-major flat copy of the values. */
  toArray(): number[] {
    const out = new Array<number>(this.sizeValue);
    const shapeStrides = computeStrides(this.shape);
    for (let i = 0; i < this.sizeValue; i += 1) {
      out[i] = readAtLinear(this, i, shapeStrides);
    }
    return out;
  }

  toNested(): NestedArray {
    const flat = this.toArray();
    if (this.shape.length === 0) {
      return flat[0];
    }
    const build = (dim: number, start: number): NestedArray[] => {
      const count = this.shape[dim];
      const block = sizeOf(this.shape.slice(dim + 1));
      const result: NestedArray[] = [];
      for (let i = 0; i < count; i += 1) {
        result.push(
          dim === this.shape.length - 1
            ? flat[start + i]
            : build(dim + 1, start + i * block),
        );
      }
      return result;
    };
    return build(0, 0);
  }

  item(): number {
    if (this.size !== 1) {
      throw new ScalarConversionError(
        `item() requires a single-element array, got shape [${this.shape}]`,
      );
    }
    return this.data[this.offset];
  }
}

// ============================================================================
// Creation
// ============================================================================

export function fromArray(values: readonly number[] | Float64Array, shape: readonly number[]): NDArray {
  return new NDArray(
    shape,
    values instanceof Float64Array ? values.slice() : Float64Array.from(values),
  );
}

export function fromNested(values: NestedArray): NDArray {
  const shape = inferShape(values);
  const flat: number[] = [];
  flattenInto(values, shape, 0, flat);
  return new NDArray(shape, Float64Array.from(flat));
}

export function scalar(value: number): NDArray {
  return new NDArray([], Float64Array.of(value));
}

export function full(shape: readonly number[], fillValue: number): NDArray {
  const data = new Float64Array(sizeOf(shape));
  data.fill(fillValue);
  return new NDArray(shape, data);
}

export function zeros(shape: readonly number[]): NDArray {
  return full(shape, 0);
}

export function ones(shape: readonly number[]): NDArray {
  return full(shape, 1);
}

export function arange(end: number, start = 0, step = 1): NDArray {
  const numElements = Math.max(0, Math.ceil((end - start) / step));
  const data = new Float64Array(numElements);
  for (let i = 0; i < numElements; i++) {
    data[i] = start + i * step;
  }
  return new NDArray([numElements], data);
}

function inferShape(values: NestedArray): Shape {
  const shape: Shape = [];
  let current: NestedArray = values;
  while (Array.isArray(current)) {
    shape.push(current.length);
    if (current.length === 0) break;
    current = current[0];
  }
  return shape;
}

function flattenInto(values: NestedArray, shape: Shape, depth: number, out: number[]): void {
  if (typeof values === "number") {
    if (depth !== shape.length) {
      throw new Error("Ragged nested array: inconsistent depth");
    }
    out.push(values);
    return;
  }
  if (depth >= shape.length || values.length !== shape[depth]) {
    throw new Error(`Ragged nested array: expected length ${shape[depth]} at depth ${depth}`);
  }
  for (const item of values) {
    flattenInto(item, shape, depth + 1, out);
  }
}

// ============================================================================
// Views
// ============================================================================

export function reshape(a: NDArray, shape: readonly number[]): NDArray {
  return a.view(resolveShape(shape, a.size));
}

function resolveShape(shape: readonly number[], size: number): Shape {
  const inferred = shape.indexOf(-1);
  if (inferred === -1) {
    return shape.slice();
  }
  if (shape.indexOf(-1, inferred + 1) !== -1) {
    throw new Error("Can only have one -1 in reshape");
  }
  const known = shape.reduce((acc, dim) => (dim === -1 ? acc : acc * dim), 1);
  if (known === 0 || size % known !== 0) {
    throw new Error(`Cannot reshape array of size ${size} to shape [${shape}]`);
  }
  const resolved = shape.slice();
  resolved[inferred] = size / known;
  return resolved;
}

export function transpose(a: NDArray, options: TransposeOptions): NDArray {
  const rank = a.shape.length;
  const dim0 = normalizeDim(options.dim0, rank);
  const dim1 = normalizeDim(options.dim1, rank);
  if (dim0 === dim1) {
    return a;
  }
  const shape = a.shape.slice();
  const strides = a.strides.slice();
  [shape[dim0], shape[dim1]] = [shape[dim1], shape[dim0]];
  [strides[dim0], strides[dim1]] = [strides[dim1], strides[dim0]];
  return new NDArray(shape, a.data, strides, a.offset, false);
}

/**
 * Permute dimensions according to the given order.
 * Returns a view sharing the same data (no copy).
 */
export function permute(a: NDArray, dims: readonly number[]): NDArray {
  const rank = a.shape.length;

  if (dims.length !== rank) {
    throw new Error(
      `permute: dims length ${dims.length} doesn't match array rank ${rank}`,
    );
  }

  const normalizedDims = dims.map((d) => (d < 0 ? d + rank : d));
  const seen = new Set<number>();
  for (let i = 0; i < normalizedDims.length; i += 1) {
    const nd = normalizedDims[i];
    if (nd < 0 || nd >= rank) {
      throw new Error(`permute: dimension ${dims[i]} out of range for rank ${rank}`);
    }
    if (seen.has(nd)) {
      throw new Error(`permute: duplicate dimension ${dims[i]}`);
    }
    seen.add(nd);
  }

  const newShape = normalizedDims.map((d) => a.shape[d]);
  const newStrides = normalizedDims.map((d) => a.strides[d]);

  return new NDArray(newShape, a.data, newStrides, a.offset, false);
}

/** Inverse of a permutation: `permute(permute(a, dims), invertPermutation(dims))` is `a`. */
export function invertPermutation(dims: readonly number[]): number[] {
  const rank = dims.length;
  const inverse = new Array<number>(rank);
  for (let i = 0; i < rank; i += 1) {
    const d = dims[i] < 0 ? dims[i] + rank : dims[i];
    inverse[d] = i;
  }
  return inverse;
}

export function broadcastTo(a: NDArray, targetShape: readonly number[]): NDArray {
  if (shapesEqual(a.shape, targetShape)) {
    return a;
  }

  if (a.shape.length > targetShape.length) {
    throw new Error(
      `Cannot broadcast shape [${a.shape}] to [${targetShape}]: target has fewer dimensions`,
    );
  }

  const pad = targetShape.length - a.shape.length;
  const outStrides = new Array<number>(targetShape.length);

  for (let axis = 0; axis < targetShape.length; axis += 1) {
    const inAxis = axis - pad;
    if (inAxis < 0) {
      outStrides[axis] = 0;
      continue;
    }
    const inDim = a.shape[inAxis];
    const outDim = targetShape[axis];
    if (inDim === outDim) {
      outStrides[axis] = a.strides[inAxis];
    } else if (inDim === 1) {
      outStrides[axis] = 0;
    } else {
      throw new Error(`Cannot broadcast shape [${a.shape}] to [${targetShape}]`);
    }
  }

  return new NDArray(targetShape, a.data, outStrides, a.offset, false);
}

// ============================================================================
// Elementwise
// ============================================================================

function unaryMap(a: NDArray, fn: (x: number) => number): NDArray {
  const out = new Float64Array(a.size);
  const shapeStrides = computeStrides(a.shape);
  for (let i = 0; i < a.size; i += 1) {
    out[i] = fn(readAtLinear(a, i, shapeStrides));
  }
  return new NDArray(a.shape, out);
}

function binaryMap(a: NDArray, b: NDArray, fn: (x: number, y: number) => number): NDArray {
  const outShape = broadcastShapes(a.shape, b.shape);
  const aBroadcast = broadcastTo(a, outShape);
  const bBroadcast = broadcastTo(b, outShape);
  const outSize = sizeOf(outShape);
  const out = new Float64Array(outSize);
  const shapeStrides = computeStrides(outShape);
  for (let i = 0; i < outSize; i += 1) {
    out[i] = fn(
      readAtLinear(aBroadcast, i, shapeStrides),
      readAtLinear(bBroadcast, i, shapeStrides),
    );
  }
  return new NDArray(outShape, out);
}

export function add(a: NDArray, b: NDArray): NDArray {
  return binaryMap(a, b, (x, y) => x + y);
}

export function sub(a: NDArray, b: NDArray): NDArray {
  return binaryMap(a, b, (x, y) => x - y);
}

export function mul(a: NDArray, b: NDArray): NDArray {
  return binaryMap(a, b, (x, y) => x * y);
}

export function div(a: NDArray, b: NDArray): NDArray {
  return binaryMap(a, b, (x, y) => x / y);
}

/** Elementwise maximum; ties keep the first operand's value. */
export function maximum(a: NDArray, b: NDArray): NDArray {
  return binaryMap(a, b, (x, y) => (x >= y ? x : y));
}

// Comparison ops - return 1.0 for true, 0.0 for false

export function ge(a: NDArray, b: NDArray): NDArray {
  return binaryMap(a, b, (x, y) => (x >= y ? 1 : 0));
}

export function lt(a: NDArray, b: NDArray): NDArray {
  return binaryMap(a, b, (x, y) => (x < y ? 1 : 0));
}

export function neg(a: NDArray): NDArray {
  return unaryMap(a, (x) => -x);
}

export function exp(a: NDArray): NDArray {
  return unaryMap(a, Math.exp);
}

export function log(a: NDArray): NDArray {
  return unaryMap(a, Math.log);
}

// ============================================================================
// Matrix product
// ============================================================================

export function matmul(a: NDArray, b: NDArray): NDArray {
  const aRank = a.shape.length;
  const bRank = b.shape.length;
  if (aRank === 0 || bRank === 0) {
    throw new Error("matmul does not support scalar inputs");
  }

  const aWas1d = aRank === 1;
  const bWas1d = bRank === 1;
  const aMatrix = aWas1d
    ? new NDArray([1, a.shape[0]], a.data, [0, a.strides[0]], a.offset, false)
    : a;
  const bMatrix = bWas1d
    ? new NDArray([b.shape[0], 1], b.data, [b.strides[0], 0], b.offset, false)
    : b;

  const m = aMatrix.shape[aMatrix.shape.length - 2];
  const k = aMatrix.shape[aMatrix.shape.length - 1];
  const kB = bMatrix.shape[bMatrix.shape.length - 2];
  const n = bMatrix.shape[bMatrix.shape.length - 1];
  if (k !== kB) {
    throw new Error(
      `matmul dimension mismatch: [${a.shape}] @ [${b.shape}]`,
    );
  }

  const aBatch = aMatrix.shape.slice(0, -2);
  const bBatch = bMatrix.shape.slice(0, -2);
  const batchShape = broadcastShapes(aBatch, bBatch);
  const aBroadcast = broadcastTo(aMatrix, batchShape.concat([m, k]));
  const bBroadcast = broadcastTo(bMatrix, batchShape.concat([k, n]));

  const batchSize = sizeOf(batchShape);
  const out = new Float64Array(batchSize * m * n);
  const batchRank = batchShape.length;
  const batchShapeStrides = computeStrides(batchShape);
  const aBatchStrides = aBroadcast.strides.slice(0, batchRank);
  const bBatchStrides = bBroadcast.strides.slice(0, batchRank);
  const aRowStride = aBroadcast.strides[batchRank];
  const aInnerStride = aBroadcast.strides[batchRank + 1];
  const bInnerStride = bBroadcast.strides[batchRank];
  const bColStride = bBroadcast.strides[batchRank + 1];

  for (let batch = 0; batch < batchSize; batch += 1) {
    const aBase = linearOffset(batch, batchShapeStrides, aBatchStrides, aBroadcast.offset);
    const bBase = linearOffset(batch, batchShapeStrides, bBatchStrides, bBroadcast.offset);
    const outBase = batch * m * n;
    for (let row = 0; row < m; row += 1) {
      const rowOffset = aBase + row * aRowStride;
      const outOffset = outBase + row * n;
      for (let col = 0; col < n; col += 1) {
        let acc = 0;
        for (let inner = 0; inner < k; inner += 1) {
          acc +=
            aBroadcast.data[rowOffset + inner * aInnerStride] *
            bBroadcast.data[bBase + inner * bInnerStride + col * bColStride];
        }
        out[outOffset + col] = acc;
      }
    }
  }

  if (aWas1d && bWas1d) {
    return new NDArray([], out);
  }
  if (aWas1d) {
    return new NDArray(batchShape.concat([n]), out);
  }
  if (bWas1d) {
    return new NDArray(batchShape.concat([m]), out);
  }
  return new NDArray(batchShape.concat([m, n]), out);
}

// ============================================================================
// Reductions
// ============================================================================

/** Output shape of reducing `shape` over `dims`. */
export function reducedShape(shape: readonly number[], dims: readonly number[], keepdim: boolean): Shape {
  const reduceSet = new Set(dims);
  return keepdim
    ? shape.map((dim, index) => (reduceSet.has(index) ? 1 : dim))
    : shape.filter((_, index) => !reduceSet.has(index));
}

function reduceAxes(
  a: NDArray,
  options: SumOptions | undefined,
  opName: string,
  init: number,
  combine: (acc: number, value: number) => number,
): NDArray {
  const rank = a.shape.length;
  const dims = normalizeDims(options?.dim, rank, opName);
  const keepdim = options?.keepdim ?? false;
  const reduceSet = new Set(dims);
  const outShape = reducedShape(a.shape, dims, keepdim);

  const out = new Float64Array(sizeOf(outShape));
  out.fill(init);
  const inShapeStrides = computeStrides(a.shape);
  const outStrides = computeStrides(outShape);

  for (let linear = 0; linear < a.size; linear += 1) {
    let remainder = linear;
    let outOffset = 0;
    let outDim = 0;
    for (let dim = 0; dim < rank; dim += 1) {
      const stride = inShapeStrides[dim];
      const coord = Math.floor(remainder / stride);
      remainder -= coord * stride;
      if (!reduceSet.has(dim)) {
        outOffset += coord * outStrides[keepdim ? dim : outDim];
        outDim += 1;
      }
    }
    out[outOffset] = combine(out[outOffset], readAtLinear(a, linear, inShapeStrides));
  }

  return new NDArray(outShape, out);
}

/**
 * Sum over `dim` (all axes when null/omitted). With `keepdim` the reduced
 * axes stay as size 1.
 */
export function sum(a: NDArray, options?: SumOptions): NDArray {
  return reduceAxes(a, options, "sum", 0, (acc, value) => acc + value);
}

export function max(a: NDArray, options?: MaxOptions): NDArray {
  return reduceAxes(a, options, "max", -Infinity, (acc, value) => (value > acc ? value : acc));
}

export function argmax(a: NDArray, options: ArgReduceOptions): NDArray {
  const rank = a.shape.length;
  const dim = normalizeDim(options.dim, rank);
  const keepdim = options.keepdim ?? false;
  const outShape = reducedShape(a.shape, [dim], keepdim);
  const outSize = sizeOf(outShape);
  const best = new Float64Array(outSize).fill(-Infinity);
  const out = new Float64Array(outSize);
  const inShapeStrides = computeStrides(a.shape);
  const outStrides = computeStrides(outShape);

  for (let linear = 0; linear < a.size; linear += 1) {
    let remainder = linear;
    let outOffset = 0;
    let outDim = 0;
    let position = 0;
    for (let axis = 0; axis < rank; axis += 1) {
      const stride = inShapeStrides[axis];
      const coord = Math.floor(remainder / stride);
      remainder -= coord * stride;
      if (axis === dim) {
        position = coord;
        if (keepdim) outDim += 1;
      } else {
        outOffset += coord * outStrides[outDim];
        outDim += 1;
      }
    }
    const value = readAtLinear(a, linear, inShapeStrides);
    if (value > best[outOffset]) {
      best[outOffset] = value;
      out[outOffset] = position;
    }
  }

  return new NDArray(outShape, out);
}

// ============================================================================
// Indexing
// ============================================================================

function readIndexValue(value: number, limit: number): number {
  if (!Number.isFinite(value) || Math.trunc(value) !== value) {
    throw new IndexError(`index values must be integers, got ${value}`);
  }
  const idx = value < 0 ? value + limit : value;
  if (idx < 0 || idx >= limit) {
    throw new IndexError(`index ${value} out of range for axis of size ${limit}`);
  }
  return idx;
}

type IndexPlan = {
  /** Broadcast shape of all index arrays. */
  indexShape: Shape;
  /** Element offset (into a contiguous layout of `shape`) of each selected block. */
  blockOffsets: number[];
  blockSize: number;
  outShape: Shape;
};

/**
 * Resolve leading-axis advanced indices against `shape`. Index arrays are
 * broadcast together (a 0-d index selects a single position), and the result
 * shape is the broadcast index shape followed by the unindexed trailing axes.
 */
function planIndex(shape: readonly number[], indices: readonly NDArray[]): IndexPlan {
  if (indices.length > shape.length) {
    throw new IndexError(
      `too many indices: ${indices.length} for array of rank ${shape.length}`,
    );
  }
  let indexShape: Shape = [];
  for (const index of indices) {
    indexShape = broadcastShapes(indexShape, index.shape);
  }
  const trailing = shape.slice(indices.length);
  const blockSize = sizeOf(trailing);
  const strides = computeStrides(shape);
  const indexShapeStrides = computeStrides(indexShape);
  const views = indices.map((index) => broadcastTo(index, indexShape));
  const count = sizeOf(indexShape);
  const blockOffsets = new Array<number>(count);

  for (let position = 0; position < count; position += 1) {
    let base = 0;
    for (let axis = 0; axis < views.length; axis += 1) {
      const idx = readIndexValue(
        readAtLinear(views[axis], position, indexShapeStrides),
        shape[axis],
      );
      base += idx * strides[axis];
    }
    blockOffsets[position] = base;
  }

  return { indexShape, blockOffsets, blockSize, outShape: indexShape.concat(trailing) };
}

/**
 * Advanced indexing over the leading axes: `take(a, [i0, i1])` is
 * NumPy's `a[i0, i1]` for integer-valued index arrays.
 */
export function take(a: NDArray, indices: readonly NDArray[]): NDArray {
  const plan = planIndex(a.shape, indices);
  const src = a.contiguous();
  const out = new Float64Array(sizeOf(plan.outShape));
  for (let position = 0; position < plan.blockOffsets.length; position += 1) {
    const base = src.offset + plan.blockOffsets[position];
    const outBase = position * plan.blockSize;
    for (let j = 0; j < plan.blockSize; j += 1) {
      out[outBase + j] = src.data[base + j];
    }
  }
  return new NDArray(plan.outShape, out);
}

/**
 * Copy of `target` with `src` added at the positions `take(target, indices)`
 * would read. Repeated indices accumulate.
 */
export function scatterAddAt(
  target: NDArray,
  indices: readonly NDArray[],
  src: NDArray,
): NDArray {
  const plan = planIndex(target.shape, indices);
  if (!shapesEqual(src.shape, plan.outShape)) {
    throw new Error(
      `scatterAddAt source shape [${src.shape}] does not match indexed shape [${plan.outShape}]`,
    );
  }
  const out = target.clone();
  const values = src.contiguous();
  for (let position = 0; position < plan.blockOffsets.length; position += 1) {
    const base = plan.blockOffsets[position];
    const srcBase = values.offset + position * plan.blockSize;
    for (let j = 0; j < plan.blockSize; j += 1) {
      out.data[base + j] += values.data[srcBase + j];
    }
  }
  return out;
}

// ============================================================================
// In-place
// ============================================================================

/** `target += src` elementwise. Shapes must match exactly. */
export function addInPlace(target: NDArray, src: NDArray): void {
  if (!shapesEqual(target.shape, src.shape)) {
    throw new Error(
      `addInPlace shape mismatch: [${target.shape}] += [${src.shape}]`,
    );
  }
  const shapeStrides = computeStrides(target.shape);
  for (let i = 0; i < target.size; i += 1) {
    const offset = linearOffset(i, shapeStrides, target.strides, target.offset);
    target.data[offset] += readAtLinear(src, i, shapeStrides);
  }
}

/** `target[...] = src` elementwise. Shapes must match exactly. */
export function copyInPlace(target: NDArray, src: NDArray): void {
  if (!shapesEqual(target.shape, src.shape)) {
    throw new Error(
      `copyInPlace shape mismatch: [${target.shape}] = [${src.shape}]`,
    );
  }
  const shapeStrides = computeStrides(target.shape);
  for (let i = 0; i < target.size; i += 1) {
    const offset = linearOffset(i, shapeStrides, target.strides, target.offset);
    target.data[offset] = readAtLinear(src, i, shapeStrides);
  }
}

export function fillInPlace(target: NDArray, value: number): void {
  const shapeStrides = computeStrides(target.shape);
  for (let i = 0; i < target.size; i += 1) {
    target.data[linearOffset(i, shapeStrides, target.strides, target.offset)] = value;
  }
}

// ============================================================================
// Strided addressing
// ============================================================================

function isContiguous(array: NDArray): boolean {
  const expected = computeStrides(array.shape);
  if (expected.length !== array.strides.length) {
    return false;
  }
  for (let axis = 0; axis < expected.length; axis += 1) {
    if (array.shape[axis] <= 1) {
      continue;
    }
    if (array.strides[axis] !== expected[axis]) {
      return false;
    }
  }
  return true;
}

function linearOffset(
  linear: number,
  shapeStrides: number[],
  strides: number[],
  baseOffset: number,
): number {
  let remainder = linear;
  let offset = baseOffset;
  for (let axis = 0; axis < shapeStrides.length; axis += 1) {
    const stride = shapeStrides[axis];
    const coord = stride === 0 ? 0 : Math.floor(remainder / stride);
    remainder -= coord * stride;
    offset += coord * strides[axis];
  }
  return offset;
}

function readAtLinear(
  array: NDArray,
  linear: number,
  shapeStrides: number[],
): number {
  return array.data[linearOffset(linear, shapeStrides, array.strides, array.offset)];
}
