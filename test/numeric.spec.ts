import { describe, expect, it } from "vitest";
import * as numeric from "../src/backend/cpu/numeric";
import { IndexError, ScalarConversionError } from "../src";

const { fromArray, fromNested } = numeric;

describe("numeric creation", () => {
  it("infers shape from nested data", () => {
    const a = fromNested([
      [1, 2, 3],
      [4, 5, 6],
    ]);
    expect(a.shape).toEqual([2, 3]);
    expect(a.strides).toEqual([3, 1]);
    expect(a.toArray()).toEqual([1, 2, 3, 4, 5, 6]);
  });

  it("treats a bare number as a 0-d array", () => {
    const a = fromNested(7);
    expect(a.shape).toEqual([]);
    expect(a.toNested()).toBe(7);
  });

  it("rejects ragged data", () => {
    expect(() => fromNested([[1, 2], [3]])).toThrow("Ragged nested array");
  });

  it("arange counts from start by step", () => {
    expect(numeric.arange(4).toArray()).toEqual([0, 1, 2, 3]);
    expect(numeric.arange(7, 1, 2).toArray()).toEqual([1, 3, 5]);
  });

  it("item requires a single element", () => {
    expect(fromNested([[3]]).item()).toBe(3);
    expect(() => fromNested([1, 2]).item()).toThrow(ScalarConversionError);
  });
});

describe("numeric views", () => {
  it("transpose shares data and reads in the new order", () => {
    const a = fromNested([
      [1, 2, 3],
      [4, 5, 6],
    ]);
    const t = numeric.transpose(a, { dim0: 0, dim1: 1 });
    expect(t.data).toBe(a.data);
    expect(t.isContiguous()).toBe(false);
    expect(t.toNested()).toEqual([
      [1, 4],
      [2, 5],
      [3, 6],
    ]);
  });

  it("reshape of a non-contiguous view materializes", () => {
    const a = fromNested([
      [1, 2, 3],
      [4, 5, 6],
    ]);
    const t = numeric.transpose(a, { dim0: 0, dim1: 1 });
    const flat = numeric.reshape(t, [6]);
    expect(flat.data).not.toBe(a.data);
    expect(flat.toArray()).toEqual([1, 4, 2, 5, 3, 6]);
  });

  it("reshape of contiguous data shares the buffer", () => {
    const a = numeric.arange(6);
    const r = numeric.reshape(a, [3, 2]);
    expect(r.data).toBe(a.data);
    expect(r.toNested()).toEqual([
      [0, 1],
      [2, 3],
      [4, 5],
    ]);
  });

  it("reshape of a broadcast view copies the repeated values", () => {
    const b = numeric.broadcastTo(numeric.arange(3), [2, 3]);
    const flat = numeric.reshape(b, [6]);
    expect(flat.data).not.toBe(b.data);
    expect(flat.toArray()).toEqual([0, 1, 2, 0, 1, 2]);
  });

  it("reshape infers a single -1", () => {
    expect(numeric.reshape(numeric.arange(6), [2, -1]).shape).toEqual([2, 3]);
    expect(() => numeric.reshape(numeric.arange(6), [-1, -1])).toThrow(
      "Can only have one -1 in reshape",
    );
  });

  it("permute is undone by the inverse permutation", () => {
    const a = numeric.reshape(numeric.arange(24), [2, 3, 4]);
    const p = numeric.permute(a, [2, 0, 1]);
    expect(p.shape).toEqual([4, 2, 3]);
    expect(numeric.invertPermutation([2, 0, 1])).toEqual([1, 2, 0]);
    const back = numeric.permute(p, numeric.invertPermutation([2, 0, 1]));
    expect(back.shape).toEqual([2, 3, 4]);
    expect(back.toArray()).toEqual(a.toArray());
  });

  it("broadcastTo uses zero strides for expanded axes", () => {
    const a = fromArray([1, 2, 3], [3]);
    const b = numeric.broadcastTo(a, [2, 3]);
    expect(b.strides).toEqual([0, 1]);
    expect(b.toArray()).toEqual([1, 2, 3, 1, 2, 3]);
  });
});

describe("numeric elementwise", () => {
  it("add broadcasts a column against a row", () => {
    const col = fromNested([[1], [2]]);
    const row = fromArray([10, 20, 30], [3]);
    expect(numeric.add(col, row).toNested()).toEqual([
      [11, 21, 31],
      [12, 22, 32],
    ]);
  });

  it("throws on incompatible shapes", () => {
    expect(() => numeric.add(numeric.zeros([2, 3]), numeric.zeros([4]))).toThrow(
      "Cannot broadcast shapes [2,3] and [4]",
    );
  });

  it("maximum keeps the first operand on ties", () => {
    const a = fromArray([1, 5, 3], [3]);
    const b = fromArray([2, 5, 1], [3]);
    expect(numeric.maximum(a, b).toArray()).toEqual([2, 5, 3]);
    expect(numeric.ge(a, b).toArray()).toEqual([0, 1, 1]);
    expect(numeric.lt(a, b).toArray()).toEqual([1, 0, 0]);
  });

  it("unary ops map every element", () => {
    const a = fromArray([0, 1], [2]);
    expect(numeric.neg(a).toArray()).toEqual([-0, -1]);
    expect(numeric.exp(a).toArray()).toEqual([1, Math.exp(1)]);
    expect(numeric.log(fromArray([1, 4], [2])).toArray()).toEqual([0, Math.log(4)]);
  });
});

describe("numeric matmul", () => {
  it("multiplies matrices", () => {
    const a = fromNested([
      [1, 2, 3],
      [4, 5, 6],
    ]);
    const b = fromNested([
      [7, 8],
      [9, 10],
      [11, 12],
    ]);
    expect(numeric.matmul(a, b).toNested()).toEqual([
      [58, 64],
      [139, 154],
    ]);
  });

  it("promotes 1-D operands", () => {
    const v = fromArray([1, 2, 3], [3]);
    const dot = numeric.matmul(v, fromArray([4, 5, 6], [3]));
    expect(dot.shape).toEqual([]);
    expect(dot.item()).toBe(32);

    const m = fromNested([
      [1, 2, 3],
      [4, 5, 6],
    ]);
    const left = numeric.matmul(fromArray([1, 2], [2]), m);
    expect(left.shape).toEqual([3]);
    expect(left.toArray()).toEqual([9, 12, 15]);
    expect(numeric.matmul(m, v).toArray()).toEqual([14, 32]);
  });

  it("broadcasts batch dimensions", () => {
    const a = numeric.reshape(numeric.arange(12), [2, 2, 3]);
    const b = numeric.ones([3, 1]);
    const out = numeric.matmul(a, b);
    expect(out.shape).toEqual([2, 2, 1]);
    expect(out.toArray()).toEqual([3, 12, 21, 30]);
  });

  it("rejects mismatched inner dimensions", () => {
    expect(() => numeric.matmul(numeric.zeros([2, 3]), numeric.zeros([2, 3]))).toThrow(
      "matmul dimension mismatch",
    );
  });
});

describe("numeric reductions", () => {
  const a = fromNested([
    [1, 2, 3],
    [4, 5, 6],
  ]);

  it("sums one axis", () => {
    expect(numeric.sum(a, { dim: 1 }).toArray()).toEqual([6, 15]);
    expect(numeric.sum(a, { dim: -2 }).toArray()).toEqual([5, 7, 9]);
  });

  it("keeps reduced axes as size 1", () => {
    const s = numeric.sum(a, { dim: 1, keepdim: true });
    expect(s.shape).toEqual([2, 1]);
    expect(s.toNested()).toEqual([[6], [15]]);
  });

  it("sums everything when dim is null", () => {
    const s = numeric.sum(a);
    expect(s.shape).toEqual([]);
    expect(s.item()).toBe(21);
    expect(numeric.sum(a, { dim: [0, 1], keepdim: true }).toNested()).toEqual([[21]]);
  });

  it("rejects repeated or out-of-range dims", () => {
    expect(() => numeric.sum(a, { dim: [1, -1] })).toThrow("sum dim repeated: -1");
    expect(() => numeric.sum(a, { dim: 2 })).toThrow("sum dim out of range: 2");
  });

  it("max and argmax pick the first largest value", () => {
    const b = fromNested([
      [1, 5, 5],
      [7, 2, 0],
    ]);
    expect(numeric.max(b, { dim: 1 }).toArray()).toEqual([5, 7]);
    expect(numeric.argmax(b, { dim: 1 }).toArray()).toEqual([1, 0]);
    expect(numeric.argmax(b, { dim: 0, keepdim: true }).toNested()).toEqual([[1, 0, 0]]);
  });
});

describe("numeric indexing", () => {
  const x = fromNested([
    [1, 2],
    [3, 4],
    [5, 6],
  ]);

  it("take gathers rows along the leading axis", () => {
    const rows = numeric.take(x, [fromArray([2, 0, 2], [3])]);
    expect(rows.toNested()).toEqual([
      [5, 6],
      [1, 2],
      [5, 6],
    ]);
  });

  it("take pairs several index arrays", () => {
    const picked = numeric.take(x, [fromArray([0, 2], [2]), fromArray([1, 0], [2])]);
    expect(picked.toArray()).toEqual([2, 5]);
  });

  it("broadcasts a scalar index against an array index", () => {
    const picked = numeric.take(x, [numeric.scalar(1), fromArray([1, 0], [2])]);
    expect(picked.toArray()).toEqual([4, 3]);
  });

  it("wraps negative indices", () => {
    expect(numeric.take(x, [numeric.scalar(-1)]).toArray()).toEqual([5, 6]);
  });

  it("rejects bad indices", () => {
    expect(() => numeric.take(x, [numeric.scalar(3)])).toThrow(IndexError);
    expect(() => numeric.take(x, [numeric.scalar(0.5)])).toThrow(IndexError);
    expect(() =>
      numeric.take(x, [numeric.scalar(0), numeric.scalar(0), numeric.scalar(0)]),
    ).toThrow("too many indices: 3 for array of rank 2");
  });

  it("scatterAddAt accumulates repeated positions", () => {
    const out = numeric.scatterAddAt(
      numeric.zeros([3]),
      [fromArray([0, 0, 1], [3])],
      numeric.ones([3]),
    );
    expect(out.toArray()).toEqual([2, 1, 0]);
  });

  it("scatterAddAt does not modify its target", () => {
    const target = numeric.zeros([3, 2]);
    const out = numeric.scatterAddAt(target, [fromArray([1], [1])], fromNested([[4, 5]]));
    expect(out.toNested()).toEqual([
      [0, 0],
      [4, 5],
      [0, 0],
    ]);
    expect(target.toArray()).toEqual([0, 0, 0, 0, 0, 0]);
  });
});

describe("numeric in-place", () => {
  it("addInPlace, copyInPlace and fillInPlace write the target buffer", () => {
    const target = numeric.zeros([2]);
    const data = target.data;
    numeric.addInPlace(target, fromArray([1, 2], [2]));
    numeric.addInPlace(target, fromArray([1, 2], [2]));
    expect(target.toArray()).toEqual([2, 4]);
    numeric.copyInPlace(target, fromArray([9, 8], [2]));
    expect(target.toArray()).toEqual([9, 8]);
    numeric.fillInPlace(target, 0);
    expect(target.toArray()).toEqual([0, 0]);
    expect(target.data).toBe(data);
  });

  it("addInPlace requires identical shapes", () => {
    expect(() => numeric.addInPlace(numeric.zeros([2]), numeric.zeros([1]))).toThrow(
      "addInPlace shape mismatch: [2] += [1]",
    );
  });
});
