import fc from "fast-check";
import { describe, expect, it } from "vitest";
import * as numeric from "../src/backend/cpu/numeric";
import { unbroadcast } from "../src";

describe("unbroadcast", () => {
  it("reduces (4,3) ones to (1,3) as [[4,4,4]]", () => {
    const grad = numeric.ones([4, 3]);
    const out = unbroadcast(grad, [1, 3]);
    expect(out.shape).toEqual([1, 3]);
    expect(out.toNested()).toEqual([[4, 4, 4]]);
  });

  it("sums prepended axes away", () => {
    const out = unbroadcast(numeric.ones([2, 3]), [3]);
    expect(out.shape).toEqual([3]);
    expect(out.toArray()).toEqual([2, 2, 2]);
  });

  it("handles prepended and size-1 axes together", () => {
    const out = unbroadcast(numeric.ones([2, 3, 4]), [3, 1]);
    expect(out.shape).toEqual([3, 1]);
    expect(out.toArray()).toEqual([8, 8, 8]);
  });

  it("sums values, not just counts", () => {
    const grad = numeric.fromNested([
      [1, 2],
      [3, 4],
    ]);
    expect(unbroadcast(grad, [2, 1]).toNested()).toEqual([[3], [7]]);
    expect(unbroadcast(grad, []).item()).toBe(10);
  });

  it("returns the gradient itself when shapes already match", () => {
    const grad = numeric.ones([2, 2]);
    expect(unbroadcast(grad, [2, 2])).toBe(grad);
  });

  it("rejects shapes that are not broadcast-related", () => {
    expect(() => unbroadcast(numeric.ones([2, 3]), [2])).toThrow(
      "Cannot unbroadcast gradient of shape [2,3] to [2]",
    );
    expect(() => unbroadcast(numeric.ones([3]), [2, 3])).toThrow(
      "Cannot unbroadcast gradient of shape [3] to [2,3]",
    );
  });

  it("always lands on the target shape with the broadcast factor", () => {
    const dimArb = fc.integer({ min: 1, max: 3 });
    const caseArb = fc
      .tuple(
        fc.array(dimArb, { minLength: 0, maxLength: 3 }),
        fc.array(dimArb, { minLength: 0, maxLength: 2 }),
        fc.array(dimArb, { minLength: 3, maxLength: 3 }),
      )
      .map(([target, leading, widen]) => ({
        target,
        grad: [...leading, ...target.map((dim, axis) => (dim === 1 ? widen[axis] : dim))],
      }));

    fc.assert(
      fc.property(caseArb, ({ target, grad }) => {
        const out = unbroadcast(numeric.ones(grad), target);
        const factor = grad.reduce((a, b) => a * b, 1) / target.reduce((a, b) => a * b, 1);
        expect(out.shape).toEqual(target);
        for (const value of out.toArray()) {
          expect(value).toBe(factor);
        }
      }),
    );
  });
});
