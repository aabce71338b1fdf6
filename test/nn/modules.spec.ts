/**
 * Tests for nn modules: Linear, ReLU, MLPClassifier
 */
import { describe, expect, it } from "vitest";
import { Generator, gradcheck, nn, SGD, Tensor, tensor } from "../../src";

const { Linear, MLPClassifier, Module, ReLU } = nn;

describe("nn.Linear", () => {
  it("creates weight and bias with correct shapes", () => {
    const linear = new Linear(4, 8, { generator: new Generator(1) });

    expect(linear.inFeatures).toBe(4);
    expect(linear.outFeatures).toBe(8);
    expect(linear.weight.shape).toEqual([8, 4]); // [outFeatures, inFeatures]
    expect(linear.bias?.shape).toEqual([8]);
    expect(linear.bias?.toArray()).toEqual(new Array(8).fill(0));
    expect(linear.parameters()).toEqual([linear.weight, linear.bias]);
  });

  it("creates without bias when bias=false", () => {
    const linear = new Linear(4, 8, { bias: false });

    expect(linear.weight.shape).toEqual([8, 4]);
    expect(linear.bias).toBeNull();
    expect(linear.parameters()).toHaveLength(1);
  });

  it("initializes identically from the same seed", () => {
    const a = new Linear(3, 2, { generator: new Generator(1) });
    const b = new Linear(3, 2, { generator: new Generator(1) });
    expect(a.weight.toArray()).toEqual(b.weight.toArray());
  });

  it("computes x @ W^T + b", () => {
    const linear = new Linear(3, 2);
    linear.weight.array.data.set([1, 2, 3, 4, 5, 6]);
    linear.bias?.array.data.set([0.5, -1]);

    const output = linear.forward(tensor([[1, 1, 1]]));

    expect(output.toNested()).toEqual([[6.5, 14]]);
  });

  it("forward works with 3D input", () => {
    const linear = new Linear(4, 8);
    const input = new Tensor(new Generator(2).normalArray([2, 3, 4]));

    expect(linear.forward(input).shape).toEqual([2, 3, 8]);
  });

  it("has gradients that match finite differences", () => {
    const linear = new Linear(3, 2, { generator: new Generator(5) });
    linear.bias?.array.data.set([0.1, -0.2]);
    const input = new Tensor(new Generator(6).uniform([4, 3], -1, 1));

    const result = gradcheck(
      () => linear.forward(input).exp().sum(),
      linear.parameters(),
    );

    expect(result.ok).toBe(true);
  });
});

describe("nn.ReLU", () => {
  it("zeros negatives and passes gradient at zero", () => {
    const x = tensor([-1, 0, 2], { requiresGrad: true });
    const y = new ReLU().call(x);
    expect(y.toArray()).toEqual([0, 0, 2]);

    y.sum().backward();
    expect(x.grad.toArray()).toEqual([0, 1, 1]);
  });
});

describe("nn.Module", () => {
  class Pair extends Module {
    forward(input: Tensor): Tensor {
      return input;
    }
  }

  it("lists shared parameters once", () => {
    const shared = new Linear(2, 2);
    const pair = new Pair();
    pair.registerModule("left", shared);
    pair.registerModule("right", shared);

    expect(pair.namedParameters().map(([name]) => name)).toEqual([
      "left.weight",
      "left.bias",
      "right.weight",
      "right.bias",
    ]);
    expect(pair.parameters()).toHaveLength(2);
    expect(pair.modules()).toEqual([shared, shared]);
  });

  it("only accepts parameters that require grad", () => {
    expect(() => new Pair().registerParameter("w", tensor([1]))).toThrow(
      'Parameter "w" must have requiresGrad=true',
    );
  });

  it("zeroGrad clears every parameter", () => {
    const linear = new Linear(2, 1);
    linear.forward(tensor([[1, 2]])).sum().backward();
    expect(linear.bias?.grad.toArray()).toEqual([1]);

    linear.zeroGrad();

    for (const param of linear.parameters()) {
      expect(param.grad.toArray().every((v) => v === 0)).toBe(true);
    }
  });
});

describe("nn.functional", () => {
  it("logSoftmax rows exponentiate to one", () => {
    const out = nn.logSoftmax(
      tensor([
        [1, 2, 3],
        [-5, 0, 5],
      ]),
    );
    const rows = out.exp().sum({ dim: -1 }).toArray();
    expect(rows[0]).toBeCloseTo(1, 12);
    expect(rows[1]).toBeCloseTo(1, 12);
  });

  it("crossEntropy of uniform logits is log of the class count", () => {
    const logits = tensor(
      [
        [0, 0],
        [0, 0],
      ],
      { requiresGrad: true },
    );
    const loss = nn.crossEntropy(logits, [0, 1]);
    expect(loss.item()).toBeCloseTo(Math.log(2), 12);

    loss.backward();
    const grad = logits.grad.toArray();
    expect(grad[0]).toBeCloseTo(-0.25, 12);
    expect(grad[1]).toBeCloseTo(0.25, 12);
    expect(grad[2]).toBeCloseTo(0.25, 12);
    expect(grad[3]).toBeCloseTo(-0.25, 12);
  });

  it("nllLoss checks the target count", () => {
    expect(() => nn.nllLoss(tensor([[0, 0]]), [0, 1])).toThrow("nllLoss expects 1 targets");
  });
});

describe("nn.MLPClassifier", () => {
  it("stacks Linear layers with ReLU between them", () => {
    const model = new MLPClassifier([4, 8, 3], { generator: new Generator(1) });

    expect(model.layers).toHaveLength(3);
    expect(model.layers[0]).toBeInstanceOf(Linear);
    expect(model.layers[1]).toBeInstanceOf(ReLU);
    expect(model.layers[2]).toBeInstanceOf(Linear);
    expect(model.namedParameters().map(([name]) => name)).toEqual([
      "0.weight",
      "0.bias",
      "2.weight",
      "2.bias",
    ]);
    expect(model.forward(tensor([[1, 2, 3, 4]])).shape).toEqual([1, 3]);
  });

  it("needs at least two sizes", () => {
    expect(() => new MLPClassifier([4])).toThrow(
      "MLPClassifier needs at least an input and an output size",
    );
  });

  it("reduces its loss under SGD and predicts valid classes", () => {
    const model = new MLPClassifier([2, 8, 2], { generator: new Generator(3) });
    const inputs = tensor([
      [1, 1],
      [1, -1],
      [-1, 1],
      [-1, -1],
    ]);
    const targets = [0, 1, 1, 0];
    const optimizer = new SGD(model.parameters(), { lr: 0.05 });

    const lossAt = (): number => nn.crossEntropy(model.forward(inputs), targets).item();
    const initial = lossAt();
    for (let step = 0; step < 20; step += 1) {
      optimizer.zeroGrad();
      nn.crossEntropy(model.forward(inputs), targets).backward();
      optimizer.step();
    }

    expect(lossAt()).toBeLessThan(initial);
    const predictions = model.predict(inputs);
    expect(predictions).toHaveLength(4);
    for (const label of predictions) {
      expect([0, 1]).toContain(label);
    }
  });
});
