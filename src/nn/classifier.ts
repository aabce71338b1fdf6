import { argmax } from "../backend/cpu/numeric";
import { Generator } from "../core/rng";
import type { Tensor } from "../tensor";
import { ReLU } from "./activation";
import { Linear } from "./linear";
import { Module } from "./module";

export type MLPClassifierOptions = {
  /** Shared by every layer's initializer. Default: a generator on the configured seed */
  generator?: Generator;
};

/**
 * Stack of Linear layers with ReLU between them.
 *
 * `sizes = [784, 128, 10]` builds Linear(784, 128), ReLU, Linear(128, 10).
 * The last layer has no activation, so `forward` returns logits.
 */
export class MLPClassifier extends Module {
  readonly layers: Module[];

  constructor(sizes: number[], options?: MLPClassifierOptions) {
    super();
    if (sizes.length < 2) {
      throw new Error("MLPClassifier needs at least an input and an output size");
    }
    const generator = options?.generator ?? new Generator();
    this.layers = [];
    for (let i = 0; i + 1 < sizes.length; i += 1) {
      this.layers.push(new Linear(sizes[i], sizes[i + 1], { generator }));
      if (i + 2 < sizes.length) {
        this.layers.push(new ReLU());
      }
    }
    this.layers.forEach((layer, i) => this.registerModule(String(i), layer));
  }

  forward(input: Tensor): Tensor {
    let x = input;
    for (const layer of this.layers) {
      x = layer.call(x);
    }
    return x;
  }

  /** Index of the largest logit for each row of `input`. */
  predict(input: Tensor): number[] {
    return argmax(this.forward(input).array, { dim: -1 }).toArray();
  }
}
