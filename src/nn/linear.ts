/**
 * Linear (fully connected) layer.
 */

import { Generator } from "../core/rng";
import { zeros } from "../creation";
import { Tensor } from "../tensor";
import { Module } from "./module";

export type LinearOptions = {
  /** Whether to include a bias term. Default: true */
  bias?: boolean;
  /** Source of the initial weights. Default: a generator on the configured seed */
  generator?: Generator;
};

/**
 * Linear transformation: y = x @ W^T + b
 *
 * @example
 * ```ts
 * const linear = new Linear(784, 128, { generator: new Generator(1) });
 * const output = linear.forward(input); // [batch, 784] -> [batch, 128]
 * ```
 */
export class Linear extends Module {
  readonly inFeatures: number;
  readonly outFeatures: number;
  readonly weight: Tensor;
  readonly bias: Tensor | null;

  constructor(inFeatures: number, outFeatures: number, options?: LinearOptions) {
    super();
    this.inFeatures = inFeatures;
    this.outFeatures = outFeatures;

    const hasBias = options?.bias ?? true;
    const generator = options?.generator ?? new Generator();

    // Scale by 1/sqrt(in_features) for better gradient flow
    const scale = 1 / Math.sqrt(inFeatures);

    // Weight shape: [outFeatures, inFeatures]
    this.weight = this.registerParameter(
      "weight",
      new Tensor(generator.normalArray([outFeatures, inFeatures], 0, scale), {
        requiresGrad: true,
      }),
    );

    // Bias shape: [outFeatures]
    this.bias = hasBias
      ? this.registerParameter("bias", zeros([outFeatures], { requiresGrad: true }))
      : null;
  }

  /**
   * Forward pass: y = x @ W^T + b
   *
   * @param input - Input tensor of shape [..., inFeatures]
   * @returns Output tensor of shape [..., outFeatures]
   */
  forward(input: Tensor): Tensor {
    const out = input.matmul(this.weight.transpose(0, 1));
    return this.bias === null ? out : out.add(this.bias);
  }
}
