import {
  add,
  copyInPlace,
  mul,
  type NDArray,
  scalar,
  sub,
} from "../backend/cpu/numeric";
import { debugLog } from "../core/debug";
import type { Tensor } from "../tensor";
import { validateOptimizerParams } from "./validate";

export type SGDOptions = {
  lr: number;
  momentum?: number;
  weightDecay?: number;
};

export class SGD {
  private params: Tensor[];
  private readonly lr: number;
  private readonly momentum: number;
  private readonly weightDecay: number;
  private velocity: Array<NDArray | null>;

  constructor(params: Tensor[], options: SGDOptions) {
    validateOptimizerParams("SGD", params);
    if (!(options.lr > 0)) {
      throw new Error("SGD learning rate must be > 0");
    }
    const momentum = options.momentum ?? 0;
    const weightDecay = options.weightDecay ?? 0;
    if (momentum < 0) {
      throw new Error("SGD momentum must be >= 0");
    }
    if (weightDecay < 0) {
      throw new Error("SGD weight decay must be >= 0");
    }
    this.lr = options.lr;
    this.params = params.slice();
    this.momentum = momentum;
    this.weightDecay = weightDecay;
    this.velocity = new Array<NDArray | null>(params.length).fill(null);
  }

  getParams(): Tensor[] {
    return this.params.slice();
  }

  /**
   * One descent step: `v = momentum * v + g + weightDecay * p`, `p -= lr * v`.
   * Parameter arrays are written in place so tensor identity and any
   * aliasing set up by the caller are preserved.
   */
  step(): Tensor[] {
    for (let i = 0; i < this.params.length; i += 1) {
      const param = this.params[i];
      let update: NDArray = param.grad;
      if (this.weightDecay !== 0) {
        update = add(update, mul(param.array, scalar(this.weightDecay)));
      }
      if (this.momentum !== 0) {
        const prev = this.velocity[i];
        update = prev === null ? update.clone() : add(mul(prev, scalar(this.momentum)), update);
        this.velocity[i] = update;
      }
      copyInPlace(param.array, sub(param.array, mul(update, scalar(this.lr))));
    }
    debugLog("sgd", `step updated ${this.params.length} parameters`);
    return this.params.slice();
  }

  zeroGrad(): void {
    for (const param of this.params) {
      param.zeroGrad();
    }
  }
}
