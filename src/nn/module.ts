/**
 * Base Module class for neural network layers.
 * Parameters and child modules are registered by name; `parameters()`
 * walks the tree.
 */

import type { Tensor } from "../tensor";

export abstract class Module {
  private _parameters = new Map<string, Tensor>();
  private _modules = new Map<string, Module>();

  /**
   * Register a learnable tensor. Returns it so constructors can assign the
   * result to a field.
   */
  registerParameter(name: string, tensor: Tensor): Tensor {
    if (!tensor.requiresGrad) {
      throw new Error(`Parameter "${name}" must have requiresGrad=true`);
    }
    this._parameters.set(name, tensor);
    return tensor;
  }

  /**
   * Register a child module whose parameters are included in
   * `parameters()` and `namedParameters()`.
   */
  registerModule<M extends Module>(name: string, module: M): M {
    this._modules.set(name, module);
    return module;
  }

  /**
   * Return all registered child modules.
   */
  modules(): Module[] {
    return [...this._modules.values()];
  }

  /**
   * Parameters of this module and its children, keyed by dotted path.
   */
  namedParameters(prefix = ""): Array<[string, Tensor]> {
    const result: Array<[string, Tensor]> = [];
    for (const [name, param] of this._parameters) {
      result.push([prefix + name, param]);
    }
    for (const [name, child] of this._modules) {
      result.push(...child.namedParameters(`${prefix}${name}.`));
    }
    return result;
  }

  /**
   * All learnable parameters. A tensor shared between modules appears once.
   */
  parameters(): Tensor[] {
    const seen = new Set<Tensor>();
    const result: Tensor[] = [];
    for (const [, param] of this.namedParameters()) {
      if (seen.has(param)) continue;
      seen.add(param);
      result.push(param);
    }
    return result;
  }

  zeroGrad(): void {
    for (const param of this.parameters()) {
      param.zeroGrad();
    }
  }

  /**
   * Forward pass. Subclasses must implement this.
   */
  abstract forward(input: Tensor): Tensor;

  /**
   * Callable interface - calls forward().
   */
  call(input: Tensor): Tensor {
    return this.forward(input);
  }
}
