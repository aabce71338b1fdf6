import { ScalarConversionError } from "./core/errors";
import type { Tensor } from "./tensor";

export type GradcheckOptions = {
  /** Finite-difference step. Default: 1e-6 */
  eps?: number;
  /** Default: 1e-4 */
  rtol?: number;
  /** Default: 1e-5 */
  atol?: number;
};

export type GradcheckMismatch = {
  /** Position of the tensor in `inputs`. */
  input: number;
  /** Flat element index inside that tensor. */
  element: number;
  analytic: number;
  numeric: number;
};

export type GradcheckResult = {
  ok: boolean;
  maxError: number;
  mismatches: GradcheckMismatch[];
};

/**
 * Compare backward gradients of `fn` against centred finite differences.
 *
 * `fn` must return a one-element tensor. Inputs with `requiresGrad = false`
 * are skipped. Each input's array must be contiguous, since elements are
 * perturbed in place and restored afterwards.
 */
export function gradcheck(
  fn: (...inputs: Tensor[]) => Tensor,
  inputs: Tensor[],
  options?: GradcheckOptions,
): GradcheckResult {
  const eps = options?.eps ?? 1e-6;
  const rtol = options?.rtol ?? 1e-4;
  const atol = options?.atol ?? 1e-5;

  for (const input of inputs) {
    input.zeroGrad();
  }
  const out = fn(...inputs);
  if (out.size !== 1) {
    throw new ScalarConversionError(
      `gradcheck requires a one-element output, got shape [${out.shape}]`,
    );
  }
  out.backward();

  const evaluate = (): number => fn(...inputs).item();
  const mismatches: GradcheckMismatch[] = [];
  let maxError = 0;

  inputs.forEach((input, inputIndex) => {
    if (!input.requiresGrad) return;
    const { array } = input;
    if (!array.isContiguous()) {
      throw new Error(`gradcheck input ${inputIndex} must be contiguous`);
    }
    const analytic = input.grad.toArray();
    for (let element = 0; element < array.size; element += 1) {
      const position = array.offset + element;
      const original = array.data[position];
      array.data[position] = original + eps;
      const plus = evaluate();
      array.data[position] = original - eps;
      const minus = evaluate();
      array.data[position] = original;

      const numeric = (plus - minus) / (2 * eps);
      const error = Math.abs(analytic[element] - numeric);
      maxError = Math.max(maxError, error);
      if (!(error <= atol + rtol * Math.abs(numeric))) {
        mismatches.push({ input: inputIndex, element, analytic: analytic[element], numeric });
      }
    }
  });

  return { ok: mismatches.length === 0, maxError, mismatches };
}
