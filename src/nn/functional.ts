/**
 * Functional neural network operations.
 */

import { arange, max, NDArray, fromArray } from "../backend/cpu/numeric";
import type { Tensor } from "../tensor";

export function relu(input: Tensor): Tensor {
  return input.maximum(0);
}

/**
 * Log of softmax along `dim`.
 *
 * The per-row maximum is subtracted first as a plain array, so it takes no
 * part in the gradient (the result does not depend on it).
 */
export function logSoftmax(input: Tensor, dim = -1): Tensor {
  const shift = max(input.array, { dim, keepdim: true });
  const shifted = input.sub(shift);
  const logSumExp = shifted.exp().sum({ dim, keepdim: true }).log();
  return shifted.sub(logSumExp);
}

function targetArray(targets: readonly number[] | NDArray): NDArray {
  return targets instanceof NDArray ? targets : fromArray(targets, [targets.length]);
}

/**
 * Mean negative log-likelihood of `targets` under `logProbs`.
 *
 * @param logProbs - [batch, classes] log-probabilities
 * @param targets - one class index per row
 */
export function nllLoss(logProbs: Tensor, targets: readonly number[] | NDArray): Tensor {
  if (logProbs.ndim !== 2) {
    throw new Error(`nllLoss expects [batch, classes] input, got shape [${logProbs.shape}]`);
  }
  const labels = targetArray(targets);
  const batch = logProbs.shape[0];
  if (labels.ndim !== 1 || labels.size !== batch) {
    throw new Error(`nllLoss expects ${batch} targets, got shape [${labels.shape}]`);
  }
  return logProbs.index(arange(batch), labels).mean().neg();
}

/**
 * Cross-entropy between raw `logits` and integer class `targets`.
 */
export function crossEntropy(logits: Tensor, targets: readonly number[] | NDArray): Tensor {
  return nllLoss(logSoftmax(logits, -1), targets);
}
