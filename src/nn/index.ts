/**
 * Neural network modules and functions.
 */

export { ReLU } from "./activation";
export { MLPClassifier, type MLPClassifierOptions } from "./classifier";
// Functional interface (nn.functional)
export * as functional from "./functional";
export { crossEntropy, logSoftmax, nllLoss, relu } from "./functional";
export { Linear, type LinearOptions } from "./linear";
export { Module } from "./module";
