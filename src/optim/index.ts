export { SGD, type SGDOptions } from "./sgd";
export { validateOptimizerParams } from "./validate";
