import type { Tensor } from "../tensor";
import { relu } from "./functional";
import { Module } from "./module";

/** Elementwise max(x, 0). Zero inputs pass their gradient through. */
export class ReLU extends Module {
  forward(input: Tensor): Tensor {
    return relu(input);
  }
}
