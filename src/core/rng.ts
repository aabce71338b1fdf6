import { NDArray } from "../backend/cpu/numeric";
import { getConfig } from "./config";
import { sizeOf } from "./shape";

export function mix32(value: number): number {
  let v = value >>> 0;
  v ^= v >>> 16;
  v = Math.imul(v, 0x7feb352d);
  v ^= v >>> 15;
  v = Math.imul(v, 0x846ca68b);
  v ^= v >>> 16;
  return v >>> 0;
}

/**
 * Counter-based pseudo-random generator.
 *
 * Each draw hashes `(seed, drawIndex)`, so two generators built from the same
 * seed produce identical streams. Pass one explicitly to every initializer
 * that needs randomness.
 */
export class Generator {
  readonly seed: number;
  private drawCount = 0;

  constructor(seed: number = getConfig().seed) {
    this.seed = seed >>> 0;
  }

  /** Number of uniform draws taken so far. */
  get draws(): number {
    return this.drawCount;
  }

  /** Uniform sample in [0, 1). */
  random(): number {
    this.drawCount += 1;
    let state = this.seed ^ Math.imul(this.drawCount, 0x9e3779b9);
    state = mix32(state);
    state = mix32(state ^ Math.imul(this.seed, 0x85ebca6b));
    return state / 2 ** 32;
  }

  /** Normal sample via Box-Muller. */
  normal(mean = 0, std = 1): number {
    const u1 = this.random();
    const u2 = this.random();
    const r = Math.sqrt(-2 * Math.log(u1 || 1e-10));
    return mean + std * r * Math.cos(2 * Math.PI * u2);
  }

  uniform(shape: number[], low = 0, high = 1): NDArray {
    const data = new Float64Array(sizeOf(shape));
    for (let i = 0; i < data.length; i += 1) {
      data[i] = low + (high - low) * this.random();
    }
    return new NDArray(shape, data);
  }

  normalArray(shape: number[], mean = 0, std = 1): NDArray {
    const data = new Float64Array(sizeOf(shape));
    for (let i = 0; i < data.length; i += 1) {
      data[i] = this.normal(mean, std);
    }
    return new NDArray(shape, data);
  }
}
