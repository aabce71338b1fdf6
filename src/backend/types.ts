export type { Shape } from "../core/shape";

/**
 * Nested JavaScript array of arbitrary depth, used to build arrays from
 * literal data. A bare number is a 0-d value.
 */
export type NestedArray = number | NestedArray[];

export type SumOptions = {
  dim?: number | number[] | null;
  keepdim?: boolean;
};

export type MaxOptions = SumOptions;

export type ArgReduceOptions = {
  dim: number;
  keepdim?: boolean;
};

export type TransposeOptions = {
  dim0: number;
  dim1: number;
};
