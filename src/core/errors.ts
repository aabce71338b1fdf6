export class MissingBackwardRuleError extends Error {
  name = "MissingBackwardRuleError";
  readonly op: string;
  readonly slot: number;

  constructor(op: string, slot: number) {
    super(`No backward rule registered for op "${op}" at parent slot ${slot}`);
    this.op = op;
    this.slot = slot;
  }
}

export class ScalarConversionError extends Error {
  name = "ScalarConversionError";
}

export class RankError extends Error {
  name = "RankError";
}

export class GradientShapeError extends Error {
  name = "GradientShapeError";
}

export class GraphCycleError extends Error {
  name = "GraphCycleError";
}

export class IndexError extends Error {
  name = "IndexError";
}

export class ConfigError extends Error {
  name = "ConfigError";
}
