import { ConfigError } from "./errors";

/**
 * How a Recipe captures its array operands.
 * - "copy": deep-copy every operand when the Recipe is created.
 * - "share": keep references; mutating a parent's array in place before
 *   backward changes what its gradient rules see.
 */
export type SnapshotMode = "copy" | "share";

export type RecipegradConfig = {
  /** Print `[scope] message` diagnostics. Env: RECIPEGRAD_DEBUG */
  debug: boolean;
  /** Recipe operand capture policy. Env: RECIPEGRAD_SNAPSHOT */
  snapshot: SnapshotMode;
  /** Seed used by `new Generator()` without an explicit seed. Env: RECIPEGRAD_SEED */
  seed: number;
};

export const DEFAULT_CONFIG: Readonly<RecipegradConfig> = Object.freeze({
  debug: false,
  snapshot: "copy",
  seed: 0,
});

type Env = Record<string, string | undefined>;

function parseFlag(name: string, raw: string): boolean {
  const value = raw.trim().toLowerCase();
  if (value === "1" || value === "true" || value === "yes") return true;
  if (value === "" || value === "0" || value === "false" || value === "no") return false;
  throw new ConfigError(`${name} must be a boolean flag, got "${raw}"`);
}

function parseSnapshot(raw: string): SnapshotMode {
  const value = raw.trim().toLowerCase();
  if (value === "copy" || value === "share") return value;
  throw new ConfigError(`RECIPEGRAD_SNAPSHOT must be "copy" or "share", got "${raw}"`);
}

function parseSeed(raw: string): number {
  const value = Number(raw.trim());
  if (!Number.isInteger(value)) {
    throw new ConfigError(`RECIPEGRAD_SEED must be an integer, got "${raw}"`);
  }
  return value;
}

export function loadConfig(
  env: Env = typeof process !== "undefined" ? process.env : {},
): RecipegradConfig {
  const config: RecipegradConfig = { ...DEFAULT_CONFIG };
  if (env.RECIPEGRAD_DEBUG !== undefined) {
    config.debug = parseFlag("RECIPEGRAD_DEBUG", env.RECIPEGRAD_DEBUG);
  }
  if (env.RECIPEGRAD_SNAPSHOT !== undefined) {
    config.snapshot = parseSnapshot(env.RECIPEGRAD_SNAPSHOT);
  }
  if (env.RECIPEGRAD_SEED !== undefined) {
    config.seed = parseSeed(env.RECIPEGRAD_SEED);
  }
  return config;
}

let activeConfig: RecipegradConfig = loadConfig();

export function getConfig(): Readonly<RecipegradConfig> {
  return activeConfig;
}

/**
 * Merge `partial` into the active configuration.
 * Returns the previous configuration so callers can restore it.
 */
export function setConfig(partial: Partial<RecipegradConfig>): RecipegradConfig {
  const previous = activeConfig;
  activeConfig = { ...activeConfig, ...partial };
  return previous;
}

export function withConfig<T>(partial: Partial<RecipegradConfig>, fn: () => T): T {
  const previous = setConfig(partial);
  try {
    return fn();
  } finally {
    activeConfig = previous;
  }
}
