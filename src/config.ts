import { parseOrThrow, RunnerConfigSchema } from "./schemas.js";
import type { LogLevel } from "./utils/logger.js";

export type RunnerConfig = {
  tasks: {
    /** Seconds assumed for a task that declares no timeout. */
    defaultTimeoutSeconds: number;
  };
  limits: {
    maxWorkers: number;
  };
  logging: {
    level: LogLevel;
  };
};

type DeepPartial<T> = {
  [P in keyof T]?: T[P] extends object ? DeepPartial<T[P]> : T[P];
};

/** Seconds assumed for a task that declares no timeout: 10 minutes. */
export const DEFAULT_TASK_TIMEOUT = 600;

const DEFAULTS: RunnerConfig = {
  tasks: {
    defaultTimeoutSeconds: DEFAULT_TASK_TIMEOUT,
  },
  limits: {
    maxWorkers: 3,
  },
  logging: {
    level: "info",
  },
};

let current: RunnerConfig = structuredClone(DEFAULTS);

function mergeSection<T extends object>(base: T, overrides: Partial<T> | undefined): T {
  const result = { ...base };
  if (!overrides) return result;
  for (const key of Object.keys(overrides) as (keyof T)[]) {
    const val = overrides[key];
    if (val !== undefined) result[key] = val;
  }
  return result;
}

/**
 * Override config values. Merges deeply with defaults. Throws a
 * ValidationError (`INVALID_CONFIG`) and leaves the current config in
 * place when the merged result is invalid.
 */
export function configure(overrides: DeepPartial<RunnerConfig>): void {
  const merged: RunnerConfig = {
    tasks: mergeSection(DEFAULTS.tasks, overrides.tasks),
    limits: mergeSection(DEFAULTS.limits, overrides.limits),
    logging: mergeSection(DEFAULTS.logging, overrides.logging),
  };
  current = parseOrThrow(RunnerConfigSchema, merged, "INVALID_CONFIG", "runner config");
}

/** Reset config to defaults. */
export function resetConfig(): void {
  current = structuredClone(DEFAULTS);
}

/** Get the current config (read-only). */
export function getConfig(): Readonly<RunnerConfig> {
  return current;
}

/** The default config values (frozen). */
export const defaults: Readonly<RunnerConfig> = Object.freeze(structuredClone(DEFAULTS));
