// Config
export { getConfig, configure, resetConfig, defaults, DEFAULT_TASK_TIMEOUT } from "./config.js";
export type { RunnerConfig } from "./config.js";

// Errors
export {
  RunnerError,
  ConfigError,
  ValidationError,
  NotImplementedError,
  NoRunnerRequirementsFound,
} from "./errors.js";
export type { ErrorCode } from "./errors.js";

// Schemas
export { parseOrThrow, TaskMetadataSchema, RunnerOptionsSchema, RunnerConfigSchema } from "./schemas.js";

// Tasks
export { defineTask, getTaskMetadata, isTask, toTask } from "./tasks/task.js";
export type { DefineTaskOptions } from "./tasks/task.js";
export type { Context, Task, TaskFn, TaskInvocation, TaskLike, TaskMetadata, TaskOutput } from "./tasks/types.js";

// Runners
export { BaseRunner, mergeOutput } from "./runners/base.js";
export { SyncRunner } from "./runners/sync.js";
export { AsyncRunner } from "./runners/async.js";
export type {
  AsyncRunnerOptions,
  RunnerDescription,
  RunnerOptions,
  RunnerStrategy,
  TaskOutcome,
} from "./runners/types.js";

// Utils
export { log, createLogger, setLogLevel, getLogLevel } from "./utils/logger.js";
export type { Logger, LogLevel } from "./utils/logger.js";
