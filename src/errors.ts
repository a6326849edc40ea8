export type ErrorCode =
  | "NO_RUNNER_REQUIREMENTS"
  | "INVALID_TASK_METADATA"
  | "INVALID_RUNNER_OPTIONS"
  | "INVALID_CONFIG"
  | "NOT_IMPLEMENTED";

/** Base class for every error the runners raise themselves. Task errors are never wrapped. */
export class RunnerError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Raised while inspecting a runner, before anything executes. */
export class ConfigError extends RunnerError {}

export class ValidationError extends RunnerError {
  readonly issues: string[];

  constructor(code: ErrorCode, message: string, issues: string[] = []) {
    super(code, message);
    this.issues = issues;
  }
}

export class NotImplementedError extends RunnerError {
  constructor(what: string) {
    super("NOT_IMPLEMENTED", `${what} is not implemented`);
  }
}

/**
 * A task was never annotated with the context keys it reads, so the
 * requirement set of its runner cannot be known.
 */
export class NoRunnerRequirementsFound extends ConfigError {
  readonly taskName: string;

  constructor(taskName: string) {
    super(
      "NO_RUNNER_REQUIREMENTS",
      `Task "${taskName}" has no metadata; declare its requirements with defineTask()`,
    );
    this.taskName = taskName;
  }
}
