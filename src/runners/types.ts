import type { Task, TaskOutput } from "../tasks/types.js";

export type TaskOutcome =
  | { status: "ok"; output: TaskOutput; durationMs: number }
  | { status: "error"; error: unknown; durationMs: number };

/**
 * Hooks run around every task invocation. The run does not wait for an
 * async hook; a hook that throws or rejects is logged and ignored.
 */
export type RunnerOptions<A = unknown> = {
  onTaskStart?: (task: Task<A>) => void | Promise<void>;
  onTaskEnd?: (task: Task<A>, outcome: TaskOutcome) => void | Promise<void>;
};

export type AsyncRunnerOptions<A = unknown> = RunnerOptions<A> & {
  /** Upper bound on task bodies in flight at once (default: config `limits.maxWorkers`). */
  maxWorkers?: number;
};

export type RunnerStrategy = "base" | "sync" | "async";

export type RunnerDescription = {
  strategy: RunnerStrategy;
  /** Aggregate timeout in seconds, as the scheduler expects it. */
  timeout: string;
  tasks: Array<{
    name: string;
    timeout: number;
    /** Undefined when the task was never annotated. */
    requirements?: string[];
  }>;
};
