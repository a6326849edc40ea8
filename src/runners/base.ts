import { getConfig } from "../config.js";
import { NoRunnerRequirementsFound, NotImplementedError } from "../errors.js";
import { toTask } from "../tasks/task.js";
import type { Context, Task, TaskInvocation, TaskLike, TaskOutput } from "../tasks/types.js";
import { createLogger } from "../utils/logger.js";
import type { RunnerDescription, RunnerOptions, RunnerStrategy, TaskOutcome } from "./types.js";

const log = createLogger("runner");

/**
 * Copy `output` onto `target` with define semantics, so a key such as
 * `"__proto__"` lands as an own property instead of hitting a setter.
 */
export function mergeOutput(target: TaskOutput, output: TaskOutput): void {
  for (const [key, value] of Object.entries(output)) {
    Object.defineProperty(target, key, { value, enumerable: true, writable: true, configurable: true });
  }
}

/**
 * Owns the fixed task list of one activity and derives its scheduling
 * metadata. Subclasses decide how the tasks are executed.
 */
export class BaseRunner<A = unknown> {
  readonly tasks: ReadonlyArray<Task<A>>;
  protected readonly strategy: RunnerStrategy = "base";
  private readonly hooks: RunnerOptions<A>;

  constructor(tasks: Iterable<TaskLike<A>>, opts: RunnerOptions<A> = {}) {
    this.tasks = Object.freeze([...tasks].map((t) => toTask(t)));
    this.hooks = { onTaskStart: opts.onTaskStart, onTaskEnd: opts.onTaskEnd };
  }

  /**
   * Worst-case duration of the whole activity in seconds. Every task is
   * counted in full, even under parallel execution.
   */
  get timeoutSeconds(): number {
    let total = 0;
    for (const task of this.tasks) {
      total += taskTimeout(task);
    }
    return total;
  }

  /** Same as `timeoutSeconds`, as the string the workflow scheduler takes. */
  get timeout(): string {
    return String(this.timeoutSeconds);
  }

  /**
   * Context keys the task list reads. Throws NoRunnerRequirementsFound as
   * soon as a task without metadata is met.
   */
  get requirements(): Set<string> {
    const requirements = new Set<string>();
    for (const task of this.tasks) {
      if (!task.metadata) {
        throw new NoRunnerRequirementsFound(task.name);
      }
      for (const key of task.metadata.requirements ?? []) {
        requirements.add(key);
      }
    }
    return requirements;
  }

  describe(): RunnerDescription {
    return {
      strategy: this.strategy,
      timeout: this.timeout,
      tasks: this.tasks.map((task) => ({
        name: task.name,
        timeout: taskTimeout(task),
        requirements: task.metadata ? [...(task.metadata.requirements ?? [])] : undefined,
      })),
    };
  }

  async execute(_activity: A, _context: Context): Promise<TaskOutput> {
    throw new NotImplementedError(`${this.constructor.name}.execute()`);
  }

  /** Run one task body with hooks and timing. A missing return value becomes `{}`. */
  protected async invoke(task: Task<A>, context: Context, invocation: TaskInvocation<A>): Promise<TaskOutput> {
    this.callHook("onTaskStart", () => this.hooks.onTaskStart?.(task));
    log.debug(`Starting task "${task.name}"`);

    const start = Date.now();
    let output: TaskOutput;
    try {
      const result = await task.run(context, invocation);
      output = result ? result : {};
    } catch (err) {
      const durationMs = Date.now() - start;
      log.debug(`Task "${task.name}" failed`, { error: String(err), durationMs });
      this.callHook("onTaskEnd", () => this.hooks.onTaskEnd?.(task, { status: "error", error: err, durationMs }));
      throw err;
    }

    const outcome: TaskOutcome = { status: "ok", output, durationMs: Date.now() - start };
    log.debug(`Finished task "${task.name}"`, { durationMs: outcome.durationMs, keys: Object.keys(output) });
    this.callHook("onTaskEnd", () => this.hooks.onTaskEnd?.(task, outcome));
    return output;
  }

  private callHook(name: keyof RunnerOptions<A>, fn: () => void | Promise<void>): void {
    const report = (err: unknown) => log.warn(`${name} hook threw; ignoring`, { error: String(err) });
    try {
      const pending = fn();
      if (pending) void pending.catch(report);
    } catch (err) {
      report(err);
    }
  }
}

function taskTimeout<A>(task: Task<A>): number {
  return task.metadata?.timeout ?? getConfig().tasks.defaultTimeoutSeconds;
}
