import { getConfig } from "../config.js";
import { parseOrThrow, RunnerOptionsSchema } from "../schemas.js";
import type { Context, TaskLike, TaskOutput } from "../tasks/types.js";
import { createLogger } from "../utils/logger.js";
import { BaseRunner, mergeOutput } from "./base.js";
import type { AsyncRunnerOptions, RunnerStrategy } from "./types.js";

const log = createLogger("async-runner");

type RunState = {
  next: number;
  failure?: { error: unknown; task: string };
};

/**
 * Runs every task against the caller's context on a bounded pool of
 * workers. No task sees another task's output; outputs are merged in
 * completion order, so on a key collision the last task to finish wins.
 *
 * On the first failure, queued tasks are never started, the shared
 * signal is aborted, in-flight tasks are awaited, and the first error is
 * rethrown as-is. Nothing collected so far is returned.
 */
export class AsyncRunner<A = unknown> extends BaseRunner<A> {
  readonly maxWorkers: number;
  protected readonly strategy: RunnerStrategy = "async";

  constructor(tasks: Iterable<TaskLike<A>>, opts: AsyncRunnerOptions<A> = {}) {
    super(tasks, opts);
    const { maxWorkers } = parseOrThrow(
      RunnerOptionsSchema,
      { maxWorkers: opts.maxWorkers },
      "INVALID_RUNNER_OPTIONS",
      "runner options",
    );
    this.maxWorkers = maxWorkers ?? getConfig().limits.maxWorkers;
  }

  async execute(activity: A, context: Context): Promise<TaskOutput> {
    const start = Date.now();
    const controller = new AbortController();
    const state: RunState = { next: 0 };
    const result: TaskOutput = {};

    // Workers share `state` and `result`; both are only touched between
    // awaits on the event loop thread.
    const worker = async (id: number): Promise<void> => {
      while (!state.failure && state.next < this.tasks.length) {
        const task = this.tasks[state.next++];
        log.debug(`Dispatching "${task.name}" to worker ${id}`);
        try {
          const output = await this.invoke(task, { ...context }, { activity, signal: controller.signal });
          if (!state.failure) mergeOutput(result, output);
        } catch (err) {
          if (state.failure) {
            log.debug(`Dropping error from "${task.name}" after an earlier failure`, { error: String(err) });
            continue;
          }
          state.failure = { error: err, task: task.name };
          controller.abort(err);
        }
      }
    };

    const poolSize = Math.min(this.maxWorkers, this.tasks.length);
    await Promise.all(Array.from({ length: poolSize }, (_, i) => worker(i)));

    if (state.failure) {
      log.error(`Parallel run failed on "${state.failure.task}"`, {
        error: String(state.failure.error),
        started: state.next,
        skipped: this.tasks.length - state.next,
        durationMs: Date.now() - start,
      });
      throw state.failure.error;
    }

    log.info(`Ran ${this.tasks.length} task(s) on ${poolSize} worker(s)`, { durationMs: Date.now() - start });
    return result;
  }
}
