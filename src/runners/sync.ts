import type { Context, TaskOutput } from "../tasks/types.js";
import { createLogger } from "../utils/logger.js";
import { BaseRunner, mergeOutput } from "./base.js";
import type { RunnerStrategy } from "./types.js";

const log = createLogger("sync-runner");

/**
 * Runs tasks one after another. Each task sees the caller's context
 * overlaid with everything earlier tasks produced.
 */
export class SyncRunner<A = unknown> extends BaseRunner<A> {
  protected readonly strategy: RunnerStrategy = "sync";

  async execute(activity: A, context: Context): Promise<TaskOutput> {
    const start = Date.now();
    const { signal } = new AbortController();
    const result: TaskOutput = {};

    for (const task of this.tasks) {
      const taskContext: Context = { ...context, ...result };
      let output: TaskOutput;
      try {
        output = await this.invoke(task, taskContext, { activity, signal });
      } catch (err) {
        log.error(`Sequential run failed on "${task.name}"`, { error: String(err), durationMs: Date.now() - start });
        throw err;
      }
      mergeOutput(result, output);
    }

    log.info(`Ran ${this.tasks.length} task(s) in sequence`, { durationMs: Date.now() - start });
    return result;
  }
}
