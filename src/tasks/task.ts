import { parseOrThrow, TaskMetadataSchema } from "../schemas.js";
import type { Task, TaskFn, TaskLike, TaskMetadata } from "./types.js";

export type DefineTaskOptions = TaskMetadata & {
  name?: string;
};

function nameOf(fn: { name: string }): string {
  return fn.name || "anonymous";
}

/**
 * Wrap a task body and attach its metadata. A task defined here always
 * carries a metadata record, even an empty one: it has been annotated and
 * declares no requirements, which is different from never being annotated.
 */
export function defineTask<A = unknown>(fn: TaskFn<A>, options: DefineTaskOptions = {}): Task<A> {
  const { name, ...rest } = options;
  const parsed = parseOrThrow(
    TaskMetadataSchema,
    rest,
    "INVALID_TASK_METADATA",
    `metadata for task "${name ?? nameOf(fn)}"`,
  );

  const metadata: TaskMetadata = {};
  if (parsed.timeout !== undefined) metadata.timeout = parsed.timeout;
  if (parsed.requirements !== undefined) metadata.requirements = Object.freeze([...parsed.requirements]);

  return Object.freeze({
    name: name ?? nameOf(fn),
    run: fn,
    metadata: Object.freeze(metadata),
  });
}

export function getTaskMetadata<A>(task: Task<A>): Readonly<TaskMetadata> | undefined {
  return task.metadata;
}

export function isTask<A>(value: TaskLike<A>): value is Task<A> {
  return typeof value !== "function";
}

/**
 * Normalise a bare function into a Task without metadata. A hand-built
 * Task is returned as-is once its metadata, if any, passes validation.
 */
export function toTask<A>(value: TaskLike<A>): Task<A> {
  if (isTask(value)) {
    if (value.metadata !== undefined) {
      parseOrThrow(TaskMetadataSchema, value.metadata, "INVALID_TASK_METADATA", `metadata for task "${value.name}"`);
    }
    return value;
  }
  return { name: nameOf(value), run: value };
}
