/** Key-value mapping a task reads from. Tasks never see a mutable reference to the caller's object. */
export type Context = Readonly<Record<string, unknown>>;

export type TaskOutput = Record<string, unknown>;

export type TaskMetadata = {
  /** Worst-case duration in seconds. */
  timeout?: number;
  /** Context keys the task reads. */
  requirements?: readonly string[];
};

/**
 * Auxiliary argument of every task call. `activity` is an opaque handle
 * owned by the workflow engine and is passed through by identity.
 */
export type TaskInvocation<A> = {
  activity: A;
  /** Aborted when a sibling task in the same parallel run fails. */
  signal: AbortSignal;
};

export type TaskFn<A = unknown> = (
  context: Context,
  invocation: TaskInvocation<A>,
) => TaskOutput | void | Promise<TaskOutput | void>;

export type Task<A = unknown> = {
  name: string;
  run: TaskFn<A>;
  /** Present once the task has been annotated with defineTask(). */
  metadata?: Readonly<TaskMetadata>;
};

/** What runners accept: an annotated task, or a bare function. */
export type TaskLike<A = unknown> = Task<A> | TaskFn<A>;
