import { describe, expect, it, vi } from "vitest";
import { SyncRunner } from "../src/runners/sync.js";
import type { TaskOutcome } from "../src/runners/types.js";
import { defineTask } from "../src/tasks/task.js";
import type { Context, TaskFn } from "../src/tasks/types.js";

const sleep = (ms: number) => new Promise((r) => setTimeout(r, ms));

describe("SyncRunner", () => {
  it("threads each task's output into the next task's context", async () => {
    const seen: Context[] = [];
    const runner = new SyncRunner([
      (ctx) => {
        seen.push(ctx);
        return { a: 1 };
      },
      (ctx) => {
        seen.push(ctx);
        return { b: Number(ctx.a) + 1 };
      },
    ]);

    const result = await runner.execute(null, {});

    expect(result).toEqual({ a: 1, b: 2 });
    expect(seen[1]).toEqual({ a: 1 });
  });

  it("lets accumulated outputs shadow the caller's context", async () => {
    let observed: unknown;
    const runner = new SyncRunner([
      () => ({ user: "from-task" }),
      (ctx) => {
        observed = ctx.user;
      },
    ]);

    await runner.execute(null, { user: "from-caller" });

    expect(observed).toBe("from-task");
  });

  it("returns only what the tasks produced", async () => {
    const runner = new SyncRunner([(ctx) => ({ doubled: Number(ctx.seed) * 2 })]);

    const result = await runner.execute(null, { seed: 4 });

    expect(result).toEqual({ doubled: 8 });
  });

  it("lets later tasks overwrite earlier keys", async () => {
    const runner = new SyncRunner([() => ({ k: "first", a: 1 }), () => ({ k: "second" })]);

    expect(await runner.execute(null, {})).toEqual({ k: "second", a: 1 });
  });

  it("keeps a \"__proto__\" output key as plain data", async () => {
    const runner = new SyncRunner([() => JSON.parse('{"__proto__":{"x":1},"y":2}'), () => ({ z: 3 })]);

    const result = await runner.execute(null, {});

    expect(Object.keys(result)).toEqual(["__proto__", "y", "z"]);
    expect(Object.getPrototypeOf(result)).toBe(Object.prototype);
    expect(Object.getOwnPropertyDescriptor(result, "__proto__")?.value).toEqual({ x: 1 });
    expect("x" in result).toBe(false);
  });

  it("treats a task with no return value as producing nothing", async () => {
    const runner = new SyncRunner([() => undefined, async () => {}, () => ({ done: true })]);

    expect(await runner.execute(null, {})).toEqual({ done: true });
  });

  it("never mutates the caller's context", async () => {
    const context = Object.freeze({ seed: 1 });
    const runner = new SyncRunner([() => ({ seed: 2 }), () => ({ extra: true })]);

    const result = await runner.execute(null, context);

    expect(context).toEqual({ seed: 1 });
    expect(result).not.toBe(context);
    expect(result).toEqual({ seed: 2, extra: true });
  });

  it("awaits each async task before starting the next", async () => {
    const order: string[] = [];
    const step = (id: string, ms: number): TaskFn => async () => {
      order.push(`start:${id}`);
      await sleep(ms);
      order.push(`end:${id}`);
    };
    const runner = new SyncRunner([step("a", 20), step("b", 1), step("c", 5)]);

    await runner.execute(null, {});

    expect(order).toEqual(["start:a", "end:a", "start:b", "end:b", "start:c", "end:c"]);
  });

  it("passes the same activity handle to every task", async () => {
    const activity = { id: "activity-1" };
    const received: unknown[] = [];
    const runner = new SyncRunner<typeof activity>([
      (_ctx, { activity: a }) => {
        received.push(a);
      },
      (_ctx, { activity: a }) => {
        received.push(a);
      },
    ]);

    await runner.execute(activity, {});

    expect(received).toHaveLength(2);
    expect(received[0]).toBe(activity);
    expect(received[1]).toBe(activity);
  });

  it("does not put the activity into the context", async () => {
    let keys: string[] = [];
    const runner = new SyncRunner([
      (ctx) => {
        keys = Object.keys(ctx);
      },
    ]);

    await runner.execute({ id: "activity-1" }, { a: 1 });

    expect(keys).toEqual(["a"]);
  });

  it("propagates the first error unchanged and stops", async () => {
    const boom = new Error("boom");
    const second = vi.fn(() => ({ b: 2 }));
    const runner = new SyncRunner([
      () => {
        throw boom;
      },
      second,
    ]);

    await expect(runner.execute(null, {})).rejects.toBe(boom);
    expect(second).not.toHaveBeenCalled();
  });

  it("propagates a rejected promise unchanged", async () => {
    const boom = new TypeError("bad input");
    const after = vi.fn();
    const runner = new SyncRunner([() => ({ a: 1 }), async () => Promise.reject(boom), after]);

    await expect(runner.execute(null, {})).rejects.toBe(boom);
    expect(after).not.toHaveBeenCalled();
  });

  it("calls hooks around every task in order", async () => {
    const events: string[] = [];
    const runner = new SyncRunner(
      [defineTask(() => ({ a: 1 }), { name: "first" }), defineTask(() => {}, { name: "second" })],
      {
        onTaskStart: (task) => events.push(`start:${task.name}`),
        onTaskEnd: (task, outcome) => events.push(`end:${task.name}:${outcome.status}`),
      },
    );

    await runner.execute(null, {});

    expect(events).toEqual(["start:first", "end:first:ok", "start:second", "end:second:ok"]);
  });

  it("reports the failing task to onTaskEnd", async () => {
    const boom = new Error("boom");
    const outcomes: TaskOutcome[] = [];
    const runner = new SyncRunner(
      [
        defineTask(
          () => {
            throw boom;
          },
          { name: "explodes" },
        ),
      ],
      { onTaskEnd: (_task, outcome) => outcomes.push(outcome) },
    );

    await expect(runner.execute(null, {})).rejects.toBe(boom);
    expect(outcomes).toHaveLength(1);
    expect(outcomes[0]).toMatchObject({ status: "error", error: boom });
  });

  it("logs the failing task once at error level", async () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    const runner = new SyncRunner([
      defineTask(
        () => {
          throw new Error("boom");
        },
        { name: "explodes" },
      ),
    ]);

    await expect(runner.execute(null, {})).rejects.toThrow("boom");
    expect(error).toHaveBeenCalledTimes(1);
    expect(error.mock.calls[0][0]).toMatch(/\[sync-runner\] Sequential run failed on "explodes"/);
  });

  it("logs and ignores a hook that rejects", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const runner = new SyncRunner([() => ({ a: 1 })], {
      onTaskEnd: async () => {
        throw new Error("hook failure");
      },
    });

    expect(await runner.execute(null, {})).toEqual({ a: 1 });
    await new Promise((r) => setTimeout(r, 0));
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn.mock.calls[0][0]).toMatch(/onTaskEnd hook threw; ignoring/);
  });

  it("keeps running when a hook throws", async () => {
    const runner = new SyncRunner([() => ({ a: 1 })], {
      onTaskStart: () => {
        throw new Error("hook failure");
      },
    });

    expect(await runner.execute(null, {})).toEqual({ a: 1 });
  });
});
