import { describe, expect, it, vi } from "vitest";
import { WorkerPool, WorkerPoolClosedError, WorkerPoolFullError } from "@/lib/recordings/workerPool";

function deferred() {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((res) => {
    resolve = res;
  });
  return { promise, resolve };
}

const tick = () => new Promise((resolve) => setTimeout(resolve, 0));

describe("WorkerPool", () => {
  it("runs at most `concurrency` tasks at once", async () => {
    const pool = new WorkerPool({ concurrency: 2, maxQueued: 10 });
    const gates = [deferred(), deferred(), deferred()];

    gates.forEach((gate, index) => pool.submit(`job-${index}`, () => gate.promise));

    expect(pool.stats).toEqual({ active: 2, queued: 1, held: 0 });

    gates[0]?.resolve();
    await tick();
    expect(pool.stats).toEqual({ active: 2, queued: 0, held: 0 });

    gates[1]?.resolve();
    gates[2]?.resolve();
    await pool.onIdle();
    expect(pool.stats).toEqual({ active: 0, queued: 0, held: 0 });
  });

  it("never overlaps tasks that share a key", async () => {
    const pool = new WorkerPool({ concurrency: 4, maxQueued: 10 });
    const first = deferred();
    const order: string[] = [];

    pool.submit("job-1", async () => {
      order.push("first:start");
      await first.promise;
      order.push("first:end");
    });
    pool.submit("job-1", async () => {
      order.push("second:start");
    });

    await tick();
    expect(order).toEqual(["first:start"]);
    expect(pool.stats).toEqual({ active: 1, queued: 1, held: 0 });

    first.resolve();
    await pool.onIdle();
    expect(order).toEqual(["first:start", "first:end", "second:start"]);
  });

  it("lets other keys overtake a key that is waiting on itself", async () => {
    const pool = new WorkerPool({ concurrency: 2, maxQueued: 10 });
    const gate = deferred();
    const other = vi.fn(async () => undefined);

    pool.submit("job-1", () => gate.promise);
    pool.submit("job-1", async () => undefined);
    pool.submit("job-2", other);

    await tick();
    expect(other).toHaveBeenCalledTimes(1);

    gate.resolve();
    await pool.onIdle();
  });

  it("does not queue a key that is already waiting", async () => {
    const pool = new WorkerPool({ concurrency: 1, maxQueued: 10 });
    const gate = deferred();
    const rerun = vi.fn(async () => undefined);

    expect(pool.submit("job-1", () => gate.promise)).toBe(true);
    expect(pool.submit("job-1", rerun)).toBe(true);
    expect(pool.submit("job-1", rerun)).toBe(false);

    gate.resolve();
    await pool.onIdle();
    expect(rerun).toHaveBeenCalledTimes(1);
  });

  it("pushes back when the queue is full", async () => {
    const pool = new WorkerPool({ concurrency: 1, maxQueued: 1 });
    const gate = deferred();

    pool.submit("job-1", () => gate.promise);
    pool.submit("job-2", async () => undefined);

    expect(() => pool.submit("job-3", async () => undefined)).toThrow(WorkerPoolFullError);
    expect(() => pool.ensureCapacity()).toThrow("Worker queue is full (1 waiting)");

    gate.resolve();
    await pool.onIdle();
    expect(() => pool.ensureCapacity()).not.toThrow();
  });

  it("contains task failures and keeps working", async () => {
    const pool = new WorkerPool({ concurrency: 1, maxQueued: 10 });
    const after = vi.fn(async () => undefined);

    pool.submit("job-1", async () => {
      throw new Error("task exploded");
    });
    pool.submit("job-2", after);

    await expect(pool.onIdle()).resolves.toBeUndefined();
    expect(after).toHaveBeenCalledTimes(1);
  });

  it("drains queued work on close and refuses new tasks", async () => {
    const pool = new WorkerPool({ concurrency: 1, maxQueued: 10 });
    const gate = deferred();
    const queued = vi.fn(async () => undefined);

    pool.submit("job-1", () => gate.promise);
    pool.submit("job-2", queued);

    const closing = pool.close();
    expect(() => pool.submit("job-3", async () => undefined)).toThrow(WorkerPoolClosedError);

    gate.resolve();
    await closing;
    expect(queued).toHaveBeenCalledTimes(1);
  });

  it("counts held slots against the queue limit", async () => {
    const pool = new WorkerPool({ concurrency: 1, maxQueued: 1 });
    const gate = deferred();
    pool.submit("job-1", () => gate.promise);

    const slot = pool.reserve();

    expect(pool.stats).toEqual({ active: 1, queued: 0, held: 1 });
    expect(() => pool.reserve()).toThrow(WorkerPoolFullError);
    expect(() => pool.submit("job-2", async () => undefined)).toThrow(WorkerPoolFullError);

    slot.release();
    expect(pool.stats).toEqual({ active: 1, queued: 0, held: 0 });
    expect(() => pool.ensureCapacity()).not.toThrow();

    gate.resolve();
    await pool.onIdle();
  });

  it("queues a task into a held slot", async () => {
    const pool = new WorkerPool({ concurrency: 1, maxQueued: 1 });
    const task = vi.fn(async () => undefined);
    const slot = pool.reserve();

    expect(slot.submit("job-1", task)).toBe(true);
    await pool.onIdle();

    expect(task).toHaveBeenCalledTimes(1);
    expect(() => slot.submit("job-1", task)).toThrow("Queue slot was already used");
  });

  it("frees a held slot when its key is already waiting", async () => {
    const pool = new WorkerPool({ concurrency: 1, maxQueued: 2 });
    const gate = deferred();
    pool.submit("job-1", () => gate.promise);
    pool.submit("job-1", async () => undefined);

    const slot = pool.reserve();

    expect(slot.submit("job-1", async () => undefined)).toBe(false);
    expect(pool.stats).toEqual({ active: 1, queued: 1, held: 0 });

    gate.resolve();
    await pool.onIdle();
  });

  it("waits for held slots before reporting idle", async () => {
    const pool = new WorkerPool({ concurrency: 1, maxQueued: 1 });
    const slot = pool.reserve();
    let idle = false;
    const waiting = pool.onIdle().then(() => {
      idle = true;
    });

    await tick();
    expect(idle).toBe(false);

    slot.release();
    await waiting;
    expect(idle).toBe(true);
  });

  it("is idle immediately when nothing was submitted", async () => {
    const pool = new WorkerPool({ concurrency: 1, maxQueued: 1 });

    await expect(pool.onIdle()).resolves.toBeUndefined();
  });
});
