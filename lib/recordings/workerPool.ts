import { log } from "../api/log";
import { captureError } from "../sentry";
import { errorMessage } from "./errors";

export class WorkerPoolFullError extends Error {
  readonly maxQueued: number;

  constructor(maxQueued: number) {
    super(`Worker queue is full (${maxQueued} waiting)`);
    this.name = "WorkerPoolFullError";
    this.maxQueued = maxQueued;
  }
}

export class WorkerPoolClosedError extends Error {
  constructor() {
    super("Worker pool is closed");
    this.name = "WorkerPoolClosedError";
  }
}

type Task = () => Promise<unknown>;
type QueuedTask = { key: string; task: Task };

export type WorkerPoolOptions = {
  concurrency: number;
  maxQueued: number;
};

/**
 * A queue slot held while the caller prepares its task. Holding one keeps
 * other callers from filling the queue in the meantime.
 */
export type QueueSlot = {
  /** Queue `task` in the held slot. Returns false when `key` was already waiting. */
  submit(key: string, task: Task): boolean;
  /** Give the slot back unused. */
  release(): void;
};

/**
 * Bounded in-process task queue.
 *
 * - at most `concurrency` tasks run at once
 * - tasks sharing a key never overlap; a later one waits for the earlier
 * - a key already waiting is not queued again
 * - held slots count against `maxQueued`
 * - task errors are logged and reported, never rethrown
 */
export class WorkerPool {
  private readonly queue: QueuedTask[] = [];
  private readonly queuedKeys = new Set<string>();
  private readonly runningKeys = new Set<string>();
  private readonly idleWaiters: Array<() => void> = [];
  private readonly concurrency: number;
  private readonly maxQueued: number;
  private active = 0;
  private held = 0;
  private closed = false;

  constructor(options: WorkerPoolOptions) {
    this.concurrency = Math.max(1, Math.floor(options.concurrency));
    this.maxQueued = Math.max(1, Math.floor(options.maxQueued));
  }

  /**
   * Queue `task` under `key`. Returns false when a task with that key is
   * already waiting. Throws WorkerPoolFullError at capacity.
   */
  submit(key: string, task: Task): boolean {
    if (this.closed) throw new WorkerPoolClosedError();
    if (this.queuedKeys.has(key)) return false;
    this.ensureCapacity();
    this.enqueue(key, task);
    return true;
  }

  /**
   * Take a queue slot now and fill it later. Throws WorkerPoolFullError when
   * none is free; the slot must be either submitted or released.
   */
  reserve(): QueueSlot {
    this.ensureCapacity();
    this.held++;
    let open = true;
    const settle = (): void => {
      if (!open) throw new Error("Queue slot was already used");
      open = false;
      this.held--;
    };

    return {
      submit: (key, task) => {
        settle();
        if (this.queuedKeys.has(key)) {
          this.notifyIfIdle();
          return false;
        }
        this.enqueue(key, task);
        return true;
      },
      release: () => {
        if (!open) return;
        settle();
        this.notifyIfIdle();
      },
    };
  }

  /** Throws WorkerPoolFullError when a new key could not be queued. */
  ensureCapacity(): void {
    if (this.closed) throw new WorkerPoolClosedError();
    if (this.queue.length + this.held >= this.maxQueued) {
      throw new WorkerPoolFullError(this.maxQueued);
    }
  }

  get stats(): { active: number; queued: number; held: number } {
    return { active: this.active, queued: this.queue.length, held: this.held };
  }

  /** Resolves once nothing is running, waiting or held. */
  onIdle(): Promise<void> {
    if (this.isIdle()) return Promise.resolve();
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  /** Refuse new work and wait for queued work to finish. */
  async close(): Promise<void> {
    this.closed = true;
    await this.onIdle();
  }

  private enqueue(key: string, task: Task): void {
    this.queue.push({ key, task });
    this.queuedKeys.add(key);
    this.pump();
  }

  private isIdle(): boolean {
    return this.active === 0 && this.queue.length === 0 && this.held === 0;
  }

  private notifyIfIdle(): void {
    if (!this.isIdle()) return;
    for (const resolve of this.idleWaiters.splice(0)) resolve();
  }

  private pump(): void {
    while (this.active < this.concurrency) {
      const index = this.queue.findIndex((item) => !this.runningKeys.has(item.key));
      if (index < 0) return;

      const [next] = this.queue.splice(index, 1);
      if (!next) return;
      this.queuedKeys.delete(next.key);
      this.runningKeys.add(next.key);
      this.active++;
      void this.execute(next);
    }
  }

  private async execute({ key, task }: QueuedTask): Promise<void> {
    try {
      await task();
    } catch (err) {
      log("error", "worker_task_failed", { key, error: errorMessage(err) });
      captureError(err, { tags: { component: "worker_pool" }, extra: { key } });
    } finally {
      this.active--;
      this.runningKeys.delete(key);
      this.pump();
      this.notifyIfIdle();
    }
  }
}
