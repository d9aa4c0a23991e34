import { randomUUID } from "node:crypto";
import { log } from "../api/log";
import type { RecordingJobRepository, TenantRepository } from "../repository/interfaces";
import { TenantInactiveError, TenantNotFoundError } from "./errors";
import type { RecordingPipeline } from "./pipeline";
import type { RecordingJob } from "./types";
import { WorkerPoolFullError, type QueueSlot, type WorkerPool } from "./workerPool";

export const DEFAULT_LIST_LIMIT = 100;
export const MAX_LIST_LIMIT = 1000;

export type CreateJobInput = {
  tenantId: string;
  audioRef: string;
  filename?: string | null;
  contentType?: string | null;
  sizeBytes?: number | null;
};

export type ListJobsInput = {
  tenantId?: string;
  offset?: number;
  limit?: number;
};

export type RecordingServiceDeps = {
  jobs: RecordingJobRepository;
  tenants: TenantRepository;
  pipeline: Pick<RecordingPipeline, "run">;
  pool: WorkerPool;
  newId?: () => string;
  now?: () => number;
};

export class InvalidJobInputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidJobInputError";
  }
}

function clampInt(value: number | undefined, fallback: number, min: number, max: number): number {
  if (value === undefined || !Number.isFinite(value)) return fallback;
  return Math.min(max, Math.max(min, Math.floor(value)));
}

/**
 * Job-facing operations for an HTTP layer: create, poll, list and reprocess.
 * Pipeline runs are scheduled on the worker pool and never awaited here.
 */
export class RecordingService {
  private readonly newId: () => string;
  private readonly now: () => number;

  constructor(private readonly deps: RecordingServiceDeps) {
    this.newId = deps.newId ?? randomUUID;
    this.now = deps.now ?? Date.now;
  }

  async createJob(input: CreateJobInput): Promise<string> {
    const audioRef = input.audioRef.trim();
    if (!audioRef) throw new InvalidJobInputError("audioRef must not be empty");

    const tenant = await this.deps.tenants.findById(input.tenantId);
    if (!tenant) throw new TenantNotFoundError(input.tenantId);
    if (!tenant.isActive) throw new TenantInactiveError(tenant.id, tenant.name);

    const slot = this.deps.pool.reserve();
    let job: RecordingJob;
    try {
      job = await this.deps.jobs.create({
        id: this.newId(),
        tenantId: tenant.id,
        audioRef,
        filename: input.filename ?? null,
        contentType: input.contentType ?? null,
        sizeBytes: input.sizeBytes ?? null,
      });
    } catch (err) {
      slot.release();
      throw err;
    }
    log("info", "recording_job_created", { jobId: job.id, tenantId: job.tenantId });

    this.schedule(slot, job.id);
    return job.id;
  }

  async getJob(jobId: string): Promise<RecordingJob | null> {
    return this.deps.jobs.findById(jobId);
  }

  async listJobs(input: ListJobsInput = {}): Promise<RecordingJob[]> {
    return this.deps.jobs.list({
      ...(input.tenantId === undefined ? {} : { tenantId: input.tenantId }),
      offset: clampInt(input.offset, 0, 0, Number.MAX_SAFE_INTEGER),
      limit: clampInt(input.limit, DEFAULT_LIST_LIMIT, 1, MAX_LIST_LIMIT),
    });
  }

  /** Reset the job to `uploaded` (from any status) and schedule a fresh run. */
  async reprocess(jobId: string): Promise<RecordingJob | null> {
    const slot = this.deps.pool.reserve();
    const job = await this.resetHolding(slot, jobId);
    if (!job) return null;

    log("info", "recording_job_reprocessed", { jobId, attempt: job.attempt });
    this.schedule(slot, job.id);
    return job;
  }

  /**
   * Reset and resubmit non-terminal jobs nobody has touched for `olderThanMs`,
   * e.g. runs lost to a restart. Returns the recovered job ids.
   */
  async recoverStuckJobs(options: { olderThanMs: number; limit?: number }): Promise<string[]> {
    const cutoff = this.now() - options.olderThanMs;
    const stale = await this.deps.jobs.findStale(cutoff, options.limit ?? DEFAULT_LIST_LIMIT);
    const recovered: string[] = [];

    for (const job of stale) {
      let slot: QueueSlot;
      try {
        slot = this.deps.pool.reserve();
      } catch (err) {
        if (!(err instanceof WorkerPoolFullError)) throw err;
        log("warn", "recording_recovery_deferred", { remaining: stale.length - recovered.length });
        break;
      }

      const reset = await this.resetHolding(slot, job.id);
      if (!reset) continue;
      this.schedule(slot, reset.id);
      recovered.push(reset.id);
      log("warn", "recording_job_recovered", {
        jobId: job.id,
        previousStatus: job.status,
        attempt: reset.attempt,
      });
    }

    return recovered;
  }

  /** Reset under a held slot; the slot is released unless a job comes back. */
  private async resetHolding(slot: QueueSlot, jobId: string): Promise<RecordingJob | null> {
    let job: RecordingJob | null;
    try {
      job = await this.deps.jobs.reset(jobId);
    } catch (err) {
      slot.release();
      throw err;
    }
    if (!job) slot.release();
    return job;
  }

  private schedule(slot: QueueSlot, jobId: string): void {
    const queued = slot.submit(jobId, () => this.deps.pipeline.run(jobId));
    if (!queued) log("debug", "recording_run_already_queued", { jobId });
  }
}
