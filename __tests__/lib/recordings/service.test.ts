import { beforeEach, describe, expect, it, vi } from "vitest";
import { TenantInactiveError, TenantNotFoundError } from "@/lib/recordings/errors";
import { newJobRecord } from "@/lib/recordings/jobState";
import { RecordingPipeline, type RunOutcome } from "@/lib/recordings/pipeline";
import { InvalidJobInputError, RecordingService } from "@/lib/recordings/service";
import type { ExtractionResult, RecordingJob } from "@/lib/recordings/types";
import { WorkerPool, WorkerPoolFullError } from "@/lib/recordings/workerPool";
import { createInMemoryRepositories } from "@/lib/repository/memory";
import {
  ANIMAL_MAPPING,
  AUDIO_BYTES,
  HEIFER_FIELDS,
  HEIFER_TRANSCRIPT,
  TENANT,
} from "../../helpers";

const NOW = 10_000_000;

function createHarness(poolOptions = { concurrency: 2, maxQueued: 10 }) {
  const repos = createInMemoryRepositories(() => NOW);
  repos.tenants.seed([TENANT, { ...TENANT, id: "tenant-2", name: "Closed Farm", isActive: false }]);
  const pipeline = {
    run: vi.fn(async (_jobId: string): Promise<RunOutcome> => ({
      outcome: "skipped",
      reason: "not_uploaded",
    })),
  };
  const pool = new WorkerPool(poolOptions);
  let counter = 0;
  const service = new RecordingService({
    jobs: repos.jobs,
    tenants: repos.tenants,
    pipeline,
    pool,
    newId: () => `job-${++counter}`,
    now: () => NOW,
  });
  return { repos, pipeline, pool, service };
}

function storedJob(overrides: Partial<RecordingJob> & Pick<RecordingJob, "id">): RecordingJob {
  return {
    ...newJobRecord(
      {
        id: overrides.id,
        tenantId: TENANT.id,
        audioRef: `recordings/${overrides.id}.webm`,
        filename: null,
        contentType: null,
        sizeBytes: null,
      },
      0,
    ),
    ...overrides,
  };
}

describe("RecordingService", () => {
  let harness: ReturnType<typeof createHarness>;

  beforeEach(() => {
    harness = createHarness();
  });

  describe("createJob", () => {
    it("stores an uploaded job and schedules its run", async () => {
      const jobId = await harness.service.createJob({
        tenantId: TENANT.id,
        audioRef: "  recordings/a.webm ",
        filename: "a.webm",
        contentType: "audio/webm",
        sizeBytes: 2048,
      });
      await harness.pool.onIdle();

      expect(jobId).toBe("job-1");
      expect(await harness.service.getJob(jobId)).toMatchObject({
        id: "job-1",
        tenantId: TENANT.id,
        audioRef: "recordings/a.webm",
        filename: "a.webm",
        contentType: "audio/webm",
        sizeBytes: 2048,
        status: "uploaded",
        attempt: 0,
        createdAt: NOW,
      });
      expect(harness.pipeline.run).toHaveBeenCalledWith("job-1");
    });

    it("defaults optional upload metadata to null", async () => {
      const jobId = await harness.service.createJob({ tenantId: TENANT.id, audioRef: "a.webm" });

      expect(await harness.service.getJob(jobId)).toMatchObject({
        filename: null,
        contentType: null,
        sizeBytes: null,
      });
    });

    it("rejects an unknown tenant", async () => {
      await expect(
        harness.service.createJob({ tenantId: "nope", audioRef: "a.webm" }),
      ).rejects.toThrow(new TenantNotFoundError("nope"));
      expect(await harness.service.listJobs()).toEqual([]);
    });

    it("rejects an inactive tenant", async () => {
      const error = await harness.service
        .createJob({ tenantId: "tenant-2", audioRef: "a.webm" })
        .catch((err: unknown) => err);

      expect(error).toBeInstanceOf(TenantInactiveError);
      expect(error).toMatchObject({ message: "Tenant 'Closed Farm' is not active" });
    });

    it("rejects an empty audio reference", async () => {
      await expect(
        harness.service.createJob({ tenantId: TENANT.id, audioRef: "   " }),
      ).rejects.toBeInstanceOf(InvalidJobInputError);
    });

    it("refuses new jobs when the worker queue is full", async () => {
      harness = createHarness({ concurrency: 1, maxQueued: 1 });
      harness.pipeline.run.mockImplementation(() => new Promise<RunOutcome>(() => undefined));
      await harness.service.createJob({ tenantId: TENANT.id, audioRef: "a.webm" });
      await harness.service.createJob({ tenantId: TENANT.id, audioRef: "b.webm" });

      await expect(
        harness.service.createJob({ tenantId: TENANT.id, audioRef: "c.webm" }),
      ).rejects.toBeInstanceOf(WorkerPoolFullError);
      expect(await harness.service.listJobs()).toHaveLength(2);
    });

    it("leaves no job behind when the queue fills while the insert is pending", async () => {
      harness = createHarness({ concurrency: 1, maxQueued: 1 });
      harness.pipeline.run.mockImplementation(() => new Promise<RunOutcome>(() => undefined));
      await harness.service.createJob({ tenantId: TENANT.id, audioRef: "busy.webm" });

      const results = await Promise.allSettled([
        harness.service.createJob({ tenantId: TENANT.id, audioRef: "a.webm" }),
        harness.service.createJob({ tenantId: TENANT.id, audioRef: "b.webm" }),
      ]);

      expect(results.map((result) => result.status)).toEqual(["fulfilled", "rejected"]);
      const jobs = await harness.service.listJobs();
      expect(jobs.map((job) => job.audioRef).sort()).toEqual(["a.webm", "busy.webm"]);
      expect(harness.pool.stats).toEqual({ active: 1, queued: 1, held: 0 });
    });

    it("gives the queue slot back when the insert fails", async () => {
      vi.spyOn(harness.repos.jobs, "create").mockRejectedValueOnce(new Error("store offline"));

      await expect(
        harness.service.createJob({ tenantId: TENANT.id, audioRef: "a.webm" }),
      ).rejects.toThrow("store offline");
      expect(harness.pool.stats.held).toBe(0);
    });
  });

  describe("getJob", () => {
    it("returns null for an unknown id", async () => {
      await expect(harness.service.getJob("missing")).resolves.toBeNull();
    });
  });

  describe("listJobs", () => {
    beforeEach(() => {
      harness.repos.jobs.seed([
        storedJob({ id: "old", createdAt: 1 }),
        storedJob({ id: "new", createdAt: 3 }),
        storedJob({ id: "other-tenant", tenantId: "tenant-9", createdAt: 2 }),
      ]);
    });

    it("returns newest first", async () => {
      const jobs = await harness.service.listJobs();

      expect(jobs.map((job) => job.id)).toEqual(["new", "other-tenant", "old"]);
    });

    it("filters by tenant and pages with offset and limit", async () => {
      const all = await harness.service.listJobs({ tenantId: TENANT.id });
      const page = await harness.service.listJobs({ offset: 1, limit: 1 });

      expect(all.map((job) => job.id)).toEqual(["new", "old"]);
      expect(page.map((job) => job.id)).toEqual(["other-tenant"]);
    });

    it("clamps paging arguments", async () => {
      const list = vi.spyOn(harness.repos.jobs, "list");

      await harness.service.listJobs({ offset: -5, limit: 0 });
      await harness.service.listJobs({ limit: 50_000 });

      expect(list.mock.calls).toEqual([
        [{ offset: 0, limit: 1 }],
        [{ offset: 0, limit: 1000 }],
      ]);
    });
  });

  describe("reprocess", () => {
    it("clears a failed job and schedules a new run each time", async () => {
      harness.repos.jobs.seed([
        storedJob({
          id: "job-9",
          status: "failed",
          transcript: "old transcript",
          error: "Remote sync failed: 503",
          errorCode: "remote_sync_failure",
        }),
      ]);

      const first = await harness.service.reprocess("job-9");
      await harness.pool.onIdle();
      const second = await harness.service.reprocess("job-9");
      await harness.pool.onIdle();

      expect(first).toMatchObject({ status: "uploaded", attempt: 1, transcript: null, error: null });
      expect(second).toMatchObject({ status: "uploaded", attempt: 2, errorCode: null });
      expect(harness.pipeline.run.mock.calls).toEqual([["job-9"], ["job-9"]]);
    });

    it("returns null for an unknown job", async () => {
      await expect(harness.service.reprocess("missing")).resolves.toBeNull();
      expect(harness.pipeline.run).not.toHaveBeenCalled();
      expect(harness.pool.stats.held).toBe(0);
    });

    it("refuses before resetting when concurrent requests fill the queue", async () => {
      harness = createHarness({ concurrency: 1, maxQueued: 1 });
      harness.pipeline.run.mockImplementation(() => new Promise<RunOutcome>(() => undefined));
      harness.repos.jobs.seed([
        storedJob({ id: "a", status: "failed", error: "Remote sync failed: 503", errorCode: "remote_sync_failure" }),
        storedJob({ id: "b", status: "failed", error: "Remote sync failed: 503", errorCode: "remote_sync_failure" }),
      ]);
      await harness.service.createJob({ tenantId: TENANT.id, audioRef: "busy.webm" });

      const results = await Promise.allSettled([
        harness.service.reprocess("a"),
        harness.service.reprocess("b"),
      ]);

      expect(results[0]?.status).toBe("fulfilled");
      expect(results[1]?.status === "rejected" ? results[1].reason : null).toBeInstanceOf(
        WorkerPoolFullError,
      );
      expect(await harness.service.getJob("b")).toMatchObject({
        status: "failed",
        attempt: 0,
        error: "Remote sync failed: 503",
      });
      expect(harness.pool.stats).toEqual({ active: 1, queued: 1, held: 0 });
    });

    it("gives the queue slot back when the reset fails", async () => {
      vi.spyOn(harness.repos.jobs, "reset").mockRejectedValueOnce(new Error("store offline"));

      await expect(harness.service.reprocess("job-9")).rejects.toThrow("store offline");
      expect(harness.pool.stats.held).toBe(0);
    });
  });

  describe("recoverStuckJobs", () => {
    it("resets and resubmits non-terminal jobs past the threshold", async () => {
      harness.repos.jobs.seed([
        storedJob({ id: "stuck-transcribing", status: "transcribing", updatedAt: NOW - 60_000 }),
        storedJob({ id: "stuck-processing", status: "processing", updatedAt: NOW - 30_000 }),
        storedJob({ id: "recent", status: "processing", updatedAt: NOW - 1_000 }),
        storedJob({ id: "done", status: "synced", updatedAt: NOW - 60_000 }),
        storedJob({ id: "dead", status: "failed", updatedAt: NOW - 60_000 }),
      ]);

      const recovered = await harness.service.recoverStuckJobs({ olderThanMs: 10_000 });
      await harness.pool.onIdle();

      expect(recovered).toEqual(["stuck-transcribing", "stuck-processing"]);
      expect(await harness.service.getJob("stuck-processing")).toMatchObject({
        status: "uploaded",
        attempt: 1,
      });
      expect(await harness.service.getJob("recent")).toMatchObject({ status: "processing" });
      expect(harness.pipeline.run.mock.calls).toEqual([["stuck-transcribing"], ["stuck-processing"]]);
    });

    it("stops recovering when the queue fills", async () => {
      harness = createHarness({ concurrency: 1, maxQueued: 1 });
      harness.pipeline.run.mockImplementation(() => new Promise<RunOutcome>(() => undefined));
      harness.repos.jobs.seed([
        storedJob({ id: "a", status: "transcribing", updatedAt: 1 }),
        storedJob({ id: "b", status: "transcribing", updatedAt: 2 }),
        storedJob({ id: "c", status: "transcribing", updatedAt: 3 }),
      ]);

      const recovered = await harness.service.recoverStuckJobs({ olderThanMs: 10_000 });

      expect(recovered).toEqual(["a", "b"]);
      expect(await harness.service.getJob("c")).toMatchObject({ status: "transcribing", attempt: 0 });
    });
  });

  describe("reprocess while a run is in flight", () => {
    it("ends with one clean run at the latest attempt", async () => {
      const repos = createInMemoryRepositories(() => NOW);
      repos.tenants.seed([TENANT]);
      repos.mappings.seed([ANIMAL_MAPPING]);
      repos.jobs.seed([
        storedJob({ id: "job-9", status: "failed", error: "Remote sync failed: 503", errorCode: "remote_sync_failure" }),
      ]);

      let releaseAudio: () => void = () => undefined;
      const audioGate = new Promise<void>((resolve) => {
        releaseAudio = resolve;
      });
      const extraction: ExtractionResult = {
        kind: "classified",
        entityType: "animal",
        confidence: "HIGH",
        fields: HEIFER_FIELDS,
        notes: null,
      };
      const remoteCreator = { create: vi.fn(async () => ({ remoteId: "remote-9" })) };
      const pipeline = new RecordingPipeline({
        jobs: repos.jobs,
        mappings: repos.mappings,
        blobStore: {
          fetch: async () => {
            await audioGate;
            return { bytes: AUDIO_BYTES, mimeType: "audio/webm", filename: "job-9.webm" };
          },
        },
        transcriber: { transcribe: async () => ({ text: HEIFER_TRANSCRIPT, confidence: "HIGH" }) },
        extractor: { extract: async () => extraction },
        remoteCreator,
        now: () => NOW,
      });
      const pool = new WorkerPool({ concurrency: 2, maxQueued: 10 });
      const service = new RecordingService({ jobs: repos.jobs, tenants: repos.tenants, pipeline, pool });

      await service.reprocess("job-9");
      await service.reprocess("job-9");
      releaseAudio();
      await pool.onIdle();

      expect(remoteCreator.create).toHaveBeenCalledTimes(1);
      expect(await service.getJob("job-9")).toMatchObject({
        status: "synced",
        attempt: 2,
        remoteRecordId: "remote-9",
        error: null,
        errorCode: null,
        tenantId: TENANT.id,
        audioRef: "recordings/job-9.webm",
      });
    });
  });
});
