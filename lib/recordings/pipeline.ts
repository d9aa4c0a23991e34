import { withContext, type Logger } from "../api/log";
import type { RecordingJobRepository } from "../repository/interfaces";
import { captureError } from "../sentry";
import { RecordingPipelineError, errorMessage, type PipelineErrorCode } from "./errors";
import type { BlobStore, Extractor, MappingProvider, RemoteCreator, Transcriber } from "./ports";
import {
  LIVESTOCK_CHECKLIST,
  findMissingRequiredFields,
  formatMissingFieldsPrompt,
  type RequiredFieldChecklist,
} from "./requiredFields";
import { DEFAULT_RETRY_POLICY, withRateLimitRetry, type RetryPolicy, type Sleep } from "./retry";
import { DEFAULT_STAGE_TIMEOUTS, withStageTimeout, type StageTimeouts } from "./timeout";
import type { RecordingJob, RecordingJobPatch } from "./types";
import { mapFields, validateFields } from "./validation";

export type RecordingPipelineDeps = {
  jobs: RecordingJobRepository;
  mappings: MappingProvider;
  blobStore: BlobStore;
  transcriber: Transcriber;
  extractor: Extractor;
  remoteCreator: RemoteCreator;
  retry?: Partial<RetryPolicy>;
  timeouts?: Partial<StageTimeouts>;
  checklist?: RequiredFieldChecklist;
  sleep?: Sleep;
  now?: () => number;
};

export type RunOutcome =
  | { outcome: "synced"; remoteRecordId: string }
  | { outcome: "failed"; code: PipelineErrorCode; error: string }
  | { outcome: "skipped"; reason: "not_found" | "not_uploaded" | "superseded" };

/** A reset bumped the job's attempt while this run was in flight. */
class SupersededRunError extends Error {
  constructor(jobId: string, attempt: number) {
    super(`Run ${attempt} of recording job ${jobId} was superseded`);
    this.name = "SupersededRunError";
  }
}

type RunContext = {
  job: RecordingJob;
  logger: Logger;
};

/**
 * Drives one recording job from `uploaded` to `synced` or `failed`.
 *
 * Every write is conditional on the attempt the run started with, so a run
 * overtaken by a reprocess stops at its next write and leaves the job alone.
 * `run` never throws; failures are recorded on the job.
 */
export class RecordingPipeline {
  private readonly retry: RetryPolicy;
  private readonly timeouts: StageTimeouts;
  private readonly checklist: RequiredFieldChecklist;
  private readonly now: () => number;

  constructor(private readonly deps: RecordingPipelineDeps) {
    this.retry = { ...DEFAULT_RETRY_POLICY, ...deps.retry };
    this.timeouts = { ...DEFAULT_STAGE_TIMEOUTS, ...deps.timeouts };
    this.checklist = deps.checklist ?? LIVESTOCK_CHECKLIST;
    this.now = deps.now ?? Date.now;
  }

  async run(jobId: string): Promise<RunOutcome> {
    const logger = withContext({ jobId });
    let ctx: RunContext | null = null;

    try {
      const job = await this.deps.jobs.findById(jobId);
      if (!job) {
        logger.warn("recording_job_not_found");
        return { outcome: "skipped", reason: "not_found" };
      }
      if (job.status !== "uploaded") {
        logger.info("recording_run_skipped", { status: job.status, attempt: job.attempt });
        return { outcome: "skipped", reason: "not_uploaded" };
      }

      ctx = { job, logger: withContext({ jobId, attempt: job.attempt }) };
      const remoteRecordId = await this.execute(ctx);
      return { outcome: "synced", remoteRecordId };
    } catch (err) {
      if (err instanceof SupersededRunError) {
        logger.info("recording_run_superseded");
        return { outcome: "skipped", reason: "superseded" };
      }
      if (!ctx) {
        logger.error("recording_run_load_failed", { error: errorMessage(err) });
        captureError(err, { tags: { component: "recording_pipeline" }, extra: { jobId } });
        return { outcome: "failed", code: "unexpected", error: errorMessage(err) };
      }
      return this.fail(ctx, err);
    }
  }

  private async execute(ctx: RunContext): Promise<string> {
    const { job, logger } = ctx;

    await this.write(ctx, { status: "transcribing" });
    const audio = await this.stage("storage_failure", "Audio retrieval failed", () =>
      withStageTimeout("Audio retrieval", this.timeouts.storageMs, (signal) =>
        this.deps.blobStore.fetch(job.audioRef, { signal }),
      ),
    );
    logger.info("recording_audio_fetched", { bytes: audio.bytes.byteLength, mimeType: audio.mimeType });

    const transcription = await this.stage("transcription_failure", "Transcription failed", () =>
      withStageTimeout("Transcription", this.timeouts.transcriptionMs, (signal) =>
        this.deps.transcriber.transcribe({ audio, signal }),
      ),
    );
    const transcript = transcription.text.trim();
    if (!transcript) {
      throw new RecordingPipelineError(
        "transcription_failure",
        "Transcription failed: transcript was empty",
      );
    }
    await this.write(ctx, {
      status: "transcribed",
      transcript,
      transcriptConfidence: transcription.confidence,
    });
    logger.info("recording_transcribed", { confidence: transcription.confidence });

    await this.write(ctx, { status: "processing" });
    const mappings = await this.deps.mappings.activeMappings(job.tenantId);
    if (mappings.length === 0) {
      throw new RecordingPipelineError(
        "missing_mapping",
        "No schema mappings configured for this client",
      );
    }

    const extraction = await this.stage("extraction_failure", "Extraction failed", () =>
      withRateLimitRetry(
        () =>
          withStageTimeout("Extraction", this.timeouts.extractionMs, (signal) =>
            this.deps.extractor.extract({ transcript, mappings, signal }),
          ),
        { ...this.retry, sleep: this.deps.sleep, label: "extraction" },
      ),
    );

    await this.write(ctx, {
      entityType: extraction.kind === "classified" ? extraction.entityType : "unknown",
      extractionConfidence: extraction.confidence,
      extractedFields: extraction.fields,
    });
    if (extraction.kind === "unknown") {
      throw new RecordingPipelineError(
        "unknown_entity",
        "Could not determine entity type from transcription",
      );
    }
    logger.info("recording_extracted", {
      entityType: extraction.entityType,
      confidence: extraction.confidence,
    });

    const missing = findMissingRequiredFields(extraction.fields, this.checklist);
    if (missing.length > 0) {
      throw new RecordingPipelineError("missing_required_fields", formatMissingFieldsPrompt(missing));
    }

    const mapping = mappings.find((candidate) => candidate.entityName === extraction.entityType);
    if (!mapping) {
      throw new RecordingPipelineError(
        "missing_mapping",
        `No schema mapping found for entity type: ${extraction.entityType}`,
      );
    }

    const validation = validateFields(extraction.fields, mapping.validationRules);
    if (validation.warnings.length > 0) {
      logger.warn("recording_validation_warnings", { warnings: validation.warnings });
    }
    if (!validation.ok) {
      throw new RecordingPipelineError(
        "validation_failure",
        `Validation errors: ${validation.errors.join(", ")}`,
      );
    }

    const remoteFields = mapFields(extraction.fields, mapping.fieldMappings);
    const { remoteId } = await this.stage("remote_sync_failure", "Remote sync failed", () =>
      withStageTimeout("Remote sync", this.timeouts.remoteSyncMs, (signal) =>
        this.deps.remoteCreator.create({
          tenantId: job.tenantId,
          entityName: mapping.remoteEntityName,
          fields: remoteFields,
          signal,
        }),
      ),
    );

    await this.write(ctx, { status: "synced", remoteRecordId: remoteId, completedAt: this.now() });
    logger.info("recording_synced", { remoteRecordId: remoteId, entity: mapping.remoteEntityName });
    return remoteId;
  }

  /** Run a port call, turning any failure other than a pipeline error into `code`. */
  private async stage<T>(
    code: PipelineErrorCode,
    prefix: string,
    operation: () => Promise<T>,
  ): Promise<T> {
    try {
      return await operation();
    } catch (err) {
      if (err instanceof RecordingPipelineError) throw err;
      throw new RecordingPipelineError(code, `${prefix}: ${errorMessage(err)}`, { cause: err });
    }
  }

  private async write(ctx: RunContext, patch: RecordingJobPatch): Promise<void> {
    const updated = await this.deps.jobs.updateForAttempt(ctx.job.id, ctx.job.attempt, patch);
    if (!updated) throw new SupersededRunError(ctx.job.id, ctx.job.attempt);
  }

  private async fail(ctx: RunContext, err: unknown): Promise<RunOutcome> {
    const failure =
      err instanceof RecordingPipelineError
        ? err
        : new RecordingPipelineError(
            "unexpected",
            `Processing failed unexpectedly: ${errorMessage(err)}`,
            { cause: err },
          );

    if (failure.code === "unexpected") {
      ctx.logger.error("recording_failed", { code: failure.code, error: failure.message });
      captureError(err, {
        tags: { component: "recording_pipeline" },
        extra: { jobId: ctx.job.id, attempt: ctx.job.attempt },
      });
    } else {
      ctx.logger.warn("recording_failed", { code: failure.code, error: failure.message });
    }

    try {
      await this.write(ctx, { status: "failed", error: failure.message, errorCode: failure.code });
    } catch (writeErr) {
      if (writeErr instanceof SupersededRunError) {
        ctx.logger.info("recording_run_superseded");
        return { outcome: "skipped", reason: "superseded" };
      }
      ctx.logger.error("recording_failure_not_persisted", { error: errorMessage(writeErr) });
      captureError(writeErr, {
        tags: { component: "recording_pipeline" },
        extra: { jobId: ctx.job.id, attempt: ctx.job.attempt },
      });
    }

    return { outcome: "failed", code: failure.code, error: failure.message };
  }
}
