import { ConvexError, v } from "convex/values";
import { parseFields, serializeFields } from "../lib/recordings/fieldValue";
import { applyPatch, applyReset, newJobRecord } from "../lib/recordings/jobState";
import { ACTIVE_STATUSES, InvalidTransitionError } from "../lib/recordings/status";
import type { RecordingJob, RecordingJobPatch } from "../lib/recordings/types";
import { mutation, query, requireServiceKey, type Doc, type QueryCtx } from "./model";
import {
  confidenceLevel,
  nullableNumber,
  nullableString,
  pipelineErrorCode,
  recordingStatus,
} from "./schema";

type JobFields = Omit<Doc<"recordingJobs">, "_id" | "_creationTime">;

export function toRecordingJob(doc: Doc<"recordingJobs">): RecordingJob {
  return {
    id: doc.jobId,
    tenantId: doc.tenantId,
    audioRef: doc.audioRef,
    filename: doc.filename,
    contentType: doc.contentType,
    sizeBytes: doc.sizeBytes,
    status: doc.status,
    attempt: doc.attempt,
    transcript: doc.transcript,
    transcriptConfidence: doc.transcriptConfidence,
    entityType: doc.entityType,
    extractionConfidence: doc.extractionConfidence,
    extractedFields: parseFields(doc.extractedFieldsJson),
    remoteRecordId: doc.remoteRecordId,
    error: doc.error,
    errorCode: doc.errorCode,
    createdAt: doc.createdAt,
    updatedAt: doc.updatedAt,
    completedAt: doc.completedAt,
  };
}

export function toJobFields(job: RecordingJob): JobFields {
  const { id, extractedFields, ...rest } = job;
  return { ...rest, jobId: id, extractedFieldsJson: serializeFields(extractedFields) };
}

const patchArgs = v.object({
  status: v.optional(recordingStatus),
  transcript: v.optional(nullableString),
  transcriptConfidence: v.optional(v.union(confidenceLevel, v.null())),
  entityType: v.optional(nullableString),
  extractionConfidence: v.optional(v.union(confidenceLevel, v.null())),
  extractedFieldsJson: v.optional(nullableString),
  remoteRecordId: v.optional(nullableString),
  error: v.optional(nullableString),
  errorCode: v.optional(v.union(pipelineErrorCode, v.null())),
  completedAt: v.optional(nullableNumber),
});

async function findDoc(ctx: Pick<QueryCtx, "db">, jobId: string): Promise<Doc<"recordingJobs"> | null> {
  return ctx.db
    .query("recordingJobs")
    .withIndex("by_job_id", (q) => q.eq("jobId", jobId))
    .unique();
}

export const create = mutation({
  args: {
    serviceKey: v.string(),
    jobId: v.string(),
    tenantId: v.string(),
    audioRef: v.string(),
    filename: nullableString,
    contentType: nullableString,
    sizeBytes: nullableNumber,
  },
  handler: async (ctx, { serviceKey, jobId, ...job }): Promise<RecordingJob> => {
    requireServiceKey(serviceKey);
    if (await findDoc(ctx, jobId)) {
      throw new ConvexError(`Recording job ${jobId} already exists`);
    }
    const record = newJobRecord({ id: jobId, ...job }, Date.now());
    await ctx.db.insert("recordingJobs", toJobFields(record));
    return record;
  },
});

export const get = query({
  args: { serviceKey: v.string(), jobId: v.string() },
  handler: async (ctx, { serviceKey, jobId }): Promise<RecordingJob | null> => {
    requireServiceKey(serviceKey);
    const doc = await findDoc(ctx, jobId);
    return doc ? toRecordingJob(doc) : null;
  },
});

export const list = query({
  args: {
    serviceKey: v.string(),
    tenantId: v.optional(v.string()),
    offset: v.number(),
    limit: v.number(),
  },
  handler: async (ctx, { serviceKey, tenantId, offset, limit }): Promise<RecordingJob[]> => {
    requireServiceKey(serviceKey);
    const docs = tenantId
      ? await ctx.db
          .query("recordingJobs")
          .withIndex("by_tenant_created", (q) => q.eq("tenantId", tenantId))
          .order("desc")
          .take(offset + limit)
      : await ctx.db
          .query("recordingJobs")
          .withIndex("by_created")
          .order("desc")
          .take(offset + limit);
    return docs.slice(offset).map(toRecordingJob);
  },
});

export const updateForAttempt = mutation({
  args: { serviceKey: v.string(), jobId: v.string(), attempt: v.number(), patch: patchArgs },
  handler: async (ctx, { serviceKey, jobId, attempt, patch }): Promise<RecordingJob | null> => {
    requireServiceKey(serviceKey);
    const doc = await findDoc(ctx, jobId);
    if (!doc || doc.attempt !== attempt) return null;

    const { extractedFieldsJson, ...fields } = patch;
    const jobPatch: RecordingJobPatch =
      extractedFieldsJson === undefined
        ? fields
        : { ...fields, extractedFields: parseFields(extractedFieldsJson) };

    let next: RecordingJob;
    try {
      next = applyPatch(toRecordingJob(doc), jobPatch, Date.now());
    } catch (err) {
      if (err instanceof InvalidTransitionError) throw new ConvexError(err.message);
      throw err;
    }
    await ctx.db.patch(doc._id, toJobFields(next));
    return next;
  },
});

export const reset = mutation({
  args: { serviceKey: v.string(), jobId: v.string() },
  handler: async (ctx, { serviceKey, jobId }): Promise<RecordingJob | null> => {
    requireServiceKey(serviceKey);
    const doc = await findDoc(ctx, jobId);
    if (!doc) return null;
    const next = applyReset(toRecordingJob(doc), Date.now());
    await ctx.db.patch(doc._id, toJobFields(next));
    return next;
  },
});

export const findStale = query({
  args: { serviceKey: v.string(), updatedBefore: v.number(), limit: v.number() },
  handler: async (ctx, { serviceKey, updatedBefore, limit }): Promise<RecordingJob[]> => {
    requireServiceKey(serviceKey);
    const batches = await Promise.all(
      ACTIVE_STATUSES.map((status) =>
        ctx.db
          .query("recordingJobs")
          .withIndex("by_status_updated", (q) =>
            q.eq("status", status).lt("updatedAt", updatedBefore),
          )
          .take(limit),
      ),
    );
    return batches
      .flat()
      .sort((a, b) => a.updatedAt - b.updatedAt)
      .slice(0, limit)
      .map(toRecordingJob);
  },
});
