import { defineSchema, defineTable } from "convex/server";
import { v } from "convex/values";

export const recordingStatus = v.union(
  v.literal("uploaded"),
  v.literal("transcribing"),
  v.literal("transcribed"),
  v.literal("processing"),
  v.literal("synced"),
  v.literal("failed"),
);

export const pipelineErrorCode = v.union(
  v.literal("storage_failure"),
  v.literal("transcription_failure"),
  v.literal("missing_mapping"),
  v.literal("extraction_failure"),
  v.literal("unknown_entity"),
  v.literal("missing_required_fields"),
  v.literal("validation_failure"),
  v.literal("remote_sync_failure"),
  v.literal("unexpected"),
);

export const confidenceLevel = v.union(v.literal("HIGH"), v.literal("MEDIUM"), v.literal("LOW"));

export const nullableString = v.union(v.string(), v.null());
export const nullableNumber = v.union(v.number(), v.null());

export default defineSchema({
  tenants: defineTable({
    tenantId: v.string(),
    name: v.string(),
    isActive: v.boolean(),
    crmBaseUrl: v.string(),
    crmClientId: v.string(),
    crmClientSecret: v.string(),
    crmDirectoryTenantId: v.string(),
    createdAt: v.number(),
  }).index("by_tenant_id", ["tenantId"]),
  schemaMappings: defineTable({
    tenantId: v.string(),
    entityName: v.string(),
    remoteEntityName: v.string(),
    fieldMappings: v.record(v.string(), v.string()),
    validationRules: v.record(
      v.string(),
      v.object({
        type: v.optional(v.string()),
        required: v.optional(v.boolean()),
        unique: v.optional(v.boolean()),
        pattern: v.optional(v.string()),
      }),
    ),
    detectionKeywords: v.array(v.string()),
    isActive: v.boolean(),
    description: nullableString,
    createdAt: v.number(),
  }).index("by_tenant_active", ["tenantId", "isActive"]),
  recordingJobs: defineTable({
    jobId: v.string(),
    tenantId: v.string(),
    audioRef: v.string(),
    filename: nullableString,
    contentType: nullableString,
    sizeBytes: nullableNumber,
    status: recordingStatus,
    attempt: v.number(),
    transcript: nullableString,
    transcriptConfidence: v.union(confidenceLevel, v.null()),
    entityType: nullableString,
    extractionConfidence: v.union(confidenceLevel, v.null()),
    /** JSON text; extracted values are arbitrary nested JSON. */
    extractedFieldsJson: nullableString,
    remoteRecordId: nullableString,
    error: nullableString,
    errorCode: v.union(pipelineErrorCode, v.null()),
    createdAt: v.number(),
    updatedAt: v.number(),
    completedAt: nullableNumber,
  })
    .index("by_job_id", ["jobId"])
    .index("by_created", ["createdAt"])
    .index("by_tenant_created", ["tenantId", "createdAt"])
    .index("by_status_updated", ["status", "updatedAt"]),
});
