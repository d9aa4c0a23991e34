import { assertTransition, isTerminalStatus } from "./status";
import type { NewRecordingJob, RecordingJob, RecordingJobPatch } from "./types";

/**
 * Pure job-state helpers shared by every repository implementation, so the
 * in-memory store and the Convex mutations apply identical rules.
 */

export function newJobRecord(job: NewRecordingJob, now: number): RecordingJob {
  return {
    ...job,
    status: "uploaded",
    attempt: 0,
    transcript: null,
    transcriptConfidence: null,
    entityType: null,
    extractionConfidence: null,
    extractedFields: null,
    remoteRecordId: null,
    error: null,
    errorCode: null,
    createdAt: now,
    updatedAt: now,
    completedAt: null,
  };
}

export const RESET_FIELDS = {
  status: "uploaded",
  transcript: null,
  transcriptConfidence: null,
  entityType: null,
  extractionConfidence: null,
  extractedFields: null,
  remoteRecordId: null,
  error: null,
  errorCode: null,
  completedAt: null,
} as const satisfies RecordingJobPatch;

export function applyPatch(job: RecordingJob, patch: RecordingJobPatch, now: number): RecordingJob {
  if (patch.status !== undefined && patch.status !== job.status) {
    assertTransition(job.status, patch.status);
  }
  return { ...job, ...patch, updatedAt: now };
}

export function applyReset(job: RecordingJob, now: number): RecordingJob {
  return { ...job, ...RESET_FIELDS, attempt: job.attempt + 1, updatedAt: now };
}

export function isStale(job: RecordingJob, updatedBefore: number): boolean {
  return !isTerminalStatus(job.status) && job.updatedAt < updatedBefore;
}
