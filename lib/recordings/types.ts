import type { RecordingStatus } from "./status";
import type { PipelineErrorCode } from "./errors";

export type ConfidenceLevel = "HIGH" | "MEDIUM" | "LOW";

/** JSON-compatible value produced by extraction. */
export type FieldValue = string | number | boolean | null | FieldValue[] | { [key: string]: FieldValue };

export type ExtractedFields = Record<string, FieldValue>;

export type RecordingJob = {
  id: string;
  tenantId: string;
  audioRef: string;
  filename: string | null;
  contentType: string | null;
  sizeBytes: number | null;
  status: RecordingStatus;
  /** Incremented on every reset; pipeline writes are conditional on it. */
  attempt: number;
  transcript: string | null;
  transcriptConfidence: ConfidenceLevel | null;
  entityType: string | null;
  extractionConfidence: ConfidenceLevel | null;
  extractedFields: ExtractedFields | null;
  remoteRecordId: string | null;
  error: string | null;
  errorCode: PipelineErrorCode | null;
  createdAt: number;
  updatedAt: number;
  completedAt: number | null;
};

/** Fields the pipeline may write on a job during a run. */
export type RecordingJobPatch = Partial<
  Pick<
    RecordingJob,
    | "status"
    | "transcript"
    | "transcriptConfidence"
    | "entityType"
    | "extractionConfidence"
    | "extractedFields"
    | "remoteRecordId"
    | "error"
    | "errorCode"
    | "completedAt"
  >
>;

export type NewRecordingJob = Pick<
  RecordingJob,
  "id" | "tenantId" | "audioRef" | "filename" | "contentType" | "sizeBytes"
>;

export type ValidationRule = {
  /** string | integer | float | boolean are enforced; other types are descriptive only. */
  type?: string;
  required?: boolean;
  /** Uniqueness is enforced by the remote system, not here. */
  unique?: boolean;
  pattern?: string;
};

export type ValidationRules = Record<string, ValidationRule>;

export type TenantMapping = {
  id: string;
  tenantId: string;
  /** Classification label the extractor emits, e.g. "animal". */
  entityName: string;
  /** Entity set name on the remote CRM, e.g. "biotrack_animals". */
  remoteEntityName: string;
  fieldMappings: Record<string, string>;
  validationRules: ValidationRules;
  detectionKeywords: string[];
  isActive: boolean;
  description: string | null;
};

export type CrmCredentials = {
  baseUrl: string;
  clientId: string;
  clientSecret: string;
  /** Azure AD directory (tenant) id used for the token endpoint. */
  directoryTenantId: string;
};

export type Tenant = {
  id: string;
  name: string;
  isActive: boolean;
  crm: CrmCredentials;
};

export type AudioPayload = {
  bytes: ArrayBuffer;
  mimeType: string;
  filename: string;
};

export type Transcription = {
  text: string;
  confidence: ConfidenceLevel;
};

export type ExtractionResult =
  | {
      kind: "classified";
      entityType: string;
      confidence: ConfidenceLevel;
      fields: ExtractedFields;
      notes: string | null;
    }
  | {
      kind: "unknown";
      confidence: ConfidenceLevel;
      fields: ExtractedFields;
      notes: string | null;
    };
