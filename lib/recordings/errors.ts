export const PIPELINE_ERROR_CODES = [
  "storage_failure",
  "transcription_failure",
  "missing_mapping",
  "extraction_failure",
  "unknown_entity",
  "missing_required_fields",
  "validation_failure",
  "remote_sync_failure",
  "unexpected",
] as const;

export type PipelineErrorCode = (typeof PIPELINE_ERROR_CODES)[number];

/** A stage failure. `message` is what the job's `error` field will show. */
export class RecordingPipelineError extends Error {
  readonly code: PipelineErrorCode;

  constructor(code: PipelineErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "RecordingPipelineError";
    this.code = code;
  }
}

/** Raised by an Extractor when the upstream model provider is throttling. */
export class RateLimitedError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RateLimitedError";
  }
}

/** Raised by a stage timeout. */
export class StageTimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(label: string, timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs / 1000}s`);
    this.name = "StageTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

export class TenantNotFoundError extends Error {
  readonly tenantId: string;

  constructor(tenantId: string) {
    super(`Tenant with id '${tenantId}' not found`);
    this.name = "TenantNotFoundError";
    this.tenantId = tenantId;
  }
}

export class TenantInactiveError extends Error {
  readonly tenantId: string;

  constructor(tenantId: string, name: string) {
    super(`Tenant '${name}' is not active`);
    this.name = "TenantInactiveError";
    this.tenantId = tenantId;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function isPipelineErrorCode(value: unknown): value is PipelineErrorCode {
  return typeof value === "string" && (PIPELINE_ERROR_CODES as readonly string[]).includes(value);
}
