import type {
  AudioPayload,
  ExtractedFields,
  ExtractionResult,
  TenantMapping,
  Transcription,
} from "./types";

/**
 * Capability ports the pipeline depends on. Implementations live in
 * lib/stt, lib/extraction, lib/crm, lib/storage and lib/repository.
 *
 * Every call may be retried by a later reprocess, so implementations must not
 * leave remote state half-written beyond creating at most the intended record.
 */

export type CallOptions = { signal?: AbortSignal };

export interface BlobStore {
  /** Throws when the audio cannot be resolved or read. */
  fetch(audioRef: string, options?: CallOptions): Promise<AudioPayload>;
}

export interface Transcriber {
  /** Throws on provider failure or when nothing intelligible was heard. */
  transcribe(params: { audio: AudioPayload } & CallOptions): Promise<Transcription>;
}

export interface Extractor {
  /** Throws RateLimitedError when throttled; any other error is a hard failure. */
  extract(
    params: { transcript: string; mappings: TenantMapping[] } & CallOptions,
  ): Promise<ExtractionResult>;
}

export interface RemoteCreator {
  create(
    params: {
      tenantId: string;
      entityName: string;
      fields: ExtractedFields;
    } & CallOptions,
  ): Promise<{ remoteId: string }>;
}

export interface MappingProvider {
  /** Active mappings for the tenant, in a stable order. Empty when none are configured. */
  activeMappings(tenantId: string): Promise<TenantMapping[]>;
}
