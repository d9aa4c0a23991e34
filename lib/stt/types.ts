export type SttProvider = "whisper" | "deepgram";

export type FinalTranscript = {
  provider: SttProvider;
  transcript: string;
  /** 0..1 when the provider reports one. */
  confidence?: number;
};

export type SttErrorCode =
  | "rate_limited"
  | "quota_exceeded"
  | "unauthorized"
  | "unsupported_format"
  | "audio_too_large"
  | "empty_transcript"
  | "provider_error"
  | "timeout"
  | "network_error";

export class STTError extends Error {
  readonly code: SttErrorCode;
  readonly provider: SttProvider;
  /** Whether a retry (with same or fallback provider) is sensible. */
  readonly retryable: boolean;

  constructor(opts: {
    code: SttErrorCode;
    provider: SttProvider;
    message: string;
    retryable?: boolean;
  }) {
    super(opts.message);
    this.name = "STTError";
    this.code = opts.code;
    this.provider = opts.provider;
    this.retryable = opts.retryable ?? false;
  }
}

export type TranscribeParams = {
  audioBytes: ArrayBuffer;
  mimeType: string;
  filename: string;
  signal?: AbortSignal;
};

export interface STTAdapter {
  readonly provider: SttProvider;
  /** Transcribe audio bytes. Throws STTError on failure. */
  transcribe(params: TranscribeParams): Promise<FinalTranscript>;
}

export type FallbackPolicy = {
  primary: SttProvider;
  secondary?: SttProvider;
};

/** Per-provider kill switches. Missing key → enabled. */
export type ProviderFlags = Partial<Record<SttProvider, boolean>>;

export function classifyStatus(status: number): SttErrorCode {
  if (status === 401 || status === 403) return "unauthorized";
  if (status === 402) return "quota_exceeded";
  if (status === 429) return "rate_limited";
  if (status === 413) return "audio_too_large";
  if (status === 415) return "unsupported_format";
  return "provider_error";
}
