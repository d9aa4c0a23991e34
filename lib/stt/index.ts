export type {
  SttProvider,
  FinalTranscript,
  SttErrorCode,
  STTAdapter,
  FallbackPolicy,
  ProviderFlags,
  TranscribeParams,
} from "./types";
export { STTError } from "./types";
export { transcribeWithGateway } from "./gateway";
export { createAdapter, resolveFallbackPolicy, resolveProviderFlags } from "./registry";
export { GatewayTranscriber } from "./transcriber";
export { DeepgramAdapter } from "./adapters/deepgram";
export { WhisperAdapter } from "./adapters/whisper";
