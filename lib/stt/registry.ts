import type { PipelineConfig } from "../config";
import type { FallbackPolicy, ProviderFlags, STTAdapter, SttProvider } from "./types";
import { DeepgramAdapter } from "./adapters/deepgram";
import { WhisperAdapter } from "./adapters/whisper";

type SttConfig = PipelineConfig["stt"];

export function resolveProviderFlags(config: SttConfig): ProviderFlags {
  return {
    whisper: config.whisper.enabled,
    deepgram: config.deepgram.enabled,
  };
}

export function resolveFallbackPolicy(config: SttConfig): FallbackPolicy {
  return { primary: config.primary, secondary: config.secondary };
}

/**
 * Construct a provider adapter from config.
 * Returns null if the key is absent (provider not configured).
 */
export function createAdapter(provider: SttProvider, config: SttConfig): STTAdapter | null {
  switch (provider) {
    case "whisper": {
      const { apiKey, baseUrl, model } = config.whisper;
      return apiKey ? new WhisperAdapter({ apiKey, baseUrl, model }) : null;
    }
    case "deepgram": {
      const { apiKey, model } = config.deepgram;
      return apiKey ? new DeepgramAdapter(apiKey, model) : null;
    }
    default: {
      const _exhaustive: never = provider;
      return _exhaustive;
    }
  }
}
