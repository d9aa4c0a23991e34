import { log } from "../api/log";
import { captureError } from "../sentry";
import type { FallbackPolicy, FinalTranscript, ProviderFlags, STTAdapter, SttProvider } from "./types";
import { STTError } from "./types";

function isEnabled(provider: SttProvider, flags: ProviderFlags): boolean {
  return flags[provider] !== false;
}

/**
 * Transcribe audio through the STT gateway.
 *
 * Routing order: primary → secondary (if configured).
 * Providers are skipped when:
 *   - kill-switched via flags
 *   - `createAdapter` returns null (no API key configured)
 *
 * Throws STTError if no provider succeeds. A caller abort stops the
 * fallback chain instead of trying the next provider.
 */
export async function transcribeWithGateway(params: {
  audioBytes: ArrayBuffer;
  mimeType: string;
  filename: string;
  policy: FallbackPolicy;
  flags: ProviderFlags;
  createAdapter: (provider: SttProvider) => STTAdapter | null;
  signal?: AbortSignal;
}): Promise<FinalTranscript> {
  const { audioBytes, mimeType, filename, policy, flags, signal } = params;

  const ordered: SttProvider[] = [policy.primary];
  if (policy.secondary && policy.secondary !== policy.primary) {
    ordered.push(policy.secondary);
  }

  const errors: string[] = [];

  for (const provider of ordered) {
    if (signal?.aborted) break;

    if (!isEnabled(provider, flags)) {
      log("info", "stt_provider_skipped", { provider, reason: "kill_switch" });
      continue;
    }

    const adapter = params.createAdapter(provider);
    if (!adapter) {
      log("warn", "stt_provider_skipped", { provider, reason: "no_api_key" });
      continue;
    }

    try {
      return await adapter.transcribe({ audioBytes, mimeType, filename, signal });
    } catch (err) {
      const retryable = err instanceof STTError ? err.retryable : false;
      captureError(err, { tags: { provider }, extra: { retryable, mimeType } });
      const msg = err instanceof Error ? err.message : String(err);
      errors.push(`${provider}: ${msg}`);
      log("warn", "stt_provider_failed", { provider, error: msg, retryable });
    }
  }

  const finalError = new STTError({
    code: "provider_error",
    provider: policy.primary,
    message: errors.join(" | ") || "No STT provider is configured",
    retryable: false,
  });
  captureError(finalError, { extra: { providers: ordered } });
  throw finalError;
}
