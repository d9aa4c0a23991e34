import { STTError, classifyStatus, type SttProvider } from "./types";

const PROVIDER_LABELS: Record<SttProvider, string> = {
  whisper: "Whisper",
  deepgram: "Deepgram",
};

/**
 * POST to a provider with a local timeout that also honours the caller's
 * signal. Network failures and non-2xx responses become STTError.
 */
export async function postToProvider(params: {
  provider: SttProvider;
  url: string | URL;
  init: RequestInit;
  timeoutMs: number;
  signal?: AbortSignal;
}): Promise<Response> {
  const label = PROVIDER_LABELS[params.provider];
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), params.timeoutMs);
  const onCallerAbort = () => controller.abort();
  params.signal?.addEventListener("abort", onCallerAbort, { once: true });
  if (params.signal?.aborted) controller.abort();

  let response: Response;
  try {
    response = await fetch(params.url, { ...params.init, signal: controller.signal });
  } catch (err) {
    const isAbort = err instanceof Error && err.name === "AbortError";
    throw new STTError({
      code: isAbort ? "timeout" : "network_error",
      provider: params.provider,
      message: isAbort
        ? `${label} timed out after ${params.timeoutMs}ms`
        : `${label} network error: ${err instanceof Error ? err.message : String(err)}`,
      retryable: true,
    });
  } finally {
    clearTimeout(timeout);
    params.signal?.removeEventListener("abort", onCallerAbort);
  }

  if (!response.ok) {
    const body = await response.text().catch(() => "");
    throw new STTError({
      code: classifyStatus(response.status),
      provider: params.provider,
      message: `${label} ${response.status}: ${body.slice(0, 200)}`,
      retryable: response.status === 429 || response.status >= 500,
    });
  }

  return response;
}

export function cleanTranscript(input: string): string {
  return input
    .replace(/\s+\n/g, "\n")
    .replace(/\n{3,}/g, "\n\n")
    .trim();
}
