import { cleanTranscript, postToProvider } from "../http";
import { STTError, type FinalTranscript, type STTAdapter, type TranscribeParams } from "../types";

const PROVIDER = "whisper";
const TIMEOUT_MS = 110_000;

type WhisperSegment = { avg_logprob?: number; no_speech_prob?: number };

type WhisperPayload = {
  text?: string;
  segments?: WhisperSegment[];
};

/**
 * Whisper does not report a confidence score directly. Approximate one from
 * the mean segment log-probability, the way the verbose_json output is
 * usually read.
 */
export function confidenceFromSegments(segments: WhisperSegment[] | undefined): number | undefined {
  const logprobs = (segments ?? [])
    .map((segment) => segment.avg_logprob)
    .filter((value): value is number => typeof value === "number" && Number.isFinite(value));
  if (logprobs.length === 0) return undefined;
  const mean = logprobs.reduce((sum, value) => sum + value, 0) / logprobs.length;
  return Math.min(1, Math.max(0, Math.exp(mean)));
}

export class WhisperAdapter implements STTAdapter {
  readonly provider = PROVIDER;
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly model: string;

  constructor(options: { apiKey: string; baseUrl: string; model: string }) {
    this.apiKey = options.apiKey;
    this.baseUrl = options.baseUrl;
    this.model = options.model;
  }

  async transcribe(params: TranscribeParams): Promise<FinalTranscript> {
    const form = new FormData();
    form.append("file", new Blob([params.audioBytes], { type: params.mimeType }), params.filename);
    form.append("model", this.model);
    form.append("response_format", "verbose_json");

    const response = await postToProvider({
      provider: PROVIDER,
      url: `${this.baseUrl}/audio/transcriptions`,
      timeoutMs: TIMEOUT_MS,
      signal: params.signal,
      init: {
        method: "POST",
        headers: { Authorization: `Bearer ${this.apiKey}` },
        body: form,
      },
    });

    const payload = (await response.json()) as WhisperPayload;
    const transcript = cleanTranscript(payload.text ?? "");
    if (!transcript) {
      throw new STTError({
        code: "empty_transcript",
        provider: PROVIDER,
        message: "Whisper returned an empty transcript",
      });
    }

    return {
      provider: PROVIDER,
      transcript,
      confidence: confidenceFromSegments(payload.segments),
    };
  }
}
