import { cleanTranscript, postToProvider } from "../http";
import { STTError, type FinalTranscript, type STTAdapter, type TranscribeParams } from "../types";

const PROVIDER = "deepgram";
const TIMEOUT_MS = 90_000;
const ENDPOINT = "https://api.deepgram.com/v1/listen";

type DeepgramPayload = {
  results?: {
    channels?: Array<{
      alternatives?: Array<{ transcript?: string; confidence?: number }>;
    }>;
  };
};

export class DeepgramAdapter implements STTAdapter {
  readonly provider = PROVIDER;

  constructor(
    private readonly apiKey: string,
    private readonly model = "nova-3",
  ) {}

  async transcribe(params: TranscribeParams): Promise<FinalTranscript> {
    const url = new URL(ENDPOINT);
    url.searchParams.set("model", this.model);
    url.searchParams.set("punctuate", "true");
    url.searchParams.set("smart_format", "true");

    const response = await postToProvider({
      provider: PROVIDER,
      url,
      timeoutMs: TIMEOUT_MS,
      signal: params.signal,
      init: {
        method: "POST",
        headers: {
          Authorization: `Token ${this.apiKey}`,
          "Content-Type": params.mimeType,
        },
        body: params.audioBytes,
      },
    });

    const payload = (await response.json()) as DeepgramPayload;
    const alt = payload.results?.channels?.[0]?.alternatives?.[0];
    const transcript = cleanTranscript(alt?.transcript ?? "");
    if (!transcript) {
      throw new STTError({
        code: "empty_transcript",
        provider: PROVIDER,
        message: "Deepgram returned an empty transcript",
      });
    }

    return { provider: PROVIDER, transcript, confidence: alt?.confidence };
  }
}
