import { toConfidenceLevel } from "../recordings/confidence";
import type { CallOptions, Transcriber } from "../recordings/ports";
import type { AudioPayload, Transcription } from "../recordings/types";
import { transcribeWithGateway } from "./gateway";
import type { FallbackPolicy, ProviderFlags, STTAdapter, SttProvider } from "./types";

/** Transcriber port backed by the STT gateway. */
export class GatewayTranscriber implements Transcriber {
  constructor(
    private readonly options: {
      policy: FallbackPolicy;
      flags: ProviderFlags;
      createAdapter: (provider: SttProvider) => STTAdapter | null;
    },
  ) {}

  async transcribe(params: { audio: AudioPayload } & CallOptions): Promise<Transcription> {
    const result = await transcribeWithGateway({
      audioBytes: params.audio.bytes,
      mimeType: params.audio.mimeType,
      filename: params.audio.filename,
      signal: params.signal,
      ...this.options,
    });

    return {
      text: result.transcript,
      confidence: toConfidenceLevel(result.confidence),
    };
  }
}
