import { ChatCompletionApiError, chatCompletion } from "../ai/chatCompletion";
import { log } from "../api/log";
import { RateLimitedError } from "../recordings/errors";
import type { CallOptions, Extractor } from "../recordings/ports";
import type { ExtractionResult, TenantMapping } from "../recordings/types";
import { normalizeExtraction } from "./normalize";
import { buildExtractionSystemPrompt, buildExtractionUserPrompt } from "./prompt";

export type LlmExtractorOptions = {
  apiKey: string;
  baseUrl: string;
  model: string;
  temperature: number;
};

/**
 * Extractor port over an OpenAI-compatible chat completion endpoint.
 * HTTP 429 becomes RateLimitedError so the caller's retry policy applies.
 */
export class LlmExtractor implements Extractor {
  constructor(private readonly options: LlmExtractorOptions) {}

  async extract(
    params: { transcript: string; mappings: TenantMapping[] } & CallOptions,
  ): Promise<ExtractionResult> {
    let content: string;
    try {
      ({ content } = await chatCompletion({
        apiKey: this.options.apiKey,
        baseUrl: this.options.baseUrl,
        signal: params.signal,
        request: {
          model: this.options.model,
          temperature: this.options.temperature,
          response_format: { type: "json_object" },
          messages: [
            { role: "system", content: buildExtractionSystemPrompt(params.mappings) },
            { role: "user", content: buildExtractionUserPrompt(params.transcript, params.mappings) },
          ],
        },
      }));
    } catch (err) {
      if (err instanceof ChatCompletionApiError && err.status === 429) {
        throw new RateLimitedError(err.providerMessage);
      }
      throw err;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch {
      throw new Error("Model returned invalid JSON");
    }

    const result = normalizeExtraction(parsed);
    log("info", "extraction_completed", {
      model: this.options.model,
      kind: result.kind,
      entityType: result.kind === "classified" ? result.entityType : null,
      confidence: result.confidence,
      fieldCount: Object.keys(result.fields).length,
    });
    return result;
  }
}
