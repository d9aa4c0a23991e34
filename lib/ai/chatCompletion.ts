/**
 * Minimal client for OpenAI-compatible `/chat/completions` endpoints
 * (Groq by default). Only the request fields the extractor uses are typed.
 */

export type ChatRole = "system" | "user" | "assistant";

export type ChatMessage = {
  role: ChatRole;
  content: string;
};

export type ChatResponseFormat = { type: "text" } | { type: "json_object" };

export type ChatCompletionRequest = {
  model: string;
  messages: ChatMessage[];
  temperature?: number;
  max_tokens?: number;
  response_format?: ChatResponseFormat;
};

type ChatCompletionResponse = {
  choices?: Array<{
    message?: {
      content?: string | null;
    };
  }>;
  error?: {
    message?: string;
    type?: string;
    code?: string | number;
  };
};

export class ChatCompletionApiError extends Error {
  readonly status: number;
  readonly providerMessage: string;

  constructor(params: { status: number; providerMessage: string }) {
    super(`Chat completion error: ${params.status} ${params.providerMessage}`);
    this.name = "ChatCompletionApiError";
    this.status = params.status;
    this.providerMessage = params.providerMessage;
  }
}

export async function chatCompletion(params: {
  apiKey: string;
  baseUrl: string;
  request: ChatCompletionRequest;
  signal?: AbortSignal;
}): Promise<{ content: string; raw: ChatCompletionResponse }> {
  const response = await fetch(`${params.baseUrl}/chat/completions`, {
    method: "POST",
    headers: {
      Authorization: `Bearer ${params.apiKey}`,
      "Content-Type": "application/json",
    },
    body: JSON.stringify(params.request),
    signal: params.signal,
  });

  const data = (await response.json().catch(() => ({}))) as ChatCompletionResponse;

  if (!response.ok || data.error) {
    throw new ChatCompletionApiError({
      status: response.ok ? 500 : response.status,
      providerMessage: data.error?.message ?? "Unknown error",
    });
  }

  const content = data.choices?.[0]?.message?.content ?? "";
  return { content, raw: data };
}
