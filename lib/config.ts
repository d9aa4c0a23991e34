import type { RetryPolicy } from "./recordings/retry";
import type { StageTimeouts } from "./recordings/timeout";
import type { SttProvider } from "./stt/types";

type Env = Record<string, string | undefined>;

export type PipelineConfig = {
  environment: "development" | "production" | "test";
  sentryDsn?: string;
  convexUrl?: string;
  /** Shared key the Convex functions require from this worker. */
  convexServiceKey?: string;
  worker: {
    concurrency: number;
    maxQueued: number;
    /** Non-terminal jobs untouched for this long are reset on startup. */
    stuckThresholdMs: number;
  };
  retry: RetryPolicy;
  timeouts: StageTimeouts;
  storage:
    | { kind: "vercel-blob"; token?: string; maxAudioBytes: number }
    | { kind: "local"; rootDir: string; maxAudioBytes: number };
  stt: {
    primary: SttProvider;
    secondary?: SttProvider;
    whisper: { apiKey?: string; baseUrl: string; model: string; enabled: boolean };
    deepgram: { apiKey?: string; model: string; enabled: boolean };
  };
  extraction: {
    apiKey?: string;
    baseUrl: string;
    model: string;
    temperature: number;
  };
};

function readString(env: Env, name: string): string | undefined {
  const raw = env[name]?.trim();
  return raw ? raw : undefined;
}

function parseNumberEnv(env: Env, name: string): number | undefined {
  const raw = readString(env, name);
  if (!raw) return undefined;
  const value = Number(raw);
  return Number.isFinite(value) ? value : undefined;
}

function parseIntEnv(env: Env, name: string): number | undefined {
  const raw = readString(env, name);
  if (!raw) return undefined;
  const value = Number.parseInt(raw, 10);
  return Number.isFinite(value) ? value : undefined;
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

function parseSttProvider(raw: string | undefined): SttProvider | undefined {
  return raw === "whisper" || raw === "deepgram" ? raw : undefined;
}

function parseEnvironment(raw: string | undefined): PipelineConfig["environment"] {
  if (raw === "production" || raw === "test") return raw;
  return "development";
}

const MEGABYTE = 1024 * 1024;

export function getPipelineConfig(env: Env = process.env): PipelineConfig {
  const maxAudioBytes = clamp(parseNumberEnv(env, "AUDIO_MAX_MB") ?? 32, 1, 512) * MEGABYTE;
  const localRoot = readString(env, "LOCAL_STORAGE_PATH");

  const primary = parseSttProvider(readString(env, "STT_PRIMARY_PROVIDER")) ?? "whisper";
  const secondaryRaw = readString(env, "STT_SECONDARY_PROVIDER");
  const secondary =
    secondaryRaw === "none"
      ? undefined
      : (parseSttProvider(secondaryRaw) ?? (primary === "whisper" ? "deepgram" : "whisper"));

  return {
    environment: parseEnvironment(readString(env, "NODE_ENV")),
    sentryDsn: readString(env, "SENTRY_DSN"),
    convexUrl: readString(env, "CONVEX_URL"),
    convexServiceKey: readString(env, "PIPELINE_SERVICE_KEY"),
    worker: {
      concurrency: clamp(parseIntEnv(env, "PIPELINE_CONCURRENCY") ?? 4, 1, 64),
      maxQueued: clamp(parseIntEnv(env, "PIPELINE_MAX_QUEUED") ?? 500, 1, 100_000),
      stuckThresholdMs:
        clamp(parseIntEnv(env, "PIPELINE_STUCK_THRESHOLD_MINUTES") ?? 15, 1, 24 * 60) * 60_000,
    },
    retry: {
      maxAttempts: clamp(parseIntEnv(env, "EXTRACTION_MAX_ATTEMPTS") ?? 3, 1, 10),
      unitMs: clamp(parseIntEnv(env, "EXTRACTION_BACKOFF_UNIT_MS") ?? 1000, 0, 60_000),
    },
    timeouts: {
      storageMs: clamp(parseIntEnv(env, "STORAGE_TIMEOUT_MS") ?? 30_000, 1_000, 600_000),
      transcriptionMs: clamp(parseIntEnv(env, "TRANSCRIPTION_TIMEOUT_MS") ?? 120_000, 1_000, 900_000),
      extractionMs: clamp(parseIntEnv(env, "EXTRACTION_TIMEOUT_MS") ?? 60_000, 1_000, 600_000),
      remoteSyncMs: clamp(parseIntEnv(env, "REMOTE_SYNC_TIMEOUT_MS") ?? 60_000, 1_000, 600_000),
    },
    storage: localRoot
      ? { kind: "local", rootDir: localRoot, maxAudioBytes }
      : { kind: "vercel-blob", token: readString(env, "BLOB_READ_WRITE_TOKEN"), maxAudioBytes },
    stt: {
      primary,
      secondary: secondary === primary ? undefined : secondary,
      whisper: {
        apiKey: readString(env, "WHISPER_API_KEY"),
        baseUrl: (readString(env, "WHISPER_BASE_URL") ?? "https://api.openai.com/v1").replace(
          /\/$/,
          "",
        ),
        model: readString(env, "WHISPER_MODEL") ?? "whisper-1",
        enabled: readString(env, "STT_WHISPER_ENABLED") !== "false",
      },
      deepgram: {
        apiKey: readString(env, "DEEPGRAM_API_KEY"),
        model: readString(env, "DEEPGRAM_STT_MODEL") ?? "nova-3",
        enabled: readString(env, "STT_DEEPGRAM_ENABLED") !== "false",
      },
    },
    extraction: {
      apiKey: readString(env, "GROQ_API_KEY"),
      baseUrl: (readString(env, "EXTRACTION_BASE_URL") ?? "https://api.groq.com/openai/v1").replace(
        /\/$/,
        "",
      ),
      model: readString(env, "EXTRACTION_MODEL") ?? "llama-3.3-70b-versatile",
      temperature: clamp(parseNumberEnv(env, "EXTRACTION_TEMPERATURE") ?? 0.1, 0, 1.5),
    },
  };
}
