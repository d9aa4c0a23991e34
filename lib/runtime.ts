import { ConvexHttpClient } from "convex/browser";
import { log } from "./api/log";
import type { PipelineConfig } from "./config";
import { DynamicsRemoteCreator } from "./crm/remoteCreator";
import { LlmExtractor } from "./extraction/llmExtractor";
import { RecordingPipeline } from "./recordings/pipeline";
import type { BlobStore, Extractor, RemoteCreator, Transcriber } from "./recordings/ports";
import type { Sleep } from "./recordings/retry";
import { RecordingService } from "./recordings/service";
import { WorkerPool } from "./recordings/workerPool";
import { createConvexRepositories } from "./repository/convex";
import type { Repositories } from "./repository/interfaces";
import { createInMemoryRepositories } from "./repository/memory";
import { flushSentry, initSentry } from "./sentry";
import { LocalBlobStore } from "./storage/localFs";
import { VercelBlobStore } from "./storage/vercelBlob";
import {
  GatewayTranscriber,
  createAdapter,
  resolveFallbackPolicy,
  resolveProviderFlags,
} from "./stt";

export type RuntimeOverrides = {
  repositories?: Repositories;
  blobStore?: BlobStore;
  transcriber?: Transcriber;
  extractor?: Extractor;
  remoteCreator?: RemoteCreator;
  sleep?: Sleep;
  now?: () => number;
};

export type RecordingRuntime = {
  service: RecordingService;
  pipeline: RecordingPipeline;
  pool: WorkerPool;
  repositories: Repositories;
  /** Initialise error reporting and recover jobs left mid-run. */
  open(): Promise<void>;
  /** Stop accepting work, drain the queue, flush error reports. */
  close(): Promise<void>;
};

export class MissingConfigError extends Error {
  constructor(variable: string) {
    super(`${variable} is not configured`);
    this.name = "MissingConfigError";
  }
}

function createRepositories(config: PipelineConfig): Repositories {
  if (!config.convexUrl) {
    log("warn", "persistence_in_memory", { reason: "CONVEX_URL not set" });
    return createInMemoryRepositories();
  }
  if (!config.convexServiceKey) throw new MissingConfigError("PIPELINE_SERVICE_KEY");
  return createConvexRepositories(new ConvexHttpClient(config.convexUrl), config.convexServiceKey);
}

function createBlobStore(config: PipelineConfig): BlobStore {
  const { storage } = config;
  return storage.kind === "local"
    ? new LocalBlobStore({ rootDir: storage.rootDir, maxBytes: storage.maxAudioBytes })
    : new VercelBlobStore({ token: storage.token, maxBytes: storage.maxAudioBytes });
}

function createExtractor(config: PipelineConfig): Extractor {
  const { apiKey, baseUrl, model, temperature } = config.extraction;
  if (!apiKey) throw new MissingConfigError("GROQ_API_KEY");
  return new LlmExtractor({ apiKey, baseUrl, model, temperature });
}

/** Build every collaborator from config. Overrides replace single pieces (tests, scripts). */
export function createRecordingRuntime(
  config: PipelineConfig,
  overrides: RuntimeOverrides = {},
): RecordingRuntime {
  const repositories = overrides.repositories ?? createRepositories(config);
  const pool = new WorkerPool(config.worker);

  const pipeline = new RecordingPipeline({
    jobs: repositories.jobs,
    mappings: repositories.mappings,
    blobStore: overrides.blobStore ?? createBlobStore(config),
    transcriber:
      overrides.transcriber ??
      new GatewayTranscriber({
        policy: resolveFallbackPolicy(config.stt),
        flags: resolveProviderFlags(config.stt),
        createAdapter: (provider) => createAdapter(provider, config.stt),
      }),
    extractor: overrides.extractor ?? createExtractor(config),
    remoteCreator: overrides.remoteCreator ?? new DynamicsRemoteCreator(repositories.tenants),
    retry: config.retry,
    timeouts: config.timeouts,
    sleep: overrides.sleep,
    now: overrides.now,
  });

  const service = new RecordingService({
    jobs: repositories.jobs,
    tenants: repositories.tenants,
    pipeline,
    pool,
    now: overrides.now,
  });

  return {
    service,
    pipeline,
    pool,
    repositories,
    async open() {
      const reporting = initSentry({ dsn: config.sentryDsn, environment: config.environment });
      const recovered = await service.recoverStuckJobs({
        olderThanMs: config.worker.stuckThresholdMs,
      });
      log("info", "recording_runtime_opened", {
        errorReporting: reporting,
        recoveredJobs: recovered.length,
        concurrency: config.worker.concurrency,
      });
    },
    async close() {
      await pool.close();
      await flushSentry();
      log("info", "recording_runtime_closed");
    },
  };
}
