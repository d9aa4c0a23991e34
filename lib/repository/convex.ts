import type { ConvexHttpClient } from "convex/browser";
import { makeFunctionReference } from "convex/server";
import { serializeFields } from "../recordings/fieldValue";
import type {
  NewRecordingJob,
  RecordingJob,
  RecordingJobPatch,
  Tenant,
  TenantMapping,
} from "../recordings/types";
import type {
  ListRecordingJobsQuery,
  RecordingJobRepository,
  Repositories,
  SchemaMappingRepository,
  TenantRepository,
} from "./interfaces";

type Client = Pick<ConvexHttpClient, "query" | "mutation">;
type Keyed<T> = T & { serviceKey: string };

/** Wire shape of a patch; extracted fields travel as JSON text. */
type PatchArgs = Omit<RecordingJobPatch, "extractedFields"> & { extractedFieldsJson?: string | null };

const refs = {
  createJob: makeFunctionReference<
    "mutation",
    Keyed<{
      jobId: string;
      tenantId: string;
      audioRef: string;
      filename: string | null;
      contentType: string | null;
      sizeBytes: number | null;
    }>,
    RecordingJob
  >("recordingJobs:create"),
  getJob: makeFunctionReference<"query", Keyed<{ jobId: string }>, RecordingJob | null>(
    "recordingJobs:get",
  ),
  listJobs: makeFunctionReference<
    "query",
    Keyed<{ tenantId?: string; offset: number; limit: number }>,
    RecordingJob[]
  >("recordingJobs:list"),
  updateForAttempt: makeFunctionReference<
    "mutation",
    Keyed<{ jobId: string; attempt: number; patch: PatchArgs }>,
    RecordingJob | null
  >("recordingJobs:updateForAttempt"),
  resetJob: makeFunctionReference<"mutation", Keyed<{ jobId: string }>, RecordingJob | null>(
    "recordingJobs:reset",
  ),
  findStale: makeFunctionReference<
    "query",
    Keyed<{ updatedBefore: number; limit: number }>,
    RecordingJob[]
  >("recordingJobs:findStale"),
  activeMappings: makeFunctionReference<"query", Keyed<{ tenantId: string }>, TenantMapping[]>(
    "schemaMappings:activeForTenant",
  ),
  getTenant: makeFunctionReference<"query", Keyed<{ tenantId: string }>, Tenant | null>(
    "tenants:get",
  ),
};

export function toPatchArgs(patch: RecordingJobPatch): PatchArgs {
  const { extractedFields, ...rest } = patch;
  return extractedFields === undefined
    ? rest
    : { ...rest, extractedFieldsJson: serializeFields(extractedFields) };
}

export class ConvexRecordingJobRepository implements RecordingJobRepository {
  constructor(
    private readonly client: Client,
    private readonly serviceKey: string,
  ) {}

  async create(job: NewRecordingJob): Promise<RecordingJob> {
    const { id, ...rest } = job;
    return this.client.mutation(refs.createJob, { serviceKey: this.serviceKey, jobId: id, ...rest });
  }

  async findById(id: string): Promise<RecordingJob | null> {
    return this.client.query(refs.getJob, { serviceKey: this.serviceKey, jobId: id });
  }

  async list(query: ListRecordingJobsQuery): Promise<RecordingJob[]> {
    const { tenantId, offset, limit } = query;
    return this.client.query(refs.listJobs, {
      serviceKey: this.serviceKey,
      offset,
      limit,
      ...(tenantId === undefined ? {} : { tenantId }),
    });
  }

  async updateForAttempt(
    id: string,
    attempt: number,
    patch: RecordingJobPatch,
  ): Promise<RecordingJob | null> {
    return this.client.mutation(refs.updateForAttempt, {
      serviceKey: this.serviceKey,
      jobId: id,
      attempt,
      patch: toPatchArgs(patch),
    });
  }

  async reset(id: string): Promise<RecordingJob | null> {
    return this.client.mutation(refs.resetJob, { serviceKey: this.serviceKey, jobId: id });
  }

  async findStale(updatedBefore: number, limit: number): Promise<RecordingJob[]> {
    return this.client.query(refs.findStale, { serviceKey: this.serviceKey, updatedBefore, limit });
  }
}

export class ConvexSchemaMappingRepository implements SchemaMappingRepository {
  constructor(
    private readonly client: Client,
    private readonly serviceKey: string,
  ) {}

  async activeMappings(tenantId: string): Promise<TenantMapping[]> {
    return this.client.query(refs.activeMappings, { serviceKey: this.serviceKey, tenantId });
  }
}

export class ConvexTenantRepository implements TenantRepository {
  constructor(
    private readonly client: Client,
    private readonly serviceKey: string,
  ) {}

  async findById(id: string): Promise<Tenant | null> {
    return this.client.query(refs.getTenant, { serviceKey: this.serviceKey, tenantId: id });
  }
}

export const createConvexRepositories = (client: Client, serviceKey: string) => ({
  jobs: new ConvexRecordingJobRepository(client, serviceKey),
  mappings: new ConvexSchemaMappingRepository(client, serviceKey),
  tenants: new ConvexTenantRepository(client, serviceKey),
}) satisfies Repositories;
