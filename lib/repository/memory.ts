import { applyPatch, applyReset, isStale, newJobRecord } from "../recordings/jobState";
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

type Clock = () => number;

/** Stored jobs are deep-copied in and out. Jobs with equal createdAt keep insertion order reversed (newest insert first). */
export class InMemoryRecordingJobRepository implements RecordingJobRepository {
  private jobs = new Map<string, RecordingJob>();

  constructor(private readonly now: Clock = Date.now) {}

  async create(job: NewRecordingJob): Promise<RecordingJob> {
    if (this.jobs.has(job.id)) throw new Error(`Recording job ${job.id} already exists`);
    const doc = newJobRecord(job, this.now());
    this.jobs.set(doc.id, doc);
    return structuredClone(doc);
  }

  async findById(id: string): Promise<RecordingJob | null> {
    const job = this.jobs.get(id);
    return job ? structuredClone(job) : null;
  }

  async list(query: ListRecordingJobsQuery): Promise<RecordingJob[]> {
    return Array.from(this.jobs.values())
      .filter((job) => query.tenantId === undefined || job.tenantId === query.tenantId)
      .reverse()
      .sort((a, b) => b.createdAt - a.createdAt)
      .slice(query.offset, query.offset + query.limit)
      .map((job) => structuredClone(job));
  }

  async updateForAttempt(
    id: string,
    attempt: number,
    patch: RecordingJobPatch,
  ): Promise<RecordingJob | null> {
    const current = this.jobs.get(id);
    if (!current || current.attempt !== attempt) return null;
    const next = structuredClone(applyPatch(current, patch, this.now()));
    this.jobs.set(id, next);
    return structuredClone(next);
  }

  async reset(id: string): Promise<RecordingJob | null> {
    const current = this.jobs.get(id);
    if (!current) return null;
    const next = applyReset(current, this.now());
    this.jobs.set(id, next);
    return structuredClone(next);
  }

  async findStale(updatedBefore: number, limit: number): Promise<RecordingJob[]> {
    return Array.from(this.jobs.values())
      .filter((job) => isStale(job, updatedBefore))
      .sort((a, b) => a.updatedAt - b.updatedAt)
      .slice(0, limit)
      .map((job) => structuredClone(job));
  }

  seed(docs: RecordingJob[]): void {
    docs.forEach((doc) => this.jobs.set(doc.id, structuredClone(doc)));
  }

  clear(): void {
    this.jobs.clear();
  }
}

export class InMemorySchemaMappingRepository implements SchemaMappingRepository {
  private mappings: TenantMapping[] = [];

  async activeMappings(tenantId: string): Promise<TenantMapping[]> {
    return this.mappings
      .filter((mapping) => mapping.tenantId === tenantId && mapping.isActive)
      .sort((a, b) => a.entityName.localeCompare(b.entityName));
  }

  seed(docs: TenantMapping[]): void {
    this.mappings.push(...docs);
  }

  clear(): void {
    this.mappings = [];
  }
}

export class InMemoryTenantRepository implements TenantRepository {
  private tenants = new Map<string, Tenant>();

  async findById(id: string): Promise<Tenant | null> {
    return this.tenants.get(id) ?? null;
  }

  seed(docs: Tenant[]): void {
    docs.forEach((doc) => this.tenants.set(doc.id, doc));
  }

  clear(): void {
    this.tenants.clear();
  }
}

export const createInMemoryRepositories = (now: Clock = Date.now) => ({
  jobs: new InMemoryRecordingJobRepository(now),
  mappings: new InMemorySchemaMappingRepository(),
  tenants: new InMemoryTenantRepository(),
}) satisfies Repositories;
