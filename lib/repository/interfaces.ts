import type { MappingProvider } from "../recordings/ports";
import type {
  NewRecordingJob,
  RecordingJob,
  RecordingJobPatch,
  Tenant,
} from "../recordings/types";

export type ListRecordingJobsQuery = {
  tenantId?: string;
  offset: number;
  limit: number;
};

export interface RecordingJobRepository {
  /** Inserts an `uploaded` job at attempt 0. */
  create(job: NewRecordingJob): Promise<RecordingJob>;
  findById(id: string): Promise<RecordingJob | null>;
  /** Newest `createdAt` first. */
  list(query: ListRecordingJobsQuery): Promise<RecordingJob[]>;
  /**
   * Apply `patch` only while the job is still on `attempt`. Returns null when
   * the job is gone or a reset has superseded the attempt. A status change
   * off the state machine throws InvalidTransitionError.
   */
  updateForAttempt(id: string, attempt: number, patch: RecordingJobPatch): Promise<RecordingJob | null>;
  /** Back to `uploaded` with every stage output cleared and the attempt bumped. */
  reset(id: string): Promise<RecordingJob | null>;
  /** Non-terminal jobs whose `updatedAt` is before the cutoff, oldest first. */
  findStale(updatedBefore: number, limit: number): Promise<RecordingJob[]>;
}

export type SchemaMappingRepository = MappingProvider;

export interface TenantRepository {
  findById(id: string): Promise<Tenant | null>;
}

export type Repositories = {
  jobs: RecordingJobRepository;
  mappings: SchemaMappingRepository;
  tenants: TenantRepository;
};
