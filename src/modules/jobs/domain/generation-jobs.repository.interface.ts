import type {
  GenerationJob,
  GenerationJobPatch,
  JobStatus,
  JobType,
} from './entities/generation-job.entity';

export interface IGenerationJobsRepository {
  create(params: {
    jobType: JobType;
    referenceId: string;
    attempts?: number;
    maxAttempts: number;
    currentStep?: string;
  }): Promise<GenerationJob>;
  findById(jobId: string): Promise<GenerationJob | null>;
  findLatestByReference(referenceId: string, jobType: JobType): Promise<GenerationJob | null>;
  /** Writes only the fields present in the patch. */
  update(jobId: string, patch: GenerationJobPatch): Promise<void>;
  findForRecovery(params: {
    jobType: JobType;
    statuses: JobStatus[];
    createdAfter: Date;
  }): Promise<GenerationJob[]>;
}

export const IGenerationJobsRepositoryToken = Symbol('IGenerationJobsRepository');
