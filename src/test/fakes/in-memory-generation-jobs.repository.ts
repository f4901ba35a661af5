import type {
  GenerationJob,
  GenerationJobPatch,
  JobStatus,
  JobType,
} from '../../modules/jobs/domain/entities/generation-job.entity';
import type { IGenerationJobsRepository } from '../../modules/jobs/domain/generation-jobs.repository.interface';

export class InMemoryGenerationJobsRepository implements IGenerationJobsRepository {
  readonly rows = new Map<string, GenerationJob>();
  /** Every progress value written, in order, per job. */
  readonly progressHistory = new Map<string, number[]>();
  private sequence = 0;

  async create(params: {
    jobType: JobType;
    referenceId: string;
    attempts?: number;
    maxAttempts: number;
    currentStep?: string;
  }): Promise<GenerationJob> {
    return this.insert({
      id: this.nextId(),
      jobType: params.jobType,
      referenceId: params.referenceId,
      status: 'queued',
      progress: 0,
      currentStep: params.currentStep ?? 'Queued',
      attempts: params.attempts ?? 1,
      maxAttempts: params.maxAttempts,
      errorMessage: null,
      resultData: null,
      queuedAt: new Date(),
      startedAt: null,
      completedAt: null,
    });
  }

  insert(job: GenerationJob): GenerationJob {
    this.rows.set(job.id, structuredClone(job));
    return structuredClone(job);
  }

  async findById(jobId: string): Promise<GenerationJob | null> {
    const row = this.rows.get(jobId);
    return row ? structuredClone(row) : null;
  }

  async findLatestByReference(referenceId: string, jobType: JobType): Promise<GenerationJob | null> {
    const matches = [...this.rows.values()].filter(
      (row) => row.referenceId === referenceId && row.jobType === jobType,
    );
    const latest = matches[matches.length - 1];
    return latest ? structuredClone(latest) : null;
  }

  async update(jobId: string, patch: GenerationJobPatch): Promise<void> {
    const row = this.rows.get(jobId);
    if (!row) return;

    const next: GenerationJob = { ...row };
    if (patch.status !== undefined) next.status = patch.status;
    if (patch.progress !== undefined) {
      next.progress = Math.min(100, Math.max(0, Math.round(patch.progress)));
      this.progressHistory.set(jobId, [...(this.progressHistory.get(jobId) ?? []), next.progress]);
    }
    if (patch.currentStep !== undefined) next.currentStep = patch.currentStep;
    if (patch.errorMessage !== undefined) next.errorMessage = patch.errorMessage;
    if (patch.resultData !== undefined) next.resultData = structuredClone(patch.resultData);
    if (patch.startedAt !== undefined) next.startedAt = patch.startedAt;
    if (patch.completedAt !== undefined) next.completedAt = patch.completedAt;
    this.rows.set(jobId, next);
  }

  async findForRecovery(params: {
    jobType: JobType;
    statuses: JobStatus[];
    createdAfter: Date;
  }): Promise<GenerationJob[]> {
    return [...this.rows.values()]
      .filter(
        (row) =>
          row.jobType === params.jobType &&
          params.statuses.includes(row.status) &&
          row.queuedAt.getTime() >= params.createdAfter.getTime(),
      )
      .map((row) => structuredClone(row));
  }

  private nextId(): string {
    do {
      this.sequence += 1;
    } while (this.rows.has(`job-${this.sequence}`));
    return `job-${this.sequence}`;
  }

  get(jobId: string): GenerationJob {
    const row = this.rows.get(jobId);
    if (!row) throw new Error(`No job ${jobId}`);
    return structuredClone(row);
  }
}
