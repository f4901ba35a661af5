import { Injectable } from '@nestjs/common';
import { PartialUpdateBuilder } from '../../../../../common/database/update-builder';
import { DatabaseService } from '../../../../database/infrastructure/database.service';
import {
  rowToGenerationJob,
  type GenerationJob,
  type GenerationJobPatch,
  type GenerationJobRow,
  type JobStatus,
  type JobType,
} from '../../../domain/entities/generation-job.entity';
import type { IGenerationJobsRepository } from '../../../domain/generation-jobs.repository.interface';

const clampProgress = (progress: number | undefined) =>
  progress === undefined ? undefined : Math.min(100, Math.max(0, Math.round(progress)));

@Injectable()
export class GenerationJobsRepository implements IGenerationJobsRepository {
  constructor(private readonly db: DatabaseService) {}

  async create(params: {
    jobType: JobType;
    referenceId: string;
    attempts?: number;
    maxAttempts: number;
    currentStep?: string;
  }): Promise<GenerationJob> {
    const rows = await this.db.query<GenerationJobRow>(
      `INSERT INTO generation_jobs (job_type, reference_id, status, progress, current_step, attempts, max_attempts)
       VALUES ($1, $2, 'queued', 0, $3, $4, $5)
       RETURNING *`,
      [
        params.jobType,
        params.referenceId,
        params.currentStep ?? 'Queued',
        params.attempts ?? 1,
        params.maxAttempts,
      ],
    );
    return rowToGenerationJob(rows[0]);
  }

  async findById(jobId: string): Promise<GenerationJob | null> {
    const rows = await this.db.query<GenerationJobRow>(
      'SELECT * FROM generation_jobs WHERE id = $1 LIMIT 1',
      [jobId],
    );
    return rows[0] ? rowToGenerationJob(rows[0]) : null;
  }

  async findLatestByReference(
    referenceId: string,
    jobType: JobType,
  ): Promise<GenerationJob | null> {
    const rows = await this.db.query<GenerationJobRow>(
      `SELECT * FROM generation_jobs
       WHERE reference_id = $1 AND job_type = $2
       ORDER BY queued_at DESC
       LIMIT 1`,
      [referenceId, jobType],
    );
    return rows[0] ? rowToGenerationJob(rows[0]) : null;
  }

  async update(jobId: string, patch: GenerationJobPatch): Promise<void> {
    const statement = new PartialUpdateBuilder('generation_jobs')
      .set('status', patch.status)
      .set('progress', clampProgress(patch.progress))
      .set('current_step', patch.currentStep)
      .set('error_message', patch.errorMessage)
      .setJson('result_data', patch.resultData)
      .set('started_at', patch.startedAt)
      .set('completed_at', patch.completedAt)
      .build(jobId);

    if (statement) {
      await this.db.query(statement.text, statement.values);
    }
  }

  async findForRecovery(params: {
    jobType: JobType;
    statuses: JobStatus[];
    createdAfter: Date;
  }): Promise<GenerationJob[]> {
    if (params.statuses.length === 0) return [];

    const rows = await this.db.query<GenerationJobRow>(
      `SELECT * FROM generation_jobs
       WHERE job_type = $1
         AND status = ANY($2::text[])
         AND queued_at >= $3
       ORDER BY queued_at ASC`,
      [params.jobType, params.statuses, params.createdAfter],
    );
    return rows.map(rowToGenerationJob);
  }
}
