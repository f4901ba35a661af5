import { isRecord, parseLiteral } from '../../../../common/utils/types';

export const JOB_STATUSES = ['queued', 'processing', 'completed', 'failed'] as const;
export type JobStatus = (typeof JOB_STATUSES)[number];

export const JOB_TYPES = ['preview_generation', 'book_completion'] as const;
export type JobType = (typeof JOB_TYPES)[number];

export interface GenerationJob {
  id: string;
  jobType: JobType;
  /** Preview id for preview jobs, order id for completion jobs. */
  referenceId: string;
  status: JobStatus;
  progress: number;
  currentStep: string | null;
  attempts: number;
  maxAttempts: number;
  errorMessage: string | null;
  resultData: Record<string, unknown> | null;
  queuedAt: Date;
  startedAt: Date | null;
  completedAt: Date | null;
}

export interface GenerationJobRow {
  id: string;
  job_type: string;
  reference_id: string;
  status: string;
  progress: number;
  current_step: string | null;
  attempts: number;
  max_attempts: number;
  error_message: string | null;
  result_data: unknown;
  queued_at: Date;
  started_at: Date | null;
  completed_at: Date | null;
}

export interface GenerationJobPatch {
  status?: JobStatus;
  progress?: number;
  currentStep?: string | null;
  errorMessage?: string | null;
  resultData?: Record<string, unknown> | null;
  startedAt?: Date | null;
  completedAt?: Date | null;
}

export const isTerminalJobStatus = (status: JobStatus) =>
  status === 'completed' || status === 'failed';

export function rowToGenerationJob(row: GenerationJobRow): GenerationJob {
  return {
    id: row.id,
    jobType: parseLiteral(JOB_TYPES, row.job_type, 'preview_generation'),
    referenceId: row.reference_id,
    status: parseLiteral(JOB_STATUSES, row.status, 'failed'),
    progress: row.progress,
    currentStep: row.current_step,
    attempts: row.attempts,
    maxAttempts: row.max_attempts,
    errorMessage: row.error_message,
    resultData: isRecord(row.result_data) ? row.result_data : null,
    queuedAt: row.queued_at,
    startedAt: row.started_at,
    completedAt: row.completed_at,
  };
}
