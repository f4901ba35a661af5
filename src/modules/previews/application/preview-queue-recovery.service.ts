import { Inject, Injectable, Logger, OnApplicationBootstrap } from '@nestjs/common';
import { InjectQueue } from '@nestjs/bullmq';
import type { Queue } from 'bullmq';
import { toError } from '../../../common/utils/concurrency';
import { addHours } from '../../../common/utils/dates';
import type { JobStatus } from '../../jobs/domain/entities/generation-job.entity';
import {
  IGenerationJobsRepositoryToken,
  type IGenerationJobsRepository,
} from '../../jobs/domain/generation-jobs.repository.interface';
import { PREVIEW_QUEUE } from '../../queue/queue.module';
import type { PreviewTaskData } from '../domain/preview-task';

const RECOVERY_STATUSES: JobStatus[] = ['queued', 'processing'];
const RECOVERY_LOOKBACK_HOURS = 24;

/** Re-enqueues preview jobs that were lost from Redis while the service was down. */
@Injectable()
export class PreviewQueueRecoveryService implements OnApplicationBootstrap {
  private readonly logger = new Logger(PreviewQueueRecoveryService.name);

  constructor(
    @InjectQueue(PREVIEW_QUEUE)
    private readonly previewQueue: Queue<PreviewTaskData>,
    @Inject(IGenerationJobsRepositoryToken)
    private readonly jobsRepository: IGenerationJobsRepository,
  ) {}

  async onApplicationBootstrap() {
    await this.recoverQueue();
  }

  async recoverQueue(now: Date = new Date()): Promise<number> {
    try {
      if (await this.previewQueue.isPaused()) {
        await this.previewQueue.resume();
        this.logger.warn('Preview queue was paused; resumed on startup.');
      }

      const jobs = await this.jobsRepository.findForRecovery({
        jobType: 'preview_generation',
        statuses: RECOVERY_STATUSES,
        createdAfter: addHours(now, -RECOVERY_LOOKBACK_HOURS),
      });
      if (jobs.length === 0) return 0;

      const queueJobs = await this.previewQueue.getJobs([
        'waiting',
        'delayed',
        'active',
        'paused',
        'prioritized',
      ]);
      const queuedJobIds = new Set(queueJobs.map((job) => job.data.jobId));

      let requeued = 0;
      for (const job of jobs) {
        if (queuedJobIds.has(job.id)) continue;

        // A finished Bull job with the same id would swallow the add.
        const stale = await this.previewQueue.getJob(job.id);
        if (stale) {
          await stale.remove();
        }

        try {
          await this.previewQueue.add(
            'generate',
            { jobId: job.id, previewId: job.referenceId },
            { jobId: job.id },
          );
          requeued++;
        } catch (error) {
          this.logger.warn(`Failed to re-queue preview job ${job.id}: ${toError(error).message}`);
        }
      }

      if (requeued > 0) {
        this.logger.warn(`Re-queued ${requeued} preview job(s) after restart.`);
      }
      return requeued;
    } catch (error) {
      const err = toError(error);
      this.logger.error(`Failed to recover preview queue: ${err.message}`, err.stack);
      return 0;
    }
  }
}
