import { OnWorkerEvent, Processor, WorkerHost } from '@nestjs/bullmq';
import { Inject, Logger } from '@nestjs/common';
import type { Job } from 'bullmq';
import { toError } from '../../../../common/utils/concurrency';
import {
  IGenerationJobsRepositoryToken,
  type IGenerationJobsRepository,
} from '../../../jobs/domain/generation-jobs.repository.interface';
import { BOOK_COMPLETION_QUEUE } from '../../../queue/queue.module';
import { BookCompletionService } from '../../application/book-completion.service';
import type { BookCompletionTaskData } from '../../domain/book-completion-task';

// Retries happen inside BookCompletionService, so the Bull job runs once.
@Processor(BOOK_COMPLETION_QUEUE, {
  concurrency: 2,
})
export class BookCompletionProcessor extends WorkerHost {
  private readonly logger = new Logger(BookCompletionProcessor.name);

  constructor(
    private readonly completionService: BookCompletionService,
    @Inject(IGenerationJobsRepositoryToken)
    private readonly jobsRepository: IGenerationJobsRepository,
  ) {
    super();
  }

  async process(job: Job<BookCompletionTaskData>): Promise<string> {
    const { orderId, previewId, childName, jobId } = job.data;
    this.logger.log(`Completing book for order ${orderId} (Bull job ${job.id})`);

    await this.jobsRepository.update(jobId, {
      status: 'processing',
      progress: 10,
      currentStep: 'Generating remaining pages',
      startedAt: new Date(),
    });

    try {
      const pdfUrl = await this.completionService.completeBookAndGeneratePdf(
        orderId,
        previewId,
        childName,
      );
      await this.jobsRepository.update(jobId, {
        status: 'completed',
        progress: 100,
        currentStep: 'Complete',
        completedAt: new Date(),
        resultData: { orderId, previewId, pdfUrl },
      });
      return pdfUrl;
    } catch (err) {
      const error = toError(err);
      await this.jobsRepository.update(jobId, {
        status: 'failed',
        currentStep: 'Failed',
        errorMessage: error.message,
        completedAt: new Date(),
      });
      throw error;
    }
  }

  @OnWorkerEvent('completed')
  onCompleted(job: Job<BookCompletionTaskData>) {
    this.logger.debug(`Job ${job.id} completed for order ${job.data.orderId}`);
  }

  @OnWorkerEvent('failed')
  onFailed(job: Job<BookCompletionTaskData> | undefined, error: Error) {
    this.logger.error(
      `Job ${job?.id ?? 'unknown'} failed for order ${job?.data.orderId ?? 'unknown'}: ${error.message}`,
    );
  }
}
