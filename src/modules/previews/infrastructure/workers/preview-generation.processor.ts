import { OnWorkerEvent, Processor, WorkerHost } from '@nestjs/bullmq';
import { Logger } from '@nestjs/common';
import type { Job } from 'bullmq';
import { PREVIEW_QUEUE } from '../../../queue/queue.module';
import { PreviewPipelineService } from '../../application/preview-pipeline.service';
import type { PreviewRunResult, PreviewTaskData } from '../../domain/preview-task';

// Pages within a run are sequential; this bounds how many previews hit the
// generation provider at once.
@Processor(PREVIEW_QUEUE, {
  concurrency: 3,
})
export class PreviewGenerationProcessor extends WorkerHost {
  private readonly logger = new Logger(PreviewGenerationProcessor.name);

  constructor(private readonly pipeline: PreviewPipelineService) {
    super();
  }

  async process(job: Job<PreviewTaskData>): Promise<PreviewRunResult> {
    const { jobId, previewId } = job.data;
    this.logger.log(`Processing preview ${previewId} (job ${jobId}, Bull job ${job.id})`);
    return this.pipeline.runPreview(job.data);
  }

  @OnWorkerEvent('completed')
  onCompleted(job: Job<PreviewTaskData>, result: PreviewRunResult) {
    this.logger.debug(
      `Job ${job.id} finished for preview ${job.data.previewId}: ${result.status}`,
    );
  }

  @OnWorkerEvent('failed')
  onFailed(job: Job<PreviewTaskData> | undefined, error: Error) {
    this.logger.error(
      `Job ${job?.id ?? 'unknown'} failed for preview ${job?.data.previewId ?? 'unknown'}: ${error.message}`,
    );
  }
}
