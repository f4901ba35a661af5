import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { toError } from '../../../common/utils/concurrency';
import { isTerminalJobStatus } from '../../jobs/domain/entities/generation-job.entity';
import {
  IGenerationJobsRepositoryToken,
  type IGenerationJobsRepository,
} from '../../jobs/domain/generation-jobs.repository.interface';
import {
  NOTIFICATION_DISPATCHER,
  type NotificationDispatcher,
} from '../../notifications/domain/notification-dispatcher.interface';
import { StoriesService } from '../../stories/application/stories.service';
import { mergePages, type Preview } from '../domain/entities/preview.entity';
import { UnknownThemeError } from '../domain/errors';
import { canAdvanceGenerationPhase, canTransitionPreviewStatus } from '../domain/preview-status';
import type { PreviewRunResult, PreviewTaskData } from '../domain/preview-task';
import { PREVIEW_PROGRESS, pageProgress } from '../domain/progress';
import {
  IPreviewsRepositoryToken,
  type IPreviewsRepository,
} from '../domain/previews.repository.interface';
import { PageRendererService } from './page-renderer.service';

@Injectable()
export class PreviewPipelineService {
  private readonly logger = new Logger(PreviewPipelineService.name);

  constructor(
    @Inject(IPreviewsRepositoryToken)
    private readonly previewsRepository: IPreviewsRepository,
    @Inject(IGenerationJobsRepositoryToken)
    private readonly jobsRepository: IGenerationJobsRepository,
    @Inject(NOTIFICATION_DISPATCHER)
    private readonly notifications: NotificationDispatcher,
    private readonly pageRenderer: PageRendererService,
    private readonly storiesService: StoriesService,
    private readonly configService: ConfigService,
  ) {}

  /**
   * Generate the free preview pages. Individual page failures are tolerated;
   * the run only fails when too few pages (by default none) were produced.
   */
  async runPreview(task: PreviewTaskData): Promise<PreviewRunResult> {
    const { jobId, previewId } = task;

    const job = await this.jobsRepository.findById(jobId);
    if (!job) {
      this.logger.warn(`Preview job ${jobId} not found`);
      return { status: 'skipped', pageCount: 0, failedPages: [], error: 'Job not found' };
    }
    if (isTerminalJobStatus(job.status)) {
      this.logger.warn(`Preview job ${jobId} is already ${job.status}, skipping`);
      return { status: 'skipped', pageCount: 0, failedPages: [] };
    }

    const preview = await this.previewsRepository.findById(previewId);
    if (!preview) {
      const error = `Preview ${previewId} not found`;
      await this.jobsRepository.update(jobId, {
        status: 'failed',
        errorMessage: error,
        completedAt: new Date(),
      });
      return { status: 'failed', pageCount: 0, failedPages: [], error };
    }

    try {
      return await this.generate(jobId, preview);
    } catch (err) {
      const error = toError(err);
      this.logger.error(`Preview ${previewId}: generation crashed: ${error.message}`, error.stack);
      await this.markFailed(jobId, preview, `Generation failed: ${error.message}`);
      return { status: 'failed', pageCount: 0, failedPages: [], error: error.message };
    }
  }

  private async generate(jobId: string, preview: Preview): Promise<PreviewRunResult> {
    const previewId = preview.id;
    await this.jobsRepository.update(jobId, {
      status: 'processing',
      progress: PREVIEW_PROGRESS.start,
      currentStep: 'Starting',
      errorMessage: null,
      startedAt: new Date(),
    });

    const theme = this.storiesService.getTheme(preview.request.themeId);
    if (!theme) {
      throw new UnknownThemeError(preview.request.themeId);
    }

    await this.reportProgress(jobId, PREVIEW_PROGRESS.faceAnalysis, 'Analyzing photo');
    const faceDescription = await this.pageRenderer.resolveFaceDescription(preview, {
      analyze: true,
    });

    await this.reportProgress(jobId, PREVIEW_PROGRESS.cover, 'Creating cover');
    const coverUrl = await this.pageRenderer.renderCover(preview, theme, faceDescription);
    if (coverUrl && coverUrl !== preview.coverUrl) {
      await this.previewsRepository.update(previewId, { coverUrl });
    }

    const templates = theme.pages.slice(0, preview.previewPageCount);
    const templateNumbers = new Set(templates.map((page) => page.pageNumber));
    let pages = preview.pages;
    const failedPages: number[] = [];

    for (const [index, template] of templates.entries()) {
      if (pages.some((page) => page.pageNumber === template.pageNumber)) {
        continue;
      }

      await this.reportProgress(
        jobId,
        pageProgress(index, templates.length),
        `Generating page ${index + 1} of ${templates.length}`,
      );

      try {
        const result = await this.pageRenderer.renderPage(preview, template, faceDescription, {
          watermark: true,
        });
        pages = mergePages(pages, [result]);
        // Persist after every page so a crash keeps what was already paid for.
        await this.previewsRepository.update(previewId, { pages });
        this.logger.log(`Preview ${previewId}: page ${template.pageNumber} done`);
      } catch (error) {
        failedPages.push(template.pageNumber);
        this.logger.warn(
          `Preview ${previewId}: page ${template.pageNumber} failed: ${toError(error).message}`,
        );
      }
    }

    const pageCount = pages.filter((page) => templateNumbers.has(page.pageNumber)).length;
    const required = this.requiredPageCount(templates.length);

    if (pageCount < required) {
      const error =
        pageCount === 0
          ? 'Generation failed: No images or story pages generated'
          : `Generation failed: only ${pageCount} of ${templates.length} pages generated`;
      this.logger.error(`Preview ${previewId}: ${error}`);
      await this.markFailed(jobId, preview, error);
      return { status: 'failed', pageCount, failedPages, error };
    }

    await this.reportProgress(jobId, PREVIEW_PROGRESS.finalizing, 'Finalizing preview');
    // Status may have moved on (expired by the sweep) while pages were rendering.
    const current = (await this.previewsRepository.findById(previewId)) ?? preview;
    if (!canTransitionPreviewStatus(current.status, 'active')) {
      const error = `Preview is ${current.status}; generated pages were kept but it was not activated`;
      this.logger.warn(`Preview ${previewId}: ${error}`);
      await this.jobsRepository.update(jobId, {
        status: 'failed',
        errorMessage: error,
        currentStep: 'Failed',
        completedAt: new Date(),
      });
      return { status: 'skipped', pageCount, failedPages, error };
    }
    await this.previewsRepository.update(previewId, {
      status: 'active',
      ...(canAdvanceGenerationPhase(current.generationPhase, 'preview')
        ? { generationPhase: 'preview' as const }
        : {}),
      pages,
    });
    await this.jobsRepository.update(jobId, {
      status: 'completed',
      progress: PREVIEW_PROGRESS.complete,
      currentStep: 'Complete',
      completedAt: new Date(),
      resultData: { previewId, pageCount, failedPages },
    });

    this.logger.log(
      `Preview ${previewId}: ready with ${pageCount}/${templates.length} pages` +
        (failedPages.length > 0 ? ` (failed: ${failedPages.join(', ')})` : ''),
    );

    await this.notifyPreviewReady(preview);
    return { status: 'active', pageCount, failedPages };
  }

  private requiredPageCount(total: number): number {
    const ratio = this.configService.get<number>('book.previewMinSuccessRatio') ?? 0;
    return Math.max(1, Math.ceil(total * ratio));
  }

  private async reportProgress(jobId: string, progress: number, currentStep: string) {
    await this.jobsRepository.update(jobId, { progress, currentStep });
  }

  private async markFailed(jobId: string, preview: Preview, errorMessage: string) {
    await this.jobsRepository.update(jobId, {
      status: 'failed',
      errorMessage,
      currentStep: 'Failed',
      completedAt: new Date(),
    });

    const status = (await this.previewsRepository.findById(preview.id))?.status ?? preview.status;
    if (canTransitionPreviewStatus(status, 'failed')) {
      await this.previewsRepository.update(preview.id, { status: 'failed' });
    } else {
      this.logger.warn(`Preview ${preview.id}: left as ${status} after failed run`);
    }
  }

  private async notifyPreviewReady(preview: Preview) {
    if (!preview.notifyOnComplete || !preview.customerEmail) return;

    const frontendUrl = this.configService.get<string>('app.frontendUrl') ?? '';
    try {
      const sent = await this.notifications.send(preview.customerEmail, 'preview_ready', {
        childName: preview.request.childName,
        previewUrl: `${frontendUrl}/#/preview/${preview.id}`,
      });
      if (!sent) {
        this.logger.warn(`Preview ${preview.id}: preview_ready email not delivered`);
      }
    } catch (error) {
      this.logger.warn(
        `Preview ${preview.id}: preview_ready email failed: ${toError(error).message}`,
      );
    }
  }
}
