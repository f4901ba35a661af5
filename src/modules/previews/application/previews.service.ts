import {
  BadRequestException,
  ConflictException,
  GoneException,
  Inject,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { InjectQueue } from '@nestjs/bullmq';
import type { Queue } from 'bullmq';
import { ConfigService } from '@nestjs/config';
import { addDays, daysUntil } from '../../../common/utils/dates';
import { sanitizeChildName } from '../../../common/utils/sanitize';
import type { GenerationJob, JobStatus } from '../../jobs/domain/entities/generation-job.entity';
import {
  IGenerationJobsRepositoryToken,
  type IGenerationJobsRepository,
} from '../../jobs/domain/generation-jobs.repository.interface';
import { PREVIEW_QUEUE } from '../../queue/queue.module';
import { StoriesService } from '../../stories/application/stories.service';
import type { GenerationPhase, PreviewStatus } from '../domain/entities/preview.entity';
import { canTransitionPreviewStatus } from '../domain/preview-status';
import type { PreviewTaskData } from '../domain/preview-task';
import { defaultStepFor } from '../domain/progress';
import {
  IPreviewsRepositoryToken,
  type IPreviewsRepository,
} from '../domain/previews.repository.interface';
import type { CreatePreviewDto } from '../interfaces/dto/create-preview.dto';

const ESTIMATED_SECONDS_PER_IMAGE = 30;

/** Storefront login context forwarded in request headers. */
export interface StoreCustomer {
  customerId: string | null;
  customerEmail: string | null;
}

const NO_CUSTOMER: StoreCustomer = { customerId: null, customerEmail: null };
const TEASER_LENGTH = 80;

export interface JobStatusView {
  jobId: string;
  status: JobStatus;
  progress: number;
  currentStep: string;
  previewId?: string;
  error?: string;
  canRetry?: boolean;
}

export interface PreviewPageView {
  pageNumber: number;
  imageUrl: string | null;
  storyText: string;
}

export interface PreviewView {
  previewId: string;
  status: PreviewStatus;
  generationPhase: GenerationPhase;
  childName: string;
  themeId: string;
  title: string;
  coverUrl: string | null;
  pages: PreviewPageView[];
  lockedPages: { pageNumber: number; teaser: string }[];
  previewPageCount: number;
  totalPageCount: number;
  isPurchased: boolean;
  pdfUrl: string | null;
  daysRemaining: number;
  expiresAt: string;
}

@Injectable()
export class PreviewsService {
  private readonly logger = new Logger(PreviewsService.name);

  constructor(
    @Inject(IPreviewsRepositoryToken)
    private readonly previewsRepository: IPreviewsRepository,
    @Inject(IGenerationJobsRepositoryToken)
    private readonly jobsRepository: IGenerationJobsRepository,
    private readonly storiesService: StoriesService,
    private readonly configService: ConfigService,
    @InjectQueue(PREVIEW_QUEUE)
    private readonly previewQueue: Queue<PreviewTaskData>,
  ) {}

  async createPreview(dto: CreatePreviewDto, customer: StoreCustomer = NO_CUSTOMER) {
    const theme = this.storiesService.getTheme(dto.themeId);
    if (!theme) {
      throw new BadRequestException(`Unknown story theme: ${dto.themeId}`);
    }

    const previewPageCount = Math.min(
      this.configService.get<number>('book.previewPageCount') ?? 5,
      theme.pages.length,
    );
    const totalPageCount = Math.min(
      this.configService.get<number>('book.totalPageCount') ?? 10,
      theme.pages.length,
    );
    const expiryDays = this.configService.get<number>('book.previewExpiryDays') ?? 7;

    const preview = await this.previewsRepository.create({
      request: {
        childName: sanitizeChildName(dto.childName),
        childAge: dto.childAge,
        childGender: dto.childGender,
        photoUrl: dto.photoUrl,
        themeId: theme.id,
        style: dto.style ?? 'photorealistic',
        seed: dto.seed ?? null,
      },
      owner: { sessionId: dto.sessionId ?? null, customerId: customer.customerId },
      customerEmail: customer.customerEmail ?? dto.customerEmail ?? null,
      notifyOnComplete: dto.notifyOnComplete ?? false,
      previewPageCount,
      totalPageCount,
      expiresAt: addDays(new Date(), expiryDays),
    });

    const job = await this.jobsRepository.create({
      jobType: 'preview_generation',
      referenceId: preview.id,
      maxAttempts: this.configService.get<number>('book.maxJobAttempts') ?? 3,
    });

    await this.enqueue(job.id, preview.id);
    this.logger.log(`Preview ${preview.id} created, job ${job.id} queued`);

    return {
      jobId: job.id,
      previewId: preview.id,
      status: job.status,
      // Cover plus every preview page.
      estimatedTimeSeconds: (previewPageCount + 1) * ESTIMATED_SECONDS_PER_IMAGE,
    };
  }

  async getJobStatus(jobId: string): Promise<JobStatusView> {
    const job = await this.requireJob(jobId);

    const view: JobStatusView = {
      jobId: job.id,
      status: job.status,
      progress: job.progress,
      currentStep: job.currentStep ?? defaultStepFor(job.status),
    };
    if (job.jobType === 'preview_generation') {
      view.previewId = job.referenceId;
    }
    if (job.status === 'failed') {
      view.error = job.errorMessage ?? defaultStepFor('failed');
      view.canRetry = job.jobType === 'preview_generation' && job.attempts < job.maxAttempts;
    }
    return view;
  }

  /** Start a new attempt for a failed preview job. The failed job stays as it is. */
  async retryJob(jobId: string) {
    const failedJob = await this.requireJob(jobId);

    if (failedJob.jobType !== 'preview_generation') {
      throw new BadRequestException('Only preview jobs can be retried');
    }
    if (failedJob.status !== 'failed') {
      throw new BadRequestException(`Job is ${failedJob.status}; only failed jobs can be retried`);
    }
    if (failedJob.attempts >= failedJob.maxAttempts) {
      throw new BadRequestException(
        `Retry limit reached (${failedJob.attempts}/${failedJob.maxAttempts})`,
      );
    }

    const preview = await this.previewsRepository.findById(failedJob.referenceId);
    if (!preview) {
      throw new NotFoundException('Preview not found');
    }
    if (!canTransitionPreviewStatus(preview.status, 'generating')) {
      throw new ConflictException(`Preview is ${preview.status} and cannot be regenerated`);
    }

    await this.previewsRepository.update(preview.id, { status: 'generating' });
    const job = await this.jobsRepository.create({
      jobType: 'preview_generation',
      referenceId: preview.id,
      attempts: failedJob.attempts + 1,
      maxAttempts: failedJob.maxAttempts,
      currentStep: 'Retry queued',
    });

    await this.enqueue(job.id, preview.id);
    this.logger.log(
      `Preview ${preview.id}: retry ${job.attempts}/${job.maxAttempts} queued as job ${job.id}`,
    );

    return {
      jobId: job.id,
      previewId: preview.id,
      status: job.status,
      attempt: job.attempts,
      maxAttempts: job.maxAttempts,
    };
  }

  async getPreview(previewId: string, now: Date = new Date()): Promise<PreviewView> {
    const preview = await this.previewsRepository.findById(previewId);
    if (!preview) {
      throw new NotFoundException('Preview not found');
    }
    if (preview.status === 'expired' || preview.expiresAt.getTime() <= now.getTime()) {
      throw new GoneException('This preview has expired');
    }
    if (preview.status === 'failed') {
      throw new ConflictException('Preview generation failed; retry the generation job');
    }

    const theme = this.storiesService.getTheme(preview.request.themeId);
    const unlocked = preview.status === 'purchased' && preview.generationPhase === 'complete';
    const visibleCount = unlocked ? preview.totalPageCount : preview.previewPageCount;

    const pages = preview.pages
      .filter((page) => page.pageNumber <= visibleCount)
      .map((page) => ({
        pageNumber: page.pageNumber,
        imageUrl: unlocked ? page.imageUrl : page.previewImageUrl,
        storyText: page.storyText,
      }));

    const lockedPages =
      unlocked || !theme
        ? []
        : theme.pages
            .filter(
              (page) =>
                page.pageNumber > preview.previewPageCount &&
                page.pageNumber <= preview.totalPageCount,
            )
            .map((page) => ({
              pageNumber: page.pageNumber,
              teaser: this.teaser(
                this.storiesService.renderStoryText(page, preview.request.childName),
              ),
            }));

    return {
      previewId: preview.id,
      status: preview.status,
      generationPhase: preview.generationPhase,
      childName: preview.request.childName,
      themeId: preview.request.themeId,
      title: theme
        ? this.storiesService.bookTitle(theme, preview.request.childName)
        : preview.request.childName,
      coverUrl: preview.coverUrl,
      pages,
      lockedPages,
      previewPageCount: preview.previewPageCount,
      totalPageCount: preview.totalPageCount,
      isPurchased: preview.status === 'purchased',
      pdfUrl: unlocked ? preview.pdfUrl : null,
      daysRemaining: daysUntil(preview.expiresAt, now),
      expiresAt: preview.expiresAt.toISOString(),
    };
  }

  private teaser(text: string): string {
    return text.length > TEASER_LENGTH ? `${text.slice(0, TEASER_LENGTH)}...` : text;
  }

  private async requireJob(jobId: string): Promise<GenerationJob> {
    const job = await this.jobsRepository.findById(jobId);
    if (!job) {
      throw new NotFoundException('Job not found');
    }
    return job;
  }

  private async enqueue(jobId: string, previewId: string) {
    await this.previewQueue.add('generate', { jobId, previewId }, { jobId });
  }
}
