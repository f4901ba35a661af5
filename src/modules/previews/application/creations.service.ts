import { BadRequestException, Inject, Injectable, Logger } from '@nestjs/common';
import { daysUntil } from '../../../common/utils/dates';
import {
  IGenerationJobsRepositoryToken,
  type IGenerationJobsRepository,
} from '../../jobs/domain/generation-jobs.repository.interface';
import type { Preview, PreviewOwner, PreviewStatus } from '../domain/entities/preview.entity';
import {
  IPreviewsRepositoryToken,
  type IPreviewsRepository,
} from '../domain/previews.repository.interface';

/** Unexpired previews a guest session may hold before logging in. */
export const GUEST_CREATION_LIMIT = 3;
const MAX_LISTED = 50;

export interface CreationView {
  previewId: string;
  childName: string;
  themeId: string;
  coverUrl: string | null;
  status: PreviewStatus;
  paymentStatus: 'paid' | 'unpaid';
  createdAt: string;
  expiresAt: string;
  daysRemaining: number;
  jobId: string | null;
}

export interface CreationsView {
  creations: CreationView[];
  total: number;
  canCreateMore: boolean;
}

export interface CreationCountView {
  count: number;
  limit: number | null;
  canCreate: boolean;
}

export interface LinkSessionResult {
  linkedCount: number;
  message: string;
}

/** The "my creations" list for guests (by session) and logged-in customers. */
@Injectable()
export class CreationsService {
  private readonly logger = new Logger(CreationsService.name);

  constructor(
    @Inject(IPreviewsRepositoryToken)
    private readonly previewsRepository: IPreviewsRepository,
    @Inject(IGenerationJobsRepositoryToken)
    private readonly jobsRepository: IGenerationJobsRepository,
  ) {}

  async listCreations(owner: PreviewOwner, now: Date = new Date()): Promise<CreationsView> {
    if (!owner.customerId && !owner.sessionId) {
      return { creations: [], total: 0, canCreateMore: true };
    }

    const previews = await this.previewsRepository.findByOwner({
      owner,
      expiresAfter: now,
      limit: MAX_LISTED,
    });
    const creations = await Promise.all(previews.map((preview) => this.toView(preview, now)));

    this.logger.log(
      `Listed ${creations.length} creations for ${owner.customerId ? `customer ${owner.customerId}` : 'guest session'}`,
    );

    return {
      creations,
      total: creations.length,
      canCreateMore: owner.customerId !== null || creations.length < GUEST_CREATION_LIMIT,
    };
  }

  /** Customers have no limit, so only guest sessions are counted. */
  async countCreations(owner: PreviewOwner, now: Date = new Date()): Promise<CreationCountView> {
    if (owner.customerId) {
      return { count: 0, limit: null, canCreate: true };
    }
    if (!owner.sessionId) {
      return { count: 0, limit: GUEST_CREATION_LIMIT, canCreate: true };
    }

    const previews = await this.previewsRepository.findByOwner({
      owner: { sessionId: owner.sessionId, customerId: null },
      expiresAfter: now,
      limit: MAX_LISTED,
    });
    return {
      count: previews.length,
      limit: GUEST_CREATION_LIMIT,
      canCreate: previews.length < GUEST_CREATION_LIMIT,
    };
  }

  /** Called after login so creations made as a guest follow the customer. */
  async linkSession(owner: PreviewOwner): Promise<LinkSessionResult> {
    if (!owner.customerId) {
      throw new BadRequestException('Customer ID required (not logged in)');
    }
    if (!owner.sessionId) {
      return { linkedCount: 0, message: 'No session to link' };
    }

    const linkedCount = await this.previewsRepository.assignCustomer(
      owner.sessionId,
      owner.customerId,
    );
    this.logger.log(`Linked ${linkedCount} previews to customer ${owner.customerId}`);

    return { linkedCount, message: `Linked ${linkedCount} creation(s) to your account` };
  }

  private async toView(preview: Preview, now: Date): Promise<CreationView> {
    const job = await this.jobsRepository.findLatestByReference(preview.id, 'preview_generation');
    const [firstPage] = preview.pages;

    return {
      previewId: preview.id,
      childName: preview.request.childName,
      themeId: preview.request.themeId,
      coverUrl: preview.coverUrl ?? firstPage?.previewImageUrl ?? null,
      status: preview.status,
      paymentStatus: preview.status === 'purchased' ? 'paid' : 'unpaid',
      createdAt: preview.createdAt.toISOString(),
      expiresAt: preview.expiresAt.toISOString(),
      daysRemaining: daysUntil(preview.expiresAt, now),
      jobId: job?.id ?? null,
    };
  }
}
