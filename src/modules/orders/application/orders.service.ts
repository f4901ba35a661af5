import {
  ConflictException,
  ForbiddenException,
  GoneException,
  Inject,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { InjectQueue } from '@nestjs/bullmq';
import type { Queue } from 'bullmq';
import { ConfigService } from '@nestjs/config';
import { addDays, addHours, daysUntil } from '../../../common/utils/dates';
import { isUniqueViolation } from '../../database/infrastructure/database.service';
import {
  IGenerationJobsRepositoryToken,
  type IGenerationJobsRepository,
} from '../../jobs/domain/generation-jobs.repository.interface';
import type { Preview } from '../../previews/domain/entities/preview.entity';
import { canTransitionPreviewStatus } from '../../previews/domain/preview-status';
import {
  IPreviewsRepositoryToken,
  type IPreviewsRepository,
} from '../../previews/domain/previews.repository.interface';
import { BOOK_COMPLETION_QUEUE } from '../../queue/queue.module';
import {
  STORAGE_GATEWAY,
  type StorageGateway,
} from '../../storage/domain/storage-gateway.interface';
import { StoriesService } from '../../stories/application/stories.service';
import { completionQueueJobId, type BookCompletionTaskData } from '../domain/book-completion-task';
import type { Order } from '../domain/entities/order.entity';
import {
  IOrdersRepositoryToken,
  type IOrdersRepository,
} from '../domain/orders.repository.interface';

const DOWNLOAD_URL_TTL_SECONDS = 3600;
const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

export interface PaidOrderInput {
  externalOrderId: string;
  orderNumber: string | null;
  previewId: string;
  customerEmail: string | null;
  customerName: string | null;
}

export type RejectionReason = 'preview_not_found' | 'preview_not_ready' | 'preview_expired';

export type RegisterOrderResult =
  | { outcome: 'created'; order: Order; jobId: string }
  | { outcome: 'duplicate'; order: Order }
  | { outcome: 'rejected'; reason: RejectionReason };

@Injectable()
export class OrdersService {
  private readonly logger = new Logger(OrdersService.name);

  constructor(
    @Inject(IOrdersRepositoryToken)
    private readonly ordersRepository: IOrdersRepository,
    @Inject(IPreviewsRepositoryToken)
    private readonly previewsRepository: IPreviewsRepository,
    @Inject(IGenerationJobsRepositoryToken)
    private readonly jobsRepository: IGenerationJobsRepository,
    @Inject(STORAGE_GATEWAY)
    private readonly storage: StorageGateway,
    private readonly storiesService: StoriesService,
    private readonly configService: ConfigService,
    @InjectQueue(BOOK_COMPLETION_QUEUE)
    private readonly completionQueue: Queue<BookCompletionTaskData>,
  ) {}

  /**
   * Record a confirmed payment and start the full book. Delivering the same
   * confirmation again returns the existing order; if that order never got
   * its book started, the completion task is queued again (BullMQ drops the
   * add when the task is already known).
   */
  async registerPaidOrder(input: PaidOrderInput, now: Date = new Date()): Promise<RegisterOrderResult> {
    const existing = await this.ordersRepository.findByExternalOrderId(input.externalOrderId);
    if (existing) {
      this.logger.log(`Order ${input.externalOrderId} already registered as ${existing.id}`);
      await this.resumeCompletion(existing);
      return { outcome: 'duplicate', order: existing };
    }

    const preview = await this.previewsRepository.findById(input.previewId);
    if (!preview) {
      this.logger.warn(`Order ${input.externalOrderId}: preview ${input.previewId} not found`);
      return { outcome: 'rejected', reason: 'preview_not_found' };
    }

    const active = await this.ordersRepository.findActiveByPreviewId(preview.id);
    if (active) {
      this.logger.warn(
        `Order ${input.externalOrderId}: preview ${preview.id} already purchased by order ${active.externalOrderId}`,
      );
      return { outcome: 'duplicate', order: active };
    }

    const rejection = this.checkPurchasable(preview, now);
    if (rejection) {
      this.logger.warn(`Order ${input.externalOrderId}: preview ${preview.id} rejected (${rejection})`);
      return { outcome: 'rejected', reason: rejection };
    }

    let order: Order;
    try {
      order = await this.ordersRepository.create({
        ...input,
        expiresAt: addDays(now, this.configService.get<number>('book.downloadExpiryDays') ?? 30),
      });
    } catch (error) {
      if (!isUniqueViolation(error)) throw error;

      // Lost a race with a concurrent delivery of the same payment.
      const winner =
        (await this.ordersRepository.findByExternalOrderId(input.externalOrderId)) ??
        (await this.ordersRepository.findActiveByPreviewId(preview.id));
      if (!winner) throw error;
      return { outcome: 'duplicate', order: winner };
    }

    await this.previewsRepository.update(preview.id, { status: 'purchased' });
    const job = await this.createCompletionJob(order.id);
    await this.enqueueCompletion(order, preview, job.id);

    this.logger.log(`Order ${order.id} (${input.externalOrderId}) paid; book completion queued`);
    return { outcome: 'created', order, jobId: job.id };
  }

  /** Returns false when the order is unknown. */
  async markRefunded(externalOrderId: string): Promise<boolean> {
    const order = await this.ordersRepository.findByExternalOrderId(externalOrderId);
    if (!order) {
      this.logger.warn(`Refund for unknown order ${externalOrderId}`);
      return false;
    }

    await this.ordersRepository.update(order.id, { status: 'refunded' });
    this.logger.log(`Order ${order.id} (${externalOrderId}) refunded`);
    return true;
  }

  /** `identifier` may be our order id, the store's order id or the preview id. */
  async getDownload(identifier: string, now: Date = new Date()) {
    const order = await this.resolveOrder(identifier);
    if (!order) {
      throw new NotFoundException('Order not found');
    }

    switch (order.status) {
      case 'paid':
      case 'generating_pdf':
        return {
          status: 'generating' as const,
          orderId: order.id,
          message: 'Your book is still being created',
        };
      case 'failed':
        throw new ConflictException('Book generation failed for this order');
      case 'refunded':
        throw new ForbiddenException('This order was refunded');
      case 'completed':
        break;
    }

    if (order.expiresAt.getTime() <= now.getTime()) {
      throw new GoneException('This download link has expired');
    }
    if (!order.pdfUrl) {
      throw new ConflictException('Book file is missing for this order');
    }

    const preview = await this.previewsRepository.findById(order.previewId);
    const theme = preview ? this.storiesService.getTheme(preview.request.themeId) : null;
    const pages = preview?.pages ?? [];

    return {
      status: 'completed' as const,
      orderId: order.id,
      orderNumber: order.orderNumber,
      title:
        preview && theme
          ? this.storiesService.bookTitle(theme, preview.request.childName)
          : null,
      pdfUrl: await this.storage.getSignedUrl(order.pdfUrl, DOWNLOAD_URL_TTL_SECONDS),
      pages: await Promise.all(
        pages.map(async (page) => ({
          pageNumber: page.pageNumber,
          imageUrl: await this.storage.getSignedUrl(page.imageUrl, DOWNLOAD_URL_TTL_SECONDS),
        })),
      ),
      expiresAt: order.expiresAt.toISOString(),
      daysRemaining: daysUntil(order.expiresAt, now),
    };
  }

  /** Queues the book again for an order left paid by an earlier delivery that failed halfway. */
  private async resumeCompletion(order: Order): Promise<void> {
    if (order.status !== 'paid' && order.status !== 'generating_pdf') return;

    const preview = await this.previewsRepository.findById(order.previewId);
    if (!preview) {
      this.logger.warn(`Order ${order.id}: preview ${order.previewId} missing, book not resumed`);
      return;
    }
    if (preview.status !== 'purchased' && canTransitionPreviewStatus(preview.status, 'purchased')) {
      await this.previewsRepository.update(preview.id, { status: 'purchased' });
    }

    const job =
      (await this.jobsRepository.findLatestByReference(order.id, 'book_completion')) ??
      (await this.createCompletionJob(order.id));
    await this.enqueueCompletion(order, preview, job.id);
  }

  private createCompletionJob(orderId: string) {
    return this.jobsRepository.create({
      jobType: 'book_completion',
      referenceId: orderId,
      maxAttempts: this.configService.get<number>('book.maxCompletionRetries') ?? 3,
    });
  }

  private async enqueueCompletion(order: Order, preview: Preview, jobId: string): Promise<void> {
    await this.completionQueue.add(
      'complete',
      {
        orderId: order.id,
        previewId: preview.id,
        childName: preview.request.childName,
        jobId,
      },
      { jobId: completionQueueJobId(order.id) },
    );
  }

  private checkPurchasable(preview: Preview, now: Date): RejectionReason | null {
    if (!canTransitionPreviewStatus(preview.status, 'purchased')) {
      return 'preview_not_ready';
    }

    const graceHours = this.configService.get<number>('book.purchaseGraceHours') ?? 24;
    if (addHours(preview.expiresAt, graceHours).getTime() < now.getTime()) {
      return 'preview_expired';
    }
    return null;
  }

  private async resolveOrder(identifier: string): Promise<Order | null> {
    if (UUID_PATTERN.test(identifier)) {
      const order =
        (await this.ordersRepository.findById(identifier)) ??
        (await this.ordersRepository.findLatestByPreviewId(identifier));
      if (order) return order;
    }
    return this.ordersRepository.findByExternalOrderId(identifier);
  }
}
