import { Inject, Injectable, Logger, OnApplicationBootstrap } from '@nestjs/common';
import { InjectQueue } from '@nestjs/bullmq';
import type { Queue } from 'bullmq';
import { toError } from '../../../common/utils/concurrency';
import { addHours } from '../../../common/utils/dates';
import {
  IGenerationJobsRepositoryToken,
  type IGenerationJobsRepository,
} from '../../jobs/domain/generation-jobs.repository.interface';
import {
  IPreviewsRepositoryToken,
  type IPreviewsRepository,
} from '../../previews/domain/previews.repository.interface';
import { BOOK_COMPLETION_QUEUE } from '../../queue/queue.module';
import { completionQueueJobId, type BookCompletionTaskData } from '../domain/book-completion-task';
import type { OrderStatus } from '../domain/entities/order.entity';
import {
  IOrdersRepositoryToken,
  type IOrdersRepository,
} from '../domain/orders.repository.interface';

const RECOVERY_STATUSES: OrderStatus[] = ['paid', 'generating_pdf'];
const RECOVERY_LOOKBACK_HOURS = 24;

/** Paid orders whose completion job vanished from Redis are queued again on startup. */
@Injectable()
export class BookCompletionQueueRecoveryService implements OnApplicationBootstrap {
  private readonly logger = new Logger(BookCompletionQueueRecoveryService.name);

  constructor(
    @InjectQueue(BOOK_COMPLETION_QUEUE)
    private readonly completionQueue: Queue<BookCompletionTaskData>,
    @Inject(IOrdersRepositoryToken)
    private readonly ordersRepository: IOrdersRepository,
    @Inject(IPreviewsRepositoryToken)
    private readonly previewsRepository: IPreviewsRepository,
    @Inject(IGenerationJobsRepositoryToken)
    private readonly jobsRepository: IGenerationJobsRepository,
  ) {}

  async onApplicationBootstrap() {
    await this.recoverQueue();
  }

  async recoverQueue(now: Date = new Date()): Promise<number> {
    try {
      const orders = await this.ordersRepository.findByStatuses({
        statuses: RECOVERY_STATUSES,
        createdAfter: addHours(now, -RECOVERY_LOOKBACK_HOURS),
      });

      let requeued = 0;
      for (const order of orders) {
        const queueJobId = completionQueueJobId(order.id);
        const existing = await this.completionQueue.getJob(queueJobId);
        if (existing) continue;

        const preview = await this.previewsRepository.findById(order.previewId);
        if (!preview) {
          this.logger.warn(`Order ${order.id}: preview ${order.previewId} missing, not re-queued`);
          continue;
        }

        const job =
          (await this.jobsRepository.findLatestByReference(order.id, 'book_completion')) ??
          (await this.jobsRepository.create({
            jobType: 'book_completion',
            referenceId: order.id,
            maxAttempts: 3,
          }));

        try {
          await this.completionQueue.add(
            'complete',
            {
              orderId: order.id,
              previewId: preview.id,
              childName: preview.request.childName,
              jobId: job.id,
            },
            { jobId: queueJobId },
          );
          requeued++;
        } catch (error) {
          this.logger.warn(`Failed to re-queue order ${order.id}: ${toError(error).message}`);
        }
      }

      if (requeued > 0) {
        this.logger.warn(`Re-queued ${requeued} book completion(s) after restart.`);
      }
      return requeued;
    } catch (error) {
      const err = toError(error);
      this.logger.error(`Failed to recover book completion queue: ${err.message}`, err.stack);
      return 0;
    }
  }
}
