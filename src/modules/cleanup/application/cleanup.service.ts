import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Cron, CronExpression } from '@nestjs/schedule';
import { logFailedResults, processInBatchesSettled } from '../../../common/utils/concurrency';
import type { PreviewStatus } from '../../previews/domain/entities/preview.entity';
import {
  IPreviewsRepositoryToken,
  type IPreviewsRepository,
} from '../../previews/domain/previews.repository.interface';
import {
  STORAGE_GATEWAY,
  type StorageGateway,
} from '../../storage/domain/storage-gateway.interface';
import { previewFolder } from '../../storage/domain/storage-keys';

const EXPIRABLE_STATUSES: PreviewStatus[] = ['generating', 'active', 'failed'];
const BATCH_LIMIT = 100;
const SWEEP_CONCURRENCY = 3;
const HOUR_MS = 60 * 60 * 1000;

export interface SweepResult {
  expired: number;
  purged: number;
  objectsDeleted: number;
  failures: number;
}

/**
 * Expires unpurchased previews past their expiry. Their images stay until the
 * purchase grace window has closed too, since a late payment still needs them.
 * Rows are kept so an expired preview still answers with 410.
 */
@Injectable()
export class CleanupService {
  private readonly logger = new Logger(CleanupService.name);
  private isRunning = false;

  constructor(
    @Inject(IPreviewsRepositoryToken)
    private readonly previewsRepository: IPreviewsRepository,
    @Inject(STORAGE_GATEWAY)
    private readonly storage: StorageGateway,
    private readonly configService: ConfigService,
  ) {}

  @Cron(CronExpression.EVERY_HOUR)
  async handleCleanup() {
    if (this.isRunning) {
      this.logger.warn('Previous expiry sweep still running, skipping');
      return;
    }

    this.isRunning = true;
    try {
      await this.sweepExpiredPreviews(new Date());
    } finally {
      this.isRunning = false;
    }
  }

  async sweepExpiredPreviews(now: Date): Promise<SweepResult> {
    const expired = await this.expirePreviews(now);
    const purge = await this.purgeStorage(now);

    return {
      expired: expired.done,
      purged: purge.done,
      objectsDeleted: purge.objectsDeleted,
      failures: expired.failures + purge.failures,
    };
  }

  private async expirePreviews(now: Date): Promise<{ done: number; failures: number }> {
    const due = await this.previewsRepository.findExpired({
      statuses: EXPIRABLE_STATUSES,
      now,
      limit: BATCH_LIMIT,
    });
    if (!due.length) return { done: 0, failures: 0 };

    const results = await processInBatchesSettled(
      due,
      (preview) => this.previewsRepository.update(preview.id, { status: 'expired' }),
      SWEEP_CONCURRENCY,
    );
    logFailedResults(results, 'expirePreviews', this.logger);

    const done = results.filter((result) => result.status === 'fulfilled').length;
    this.logger.log(`Expired ${done} previews`);
    return { done, failures: results.length - done };
  }

  /**
   * The purge marker is written only after the delete succeeds, so a preview
   * whose delete failed is picked up again on the next sweep.
   */
  private async purgeStorage(
    now: Date,
  ): Promise<{ done: number; objectsDeleted: number; failures: number }> {
    const graceHours = this.configService.get<number>('book.purchaseGraceHours') ?? 24;
    const purgeable = await this.previewsRepository.findPurgeable({
      expiredBefore: new Date(now.getTime() - graceHours * HOUR_MS),
      limit: BATCH_LIMIT,
    });
    if (!purgeable.length) return { done: 0, objectsDeleted: 0, failures: 0 };

    const results = await processInBatchesSettled(
      purgeable,
      async (preview) => {
        const deleted = await this.storage.deletePrefix(previewFolder(preview.id));
        await this.previewsRepository.update(preview.id, { storagePurgedAt: now });
        return deleted;
      },
      SWEEP_CONCURRENCY,
    );
    logFailedResults(results, 'purgeStorage', this.logger);

    const fulfilled = results.filter(
      (result): result is PromiseFulfilledResult<number> => result.status === 'fulfilled',
    );
    const objectsDeleted = fulfilled.reduce((sum, result) => sum + result.value, 0);
    this.logger.log(`Purged ${fulfilled.length} previews, deleted ${objectsDeleted} objects`);

    return {
      done: fulfilled.length,
      objectsDeleted,
      failures: results.length - fulfilled.length,
    };
  }
}
