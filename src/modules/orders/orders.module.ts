import { Module } from '@nestjs/common';
import { SLEEP_FN, sleep } from '../../common/utils/concurrency';
import { JobsModule } from '../jobs/jobs.module';
import { NotificationsModule } from '../notifications/notifications.module';
import { PdfModule } from '../pdf/pdf.module';
import { PreviewsModule } from '../previews/previews.module';
import { QueueModule } from '../queue/queue.module';
import { StorageModule } from '../storage/storage.module';
import { StoriesModule } from '../stories/stories.module';
import { BookCompletionQueueRecoveryService } from './application/book-completion-queue-recovery.service';
import { BookCompletionService } from './application/book-completion.service';
import { OrdersService } from './application/orders.service';
import { OrdersRepositoryInterfaces } from './infrastructure/index.interface';
import { BookCompletionProcessor } from './infrastructure/workers/book-completion.processor';
import { DownloadController } from './interfaces/controllers/download.controller';

@Module({
  imports: [
    QueueModule,
    JobsModule,
    PreviewsModule,
    StorageModule,
    StoriesModule,
    PdfModule,
    NotificationsModule,
  ],
  controllers: [DownloadController],
  providers: [
    ...OrdersRepositoryInterfaces,
    { provide: SLEEP_FN, useValue: sleep },
    OrdersService,
    BookCompletionService,
    BookCompletionProcessor,
    BookCompletionQueueRecoveryService,
  ],
  exports: [OrdersService],
})
export class OrdersModule {}
