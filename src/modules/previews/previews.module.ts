import { Module } from '@nestjs/common';
import { GenAIModule } from '../genai/genai.module';
import { ImageGenerationModule } from '../image-generation/image-generation.module';
import { JobsModule } from '../jobs/jobs.module';
import { NotificationsModule } from '../notifications/notifications.module';
import { QueueModule } from '../queue/queue.module';
import { StorageModule } from '../storage/storage.module';
import { StoriesModule } from '../stories/stories.module';
import { WatermarkModule } from '../watermark/watermark.module';
import { CreationsService } from './application/creations.service';
import { PageRendererService } from './application/page-renderer.service';
import { PreviewPipelineService } from './application/preview-pipeline.service';
import { PreviewQueueRecoveryService } from './application/preview-queue-recovery.service';
import { PreviewsService } from './application/previews.service';
import { IPreviewsRepositoryToken } from './domain/previews.repository.interface';
import { PreviewsRepositoryInterfaces } from './infrastructure/index.interface';
import { PreviewGenerationProcessor } from './infrastructure/workers/preview-generation.processor';
import { CreationsController } from './interfaces/controllers/creations.controller';
import { JobsController } from './interfaces/controllers/jobs.controller';
import { PreviewsController } from './interfaces/controllers/previews.controller';

@Module({
  imports: [
    QueueModule,
    JobsModule,
    StorageModule,
    GenAIModule,
    ImageGenerationModule,
    NotificationsModule,
    StoriesModule,
    WatermarkModule,
  ],
  controllers: [PreviewsController, JobsController, CreationsController],
  providers: [
    ...PreviewsRepositoryInterfaces,
    PageRendererService,
    PreviewPipelineService,
    PreviewsService,
    CreationsService,
    PreviewGenerationProcessor,
    PreviewQueueRecoveryService,
  ],
  exports: [IPreviewsRepositoryToken, PageRendererService],
})
export class PreviewsModule {}
