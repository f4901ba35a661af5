import { Module } from '@nestjs/common';
import { SLEEP_FN, sleep } from '../../common/utils/concurrency';
import { IMAGE_GENERATION_CLIENT } from './domain/image-generation-client.interface';
import { QueueImageGenerationClient } from './infrastructure/queue-image-generation.client';

@Module({
  providers: [
    { provide: SLEEP_FN, useValue: sleep },
    QueueImageGenerationClient,
    { provide: IMAGE_GENERATION_CLIENT, useExisting: QueueImageGenerationClient },
  ],
  exports: [IMAGE_GENERATION_CLIENT],
})
export class ImageGenerationModule {}
