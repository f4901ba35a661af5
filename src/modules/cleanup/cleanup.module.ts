import { Module } from '@nestjs/common';
import { PreviewsModule } from '../previews/previews.module';
import { StorageModule } from '../storage/storage.module';
import { CleanupService } from './application/cleanup.service';

@Module({
  imports: [PreviewsModule, StorageModule],
  providers: [CleanupService],
})
export class CleanupModule {}
