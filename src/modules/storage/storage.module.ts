import { Module } from '@nestjs/common';
import { StorageService } from './infrastructure/storage.service';
import { STORAGE_GATEWAY } from './domain/storage-gateway.interface';

@Module({
  providers: [
    StorageService,
    { provide: STORAGE_GATEWAY, useExisting: StorageService },
  ],
  exports: [StorageService, STORAGE_GATEWAY],
})
export class StorageModule {}
