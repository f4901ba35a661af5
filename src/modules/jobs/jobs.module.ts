import { Module } from '@nestjs/common';
import { IGenerationJobsRepositoryToken } from './domain/generation-jobs.repository.interface';
import { GenerationJobsRepositoryInterfaces } from './infrastructure/index.interface';

@Module({
  providers: [...GenerationJobsRepositoryInterfaces],
  exports: [IGenerationJobsRepositoryToken],
})
export class JobsModule {}
