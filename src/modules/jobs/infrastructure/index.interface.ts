import { GenerationJobsRepository } from './database/repositories/generation-jobs.repository';
import { IGenerationJobsRepositoryToken } from '../domain/generation-jobs.repository.interface';

export const GenerationJobsRepositoryInterfaces = [
  {
    provide: IGenerationJobsRepositoryToken,
    useClass: GenerationJobsRepository,
  },
];
