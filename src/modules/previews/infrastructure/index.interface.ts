import { PreviewsRepository } from './database/repositories/previews.repository';
import { IPreviewsRepositoryToken } from '../domain/previews.repository.interface';

export const PreviewsRepositoryInterfaces = [
  {
    provide: IPreviewsRepositoryToken,
    useClass: PreviewsRepository,
  },
];
