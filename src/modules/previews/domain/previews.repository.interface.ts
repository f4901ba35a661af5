import type {
  GenerationRequest,
  Preview,
  PreviewOwner,
  PreviewPatch,
  PreviewStatus,
} from './entities/preview.entity';

export interface IPreviewsRepository {
  create(params: {
    request: GenerationRequest;
    owner: PreviewOwner;
    customerEmail: string | null;
    notifyOnComplete: boolean;
    previewPageCount: number;
    totalPageCount: number;
    expiresAt: Date;
  }): Promise<Preview>;
  findById(previewId: string): Promise<Preview | null>;
  /** Writes only the fields present in the patch. */
  update(previewId: string, patch: PreviewPatch): Promise<void>;
  findExpired(params: { statuses: PreviewStatus[]; now: Date; limit: number }): Promise<Preview[]>;
  /** Expired previews past `expiredBefore` whose images are still stored. */
  findPurgeable(params: { expiredBefore: Date; limit: number }): Promise<Preview[]>;
  /**
   * Newest first. A customer id takes precedence over the session id; an
   * owner with neither matches nothing.
   */
  findByOwner(params: { owner: PreviewOwner; expiresAfter: Date; limit: number }): Promise<Preview[]>;
  /** Gives unclaimed previews of a guest session to a customer; returns how many. */
  assignCustomer(sessionId: string, customerId: string): Promise<number>;
}

export const IPreviewsRepositoryToken = Symbol('IPreviewsRepository');
