import { Injectable } from '@nestjs/common';
import { PartialUpdateBuilder } from '../../../../../common/database/update-builder';
import { DatabaseService } from '../../../../database/infrastructure/database.service';
import {
  rowToPreview,
  type GenerationRequest,
  type Preview,
  type PreviewOwner,
  type PreviewPatch,
  type PreviewRow,
  type PreviewStatus,
} from '../../../domain/entities/preview.entity';
import type { IPreviewsRepository } from '../../../domain/previews.repository.interface';

@Injectable()
export class PreviewsRepository implements IPreviewsRepository {
  constructor(private readonly db: DatabaseService) {}

  async create(params: {
    request: GenerationRequest;
    owner: PreviewOwner;
    customerEmail: string | null;
    notifyOnComplete: boolean;
    previewPageCount: number;
    totalPageCount: number;
    expiresAt: Date;
  }): Promise<Preview> {
    const { request } = params;
    const rows = await this.db.query<PreviewRow>(
      `INSERT INTO previews (
         child_name, child_age, child_gender, photo_url, theme_id, style, seed,
         customer_email, notify_on_complete, preview_page_count, total_page_count,
         status, generation_phase, expires_at, session_id, customer_id
       )
       VALUES (
         $1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, 'generating', 'preview', $12, $13, $14
       )
       RETURNING *`,
      [
        request.childName,
        request.childAge,
        request.childGender,
        request.photoUrl,
        request.themeId,
        request.style,
        request.seed,
        params.customerEmail,
        params.notifyOnComplete,
        params.previewPageCount,
        params.totalPageCount,
        params.expiresAt,
        params.owner.sessionId,
        params.owner.customerId,
      ],
    );
    return rowToPreview(rows[0]);
  }

  async findById(previewId: string): Promise<Preview | null> {
    const rows = await this.db.query<PreviewRow>(
      'SELECT * FROM previews WHERE id = $1 LIMIT 1',
      [previewId],
    );
    return rows[0] ? rowToPreview(rows[0]) : null;
  }

  async update(previewId: string, patch: PreviewPatch): Promise<void> {
    const statement = new PartialUpdateBuilder('previews')
      .set('status', patch.status)
      .set('generation_phase', patch.generationPhase)
      .set('face_analysis', patch.faceAnalysis)
      .set('cover_url', patch.coverUrl)
      .setJson('pages', patch.pages)
      .set('pdf_url', patch.pdfUrl)
      .set('expires_at', patch.expiresAt)
      .set('storage_purged_at', patch.storagePurgedAt)
      .build(previewId, { touchUpdatedAt: true });

    if (statement) {
      await this.db.query(statement.text, statement.values);
    }
  }

  async findExpired(params: {
    statuses: PreviewStatus[];
    now: Date;
    limit: number;
  }): Promise<Preview[]> {
    if (params.statuses.length === 0) return [];

    const rows = await this.db.query<PreviewRow>(
      `SELECT * FROM previews
       WHERE status = ANY($1::text[])
         AND expires_at < $2
       ORDER BY expires_at ASC
       LIMIT $3`,
      [params.statuses, params.now, params.limit],
    );
    return rows.map(rowToPreview);
  }

  async findPurgeable(params: { expiredBefore: Date; limit: number }): Promise<Preview[]> {
    const rows = await this.db.query<PreviewRow>(
      `SELECT * FROM previews
       WHERE status = 'expired'
         AND storage_purged_at IS NULL
         AND expires_at < $1
       ORDER BY expires_at ASC
       LIMIT $2`,
      [params.expiredBefore, params.limit],
    );
    return rows.map(rowToPreview);
  }

  async findByOwner(params: {
    owner: PreviewOwner;
    expiresAfter: Date;
    limit: number;
  }): Promise<Preview[]> {
    const { customerId, sessionId } = params.owner;
    const [column, value] = customerId
      ? ['customer_id', customerId]
      : ['session_id', sessionId];
    if (!value) return [];

    const rows = await this.db.query<PreviewRow>(
      `SELECT * FROM previews
       WHERE ${column} = $1
         AND expires_at > $2
       ORDER BY created_at DESC
       LIMIT $3`,
      [value, params.expiresAfter, params.limit],
    );
    return rows.map(rowToPreview);
  }

  async assignCustomer(sessionId: string, customerId: string): Promise<number> {
    const rows = await this.db.query<{ id: string }>(
      `UPDATE previews
       SET customer_id = $2, updated_at = NOW()
       WHERE session_id = $1 AND customer_id IS NULL
       RETURNING id`,
      [sessionId, customerId],
    );
    return rows.length;
  }
}
