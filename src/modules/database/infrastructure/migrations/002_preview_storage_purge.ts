import type { Pool } from 'pg';
import type { Migration } from './migration.interface';

export const previewStoragePurge: Migration = {
  name: '002_preview_storage_purge',

  async up(pool: Pool): Promise<void> {
    await pool.query(`
      ALTER TABLE previews
      ADD COLUMN IF NOT EXISTS storage_purged_at TIMESTAMPTZ
    `);

    await pool.query(`
      CREATE INDEX IF NOT EXISTS idx_previews_purge_pending
      ON previews(expires_at)
      WHERE status = 'expired' AND storage_purged_at IS NULL
    `);
  },

  async down(pool: Pool): Promise<void> {
    await pool.query('DROP INDEX IF EXISTS idx_previews_purge_pending');
    await pool.query('ALTER TABLE previews DROP COLUMN IF EXISTS storage_purged_at');
  },
};
