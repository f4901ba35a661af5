import type { Pool } from 'pg';
import type { Migration } from './migration.interface';

export const previewOwner: Migration = {
  name: '003_preview_owner',

  async up(pool: Pool): Promise<void> {
    await pool.query(`
      ALTER TABLE previews
      ADD COLUMN IF NOT EXISTS session_id VARCHAR(128),
      ADD COLUMN IF NOT EXISTS customer_id VARCHAR(64)
    `);

    await pool.query(`
      CREATE INDEX IF NOT EXISTS idx_previews_session_created
      ON previews(session_id, created_at DESC)
      WHERE session_id IS NOT NULL
    `);

    await pool.query(`
      CREATE INDEX IF NOT EXISTS idx_previews_customer_created
      ON previews(customer_id, created_at DESC)
      WHERE customer_id IS NOT NULL
    `);
  },

  async down(pool: Pool): Promise<void> {
    await pool.query('DROP INDEX IF EXISTS idx_previews_customer_created');
    await pool.query('DROP INDEX IF EXISTS idx_previews_session_created');
    await pool.query('ALTER TABLE previews DROP COLUMN IF EXISTS customer_id');
    await pool.query('ALTER TABLE previews DROP COLUMN IF EXISTS session_id');
  },
};
