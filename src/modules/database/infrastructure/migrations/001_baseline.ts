import type { Pool } from 'pg';
import type { Migration } from './migration.interface';

export const baseline: Migration = {
  name: '001_baseline',

  async up(pool: Pool): Promise<void> {
    await pool.query(`
      CREATE TABLE IF NOT EXISTS previews (
        id UUID PRIMARY KEY DEFAULT gen_random_uuid(),
        child_name VARCHAR(60) NOT NULL,
        child_age SMALLINT NOT NULL CHECK (child_age BETWEEN 2 AND 12),
        child_gender VARCHAR(10) NOT NULL,
        photo_url TEXT NOT NULL,
        theme_id VARCHAR(64) NOT NULL,
        style VARCHAR(20) NOT NULL,
        seed INTEGER,
        customer_email VARCHAR(255),
        notify_on_complete BOOLEAN NOT NULL DEFAULT FALSE,
        face_analysis TEXT,
        cover_url TEXT,
        pages JSONB NOT NULL DEFAULT '[]'::jsonb,
        preview_page_count SMALLINT NOT NULL DEFAULT 5,
        total_page_count SMALLINT NOT NULL DEFAULT 10,
        pdf_url TEXT,
        generation_phase VARCHAR(20) NOT NULL DEFAULT 'preview',
        status VARCHAR(20) NOT NULL DEFAULT 'generating',
        created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
        updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
        expires_at TIMESTAMPTZ NOT NULL
      )
    `);

    await pool.query(`
      CREATE INDEX IF NOT EXISTS idx_previews_status_expires_at
      ON previews(status, expires_at)
    `);

    await pool.query(`
      CREATE TABLE IF NOT EXISTS generation_jobs (
        id UUID PRIMARY KEY DEFAULT gen_random_uuid(),
        job_type VARCHAR(30) NOT NULL,
        reference_id UUID NOT NULL,
        status VARCHAR(20) NOT NULL DEFAULT 'queued',
        progress SMALLINT NOT NULL DEFAULT 0,
        current_step TEXT,
        attempts SMALLINT NOT NULL DEFAULT 1,
        max_attempts SMALLINT NOT NULL DEFAULT 3,
        error_message TEXT,
        result_data JSONB,
        queued_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
        started_at TIMESTAMPTZ,
        completed_at TIMESTAMPTZ
      )
    `);

    await pool.query(`
      CREATE INDEX IF NOT EXISTS idx_generation_jobs_reference
      ON generation_jobs(reference_id, queued_at DESC)
    `);

    await pool.query(`
      CREATE INDEX IF NOT EXISTS idx_generation_jobs_status
      ON generation_jobs(status, queued_at)
    `);

    await pool.query(`
      CREATE TABLE IF NOT EXISTS orders (
        id UUID PRIMARY KEY DEFAULT gen_random_uuid(),
        external_order_id VARCHAR(64) UNIQUE NOT NULL,
        order_number VARCHAR(64),
        preview_id UUID NOT NULL REFERENCES previews(id),
        customer_email VARCHAR(255),
        customer_name VARCHAR(255),
        status VARCHAR(20) NOT NULL DEFAULT 'paid',
        retry_count SMALLINT NOT NULL DEFAULT 0,
        error_message TEXT,
        pdf_url TEXT,
        created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
        updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
        completed_at TIMESTAMPTZ,
        expires_at TIMESTAMPTZ NOT NULL
      )
    `);

    // One live order per preview; failed orders do not block a new purchase.
    await pool.query(`
      CREATE UNIQUE INDEX IF NOT EXISTS idx_orders_active_preview
      ON orders(preview_id) WHERE status <> 'failed'
    `);
  },

  async down(pool: Pool): Promise<void> {
    await pool.query('DROP TABLE IF EXISTS orders');
    await pool.query('DROP TABLE IF EXISTS generation_jobs');
    await pool.query('DROP TABLE IF EXISTS previews');
  },
};
