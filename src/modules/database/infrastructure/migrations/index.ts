import type { Migration } from './migration.interface';
import { baseline } from './001_baseline';
import { previewStoragePurge } from './002_preview_storage_purge';
import { previewOwner } from './003_preview_owner';

// Add new migrations to this array as they are created
export const migrations: Migration[] = [baseline, previewStoragePurge, previewOwner];

export type { Migration } from './migration.interface';
export { runMigrations, getMigrationStatus } from './migration-runner';
