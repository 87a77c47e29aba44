import type Database from 'better-sqlite3';
import { getSchemaVersion, runMigrations, LATEST_VERSION } from './migrations/index.js';

/**
 * Migrate the database to the latest schema version.
 *
 * - New database (user_version = 0): runs every migration.
 * - Partially migrated: runs the remaining migrations.
 * - Already up-to-date (user_version >= LATEST_VERSION): no-op.
 */
export function migrateDatabase(db: Database.Database): void {
  const currentVersion = getSchemaVersion(db);
  if (currentVersion >= LATEST_VERSION) {
    return;
  }
  runMigrations(db, currentVersion);
}
