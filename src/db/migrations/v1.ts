/**
 * Migration v1: Create events table
 */

import type Database from 'better-sqlite3';
import { SCHEMA_SQL } from '../schema.js';
import type { Migration } from './index.js';

const migration: Migration = {
  version: 1,
  description: 'Create events table',
  up(db: Database.Database): void {
    db.exec(SCHEMA_SQL);
  },
};

export default migration;
