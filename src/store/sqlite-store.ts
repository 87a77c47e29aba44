/**
 * fritzlog — SQLite event store
 *
 * CSV ストアと同じ追記ルールを events テーブルに適用する。
 */

import Database from 'better-sqlite3';
import { migrateDatabase } from '../db/migrate.js';
import { getSchemaVersion } from '../db/migrations/index.js';
import { EventRepository } from '../db/repository/event-repository.js';
import type { Logger } from '../logger.js';
import { silentLogger } from '../logger.js';
import type { EventQuery } from '../types/repository.js';
import type { LogEntry } from '../types/entities.js';
import type { EventLogStore } from './types.js';
import { FALLBACK_LAST_TIMESTAMP } from './types.js';

export class SqliteEventStore implements EventLogStore {
  readonly kind = 'sqlite';

  private readonly db: Database.Database;
  private readonly repo: EventRepository;
  private readonly logger: Logger;

  /** マイグレーション済みの Database を受け取る。 */
  constructor(db: Database.Database, logger: Logger = silentLogger) {
    this.db = db;
    this.repo = new EventRepository(db);
    this.logger = logger;
  }

  /** ファイルを開き、スキーマを最新にしてからストアを返す。 */
  static open(path: string, logger: Logger = silentLogger): SqliteEventStore {
    const db = new Database(path);
    migrateDatabase(db);
    logger.debug({ path, schemaVersion: getSchemaVersion(db) }, 'SQLite store opened');
    return new SqliteEventStore(db, logger);
  }

  lastTimestamp(): number {
    return this.repo.maxTimestamp() ?? FALLBACK_LAST_TIMESTAMP;
  }

  appendNewEntries(entries: readonly LogEntry[]): number {
    const lastTimestamp = this.lastTimestamp();
    const inserted = this.repo.appendNewer(entries, lastTimestamp);
    this.logger.debug({ lastTimestamp, inserted: inserted.length }, 'Appended events');
    return inserted.length;
  }

  query(query: EventQuery): LogEntry[] {
    return this.repo.query(query);
  }

  close(): void {
    this.db.close();
  }
}
