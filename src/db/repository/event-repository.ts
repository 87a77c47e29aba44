import type Database from 'better-sqlite3';
import crypto from 'node:crypto';
import type { LogEntry, StoredEvent } from '../../types/entities.js';
import type { EventQuery } from '../../types/repository.js';

/** Row shape returned by better-sqlite3 for the events table. */
interface EventRow {
  id: string;
  timestamp: number;
  date: string;
  time: string;
  message: string;
  code: string;
  ingested_at: string;
}

/** Maps a snake_case DB row to a camelCase StoredEvent entity. */
function rowToEvent(row: EventRow): StoredEvent {
  return {
    id: row.id,
    timestamp: row.timestamp,
    date: row.date,
    time: row.time,
    message: row.message,
    code: row.code,
    ingestedAt: row.ingested_at,
  };
}

const SELECT_COLUMNS = 'SELECT id, timestamp, date, time, message, code, ingested_at FROM events';

/**
 * Repository for the `events` table.
 *
 * Rows are only ever inserted; an insert batch keeps the order it was given,
 * so `rowid` order matches the order entries were appended in.
 */
export class EventRepository {
  private readonly db: Database.Database;

  private readonly insertStmt: Database.Statement;
  private readonly maxTimestampStmt: Database.Statement;

  constructor(db: Database.Database) {
    this.db = db;

    this.insertStmt = this.db.prepare(
      'INSERT INTO events (id, timestamp, date, time, message, code, ingested_at) VALUES (?, ?, ?, ?, ?, ?, ?)',
    );

    this.maxTimestampStmt = this.db.prepare('SELECT MAX(timestamp) AS max_ts FROM events');
  }

  /** Greatest persisted timestamp, or undefined when the table is empty. */
  maxTimestamp(): number | undefined {
    const row = this.maxTimestampStmt.get() as { max_ts: number | null };
    return row.max_ts ?? undefined;
  }

  /**
   * Insert, in order, the entries strictly newer than `lastTimestamp`.
   * Runs in a single transaction and returns the inserted events.
   */
  appendNewer(entries: readonly LogEntry[], lastTimestamp: number): StoredEvent[] {
    const ingestedAt = new Date().toISOString();

    const insertAll = this.db.transaction((batch: readonly LogEntry[]): StoredEvent[] => {
      const inserted: StoredEvent[] = [];
      for (const entry of batch) {
        if (entry.timestamp <= lastTimestamp) continue;
        const id = crypto.randomUUID();
        this.insertStmt.run(
          id,
          entry.timestamp,
          entry.date,
          entry.time,
          entry.message,
          entry.code,
          ingestedAt,
        );
        inserted.push({ ...entry, id, ingestedAt });
      }
      return inserted;
    });

    return insertAll(entries);
  }

  /**
   * Return events matching the query, oldest first.
   * `limit` keeps the newest `limit` matches.
   */
  query(query: EventQuery): StoredEvent[] {
    const conditions: string[] = [];
    const params: Array<string | number> = [];

    if (query.since !== undefined) {
      conditions.push('timestamp >= ?');
      params.push(query.since);
    }
    if (query.until !== undefined) {
      conditions.push('timestamp <= ?');
      params.push(query.until);
    }
    if (query.contains !== undefined) {
      // LIKE は大文字小文字を区別しないため instr() で部分一致を取る
      conditions.push('instr(message, ?) > 0');
      params.push(query.contains);
    }
    if (query.code !== undefined) {
      conditions.push('code = ?');
      params.push(query.code);
    }

    const where = conditions.length > 0 ? ` WHERE ${conditions.join(' AND ')}` : '';

    if (query.limit === undefined) {
      const rows = this.db
        .prepare(`${SELECT_COLUMNS}${where} ORDER BY timestamp ASC, rowid ASC`)
        .all(...params) as EventRow[];
      return rows.map(rowToEvent);
    }

    const rows = this.db
      .prepare(`${SELECT_COLUMNS}${where} ORDER BY timestamp DESC, rowid DESC LIMIT ?`)
      .all(...params, Math.max(query.limit, 0)) as EventRow[];
    return rows.reverse().map(rowToEvent);
  }
}
