/**
 * fritzlog - Entity type definitions
 *
 * LogEntry はルーターから取得したイベントログ 1 行を表す。
 * StoredEvent は src/db/schema.ts の events テーブルに 1:1 で対応する。
 *
 * Conventions:
 *   TEXT           -> string
 *   INTEGER        -> number
 *   All IDs        -> string (UUID)
 *   ingestedAt     -> string (ISO 8601)
 *   timestamp      -> number (epoch seconds)
 */

// ============================================================
// イベントログ
// ============================================================

/** ルーターのイベントログ 1 件。timestamp は date + time から導出される。 */
export interface LogEntry {
  readonly date: string;
  readonly time: string;
  readonly message: string;
  readonly code: string;
  readonly timestamp: number;
}

/**
 * 除外ルール。文字列なら部分一致、配列なら全要素の部分一致 (AND) で判定する。
 */
export type ExclusionRule = string | readonly string[];

// ============================================================
// events (SQLite)
// ============================================================

/** A LogEntry persisted in the SQLite store. */
export interface StoredEvent extends LogEntry {
  readonly id: string;
  readonly ingestedAt: string;
}
