/**
 * fritzlog — SQLite schema
 *
 * SQLite ストアのテーブル定義。migrations/v1.ts から適用される。
 */

export const SCHEMA_SQL = `
-- ============================================================
-- イベントログ
-- ============================================================
CREATE TABLE IF NOT EXISTS events (
  id            TEXT PRIMARY KEY,
  timestamp     INTEGER NOT NULL,           -- epoch 秒 (date + time から導出)
  date          TEXT NOT NULL,              -- "dd.mm.yy"
  time          TEXT NOT NULL,              -- "HH:MM:SS"
  message       TEXT NOT NULL,
  code          TEXT NOT NULL,
  ingested_at   TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_events_timestamp ON events(timestamp);
CREATE INDEX IF NOT EXISTS idx_events_code ON events(code);
`;
