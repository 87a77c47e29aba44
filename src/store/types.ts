/**
 * fritzlog — Store abstraction
 *
 * CSV / SQLite のどちらのストアも同じ追記ルールに従う:
 * 最終タイムスタンプより厳密に新しいエントリだけを、渡された順に追記する。
 */

import type { EventQuery } from '../types/repository.js';
import type { LogEntry } from '../types/entities.js';

/** ストアが空・読めないときに使う最終タイムスタンプ (全件受け入れ) */
export const FALLBACK_LAST_TIMESTAMP = 1;

export type StoreKind = 'csv' | 'sqlite';

export interface EventLogStore {
  readonly kind: StoreKind;
  /** 永続化済みの最終タイムスタンプ。空なら FALLBACK_LAST_TIMESTAMP */
  lastTimestamp(): number;
  /** 新しいエントリだけを追記し、追記件数を返す */
  appendNewEntries(entries: readonly LogEntry[]): number;
  /** 古い順で返す。limit 指定時は新しい方から limit 件 */
  query(query: EventQuery): LogEntry[];
  close(): void;
}

export class StoreError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StoreError';
  }
}

/** メモリ上の LogEntry 配列に EventQuery を適用する。 */
export function applyQuery(entries: readonly LogEntry[], query: EventQuery): LogEntry[] {
  const matched = entries.filter(
    (entry) =>
      (query.since === undefined || entry.timestamp >= query.since) &&
      (query.until === undefined || entry.timestamp <= query.until) &&
      (query.contains === undefined || entry.message.includes(query.contains)) &&
      (query.code === undefined || entry.code === query.code),
  );
  if (query.limit === undefined) {
    return matched;
  }
  return query.limit > 0 ? matched.slice(-query.limit) : [];
}
