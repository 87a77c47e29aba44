/**
 * fritzlog - Store query types
 *
 * CSV / SQLite 両方のストアで共通に使う検索条件。
 */

/** Filters for reading persisted log entries back. All bounds are inclusive. */
export interface EventQuery {
  /** epoch 秒。これ以降のエントリのみ */
  since?: number;
  /** epoch 秒。これ以前のエントリのみ */
  until?: number;
  /** メッセージの部分一致 */
  contains?: string;
  code?: string;
  /** 新しい順に数えた最大件数 */
  limit?: number;
}
