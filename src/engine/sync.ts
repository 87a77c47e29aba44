/**
 * fritzlog — Sync pipeline
 *
 * ログイン → イベントログ取得 → ストアへの追記 を 1 回実行する。
 * 取得とフィルタがすべて成功した場合にのみストアに書き込む。
 */

import { err, ok, type Result } from 'neverthrow';
import type { HttpTransport } from '../http/transport.js';
import { toError } from '../http/transport.js';
import type { Logger } from '../logger.js';
import { silentLogger } from '../logger.js';
import type { EventLogStore } from '../store/types.js';
import type { RouterCredentials, SyncError, SyncSummary } from '../types/engine.js';
import type { ExclusionRule } from '../types/entities.js';
import type { Clock } from './clock.js';
import { fetchEventLog } from './event-log-retriever.js';
import { SessionNegotiator } from './session-negotiator.js';

/** syncEventLog() に必要な設定値。AppConfig のサブセット。 */
export interface SyncConfig extends RouterCredentials {
  readonly exclude: readonly ExclusionRule[];
}

export interface SyncDeps {
  transport: HttpTransport;
  store: EventLogStore;
  clock?: Clock;
  logger?: Logger;
}

/**
 * ルーターのイベントログをストアに同期する。
 *
 * @returns 取得件数・追記件数・同期後の最終タイムスタンプ
 */
export async function syncEventLog(
  config: SyncConfig,
  deps: SyncDeps,
): Promise<Result<SyncSummary, SyncError>> {
  const logger = deps.logger ?? silentLogger;

  // 1. ログイン
  const negotiator = new SessionNegotiator(config, {
    transport: deps.transport,
    clock: deps.clock,
    logger,
  });
  const sid = await negotiator.negotiate();
  if (sid.isErr()) {
    return err(sid.error);
  }
  logger.info(`Successful login for user: ${config.username}`);

  // 2. イベントログ取得
  const entries = await fetchEventLog(config.url, sid.value, config.exclude, {
    transport: deps.transport,
    logger,
  });
  if (entries.isErr()) {
    return err(entries.error);
  }

  // 3. 追記
  try {
    const appended = deps.store.appendNewEntries(entries.value);
    const summary: SyncSummary = {
      fetched: entries.value.length,
      appended,
      lastTimestamp: deps.store.lastTimestamp(),
    };
    logger.info({ store: deps.store.kind, ...summary }, 'Event log synchronized');
    return ok(summary);
  } catch (e) {
    const cause = toError(e);
    return err({
      type: 'persist_failed',
      message: `Cannot write to ${deps.store.kind} store: ${cause.message}`,
      cause,
    });
  }
}

/** SyncError を 1 行の文字列にする。 */
export function describeSyncError(error: SyncError): string {
  return `${error.type}: ${error.message}`;
}
