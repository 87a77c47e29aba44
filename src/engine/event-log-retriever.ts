/**
 * fritzlog — Event Log Retriever
 *
 * data.lua からイベントログを取得し、古い順に並べ替え、除外ルールを適用して
 * LogEntry の配列を返す。
 */

import { err, ok, type Result } from 'neverthrow';
import type { HttpResponse, HttpTransport } from '../http/transport.js';
import { toError } from '../http/transport.js';
import type { Logger } from '../logger.js';
import { silentLogger } from '../logger.js';
import { parseEventLogJson } from '../parser/event-log-parser.js';
import type { RawLogRow } from '../parser/event-log-parser.js';
import type { EventLogError } from '../types/engine.js';
import type { ExclusionRule, LogEntry } from '../types/entities.js';
import { isExcluded } from './exclusion.js';
import { parseTimestamp } from './timestamp.js';

const DATA_ROUTE = 'data.lua';

export interface EventLogRetrieverDeps {
  transport: HttpTransport;
  logger?: Logger;
}

/**
 * ベース URL を data.lua を指す URL に正規化する。
 *
 * - 末尾が "/" なら "data.lua" を付ける
 * - "data.lua" を含まなければ "/data.lua" を付ける
 * - それ以外はそのまま
 */
export function dataUrl(baseUrl: string): string {
  if (baseUrl.endsWith('/')) {
    return `${baseUrl}${DATA_ROUTE}`;
  }
  if (!baseUrl.includes(DATA_ROUTE)) {
    return `${baseUrl}/${DATA_ROUTE}`;
  }
  return baseUrl;
}

/**
 * 新しい順の生ログを古い順に並べ替え、除外ルールを適用して LogEntry に変換する。
 *
 * 除外されたエントリのタイムスタンプは検証しない。
 */
export function toLogEntries(
  newestFirst: readonly RawLogRow[],
  excludes: readonly ExclusionRule[],
): Result<LogEntry[], EventLogError> {
  const entries: LogEntry[] = [];

  for (const row of [...newestFirst].reverse()) {
    if (isExcluded(row.message, excludes)) {
      continue;
    }
    const timestamp = parseTimestamp(row.date, row.time);
    if (timestamp.isErr()) {
      return err(timestamp.error);
    }
    entries.push({
      date: row.date,
      time: row.time,
      message: row.message,
      code: row.code,
      timestamp: timestamp.value,
    });
  }

  return ok(entries);
}

/**
 * ルーターのイベントログを取得する。
 *
 * @param baseUrl  - ルーターのベース URL
 * @param sid      - SessionNegotiator で取得した SID
 * @param excludes - 除外ルール
 * @returns 古い順の LogEntry 配列
 */
export async function fetchEventLog(
  baseUrl: string,
  sid: string,
  excludes: readonly ExclusionRule[],
  deps: EventLogRetrieverDeps,
): Promise<Result<LogEntry[], EventLogError>> {
  const logger = deps.logger ?? silentLogger;
  const url = dataUrl(baseUrl);
  const body = new URLSearchParams({
    xhr: '1',
    sid,
    lang: 'de',
    page: 'log',
    xhrId: 'log',
  }).toString();

  let response: HttpResponse;
  try {
    response = await deps.transport.post(url, body, {
      'Content-Type': 'application/x-www-form-urlencoded',
    });
  } catch (e) {
    const cause = toError(e);
    return err({ type: 'request_failed', message: `POST ${url} failed: ${cause.message}`, cause });
  }

  if (response.status !== 200) {
    return err({
      type: 'retrieval_failed',
      statusCode: response.status,
      message: `Failed to retrieve event log. Status code: ${response.status}`,
    });
  }

  let rows: RawLogRow[];
  try {
    rows = parseEventLogJson(response.body);
  } catch (e) {
    return err({ type: 'malformed_response', message: toError(e).message });
  }

  const entries = toLogEntries(rows, excludes);
  if (entries.isOk()) {
    logger.info(
      { received: rows.length, kept: entries.value.length },
      'Event log retrieved',
    );
  }
  return entries;
}
