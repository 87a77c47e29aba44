/**
 * fritzlog — data.lua イベントログ JSON パーサー
 *
 * `page=log` の応答は次の形をしている (新しい順):
 *
 * ```json
 * { "data": { "log": [["19.10.26", "08:15:02", "WLAN-Gerät angemeldet", "2"], ...] } }
 * ```
 *
 * 5 要素目以降は無視する。code は数値で届くこともあるため文字列に揃える。
 */

import { z } from 'zod';

// ---------------------------------------------------------------------------
// スキーマ
// ---------------------------------------------------------------------------

const rawLogRowSchema = z
  .tuple([z.string(), z.string(), z.string(), z.union([z.string(), z.number()])])
  .rest(z.unknown());

const eventLogResponseSchema = z.object({
  data: z.object({
    log: z.array(rawLogRowSchema),
  }),
});

/** data.log の 1 行 (タイムスタンプ導出前) */
export interface RawLogRow {
  date: string;
  time: string;
  message: string;
  code: string;
}

// ---------------------------------------------------------------------------
// パーサー
// ---------------------------------------------------------------------------

/**
 * data.lua の JSON 応答から data.log を取り出す。順序はルーターが返したまま (新しい順)。
 *
 * JSON として不正、または data.log の形が違う場合は例外を投げる。
 *
 * @param body - data.lua のレスポンスボディ
 */
export function parseEventLogJson(body: string): RawLogRow[] {
  let raw: unknown;
  try {
    raw = JSON.parse(body);
  } catch (e) {
    const detail = e instanceof Error ? e.message : String(e);
    throw new Error(`event log JSON: ${detail}`);
  }

  const result = eventLogResponseSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue !== undefined ? issue.path.join('.') : '';
    const what = issue !== undefined ? issue.message : 'invalid';
    throw new Error(`event log JSON: ${where === '' ? what : `${where}: ${what}`}`);
  }

  return result.data.data.log.map(([date, time, message, code]) => ({
    date,
    time,
    message,
    code: String(code),
  }));
}
