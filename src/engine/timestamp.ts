/**
 * fritzlog — Timestamp derivation
 *
 * イベントログの日付 ("dd.mm.yy") と時刻 ("HH:MM:SS") を
 * ローカルタイムゾーンの epoch 秒に変換する。
 */

import { err, ok, type Result } from 'neverthrow';
import type { MalformedTimestampError } from '../types/engine.js';

const DATE_REGEX = /^(\d{2})\.(\d{2})\.(\d{2})$/;
const TIME_REGEX = /^(\d{2}):(\d{2}):(\d{2})$/;

/** 2 桁年のピボット。69-99 → 1969-1999、00-68 → 2000-2068 */
const CENTURY_PIVOT = 69;

/** 2 桁の年を 4 桁に展開する。 */
export function expandTwoDigitYear(yy: number): number {
  return yy >= CENTURY_PIVOT ? 1900 + yy : 2000 + yy;
}

function malformed(date: string, time: string): MalformedTimestampError {
  return {
    type: 'malformed_timestamp',
    message: `Malformed timestamp: "${date} ${time}" (expected "dd.mm.yy HH:MM:SS")`,
  };
}

/**
 * 日付・時刻文字列を epoch 秒に変換する。
 *
 * 31.02. や 24:00:00 のように存在しない日時は不正として扱う。
 */
export function parseTimestamp(
  date: string,
  time: string,
): Result<number, MalformedTimestampError> {
  const d = DATE_REGEX.exec(date);
  const t = TIME_REGEX.exec(time);
  if (d === null || t === null) {
    return err(malformed(date, time));
  }

  const day = Number(d[1]);
  const month = Number(d[2]);
  const year = expandTwoDigitYear(Number(d[3]));
  const hours = Number(t[1]);
  const minutes = Number(t[2]);
  const seconds = Number(t[3]);

  if (hours > 23 || minutes > 59 || seconds > 59) {
    return err(malformed(date, time));
  }

  const local = new Date(year, month - 1, day, hours, minutes, seconds);
  // Date は範囲外の値を繰り上げるので、往復して一致しなければ存在しない日付
  if (
    local.getFullYear() !== year ||
    local.getMonth() !== month - 1 ||
    local.getDate() !== day
  ) {
    return err(malformed(date, time));
  }

  return ok(Math.floor(local.getTime() / 1000));
}
