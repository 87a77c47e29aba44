/**
 * fritzlog — Incremental CSV persister
 *
 * セミコロン区切りのテキストファイルにイベントログを追記する。
 * 既存の行は書き換えず、ファイル末尾の Timestamp より新しいエントリだけを追記する。
 *
 * 値のエスケープは行わない。メッセージにセミコロンが含まれると列がずれる。
 */

import fs from 'node:fs';
import type { Logger } from '../logger.js';
import { silentLogger } from '../logger.js';
import type { EventQuery } from '../types/repository.js';
import type { LogEntry } from '../types/entities.js';
import type { EventLogStore } from './types.js';
import { applyQuery, FALLBACK_LAST_TIMESTAMP } from './types.js';

export const LOG_FIELDS = ['Timestamp', 'Date', 'Time', 'Message', 'Code'] as const;

export type LogField = (typeof LOG_FIELDS)[number];

const DELIMITER = ';';
const LINE_END = '\r\n';
const INTEGER_REGEX = /^-?\d+$/;

/** LogEntry の各フィールドを CSV の列値に変換する */
function fieldValue(entry: LogEntry, field: LogField): string {
  switch (field) {
    case 'Timestamp':
      return String(entry.timestamp);
    case 'Date':
      return entry.date;
    case 'Time':
      return entry.time;
    case 'Message':
      return entry.message;
    case 'Code':
      return entry.code;
    default: {
      const _exhaustive: never = field;
      throw new Error(`Unknown field: ${String(_exhaustive)}`);
    }
  }
}

function toRow(entry: LogEntry, fieldOrder: readonly LogField[]): string {
  return fieldOrder.map((field) => fieldValue(entry, field)).join(DELIMITER) + LINE_END;
}

function splitLines(content: string): string[] {
  return content.split(/\r?\n/).filter((line) => line.trim().length > 0);
}

/**
 * ストアの最終行から Timestamp を読み取る。
 *
 * ファイルがない・空・読めない・数値でない場合は 1 を返す (全件受け入れ)。
 */
export function readLastTimestamp(path: string): number {
  let content: string;
  try {
    content = fs.readFileSync(path, 'utf-8');
  } catch {
    return FALLBACK_LAST_TIMESTAMP;
  }

  const lines = splitLines(content);
  if (lines.length === 0) {
    return FALLBACK_LAST_TIMESTAMP;
  }

  const header = lines[0].split(DELIMITER).map((name) => name.trim());
  const column = header.indexOf('Timestamp');
  const lastLine = lines[lines.length - 1];
  const value = lastLine.split(DELIMITER)[column === -1 ? 0 : column]?.trim() ?? '';

  return INTEGER_REGEX.test(value) ? Number(value) : FALLBACK_LAST_TIMESTAMP;
}

/**
 * 新しいエントリだけをストアに追記する。
 *
 * entries は古い順に並んでいる前提で、並べ替えや重複排除は行わない。
 *
 * @param path       - ストアのファイルパス
 * @param entries    - 古い順の LogEntry
 * @param fieldOrder - 列の順序 (ストア新規作成時のヘッダーにも使う)
 * @returns 追記した件数
 */
export function appendNewEntries(
  path: string,
  entries: readonly LogEntry[],
  fieldOrder: readonly LogField[] = LOG_FIELDS,
): number {
  if (!fs.existsSync(path)) {
    fs.writeFileSync(path, fieldOrder.join(DELIMITER) + LINE_END, 'utf-8');
  }

  const lastTimestamp = readLastTimestamp(path);
  const rows = entries
    .filter((entry) => entry.timestamp > lastTimestamp)
    .map((entry) => toRow(entry, fieldOrder));

  if (rows.length > 0) {
    fs.appendFileSync(path, rows.join(''), 'utf-8');
  }
  return rows.length;
}

function isLogField(name: string): name is LogField {
  return LOG_FIELDS.some((field) => field === name);
}

/**
 * ストアの全行を LogEntry として読み戻す。
 * ヘッダーと列数が合わない行は読み飛ばす。
 */
export function readEntries(path: string, logger: Logger = silentLogger): LogEntry[] {
  if (!fs.existsSync(path)) {
    return [];
  }

  const lines = splitLines(fs.readFileSync(path, 'utf-8'));
  if (lines.length === 0) {
    return [];
  }

  const header = lines[0].split(DELIMITER).map((name) => name.trim());
  const entries: LogEntry[] = [];

  for (const [index, line] of lines.slice(1).entries()) {
    const values = line.split(DELIMITER);
    if (values.length !== header.length) {
      logger.warn({ path, line: index + 2 }, 'Skipping row with unexpected column count');
      continue;
    }

    const record: Partial<Record<LogField, string>> = {};
    header.forEach((name, i) => {
      if (isLogField(name)) record[name] = values[i];
    });

    const timestamp = record.Timestamp?.trim() ?? '';
    if (!INTEGER_REGEX.test(timestamp)) {
      logger.warn({ path, line: index + 2 }, 'Skipping row without a numeric Timestamp');
      continue;
    }

    entries.push({
      timestamp: Number(timestamp),
      date: record.Date ?? '',
      time: record.Time ?? '',
      message: record.Message ?? '',
      code: record.Code ?? '',
    });
  }

  return entries;
}

// ============================================================
// EventLogStore 実装
// ============================================================

/** 1 つの CSV ファイルを対象とする EventLogStore。 */
export class CsvEventStore implements EventLogStore {
  readonly kind = 'csv';

  private readonly path: string;
  private readonly fieldOrder: readonly LogField[];
  private readonly logger: Logger;

  constructor(path: string, options: { fieldOrder?: readonly LogField[]; logger?: Logger } = {}) {
    this.path = path;
    this.fieldOrder = options.fieldOrder ?? LOG_FIELDS;
    this.logger = options.logger ?? silentLogger;
  }

  lastTimestamp(): number {
    return readLastTimestamp(this.path);
  }

  appendNewEntries(entries: readonly LogEntry[]): number {
    return appendNewEntries(this.path, entries, this.fieldOrder);
  }

  query(query: EventQuery): LogEntry[] {
    return applyQuery(readEntries(this.path, this.logger), query);
  }

  close(): void {
    // ファイルは操作ごとに開閉している
  }
}
