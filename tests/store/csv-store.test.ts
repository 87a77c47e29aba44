import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import {
  appendNewEntries,
  CsvEventStore,
  readEntries,
  readLastTimestamp,
} from '../../src/store/csv-store.js';
import type { LogEntry } from '../../src/types/entities.js';

// ---------------------------------------------------------------------------
// ヘルパー
// ---------------------------------------------------------------------------

function entry(timestamp: number, message = `event ${timestamp}`): LogEntry {
  return { timestamp, date: '19.10.26', time: '08:15:02', message, code: '1' };
}

const HEADER = 'Timestamp;Date;Time;Message;Code\r\n';

// ---------------------------------------------------------------------------
// テスト
// ---------------------------------------------------------------------------

describe('CSV store', () => {
  let dir: string;
  let file: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'fritzlog-csv-'));
    file = path.join(dir, 'fritzLog.csv');
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  describe('appendNewEntries', () => {
    it('ストアがなければヘッダー付きで作成する', () => {
      const appended = appendNewEntries(file, [entry(100)]);

      expect(appended).toBe(1);
      expect(fs.readFileSync(file, 'utf-8')).toBe(
        `${HEADER}100;19.10.26;08:15:02;event 100;1\r\n`,
      );
    });

    it('エントリが空でもヘッダーだけのストアを作成する', () => {
      expect(appendNewEntries(file, [])).toBe(0);
      expect(fs.readFileSync(file, 'utf-8')).toBe(HEADER);
    });

    it('最終タイムスタンプより新しいエントリだけを渡された順に追記する', () => {
      fs.writeFileSync(file, `${HEADER}150;19.10.26;08:00:00;older;1\r\n`);

      const appended = appendNewEntries(file, [entry(100), entry(200), entry(50), entry(300)]);

      expect(appended).toBe(2);
      expect(fs.readFileSync(file, 'utf-8')).toBe(
        `${HEADER}150;19.10.26;08:00:00;older;1\r\n` +
          '200;19.10.26;08:15:02;event 200;1\r\n' +
          '300;19.10.26;08:15:02;event 300;1\r\n',
      );
    });

    it('同じタイムスタンプのエントリは追記しない', () => {
      appendNewEntries(file, [entry(100)]);

      expect(appendNewEntries(file, [entry(100)])).toBe(0);
    });

    it('同じエントリを 2 回追記しても重複しない', () => {
      const entries = [entry(100), entry(200)];
      appendNewEntries(file, entries);
      appendNewEntries(file, entries);

      expect(readEntries(file)).toHaveLength(2);
    });

    it('fieldOrder の順で列を書く', () => {
      appendNewEntries(file, [entry(100)], ['Timestamp', 'Message', 'Code']);

      expect(fs.readFileSync(file, 'utf-8')).toBe(
        'Timestamp;Message;Code\r\n100;event 100;1\r\n',
      );
    });

    it('メッセージ中のセミコロンはエスケープしない', () => {
      appendNewEntries(file, [entry(100, 'a;b')]);

      expect(fs.readFileSync(file, 'utf-8')).toBe(
        `${HEADER}100;19.10.26;08:15:02;a;b;1\r\n`,
      );
    });
  });

  describe('readLastTimestamp', () => {
    it('ファイルがなければ 1', () => {
      expect(readLastTimestamp(file)).toBe(1);
    });

    it('空ファイルは 1', () => {
      fs.writeFileSync(file, '');

      expect(readLastTimestamp(file)).toBe(1);
    });

    it('ヘッダーだけなら 1', () => {
      fs.writeFileSync(file, HEADER);

      expect(readLastTimestamp(file)).toBe(1);
    });

    it('最終行の Timestamp が数値でなければ 1', () => {
      fs.writeFileSync(file, `${HEADER}abc;19.10.26;08:15:02;x;1\r\n`);

      expect(readLastTimestamp(file)).toBe(1);
    });

    it('末尾の空行を無視して最終行を読む', () => {
      fs.writeFileSync(file, `${HEADER}150;19.10.26;08:00:00;x;1\r\n\r\n`);

      expect(readLastTimestamp(file)).toBe(150);
    });

    it('LF 区切りのファイルも読める', () => {
      fs.writeFileSync(file, 'Timestamp;Date;Time;Message;Code\n42;01.01.70;00:00:42;x;1\n');

      expect(readLastTimestamp(file)).toBe(42);
    });

    it('ヘッダーから Timestamp 列を探す', () => {
      fs.writeFileSync(file, 'Message;Timestamp\r\nhello;77\r\n');

      expect(readLastTimestamp(file)).toBe(77);
    });

    it('追記後は書き込んだ最大のタイムスタンプを返す', () => {
      appendNewEntries(file, [entry(10), entry(20), entry(30)]);

      expect(readLastTimestamp(file)).toBe(30);
    });

    it('ディレクトリなど読めないパスは 1', () => {
      expect(readLastTimestamp(dir)).toBe(1);
    });
  });

  describe('readEntries', () => {
    it('追記したエントリを読み戻す', () => {
      appendNewEntries(file, [entry(100), entry(200)]);

      expect(readEntries(file)).toEqual([entry(100), entry(200)]);
    });

    it('列数が合わない行は読み飛ばす', () => {
      appendNewEntries(file, [entry(100, 'a;b'), entry(200)]);

      expect(readEntries(file)).toEqual([entry(200)]);
    });

    it('ファイルがなければ空配列', () => {
      expect(readEntries(file)).toEqual([]);
    });
  });

  describe('CsvEventStore', () => {
    it('追記・最終タイムスタンプ・検索を 1 ファイルに対して行う', () => {
      const store = new CsvEventStore(file);

      expect(store.kind).toBe('csv');
      expect(store.lastTimestamp()).toBe(1);
      expect(store.appendNewEntries([entry(100), entry(200), entry(300)])).toBe(3);
      expect(store.lastTimestamp()).toBe(300);
      expect(store.query({ since: 150 }).map((e) => e.timestamp)).toEqual([200, 300]);
      expect(store.query({ limit: 1 }).map((e) => e.timestamp)).toEqual([300]);
      expect(store.query({ contains: 'event 1' }).map((e) => e.timestamp)).toEqual([100]);
      store.close();
    });
  });
});
