import { describe, it, expect } from 'vitest';
import { parseEventLogJson } from '../../src/parser/event-log-parser.js';
import { eventLogJson } from '../helpers/fakes.js';

describe('parseEventLogJson', () => {
  it('data.log の各行を受信順のまま返す', () => {
    const rows = parseEventLogJson(
      eventLogJson([
        ['19.10.26', '08:15:02', 'Internetverbindung wurde erfolgreich hergestellt.', '23'],
        ['19.10.26', '08:14:40', 'WLAN-Gerät angemeldet (2,4 GHz)', '1'],
      ]),
    );

    expect(rows).toEqual([
      {
        date: '19.10.26',
        time: '08:15:02',
        message: 'Internetverbindung wurde erfolgreich hergestellt.',
        code: '23',
      },
      { date: '19.10.26', time: '08:14:40', message: 'WLAN-Gerät angemeldet (2,4 GHz)', code: '1' },
    ]);
  });

  it('数値の code を文字列にする', () => {
    const rows = parseEventLogJson(eventLogJson([['19.10.26', '08:15:02', 'msg', 7]]));

    expect(rows[0].code).toBe('7');
  });

  it('5 要素目以降は無視する', () => {
    const body = JSON.stringify({
      data: { log: [['19.10.26', '08:15:02', 'msg', '3', 'extra', 42]] },
    });

    expect(parseEventLogJson(body)).toEqual([
      { date: '19.10.26', time: '08:15:02', message: 'msg', code: '3' },
    ]);
  });

  it('空の log は空配列', () => {
    expect(parseEventLogJson(eventLogJson([]))).toEqual([]);
  });

  it('JSON として不正な場合は例外を投げる', () => {
    expect(() => parseEventLogJson('<html>login</html>')).toThrow(/^event log JSON: /);
  });

  it('data.log がない場合は例外を投げる', () => {
    expect(() => parseEventLogJson(JSON.stringify({ data: {} }))).toThrow(
      /^event log JSON: data\.log: /,
    );
  });

  it('要素が足りない行は例外を投げる', () => {
    const body = JSON.stringify({ data: { log: [['19.10.26', '08:15:02']] } });

    expect(() => parseEventLogJson(body)).toThrow(/^event log JSON: data\.log\.0/);
  });
});
