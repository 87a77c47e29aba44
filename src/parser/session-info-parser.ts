/**
 * fritzlog — SessionInfo XML パーサー
 *
 * login_sid.lua が返す XML を解析する。
 * fast-xml-parser を使用して XML をパースする。
 *
 * ```xml
 * <SessionInfo>
 *   <SID>0000000000000000</SID>
 *   <Challenge>2$10000$5A1711$2000$5A1722</Challenge>
 *   <BlockTime>0</BlockTime>
 * </SessionInfo>
 * ```
 */

import { XMLParser, XMLValidator } from 'fast-xml-parser';

// ============================================================
// XML パース後の型定義
// ============================================================

/** SessionInfo 要素の子要素。値はすべて文字列のまま保持する。 */
export interface SessionInfo {
  SID?: string;
  Challenge?: string;
  BlockTime?: string;
}

// ============================================================
// ユーティリティ
// ============================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** 要素値を文字列として取り出す。子要素を持つ・存在しない場合は undefined */
function textOf(value: unknown): string | undefined {
  if (typeof value === 'string') return value.trim();
  return undefined;
}

// ============================================================
// メインパーサー
// ============================================================

/**
 * SessionInfo XML をパースする。
 *
 * XML として不正な場合、または SessionInfo 要素がない場合は例外を投げる。
 * 子要素の有無の判定は呼び出し側で行う。
 *
 * @param xml - login_sid.lua のレスポンスボディ
 */
export function parseSessionInfoXml(xml: string): SessionInfo {
  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    const { msg, line, col } = validation.err;
    throw new Error(`SessionInfo XML: ${msg} (line ${line}, col ${col})`);
  }

  // "0000000000000000" が数値 0 に変換されないよう、値の型変換は無効にする
  const parser = new XMLParser({
    ignoreAttributes: true,
    ignoreDeclaration: true,
    parseTagValue: false,
  });

  const parsed: unknown = parser.parse(xml);
  if (!isRecord(parsed) || !('SessionInfo' in parsed)) {
    throw new Error('SessionInfo XML: root element SessionInfo is missing');
  }

  const sessionInfo = parsed['SessionInfo'];
  if (!isRecord(sessionInfo)) {
    // <SessionInfo/> は空文字列になる
    return {};
  }

  return {
    SID: textOf(sessionInfo['SID']),
    Challenge: textOf(sessionInfo['Challenge']),
    BlockTime: textOf(sessionInfo['BlockTime']),
  };
}
