/**
 * fritzlog — Exclusion rules
 */

import type { ExclusionRule } from '../types/entities.js';

/** 単一ルールがメッセージにマッチするか */
export function matchesRule(message: string, rule: ExclusionRule): boolean {
  if (typeof rule === 'string') {
    return message.includes(rule);
  }
  return rule.every((part) => message.includes(part));
}

/**
 * メッセージが除外対象かどうかを判定する。
 * いずれかのルールにマッチすれば除外する。
 *
 * 空配列のルールは every() の性質上すべてのメッセージにマッチする。
 * 設定読み込み時に空配列は弾いている (src/config.ts)。
 */
export function isExcluded(message: string, rules: readonly ExclusionRule[]): boolean {
  return rules.some((rule) => matchesRule(message, rule));
}
