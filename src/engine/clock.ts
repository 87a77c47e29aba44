/**
 * fritzlog — Clock
 *
 * ブロック時間の待機をテストで差し替えるための抽象。
 */

import { setTimeout as sleep } from 'node:timers/promises';

/** Node のタイマーが 1 回で待てる最大ミリ秒 (2^31 - 1) */
export const MAX_TIMER_MS = 2_147_483_647;

export interface Clock {
  /** 指定秒数だけ呼び出し元を停止する。途中で起こす手段はない。 */
  sleepSeconds(seconds: number): Promise<void>;
}

/**
 * sleepMs を使う Clock を作る。
 * MAX_TIMER_MS を超える待機は複数回に分けて待つ。
 */
export function createClock(sleepMs: (ms: number) => Promise<unknown> = sleep): Clock {
  return {
    async sleepSeconds(seconds: number): Promise<void> {
      let remaining = seconds * 1000;
      while (remaining > 0) {
        const step = Math.min(remaining, MAX_TIMER_MS);
        await sleepMs(step);
        remaining -= step;
      }
    },
  };
}

export const systemClock: Clock = createClock();
