import { describe, it, expect } from 'vitest';
import { createClock, MAX_TIMER_MS } from '../../src/engine/clock.js';

function recordingClock(): { waits: number[]; sleepSeconds: (seconds: number) => Promise<void> } {
  const waits: number[] = [];
  const clock = createClock(async (ms) => {
    waits.push(ms);
  });
  return { waits, sleepSeconds: (seconds) => clock.sleepSeconds(seconds) };
}

describe('createClock', () => {
  it('秒をミリ秒に変換して 1 回待つ', async () => {
    const clock = recordingClock();

    await clock.sleepSeconds(7);

    expect(clock.waits).toEqual([7000]);
  });

  it('0 秒なら待たない', async () => {
    const clock = recordingClock();

    await clock.sleepSeconds(0);

    expect(clock.waits).toEqual([]);
  });

  it('タイマーの上限を超える待機は分割する', async () => {
    const clock = recordingClock();

    // 3,000,000 秒 = 3,000,000,000 ms
    await clock.sleepSeconds(3_000_000);

    expect(clock.waits).toEqual([MAX_TIMER_MS, 852_516_353]);
  });
});
