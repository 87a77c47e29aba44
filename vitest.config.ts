import { defineConfig } from 'vitest/config';

// タイムスタンプ変換はローカルタイムゾーン依存のため UTC に固定する
process.env['TZ'] = 'UTC';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    env: {
      TZ: 'UTC',
    },
  },
});
