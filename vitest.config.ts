import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    // テストファイルのパターン
    include: ['lib/**/*.test.ts', 'tools/**/*.test.ts'],
    // ロガー出力はテストでは抑止
    env: { LOG_LEVEL: 'silent' },
    pool: 'forks',
  },
});
