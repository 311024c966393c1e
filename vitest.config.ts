import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const resolveFromRoot = (relative: string): string =>
  fileURLToPath(new URL(relative, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      // ワークスペースパッケージのエイリアス設定
      '@thanos-snap/protection': resolveFromRoot('./packages/thanos-protection/src/index.ts'),
      '@thanos-snap/selection': resolveFromRoot('./packages/thanos-selection/src/index.ts'),
      '@thanos-snap/config-schemas': resolveFromRoot('./packages/thanos-config-schemas/src/index.ts'),
    },
  },
  test: {
    // グローバル設定
    globals: true,
    environment: 'node',

    // タイムアウト設定（Property-based testは時間がかかる）
    testTimeout: 30000,
    hookTimeout: 30000,

    // process.env とモジュール状態（監査ログパス）はテストファイル単位で分離
    pool: 'forks',

    // `npm run test:pbt` で Property: プレフィックス付きテストのみ実行
    include: ['**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
  },
});
