import { defineConfig } from 'tsdown';

export default defineConfig({
  entry: ['src/index.ts'],
  format: ['esm'],
  clean: true,
  // バンドルに含めるパッケージ
  // - fp-ts: ESM互換性問題を回避
  // - @thanos-snap/*: workspace依存（TypeScriptソースのまま公開されている）をバンドル化
  noExternal: [/^fp-ts/, /^@thanos-snap\//],
});
