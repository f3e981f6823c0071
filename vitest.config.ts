import { defineConfig } from 'vitest/config';
import path from 'path';

export default defineConfig({
  test: {
    // 環境: Node.js（ブラウザAPIは不使用）
    environment: 'node',

    // グローバルAPI有効
    globals: true,

    include: ['src/tests/**/*.test.ts'],

    setupFiles: ['./src/tests/setup.ts'],

    testTimeout: 10000,

    // vi.spyOn のみ各テスト後に元へ戻す
    restoreMocks: true,

    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: [
        'src/lib/utils/**/*.ts',
        'src/lib/config/**/*.ts',
        'src/lib/bls/**/*.ts',
        'src/lib/store/**/*.ts',
        'src/lib/pipeline/**/*.ts',
        'src/lib/dashboard/**/*.ts',
        'src/lib/notification/**/*.ts',
      ],
      thresholds: {
        statements: 80,
        branches: 80,
        functions: 80,
        lines: 80,
      },
    },
  },

  resolve: {
    alias: {
      '@': path.resolve(__dirname, './src'),
    },
  },
});
